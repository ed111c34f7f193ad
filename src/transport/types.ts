/**
 * Transport interface: the collaborator that performs the network call.
 * Signing, retries and connection reuse all live behind this seam.
 */

import type { HttpMethod } from '../request.js';

/** A fully resolved HTTP call. */
export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL, query string included. */
  url: string;
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal | undefined;
  /** Request timeout in milliseconds. */
  timeout?: number | undefined;
}

/** The raw answer: status, headers (any casing) and the unparsed body. */
export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface Transport {
  /**
   * Execute one HTTP call. Resolves for every HTTP status; rejects only when
   * no response could be obtained.
   */
  execute(request: TransportRequest): Promise<TransportResponse>;
}

/** Configuration for the bundled fetch transport. */
export interface TransportConfig {
  /** Default request timeout in milliseconds. */
  timeout?: number | undefined;
}
