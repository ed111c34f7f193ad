/**
 * Wrapper around a raw transport response. Success bodies are parsed on
 * demand; error statuses are turned into typed exceptions by the error
 * factory the service client supplies.
 */

import { MalformedResponseError } from './errors.js';
import type { ServiceError } from './errors.js';
import { isJsonObject } from './json.js';
import type { JsonObject } from './json.js';
import type { TransportResponse } from './transport/types.js';

/** Builds the exception matching an error response. */
export type ErrorFactory = (response: Response) => ServiceError;

export class Response {
  readonly status: number;
  /** The URL the request was sent to. */
  readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly body: string;
  private readonly errorFactory: ErrorFactory;

  constructor(raw: TransportResponse, url: string, errorFactory: ErrorFactory) {
    this.status = raw.status;
    this.url = url;
    this.body = raw.body;
    this.errorFactory = errorFactory;

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(raw.headers)) {
      headers[name.toLowerCase()] = value;
    }
    this.headers = headers;
  }

  /** Case-insensitive header lookup. */
  getHeader(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  /** All headers, with lower-cased names. */
  getHeaders(): Readonly<Record<string, string>> {
    return this.headers;
  }

  isSuccessful(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  /** @throws ServiceError (or a subtype) when the status is not 2xx. */
  checkStatus(): void {
    if (!this.isSuccessful()) {
      throw this.errorFactory(this);
    }
  }

  /** The raw body text. */
  getContent(throwOnError = true): string {
    if (throwOnError) this.checkStatus();
    return this.body;
  }

  /**
   * The body parsed as a JSON object. An empty body reads as `{}`.
   * @throws MalformedResponseError when the body is not a JSON object.
   */
  toArray(throwOnError = true): JsonObject {
    if (throwOnError) this.checkStatus();
    if (this.body.trim() === '') {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.body);
    } catch (error) {
      throw new MalformedResponseError(
        `Response body from "${this.url}" is not valid JSON.`,
        '',
        error instanceof Error ? error : undefined,
      );
    }
    if (!isJsonObject(parsed)) {
      throw new MalformedResponseError(
        `Response body from "${this.url}" is not a JSON object.`,
        '',
      );
    }
    return parsed;
  }
}
