/**
 * HTTP transport implementation using the built-in `fetch` API.
 *
 * Sends exactly one request per call: no retries, no signing. Wrap it or
 * supply another {@link Transport} for either.
 */

import { ConnectionError } from '../errors.js';
import type {
  Transport,
  TransportConfig,
  TransportRequest,
  TransportResponse,
} from './types.js';

const DEFAULT_TIMEOUT = 30_000;

export class HttpTransport implements Transport {
  private readonly defaultTimeout: number;

  constructor(config: TransportConfig = {}) {
    this.defaultTimeout = config.timeout ?? DEFAULT_TIMEOUT;
  }

  async execute(request: TransportRequest): Promise<TransportResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;

    // Set up timeout via AbortController
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    // Chain the external signal if provided
    const onAbort = (): void => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const hasBody = request.method !== 'GET' && request.method !== 'HEAD' && request.body !== '';
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        signal: controller.signal,
        ...(hasBody ? { body: request.body } : {}),
      });
      const body = await response.text();

      return {
        status: response.status,
        headers: headersToRecord(response.headers),
        body,
      };
    } catch (error) {
      // Wrap fetch/network errors
      if (error instanceof TypeError || error instanceof DOMException) {
        throw new ConnectionError(
          `Connection to "${request.url}" failed: ${error.message}`,
          error,
        );
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name] = value;
  });
  return record;
}
