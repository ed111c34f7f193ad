/**
 * Transport-level description of one HTTP call, produced by an Input's
 * `request()` method.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD' | 'PATCH';

export class Request {
  constructor(
    readonly method: HttpMethod,
    /** Path relative to the service endpoint, starting with `/`. */
    readonly uri: string,
    readonly query: Readonly<Record<string, string>>,
    readonly headers: Readonly<Record<string, string>>,
    readonly body: string,
  ) {}

  /** Resolve the absolute URL against a service endpoint. */
  getUrl(endpoint: string): string {
    const base = endpoint.replace(/\/+$/, '');
    const params = new URLSearchParams();
    for (const [name, value] of Object.entries(this.query)) {
      params.set(name, value);
    }
    const query = params.toString();
    return `${base}${this.uri}${query ? `?${query}` : ''}`;
  }
}
