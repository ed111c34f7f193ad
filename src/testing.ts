/**
 * Test utilities: an in-memory transport that records requests and
 * replays queued responses.
 *
 * Usage:
 *   import { MockTransport } from 'cloudwire/testing';
 *
 *   const transport = new MockTransport();
 *   const sqs = new SqsClient({ transport });
 *
 *   transport.respondWith(200, { QueueUrl: 'https://sqs.us-east-1.amazonaws.com/123456789012/orders' });
 *   await sqs.createQueue({ queueName: 'orders' });
 *   transport.assertSent({ headers: { 'X-Amz-Target': 'AmazonSQS.CreateQueue' } });
 */

import type { JsonObject } from './json.js';
import type { HttpMethod } from './request.js';
import type { Transport, TransportRequest, TransportResponse } from './transport/types.js';

export interface MatchOptions {
  method?: HttpMethod;
  /** Substring the URL must contain. */
  url?: string;
  /** Headers that must be present with exactly these values. */
  headers?: Record<string, string>;
  /** Exact body text. */
  body?: string;
  /** Expected number of matching requests. Defaults to at least one. */
  count?: number;
}

export class MockTransport implements Transport {
  /** Every request executed, in order. */
  readonly requests: TransportRequest[] = [];
  private readonly queue: Array<TransportResponse | Error> = [];

  /**
   * Queue a response. Objects are serialized as JSON; strings are sent as is.
   */
  respondWith(
    status: number,
    body: JsonObject | string = '',
    headers: Record<string, string> = {},
  ): this {
    const json = typeof body !== 'string';
    this.queue.push({
      status,
      headers: json ? { 'content-type': 'application/json', ...headers } : headers,
      body: json ? JSON.stringify(body) : body,
    });
    return this;
  }

  /** Queue a transport failure (no response at all). */
  failWith(error: Error): this {
    this.queue.push(error);
    return this;
  }

  async execute(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error(
        `MockTransport: no response queued for ${request.method} ${request.url}. Call respondWith() first.`,
      );
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  /** The most recent request. */
  lastRequest(): TransportRequest {
    const last = this.requests[this.requests.length - 1];
    if (last === undefined) {
      throw new Error('MockTransport: no request has been sent.');
    }
    return last;
  }

  /** The most recent request's body parsed as JSON. */
  lastJsonBody(): unknown {
    return JSON.parse(this.lastRequest().body);
  }

  /** Assert that matching requests were sent. Throws if the assertion fails. */
  assertSent(options: MatchOptions = {}): void {
    const matches = this.requests.filter((request) => matchesRequest(request, options));
    if (options.count !== undefined) {
      if (matches.length !== options.count) {
        throw new Error(
          `Expected ${options.count} matching request(s), found ${matches.length}.`,
        );
      }
    } else if (matches.length === 0) {
      throw new Error(
        `Expected a matching request, found none among ${this.requests.length} sent.`,
      );
    }
  }

  /** Assert that no request was sent. */
  assertNothingSent(): void {
    if (this.requests.length > 0) {
      throw new Error(`Expected no requests, found ${this.requests.length}.`);
    }
  }

  /** Clear recorded requests and queued responses. */
  reset(): void {
    this.requests.length = 0;
    this.queue.length = 0;
  }
}

function matchesRequest(request: TransportRequest, options: MatchOptions): boolean {
  if (options.method !== undefined && request.method !== options.method) return false;
  if (options.url !== undefined && !request.url.includes(options.url)) return false;
  if (options.body !== undefined && request.body !== options.body) return false;
  if (options.headers !== undefined) {
    for (const [name, value] of Object.entries(options.headers)) {
      if (request.headers[name] !== value) return false;
    }
  }
  return true;
}
