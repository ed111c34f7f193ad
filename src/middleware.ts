/**
 * Request middleware: an onion-model chain wrapped around every service
 * call, between `Input.request()` and the transport.
 */

import type { Request } from './request.js';
import type { Response } from './response.js';

/** The context provided to request middleware. */
export interface CallContext {
  /** Endpoint prefix of the service (e.g., 'sqs'). */
  service: string;
  /** Operation name (e.g., 'CreateQueue'). */
  operation: string;
  /** Region the call is sent to. */
  region: string;
  /** The request produced by the Input. */
  request: Request;
  /** Absolute URL the request is sent to. */
  url: string;
  /**
   * Headers that will be sent. Client-wide headers merged with the
   * request's own; middleware may add to them.
   */
  headers: Record<string, string>;
  /** Mutable metadata store scoped to this call. */
  metadata: Map<string, unknown>;
  /** Signal for cooperative cancellation. */
  signal?: AbortSignal | undefined;
}

/** The next function in the middleware chain. */
export type NextFunction = () => Promise<Response>;

/** A request middleware function. */
export type RequestMiddleware = (
  ctx: CallContext,
  next: NextFunction,
) => Promise<Response>;

// ---- Middleware Chain ----

/**
 * A composable middleware chain.
 * Supports add, prepend, insertBefore, insertAfter, and remove by name.
 */
export class MiddlewareChain<T> {
  private chain: { name: string; fn: T }[] = [];

  /** Append middleware to the end of the chain. */
  add(name: string, fn: T): this {
    this.chain.push({ name, fn });
    return this;
  }

  /** Insert middleware at the beginning of the chain. */
  prepend(name: string, fn: T): this {
    this.chain.unshift({ name, fn });
    return this;
  }

  /** Insert middleware immediately before an existing middleware. */
  insertBefore(existingName: string, name: string, fn: T): this {
    const index = this.indexOf(existingName);
    if (index === -1) {
      throw new Error(`Middleware '${existingName}' not found in chain.`);
    }
    this.chain.splice(index, 0, { name, fn });
    return this;
  }

  /** Insert middleware immediately after an existing middleware. */
  insertAfter(existingName: string, name: string, fn: T): this {
    const index = this.indexOf(existingName);
    if (index === -1) {
      throw new Error(`Middleware '${existingName}' not found in chain.`);
    }
    this.chain.splice(index + 1, 0, { name, fn });
    return this;
  }

  /** Remove a middleware by name. */
  remove(name: string): this {
    const index = this.indexOf(name);
    if (index !== -1) {
      this.chain.splice(index, 1);
    }
    return this;
  }

  has(name: string): boolean {
    return this.indexOf(name) !== -1;
  }

  /** Get the ordered list of middleware functions. */
  entries(): readonly { name: string; fn: T }[] {
    return this.chain;
  }

  get length(): number {
    return this.chain.length;
  }

  clear(): void {
    this.chain = [];
  }

  private indexOf(name: string): number {
    return this.chain.findIndex((m) => m.name === name);
  }
}

/**
 * Compose request middleware into a single call function.
 * Each middleware wraps the next; the innermost step is `handler`.
 */
export function composeRequest(
  middlewares: readonly { name: string; fn: RequestMiddleware }[],
  handler: (ctx: CallContext) => Promise<Response>,
): (ctx: CallContext) => Promise<Response> {
  return (ctx: CallContext) => {
    let index = -1;

    function dispatch(i: number): Promise<Response> {
      if (i <= index) {
        return Promise.reject(new Error('next() called multiple times'));
      }
      index = i;

      const middleware = middlewares[i];
      if (!middleware) {
        return handler(ctx);
      }

      return middleware.fn(ctx, () => dispatch(i + 1));
    }

    return dispatch(0);
  };
}
