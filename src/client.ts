/**
 * Base class of the service clients.
 *
 * A client is a thin wrapper: it turns an Input into a request, runs it
 * through the middleware chain and the transport, and hands the checked
 * response back to the service method for hydration.
 */

import { resolveConfiguration, resolveEndpoint } from './configuration.js';
import type { ClientConfig, Configuration } from './configuration.js';
import type { Input } from './input.js';
import {
  MiddlewareChain,
  composeRequest,
  type CallContext,
  type RequestMiddleware,
} from './middleware.js';
import { logging } from './middleware/logging.js';
import { Response } from './response.js';
import type { ErrorFactory } from './response.js';
import { HttpTransport } from './transport/http.js';
import type { Transport } from './transport/types.js';

/** Per-call options. */
export interface CallOptions {
  /** Signal for cancelling the call. */
  signal?: AbortSignal | undefined;
  /** Request timeout in milliseconds, overriding the client default. */
  timeout?: number | undefined;
}

export abstract class AbstractApi {
  protected readonly configuration: Configuration;
  private readonly transport: Transport;
  private readonly middleware = new MiddlewareChain<RequestMiddleware>();

  /** Endpoint prefix of the service (e.g., 'sqs'). */
  protected abstract readonly endpointPrefix: string;
  /** Maps the service's error responses to exceptions. */
  protected abstract readonly errorFactory: ErrorFactory;

  constructor(config: ClientConfig = {}) {
    this.configuration = resolveConfiguration(config);
    this.transport =
      config.transport ??
      new HttpTransport({ timeout: this.configuration.timeout });

    if (config.logger) {
      this.middleware.add('logging', logging({ logger: config.logger }));
    }
  }

  /** Append request middleware. */
  use(name: string, fn: RequestMiddleware): this {
    this.middleware.add(name, fn);
    return this;
  }

  /** The request middleware chain, for reordering or removal. */
  get middlewares(): MiddlewareChain<RequestMiddleware> {
    return this.middleware;
  }

  /**
   * Send an Input and return its response once the status has been checked.
   *
   * @throws MissingRequiredFieldError / InvalidEnumValueError before anything is sent.
   * @throws ServiceError (or a subtype) when the service answers with an error.
   */
  protected async getResponse(
    input: Input,
    operation: string,
    options?: CallOptions,
  ): Promise<Response> {
    const request = input.request();
    const region = input.region ?? this.configuration.region;
    const endpoint = resolveEndpoint(this.configuration, this.endpointPrefix, region);

    const ctx: CallContext = {
      service: this.endpointPrefix,
      operation,
      region,
      request,
      url: request.getUrl(endpoint),
      headers: { ...this.configuration.headers, ...request.headers },
      metadata: new Map(),
      signal: options?.signal,
    };

    const call = composeRequest(this.middleware.entries(), async (c) => {
      const raw = await this.transport.execute({
        method: c.request.method,
        url: c.url,
        headers: c.headers,
        body: c.request.body,
        signal: c.signal,
        timeout: options?.timeout,
      });
      const response = new Response(raw, c.url, this.errorFactory);
      response.checkStatus();
      return response;
    });

    return call(ctx);
  }
}
