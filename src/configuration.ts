/**
 * Client configuration and its resolution against the environment.
 */

import type { Logger } from './middleware/logging.js';
import type { Transport } from './transport/types.js';

export const DEFAULT_REGION = 'us-east-1';

/** Configuration options accepted by every service client. */
export interface ClientConfig {
  /** Region to call (e.g., 'eu-west-1'). Defaults to AWS_REGION, then us-east-1. */
  region?: string | undefined;
  /**
   * Endpoint override (e.g., 'http://localhost:4566'). May contain a
   * `%region%` placeholder. Defaults to AWS_ENDPOINT_URL, then the public
   * endpoint of the service.
   */
  endpoint?: string | undefined;
  /** Custom headers included in every request. */
  headers?: Record<string, string> | undefined;
  /** Default request timeout in milliseconds for the bundled transport. */
  timeout?: number | undefined;
  /** Custom transport implementation (for testing, signing, or retries). */
  transport?: Transport | undefined;
  /** When set, a logging middleware writing to this logger is installed. */
  logger?: Logger | undefined;
  /** Environment to read defaults from. Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>> | undefined;
}

/** Configuration after defaults have been applied. */
export interface Configuration {
  region: string;
  endpoint: string | undefined;
  headers: Record<string, string>;
  timeout: number | undefined;
}

export function resolveConfiguration(config: ClientConfig = {}): Configuration {
  const env = config.env ?? process.env;
  return {
    region:
      nonEmpty(config.region) ??
      nonEmpty(env['AWS_REGION']) ??
      nonEmpty(env['AWS_DEFAULT_REGION']) ??
      DEFAULT_REGION,
    endpoint: nonEmpty(config.endpoint) ?? nonEmpty(env['AWS_ENDPOINT_URL']),
    headers: { ...config.headers },
    timeout: config.timeout,
  };
}

/**
 * The endpoint a service is reached at in a region, without trailing slash.
 */
export function resolveEndpoint(
  configuration: Configuration,
  endpointPrefix: string,
  region: string,
): string {
  const template = configuration.endpoint ?? `https://${endpointPrefix}.%region%.amazonaws.com`;
  return template.replace('%region%', region).replace(/\/+$/, '');
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}
