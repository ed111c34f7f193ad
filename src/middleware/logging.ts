/**
 * Structured logging middleware for service calls.
 *
 * Logs call start, completion, and failure with timing information.
 *
 * @example
 * ```typescript
 * import { SqsClient } from 'cloudwire';
 * import { logging } from 'cloudwire/middleware';
 *
 * const sqs = new SqsClient({ region: 'eu-west-1' });
 * sqs.use('logging', logging({ level: 'debug' }));
 * ```
 *
 * @module
 */

import type { CallContext, NextFunction, RequestMiddleware } from '../middleware.js';
import type { Response } from '../response.js';

/** The subset of `console` the logging middleware writes to. */
export type Logger = Pick<Console, 'log' | 'error' | 'debug'>;

/** Options for the logging middleware. */
export interface LoggingOptions {
  /** Logger instance. Defaults to `console`. */
  logger?: Logger;
  /** Minimum log level. Defaults to `'info'`. */
  level?: 'debug' | 'info' | 'error';
}

/**
 * Creates request middleware that logs call start, completion, and failure.
 *
 * @param options - logging configuration
 * @returns request middleware function
 */
export function logging(options?: LoggingOptions): RequestMiddleware {
  const logger = options?.logger ?? console;
  const level = options?.level ?? 'info';

  return async (ctx: CallContext, next: NextFunction): Promise<Response> => {
    const start = performance.now();
    const label = `${ctx.service}.${ctx.operation}`;

    if (level === 'debug') {
      logger.debug(
        `[cloudwire] Call started: ${label} (${ctx.request.method} ${ctx.url})`,
      );
    }

    try {
      const response = await next();
      const duration = (performance.now() - start).toFixed(2);

      if (level !== 'error') {
        logger.log(
          `[cloudwire] Call completed: ${label} (status=${response.status}, ${duration}ms)`,
        );
      }

      return response;
    } catch (error) {
      const duration = (performance.now() - start).toFixed(2);
      logger.error(
        `[cloudwire] Call failed: ${label} (region=${ctx.region}, ${duration}ms)`,
        error,
      );
      throw error;
    }
  };
}
