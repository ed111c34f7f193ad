/**
 * Metrics recording middleware for service calls.
 *
 * Provides a pluggable interface for recording call metrics
 * (duration, counts, errors) to any metrics backend.
 *
 * @example
 * ```typescript
 * import { metrics, type MetricsRecorder } from 'cloudwire/middleware';
 *
 * const recorder: MetricsRecorder = {
 *   callStarted(service, operation) { console.log('started', operation); },
 *   callCompleted(service, operation, status, durationMs) { console.log('done', durationMs); },
 *   callFailed(service, operation, durationMs, error) { console.error('fail', error); },
 * };
 *
 * sqs.use('metrics', metrics({ recorder }));
 * ```
 *
 * @module
 */

import type { CallContext, NextFunction, RequestMiddleware } from '../middleware.js';
import type { Response } from '../response.js';

/** Interface for recording call metrics. */
export interface MetricsRecorder {
  /** Called before the request is sent. */
  callStarted(service: string, operation: string): void;
  /** Called when the service answered with a 2xx status. */
  callCompleted(service: string, operation: string, status: number, durationMs: number): void;
  /** Called when the call failed, remotely or in transport. */
  callFailed(service: string, operation: string, durationMs: number, error: unknown): void;
}

/** Options for the metrics middleware. */
export interface MetricsOptions {
  /** The metrics recorder to use. */
  recorder: MetricsRecorder;
}

/**
 * Creates request middleware that records call metrics via a
 * {@link MetricsRecorder} interface.
 *
 * @param options - metrics configuration
 * @returns request middleware function
 */
export function metrics(options: MetricsOptions): RequestMiddleware {
  const { recorder } = options;

  return async (ctx: CallContext, next: NextFunction): Promise<Response> => {
    const start = performance.now();

    recorder.callStarted(ctx.service, ctx.operation);

    try {
      const response = await next();
      const durationMs = performance.now() - start;
      recorder.callCompleted(ctx.service, ctx.operation, response.status, durationMs);
      return response;
    } catch (error) {
      const durationMs = performance.now() - start;
      recorder.callFailed(ctx.service, ctx.operation, durationMs, error);
      throw error;
    }
  };
}
