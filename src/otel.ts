/**
 * OpenTelemetry middleware for service calls.
 *
 * Instruments every call with a CLIENT span and call metrics.
 *
 * @example
 * ```typescript
 * import { SqsClient } from 'cloudwire';
 * import { openTelemetryMiddleware } from 'cloudwire/otel';
 * import { trace, metrics } from '@opentelemetry/api';
 *
 * const sqs = new SqsClient();
 * sqs.use('otel', openTelemetryMiddleware({
 *   tracerProvider: trace.getTracerProvider(),
 *   meterProvider: metrics.getMeterProvider(),
 * }));
 * ```
 *
 * @module
 */

import { ServiceError } from './errors.js';
import type { CallContext, NextFunction, RequestMiddleware } from './middleware.js';
import type { Response } from './response.js';

/**
 * OpenTelemetry API interfaces (peer dependency).
 * Users must install `@opentelemetry/api` separately.
 */
interface OTelSpanOptions {
  kind?: number;
  attributes?: Record<string, string | number | boolean>;
}

interface OTelTracer {
  startActiveSpan<T>(name: string, options: OTelSpanOptions, fn: (span: OTelSpan) => T): T;
}

interface OTelSpan {
  setAttribute(key: string, value: string | number | boolean): void;
  setStatus(status: { code: number; message?: string }): void;
  recordException(error: Error | string): void;
  end(): void;
}

interface OTelCounter {
  add(value: number, attributes?: Record<string, string>): void;
}

interface OTelHistogram {
  record(value: number, attributes?: Record<string, string>): void;
}

interface OTelTracerProvider {
  getTracer(name: string, version?: string): OTelTracer;
}

interface OTelMeterProvider {
  getMeter(name: string, version?: string): {
    createCounter(name: string, options?: { description?: string }): OTelCounter;
    createHistogram(name: string, options?: { description?: string; unit?: string }): OTelHistogram;
  };
}

/** Configuration for OpenTelemetry middleware. */
export interface OpenTelemetryConfig {
  /** OpenTelemetry tracer provider. If omitted, no spans are created. */
  tracerProvider?: OTelTracerProvider;
  /** OpenTelemetry meter provider. If omitted, no metrics are recorded. */
  meterProvider?: OTelMeterProvider;
}

const INSTRUMENTATION_NAME = 'cloudwire';

/**
 * Creates request middleware that instruments service calls with
 * OpenTelemetry traces and metrics.
 *
 * Creates a CLIENT span named `<service>.<operation>` and records:
 * - `cloudwire.call.completed` (counter)
 * - `cloudwire.call.failed` (counter)
 * - `cloudwire.call.duration` (histogram, seconds)
 */
export function openTelemetryMiddleware(config: OpenTelemetryConfig = {}): RequestMiddleware {
  const tracer = config.tracerProvider?.getTracer(INSTRUMENTATION_NAME);
  const meter = config.meterProvider?.getMeter(INSTRUMENTATION_NAME);

  const callsCompleted = meter?.createCounter('cloudwire.call.completed', { description: 'Calls answered with a 2xx status' });
  const callsFailed = meter?.createCounter('cloudwire.call.failed', { description: 'Calls that failed' });
  const callDuration = meter?.createHistogram('cloudwire.call.duration', { description: 'Call duration in seconds', unit: 's' });

  return async (ctx: CallContext, next: NextFunction): Promise<Response> => {
    const metricAttrs = {
      'rpc.service': ctx.service,
      'rpc.method': ctx.operation,
      'cloud.region': ctx.region,
    };

    if (!tracer) {
      const start = performance.now();
      try {
        const response = await next();
        callDuration?.record((performance.now() - start) / 1000, metricAttrs);
        callsCompleted?.add(1, metricAttrs);
        return response;
      } catch (error) {
        callDuration?.record((performance.now() - start) / 1000, metricAttrs);
        callsFailed?.add(1, metricAttrs);
        throw error;
      }
    }

    return tracer.startActiveSpan(
      `${ctx.service}.${ctx.operation}`,
      {
        kind: 3, // SpanKind.CLIENT
        attributes: {
          'rpc.system': 'aws-api',
          'rpc.service': ctx.service,
          'rpc.method': ctx.operation,
          'cloud.region': ctx.region,
          'http.request.method': ctx.request.method,
          'url.full': ctx.url,
        },
      },
      async (span: OTelSpan) => {
        const start = performance.now();
        try {
          const response = await next();

          span.setAttribute('http.response.status_code', response.status);
          span.setStatus({ code: 1 }); // SpanStatusCode.OK
          callDuration?.record((performance.now() - start) / 1000, metricAttrs);
          callsCompleted?.add(1, metricAttrs);
          span.end();
          return response;
        } catch (error) {
          if (error instanceof ServiceError) {
            span.setAttribute('http.response.status_code', error.statusCode);
            span.setAttribute('aws.error.code', error.code);
          }
          span.recordException(error instanceof Error ? error : String(error));
          span.setStatus({ code: 2, message: String(error) }); // SpanStatusCode.ERROR
          callDuration?.record((performance.now() - start) / 1000, metricAttrs);
          callsFailed?.add(1, metricAttrs);
          span.end();
          throw error;
        }
      },
    );
  };
}
