/**
 * Example: Request middleware on a service client.
 *
 * Demonstrates the built-in logging and metrics middleware, a custom
 * middleware, and OpenTelemetry instrumentation.
 */

import { trace, metrics as otelMetrics } from '@opentelemetry/api';
import { AthenaClient, athena } from '../src/index.js';
import type { CallContext, NextFunction } from '../src/index.js';
import { logging, metrics } from '../src/middleware/index.js';
import { openTelemetryMiddleware } from '../src/otel.js';

const client = new AthenaClient({ region: 'us-east-2' });

// Logging is added first, so it is outermost
client.use('logging', logging({ level: 'debug' }));

// Count calls per operation
const counts = new Map<string, number>();
client.use('metrics', metrics({
  recorder: {
    callStarted(service, operation) {
      counts.set(operation, (counts.get(operation) ?? 0) + 1);
    },
    callCompleted(service, operation, status, durationMs) {
      console.log(`${service}.${operation} -> ${status} in ${durationMs.toFixed(1)}ms`);
    },
    callFailed(service, operation, durationMs, error) {
      console.error(`${service}.${operation} failed after ${durationMs.toFixed(1)}ms`, error);
    },
  },
}));

// Tag every request with a correlation id
client.use('correlation', async (ctx: CallContext, next: NextFunction) => {
  ctx.headers['X-Correlation-Id'] = crypto.randomUUID();
  return next();
});

// Traces and metrics through whatever OpenTelemetry SDK is registered
client.use('otel', openTelemetryMiddleware({
  tracerProvider: trace.getTracerProvider(),
  meterProvider: otelMetrics.getMeterProvider(),
}));

// Record the start time just outside the otel span
client.middlewares.insertBefore('otel', 'timing', async (ctx, next) => {
  ctx.metadata.set('startedAt', Date.now());
  return next();
});

const page = await client.listSessions({
  workGroup: 'spark-wg',
  stateFilter: athena.SessionState.IDLE,
  maxResults: 10,
});
for (const session of page.sessions ?? []) {
  console.log(`${session.sessionId ?? '?'}: ${session.status?.state ?? 'unknown'}`);
}
console.log('Calls:', Object.fromEntries(counts));
