/**
 * Common request middleware implementations.
 *
 * @example
 * ```typescript
 * import { logging, metrics } from 'cloudwire/middleware';
 * ```
 *
 * @module
 */

export { logging } from './logging.js';
export type { Logger, LoggingOptions } from './logging.js';

export { metrics } from './metrics.js';
export type { MetricsRecorder, MetricsOptions } from './metrics.js';
