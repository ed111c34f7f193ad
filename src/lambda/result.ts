/**
 * Lambda operation results.
 */

import type { Response } from '../response.js';

export interface InvocationResponse {
  /** HTTP status: 200 for RequestResponse, 202 for Event, 204 for DryRun. */
  readonly statusCode?: number | undefined;
  /**
   * Set when the function raised an error; the payload then holds the
   * error details. `Unhandled` for runtime errors.
   */
  readonly functionError?: string | undefined;
  /** Last 4 KB of the execution log, base64-encoded (LogType Tail only). */
  readonly logResult?: string | undefined;
  /** The function's response, or its error object. */
  readonly payload?: string | undefined;
  /** The version of the function that ran. */
  readonly executedVersion?: string | undefined;
}

/** Invoke answers through status, headers and a raw body rather than a JSON document. */
export function hydrateInvocationResponse(response: Response): InvocationResponse {
  return {
    statusCode: response.status,
    functionError: response.getHeader('x-amz-function-error'),
    logResult: response.getHeader('x-amz-log-result'),
    payload: response.getContent(),
    executedVersion: response.getHeader('x-amz-executed-version'),
  };
}
