import type { EnumValue } from '../enum.js';

/** How a function is invoked. */
export const InvocationType = {
  /** Asynchronous: the event is queued and the call returns immediately. */
  Event: 'Event',
  /** Synchronous: the call waits for the function's response. */
  RequestResponse: 'RequestResponse',
  /** Validates parameters and permissions without running the function. */
  DryRun: 'DryRun',
} as const;

export type InvocationTypeValue = EnumValue<typeof InvocationType>;

/** Whether to return the tail of the execution log (synchronous invocations only). */
export const LogType = {
  None: 'None',
  Tail: 'Tail',
} as const;

export type LogTypeValue = EnumValue<typeof LogType>;

export const ThrottleReason = {
  CallerRateLimitExceeded: 'CallerRateLimitExceeded',
  ConcurrentInvocationLimitExceeded: 'ConcurrentInvocationLimitExceeded',
  ConcurrentSnapshotCreateLimitExceeded: 'ConcurrentSnapshotCreateLimitExceeded',
  FunctionInvocationRateLimitExceeded: 'FunctionInvocationRateLimitExceeded',
  ReservedFunctionConcurrentInvocationLimitExceeded: 'ReservedFunctionConcurrentInvocationLimitExceeded',
  ReservedFunctionInvocationRateLimitExceeded: 'ReservedFunctionInvocationRateLimitExceeded',
} as const;

export type ThrottleReasonValue = EnumValue<typeof ThrottleReason>;
