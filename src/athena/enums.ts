import type { EnumValue } from '../enum.js';

/** Lifecycle state of a Spark session. */
export const SessionState = {
  BUSY: 'BUSY',
  CREATED: 'CREATED',
  CREATING: 'CREATING',
  DEGRADED: 'DEGRADED',
  FAILED: 'FAILED',
  IDLE: 'IDLE',
  TERMINATED: 'TERMINATED',
  TERMINATING: 'TERMINATING',
} as const;

export type SessionStateValue = EnumValue<typeof SessionState>;

export const ThrottleReason = {
  CONCURRENT_QUERY_LIMIT_EXCEEDED: 'CONCURRENT_QUERY_LIMIT_EXCEEDED',
} as const;

export type ThrottleReasonValue = EnumValue<typeof ThrottleReason>;
