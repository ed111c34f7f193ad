/**
 * Athena value objects shared by several operations, with the functions
 * that read them from a response and, where they are also sent, write them
 * into a request.
 */

import {
  asObject,
  readDate,
  readNumber,
  readObject,
  readString,
  readStringMap,
} from '../hydration.js';
import type { JsonObject, JsonValue } from '../json.js';
import { encodeStringMap, requireField } from '../serialization.js';

/** Data processing unit (DPU) allocation of a session. */
export interface EngineConfiguration {
  /** DPUs for the coordinator; defaults to 1. */
  readonly coordinatorDpuSize?: number | undefined;
  /** Maximum DPUs the session may use concurrently. Required when sent. */
  readonly maxConcurrentDpus?: number | undefined;
  /** DPUs per executor; defaults to 1. */
  readonly defaultExecutorDpuSize?: number | undefined;
  /** Notebook-specific engine settings. */
  readonly additionalConfigs?: Readonly<Record<string, string>> | undefined;
  /** Spark properties applied to the session. */
  readonly sparkProperties?: Readonly<Record<string, string>> | undefined;
}

export function engineConfigurationBody(config: EngineConfiguration): JsonObject {
  const owner = 'EngineConfiguration';
  const payload: JsonObject = {};
  if (config.coordinatorDpuSize !== undefined) {
    payload['CoordinatorDpuSize'] = config.coordinatorDpuSize;
  }
  payload['MaxConcurrentDpus'] = requireField(config.maxConcurrentDpus, 'MaxConcurrentDpus', owner);
  if (config.defaultExecutorDpuSize !== undefined) {
    payload['DefaultExecutorDpuSize'] = config.defaultExecutorDpuSize;
  }
  if (config.additionalConfigs !== undefined) {
    payload['AdditionalConfigs'] = encodeStringMap(config.additionalConfigs);
  }
  if (config.sparkProperties !== undefined) {
    payload['SparkProperties'] = encodeStringMap(config.sparkProperties);
  }
  return payload;
}

export function hydrateEngineConfiguration(raw: JsonObject, path: string): EngineConfiguration {
  return {
    coordinatorDpuSize: readNumber(raw, 'CoordinatorDpuSize', path),
    maxConcurrentDpus: readNumber(raw, 'MaxConcurrentDpus', path),
    defaultExecutorDpuSize: readNumber(raw, 'DefaultExecutorDpuSize', path),
    additionalConfigs: readStringMap(raw, 'AdditionalConfigs', path),
    sparkProperties: readStringMap(raw, 'SparkProperties', path),
  };
}

export interface EngineVersion {
  /** Requested engine version, or `AUTO`. */
  readonly selectedEngineVersion?: string | undefined;
  /** Engine version actually running. */
  readonly effectiveEngineVersion?: string | undefined;
}

export function hydrateEngineVersion(raw: JsonObject, path: string): EngineVersion {
  return {
    selectedEngineVersion: readString(raw, 'SelectedEngineVersion', path),
    effectiveEngineVersion: readString(raw, 'EffectiveEngineVersion', path),
  };
}

export interface SessionConfiguration {
  /** ARN of the execution role the session runs under. */
  readonly executionRole?: string | undefined;
  /** Amazon S3 location holding the session's working files. */
  readonly workingDirectory?: string | undefined;
  readonly idleTimeoutSeconds?: number | undefined;
}

export function hydrateSessionConfiguration(raw: JsonObject, path: string): SessionConfiguration {
  return {
    executionRole: readString(raw, 'ExecutionRole', path),
    workingDirectory: readString(raw, 'WorkingDirectory', path),
    idleTimeoutSeconds: readNumber(raw, 'IdleTimeoutSeconds', path),
  };
}

/** Contains information about the status of a session. */
export interface SessionStatus {
  readonly startDateTime?: Date | undefined;
  readonly lastModifiedDateTime?: Date | undefined;
  readonly endDateTime?: Date | undefined;
  /** Unset when the session is not idle. */
  readonly idleSinceDateTime?: Date | undefined;
  /** One of {@link SessionState}. */
  readonly state?: string | undefined;
  /** Why the state last changed (e.g., cancelled because the session was terminated). */
  readonly stateChangeReason?: string | undefined;
}

export function hydrateSessionStatus(raw: JsonObject, path: string): SessionStatus {
  return {
    startDateTime: readDate(raw, 'StartDateTime', path),
    lastModifiedDateTime: readDate(raw, 'LastModifiedDateTime', path),
    endDateTime: readDate(raw, 'EndDateTime', path),
    idleSinceDateTime: readDate(raw, 'IdleSinceDateTime', path),
    state: readString(raw, 'State', path),
    stateChangeReason: readString(raw, 'StateChangeReason', path),
  };
}

export interface SessionStatistics {
  /** Data processing units consumed, in milliseconds. */
  readonly dpuExecutionInMillis?: number | undefined;
}

export function hydrateSessionStatistics(raw: JsonObject, path: string): SessionStatistics {
  return {
    dpuExecutionInMillis: readNumber(raw, 'DpuExecutionInMillis', path),
  };
}

export interface SessionSummary {
  readonly sessionId?: string | undefined;
  readonly description?: string | undefined;
  readonly engineVersion?: EngineVersion | undefined;
  readonly notebookVersion?: string | undefined;
  readonly status?: SessionStatus | undefined;
}

export function hydrateSessionSummary(value: JsonValue, path: string): SessionSummary {
  const raw = asObject(value, path);
  return {
    sessionId: readString(raw, 'SessionId', path),
    description: readString(raw, 'Description', path),
    engineVersion: readObject(raw, 'EngineVersion', hydrateEngineVersion, path),
    notebookVersion: readString(raw, 'NotebookVersion', path),
    status: readObject(raw, 'Status', hydrateSessionStatus, path),
  };
}
