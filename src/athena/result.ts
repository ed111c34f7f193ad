/**
 * Athena operation results.
 */

import { readList, readObject, readString } from '../hydration.js';
import type { JsonObject } from '../json.js';
import {
  hydrateEngineConfiguration,
  hydrateEngineVersion,
  hydrateSessionConfiguration,
  hydrateSessionStatistics,
  hydrateSessionStatus,
  hydrateSessionSummary,
} from './types.js';
import type {
  EngineConfiguration,
  EngineVersion,
  SessionConfiguration,
  SessionStatistics,
  SessionStatus,
  SessionSummary,
} from './types.js';

export interface StartSessionResponse {
  readonly sessionId?: string | undefined;
  /** One of {@link SessionState}. */
  readonly state?: string | undefined;
}

export function hydrateStartSessionResponse(data: JsonObject): StartSessionResponse {
  return {
    sessionId: readString(data, 'SessionId'),
    state: readString(data, 'State'),
  };
}

export interface GetSessionResponse {
  readonly sessionId?: string | undefined;
  readonly description?: string | undefined;
  readonly workGroup?: string | undefined;
  readonly engineVersion?: EngineVersion | undefined;
  readonly engineConfiguration?: EngineConfiguration | undefined;
  readonly notebookVersion?: string | undefined;
  readonly sessionConfiguration?: SessionConfiguration | undefined;
  readonly status?: SessionStatus | undefined;
  readonly statistics?: SessionStatistics | undefined;
}

export function hydrateGetSessionResponse(data: JsonObject): GetSessionResponse {
  return {
    sessionId: readString(data, 'SessionId'),
    description: readString(data, 'Description'),
    workGroup: readString(data, 'WorkGroup'),
    engineVersion: readObject(data, 'EngineVersion', hydrateEngineVersion),
    engineConfiguration: readObject(data, 'EngineConfiguration', hydrateEngineConfiguration),
    notebookVersion: readString(data, 'NotebookVersion'),
    sessionConfiguration: readObject(data, 'SessionConfiguration', hydrateSessionConfiguration),
    status: readObject(data, 'Status', hydrateSessionStatus),
    statistics: readObject(data, 'Statistics', hydrateSessionStatistics),
  };
}

export interface ListSessionsResponse {
  /** Present when more sessions are available. */
  readonly nextToken?: string | undefined;
  readonly sessions?: readonly SessionSummary[] | undefined;
}

export function hydrateListSessionsResponse(data: JsonObject): ListSessionsResponse {
  return {
    nextToken: readString(data, 'NextToken'),
    sessions: readList(data, 'Sessions', hydrateSessionSummary),
  };
}
