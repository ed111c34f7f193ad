/**
 * Athena operation inputs (awsJson1_1 protocol).
 */

import { Input } from '../input.js';
import type { InputOptions } from '../input.js';
import type { JsonObject } from '../json.js';
import { awsJsonRequest } from '../protocols.js';
import type { Request } from '../request.js';
import { assertEnumMember, requireField } from '../serialization.js';
import { SessionState } from './enums.js';
import type { SessionStateValue } from './enums.js';
import { engineConfigurationBody } from './types.js';
import type { EngineConfiguration } from './types.js';

const TARGET_PREFIX = 'AmazonAthena';

export interface StartSessionRequestInput extends InputOptions {
  description?: string | null;
  /** Workgroup the session belongs to. Required. */
  workGroup?: string | null;
  /** DPU allocation. Required, and its `maxConcurrentDpus` is required too. */
  engineConfiguration?: EngineConfiguration | null;
  /** Notebook version, e.g. `Athena notebook version 1`. */
  notebookVersion?: string | null;
  /** Minutes of inactivity after which the session is terminated. */
  sessionIdleTimeoutInMinutes?: number | null;
  /** Idempotency token, unique per request. */
  clientRequestToken?: string | null;
}

/** Creates a session for running calculations within a workgroup. */
export class StartSessionRequest extends Input {
  description: string | undefined;
  workGroup: string | undefined;
  engineConfiguration: EngineConfiguration | undefined;
  notebookVersion: string | undefined;
  sessionIdleTimeoutInMinutes: number | undefined;
  clientRequestToken: string | undefined;

  constructor(input: StartSessionRequestInput = {}) {
    super(input);
    this.description = input.description ?? undefined;
    this.workGroup = input.workGroup ?? undefined;
    this.engineConfiguration = input.engineConfiguration ?? undefined;
    this.notebookVersion = input.notebookVersion ?? undefined;
    this.sessionIdleTimeoutInMinutes = input.sessionIdleTimeoutInMinutes ?? undefined;
    this.clientRequestToken = input.clientRequestToken ?? undefined;
  }

  static create(input: StartSessionRequest | StartSessionRequestInput): StartSessionRequest {
    return input instanceof StartSessionRequest ? input : new StartSessionRequest(input);
  }

  request(): Request {
    return awsJsonRequest('1.1', `${TARGET_PREFIX}.StartSession`, this.requestBody());
  }

  private requestBody(): JsonObject {
    const owner = 'StartSessionRequest';
    const payload: JsonObject = {};
    if (this.description !== undefined) {
      payload['Description'] = this.description;
    }
    payload['WorkGroup'] = requireField(this.workGroup, 'WorkGroup', owner);
    payload['EngineConfiguration'] = engineConfigurationBody(
      requireField(this.engineConfiguration, 'EngineConfiguration', owner),
    );
    if (this.notebookVersion !== undefined) {
      payload['NotebookVersion'] = this.notebookVersion;
    }
    if (this.sessionIdleTimeoutInMinutes !== undefined) {
      payload['SessionIdleTimeoutInMinutes'] = this.sessionIdleTimeoutInMinutes;
    }
    if (this.clientRequestToken !== undefined) {
      payload['ClientRequestToken'] = this.clientRequestToken;
    }
    return payload;
  }
}

export interface GetSessionRequestInput extends InputOptions {
  /** Required. */
  sessionId?: string | null;
}

/** Gets the full details of a previously created session. */
export class GetSessionRequest extends Input {
  sessionId: string | undefined;

  constructor(input: GetSessionRequestInput = {}) {
    super(input);
    this.sessionId = input.sessionId ?? undefined;
  }

  static create(input: GetSessionRequest | GetSessionRequestInput): GetSessionRequest {
    return input instanceof GetSessionRequest ? input : new GetSessionRequest(input);
  }

  request(): Request {
    return awsJsonRequest('1.1', `${TARGET_PREFIX}.GetSession`, {
      SessionId: requireField(this.sessionId, 'SessionId', 'GetSessionRequest'),
    });
  }
}

export interface ListSessionsRequestInput extends InputOptions {
  /** Workgroup to list sessions of. Required. */
  workGroup?: string | null;
  /** Only return sessions in this state. */
  stateFilter?: SessionStateValue | (string & {}) | null;
  /** Page size, 1 to 100. */
  maxResults?: number | null;
  /** Token from a previous page's `nextToken`. */
  nextToken?: string | null;
}

/** Lists the sessions in a workgroup, newest first. */
export class ListSessionsRequest extends Input {
  workGroup: string | undefined;
  stateFilter: SessionStateValue | (string & {}) | undefined;
  maxResults: number | undefined;
  nextToken: string | undefined;

  constructor(input: ListSessionsRequestInput = {}) {
    super(input);
    this.workGroup = input.workGroup ?? undefined;
    this.stateFilter = input.stateFilter ?? undefined;
    this.maxResults = input.maxResults ?? undefined;
    this.nextToken = input.nextToken ?? undefined;
  }

  static create(input: ListSessionsRequest | ListSessionsRequestInput): ListSessionsRequest {
    return input instanceof ListSessionsRequest ? input : new ListSessionsRequest(input);
  }

  request(): Request {
    return awsJsonRequest('1.1', `${TARGET_PREFIX}.ListSessions`, this.requestBody());
  }

  private requestBody(): JsonObject {
    const owner = 'ListSessionsRequest';
    const payload: JsonObject = {};
    payload['WorkGroup'] = requireField(this.workGroup, 'WorkGroup', owner);
    if (this.stateFilter !== undefined) {
      payload['StateFilter'] = assertEnumMember(
        SessionState, 'SessionState', this.stateFilter, 'StateFilter', owner,
      );
    }
    if (this.maxResults !== undefined) {
      payload['MaxResults'] = this.maxResults;
    }
    if (this.nextToken !== undefined) {
      payload['NextToken'] = this.nextToken;
    }
    return payload;
  }
}
