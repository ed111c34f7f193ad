import { describe, it, expect, beforeEach } from 'vitest';
import {
  AthenaClient,
  InternalServerException,
  InvalidRequestException,
  ListSessionsRequest,
  ResourceNotFoundException,
  SessionAlreadyExistsException,
  SessionState,
  StartSessionRequest,
  TooManyRequestsException,
  engineConfigurationBody,
  hydrateGetSessionResponse,
  hydrateListSessionsResponse,
} from '../src/athena/index.js';
import {
  InvalidEnumValueError,
  MalformedResponseError,
  MissingRequiredFieldError,
} from '../src/errors.js';
import { MockTransport } from '../src/testing.js';

describe('StartSessionRequest', () => {
  it('writes fields in wire order, nested configuration included', () => {
    const request = new StartSessionRequest({
      description: 'nightly',
      workGroup: 'spark-wg',
      engineConfiguration: { maxConcurrentDpus: 20, coordinatorDpuSize: 1, sparkProperties: {} },
      sessionIdleTimeoutInMinutes: 15,
    }).request();

    expect(request.headers['X-Amz-Target']).toBe('AmazonAthena.StartSession');
    expect(request.headers['Content-Type']).toBe('application/x-amz-json-1.1');
    expect(request.body).toBe(
      '{"Description":"nightly","WorkGroup":"spark-wg","EngineConfiguration":{"CoordinatorDpuSize":1,"MaxConcurrentDpus":20,"SparkProperties":{}},"SessionIdleTimeoutInMinutes":15}',
    );
  });

  it('requires the workgroup and engine configuration', () => {
    expect(() =>
      new StartSessionRequest({ engineConfiguration: { maxConcurrentDpus: 2 } }).request(),
    ).toThrow('Missing parameter "WorkGroup" for "StartSessionRequest". The value cannot be null.');
    expect(() => new StartSessionRequest({ workGroup: 'wg' }).request()).toThrow(
      MissingRequiredFieldError,
    );
  });

  it('requires maxConcurrentDpus inside the engine configuration', () => {
    try {
      new StartSessionRequest({ workGroup: 'wg', engineConfiguration: {} }).request();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingRequiredFieldError);
      if (error instanceof MissingRequiredFieldError) {
        expect(error.field).toBe('MaxConcurrentDpus');
        expect(error.owner).toBe('EngineConfiguration');
      }
    }
  });
});

describe('engineConfigurationBody', () => {
  it('writes additional configs', () => {
    expect(
      engineConfigurationBody({ maxConcurrentDpus: 4, additionalConfigs: { NotebookId: 'nb-1' } }),
    ).toEqual({ MaxConcurrentDpus: 4, AdditionalConfigs: { NotebookId: 'nb-1' } });
  });
});

describe('ListSessionsRequest', () => {
  it('writes the state filter and paging fields', () => {
    const request = new ListSessionsRequest({
      workGroup: 'spark-wg',
      stateFilter: SessionState.IDLE,
      maxResults: 10,
      nextToken: 'page-2',
    }).request();
    expect(request.body).toBe(
      '{"WorkGroup":"spark-wg","StateFilter":"IDLE","MaxResults":10,"NextToken":"page-2"}',
    );
  });

  it('rejects unknown states', () => {
    const input = new ListSessionsRequest({ workGroup: 'spark-wg', stateFilter: 'SLEEPING' });
    expect(() => input.request()).toThrow(InvalidEnumValueError);
    expect(() => input.request()).toThrow(
      'Invalid parameter "StateFilter" for "ListSessionsRequest". The value "SLEEPING" is not a valid "SessionState".',
    );
  });
});

describe('hydrateGetSessionResponse', () => {
  it('hydrates nested structures and timestamps', () => {
    const result = hydrateGetSessionResponse({
      SessionId: 'sess-1',
      WorkGroup: 'spark-wg',
      EngineVersion: { SelectedEngineVersion: 'AUTO', EffectiveEngineVersion: 'PySpark engine version 3' },
      EngineConfiguration: { CoordinatorDpuSize: 1, MaxConcurrentDpus: 20, DefaultExecutorDpuSize: 1 },
      SessionConfiguration: { WorkingDirectory: 's3://bucket/work/', IdleTimeoutSeconds: 900 },
      Status: {
        StartDateTime: 1700000000,
        LastModifiedDateTime: '2023-11-14T22:15:00Z',
        State: 'IDLE',
      },
      Statistics: { DpuExecutionInMillis: 1200 },
      SomethingNew: 'ignored',
    });

    expect(result.sessionId).toBe('sess-1');
    expect(result.description).toBeUndefined();
    expect(result.engineVersion).toEqual({
      selectedEngineVersion: 'AUTO',
      effectiveEngineVersion: 'PySpark engine version 3',
    });
    expect(result.engineConfiguration?.maxConcurrentDpus).toBe(20);
    expect(result.engineConfiguration?.sparkProperties).toBeUndefined();
    expect(result.sessionConfiguration?.idleTimeoutSeconds).toBe(900);
    expect(result.status?.startDateTime?.getTime()).toBe(1700000000000);
    expect(result.status?.lastModifiedDateTime?.toISOString()).toBe('2023-11-14T22:15:00.000Z');
    expect(result.status?.endDateTime).toBeUndefined();
    expect(result.status?.state).toBe('IDLE');
    expect(result.statistics).toEqual({ dpuExecutionInMillis: 1200 });
  });

  it('names the path of a malformed nested value', () => {
    expect(() => hydrateGetSessionResponse({ Status: { StartDateTime: 'soon' } })).toThrow(
      'Expected "Status.StartDateTime" to be a timestamp, got "soon".',
    );
  });
});

describe('hydrateListSessionsResponse', () => {
  it('hydrates each session summary', () => {
    const result = hydrateListSessionsResponse({
      NextToken: 'page-2',
      Sessions: [
        { SessionId: 'a', Status: { State: 'BUSY' } },
        { SessionId: 'b', NotebookVersion: 'Athena notebook version 1' },
      ],
    });
    expect(result.nextToken).toBe('page-2');
    expect(result.sessions).toHaveLength(2);
    expect(result.sessions?.[0]?.status?.state).toBe('BUSY');
    expect(result.sessions?.[1]?.notebookVersion).toBe('Athena notebook version 1');
  });

  it('names the index of a malformed session', () => {
    try {
      hydrateListSessionsResponse({ Sessions: [{ Status: { StartDateTime: 'soon' } }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError);
      if (error instanceof MalformedResponseError) {
        expect(error.path).toBe('Sessions[0].Status.StartDateTime');
      }
    }
  });
});

describe('AthenaClient', () => {
  let transport: MockTransport;
  let athena: AthenaClient;

  beforeEach(() => {
    transport = new MockTransport();
    athena = new AthenaClient({ transport, env: { AWS_REGION: 'ap-southeast-2' } });
  });

  it('starts a session', async () => {
    transport.respondWith(200, { SessionId: 'sess-1', State: 'CREATING' });

    const result = await athena.startSession({
      workGroup: 'spark-wg',
      engineConfiguration: { maxConcurrentDpus: 4 },
    });

    expect(result).toEqual({ sessionId: 'sess-1', state: 'CREATING' });
    expect(transport.lastRequest().url).toBe('https://athena.ap-southeast-2.amazonaws.com/');
    expect(transport.lastJsonBody()).toEqual({
      WorkGroup: 'spark-wg',
      EngineConfiguration: { MaxConcurrentDpus: 4 },
    });
  });

  it('gets a session', async () => {
    transport.respondWith(200, { SessionId: 'sess-1', Status: { State: 'IDLE' } });

    const result = await athena.getSession({ sessionId: 'sess-1' });

    expect(result.status?.state).toBe('IDLE');
    transport.assertSent({ headers: { 'X-Amz-Target': 'AmazonAthena.GetSession' }, body: '{"SessionId":"sess-1"}' });
  });

  it('lists sessions', async () => {
    transport.respondWith(200, { Sessions: [] });
    const result = await athena.listSessions({ workGroup: 'spark-wg' });
    expect(result).toEqual({ nextToken: undefined, sessions: [] });
  });

  it('maps InvalidRequestException with its Athena code', async () => {
    transport.respondWith(400, {
      __type: 'InvalidRequestException',
      Message: 'Workgroup is not Spark-enabled',
      AthenaErrorCode: 'INVALID_INPUT',
    });

    const error = await athena.startSession({
      workGroup: 'sql-wg',
      engineConfiguration: { maxConcurrentDpus: 4 },
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InvalidRequestException);
    if (error instanceof InvalidRequestException) {
      expect(error.athenaErrorCode).toBe('INVALID_INPUT');
      expect(error.awsMessage).toBe('Workgroup is not Spark-enabled');
    }
  });

  it('maps ResourceNotFoundException with its resource name', async () => {
    transport.respondWith(400, { __type: 'ResourceNotFoundException', ResourceName: 'sess-9' });

    const error = await athena.getSession({ sessionId: 'sess-9' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResourceNotFoundException);
    if (error instanceof ResourceNotFoundException) {
      expect(error.resourceName).toBe('sess-9');
    }
  });

  it('maps TooManyRequestsException with its reason', async () => {
    transport.respondWith(400, { __type: 'TooManyRequestsException', Reason: 'CONCURRENT_QUERY_LIMIT_EXCEEDED' });

    const error = await athena.listSessions({ workGroup: 'spark-wg' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TooManyRequestsException);
    if (error instanceof TooManyRequestsException) {
      expect(error.reason).toBe('CONCURRENT_QUERY_LIMIT_EXCEEDED');
    }
  });

  it('leaves diagnostic fields unset when they are not strings', async () => {
    transport
      .respondWith(400, { __type: 'TooManyRequestsException', Reason: { limit: 20 } })
      .respondWith(400, { __type: 'InvalidRequestException', AthenaErrorCode: 42 });

    const throttled = await athena.listSessions({ workGroup: 'spark-wg' }).catch((e: unknown) => e);
    const invalid = await athena.getSession({ sessionId: 's' }).catch((e: unknown) => e);

    expect(throttled).toBeInstanceOf(TooManyRequestsException);
    if (throttled instanceof TooManyRequestsException) {
      expect(throttled.reason).toBeUndefined();
    }
    expect(invalid).toBeInstanceOf(InvalidRequestException);
    if (invalid instanceof InvalidRequestException) {
      expect(invalid.athenaErrorCode).toBeUndefined();
    }
  });

  it('maps the remaining codes', async () => {
    transport
      .respondWith(500, { __type: 'InternalServerException' })
      .respondWith(400, { __type: 'SessionAlreadyExistsException' });

    await expect(athena.getSession({ sessionId: 's' })).rejects.toBeInstanceOf(InternalServerException);
    await expect(
      athena.startSession({ workGroup: 'wg', engineConfiguration: { maxConcurrentDpus: 1 } }),
    ).rejects.toBeInstanceOf(SessionAlreadyExistsException);
  });
});
