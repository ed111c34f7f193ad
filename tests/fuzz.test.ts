/**
 * Property-based tests using fast-check: serialization writes exactly the
 * fields that are set, validation rejects what it must, hydration inverts
 * serialization, and error dispatch always lands on a ServiceError.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { CreateQueueRequest } from '../src/sqs/input.js';
import { QueueAttributeName } from '../src/sqs/enums.js';
import { InvocationRequest } from '../src/lambda/input.js';
import { LogType } from '../src/lambda/enums.js';
import { createLambdaError } from '../src/lambda/errors.js';
import { engineConfigurationBody, hydrateEngineConfiguration } from '../src/athena/types.js';
import type { EngineConfiguration } from '../src/athena/types.js';
import { isEnumMember } from '../src/enum.js';
import {
  awsJsonErrorParser,
  createServiceError,
  restJsonErrorParser,
} from '../src/error-dispatch.js';
import {
  ClientError,
  InvalidEnumValueError,
  MissingRequiredFieldError,
  ServiceError,
} from '../src/errors.js';
import { asDate } from '../src/hydration.js';
import { MiddlewareChain, composeRequest, type RequestMiddleware } from '../src/middleware.js';
import { Request } from '../src/request.js';
import { Response } from '../src/response.js';

// ---------------------------------------------------------------------------
// Arbitraries
// ---------------------------------------------------------------------------

const mapKeyArb = fc.stringMatching(/^[a-z][a-zA-Z0-9.]{0,12}$/);
const stringMapArb = fc.dictionary(mapKeyArb, fc.string({ maxLength: 20 }), { maxKeys: 5 });
const attributeNameArb = fc.constantFrom(...Object.values(QueueAttributeName));

const engineConfigurationArb: fc.Arbitrary<EngineConfiguration> = fc.record(
  {
    coordinatorDpuSize: fc.integer({ min: 1, max: 4 }),
    maxConcurrentDpus: fc.integer({ min: 2, max: 5000 }),
    defaultExecutorDpuSize: fc.integer({ min: 1, max: 4 }),
    additionalConfigs: stringMapArb,
    sparkProperties: stringMapArb,
  },
  { requiredKeys: ['maxConcurrentDpus'] },
);

function makeResponse(status: number, body: string, headers: Record<string, string> = {}): Response {
  return new Response({ status, headers, body }, 'https://example.test/', (r) => new ClientError(r, {}));
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

describe('fuzz: CreateQueue serialization', () => {
  it('writes exactly the fields that are set', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1, maxLength: 80 }),
        fc.option(fc.dictionary(attributeNameArb, fc.string({ maxLength: 10 })), { nil: undefined }),
        fc.option(stringMapArb, { nil: undefined }),
        (queueName, attributes, tags) => {
          const body: unknown = JSON.parse(
            new CreateQueueRequest({ queueName, attributes, tags }).request().body,
          );

          const expected: string[] = ['QueueName'];
          if (attributes !== undefined) expected.push('Attributes');
          if (tags !== undefined) expected.push('tags');

          expect(typeof body === 'object' && body !== null ? Object.keys(body) : []).toEqual(expected);
        },
      ),
    );
  });

  it('writes empty maps as {}', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1 }), (queueName) => {
        const body = new CreateQueueRequest({ queueName, attributes: {}, tags: {} }).request().body;
        expect(body).toBe(JSON.stringify({ QueueName: queueName, Attributes: {}, tags: {} }));
      }),
    );
  });

  it('names the missing required field', () => {
    fc.assert(
      fc.property(fc.option(stringMapArb, { nil: undefined }), (tags) => {
        try {
          new CreateQueueRequest({ tags }).request();
          return false;
        } catch (error) {
          return error instanceof MissingRequiredFieldError && error.field === 'QueueName';
        }
      }),
    );
  });
});

describe('fuzz: enum validation', () => {
  it('rejects every value outside the enum', () => {
    fc.assert(
      fc.property(
        fc.string().filter((value) => !isEnumMember(LogType, value)),
        (logType) => {
          const input = new InvocationRequest({ functionName: 'my-function', logType });
          expect(() => input.request()).toThrow(InvalidEnumValueError);
        },
      ),
    );
  });

  it('accepts every enum member', () => {
    fc.assert(
      fc.property(fc.constantFrom(...Object.values(LogType)), (logType) => {
        const request = new InvocationRequest({ functionName: 'my-function', logType }).request();
        expect(request.headers['X-Amz-Log-Type']).toBe(logType);
      }),
    );
  });
});

// ---------------------------------------------------------------------------
// Hydration
// ---------------------------------------------------------------------------

describe('fuzz: hydration', () => {
  it('hydrating a serialized engine configuration gives it back', () => {
    fc.assert(
      fc.property(engineConfigurationArb, (config) => {
        const wire = JSON.parse(JSON.stringify(engineConfigurationBody(config)));
        expect(hydrateEngineConfiguration(wire, 'EngineConfiguration')).toEqual(config);
      }),
    );
  });

  it('reads epoch seconds as the same instant', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 4_000_000_000 }), (seconds) => {
        expect(asDate(seconds, 't').getTime()).toBe(seconds * 1000);
        expect(asDate(String(seconds), 't').getTime()).toBe(seconds * 1000);
      }),
    );
  });
});

// ---------------------------------------------------------------------------
// Error dispatch
// ---------------------------------------------------------------------------

describe('fuzz: error dispatch', () => {
  it('always produces a ServiceError for arbitrary status and body', () => {
    fc.assert(
      fc.property(fc.integer({ min: 300, max: 599 }), fc.string(), (status, body) => {
        const response = makeResponse(status, body);
        expect(createServiceError(response, awsJsonErrorParser, () => undefined)).toBeInstanceOf(ServiceError);
        expect(createServiceError(response, restJsonErrorParser, createLambdaError)).toBeInstanceOf(ServiceError);
      }),
    );
  });

  it('handles arbitrary JSON error bodies', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 400, max: 599 }),
        fc.dictionary(fc.constantFrom('__type', 'message', 'Message', 'Type', 'code', 'Reason'), fc.string()),
        (status, fields) => {
          const error = createServiceError(
            makeResponse(status, JSON.stringify(fields)),
            restJsonErrorParser,
            createLambdaError,
          );
          expect(error.statusCode).toBe(status);
        },
      ),
    );
  });
});

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

describe('fuzz: middleware chain', () => {
  it('runs N middlewares in order around the handler', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: 20 }), async (n) => {
        const order: number[] = [];
        const chain = new MiddlewareChain<RequestMiddleware>();
        for (let i = 0; i < n; i++) {
          chain.add(`mw-${i}`, async (_ctx, next) => {
            order.push(i);
            return next();
          });
        }
        const response = makeResponse(200, '{}');
        const call = composeRequest(chain.entries(), async () => response);

        const result = await call({
          service: 'sqs',
          operation: 'DeleteQueue',
          region: 'us-east-1',
          request: new Request('POST', '/', {}, {}, '{}'),
          url: 'https://sqs.us-east-1.amazonaws.com/',
          headers: {},
          metadata: new Map(),
        });

        expect(result).toBe(response);
        expect(order).toEqual(Array.from({ length: n }, (_, i) => i));
      }),
    );
  });
});
