/**
 * Maps an error response to exactly one exception.
 *
 * A protocol-specific {@link ErrorParser} extracts the discriminator code;
 * the service's factory turns known codes into their exception type, and
 * anything else falls back to a generic error chosen by status family.
 */

import {
  ClientError,
  MalformedResponseError,
  RedirectionError,
  ServerError,
} from './errors.js';
import type { AwsErrorInfo, ServiceError } from './errors.js';
import type { JsonObject } from './json.js';
import type { ErrorFactory, Response } from './response.js';

export interface ErrorParser {
  parse(response: Response): AwsErrorInfo;
}

/**
 * Returns the exception for a known code, or undefined so the caller falls
 * back to the status-family error.
 */
export type ServiceErrorFactory = (
  code: string,
  response: Response,
  info: AwsErrorInfo,
) => ServiceError | undefined;

/**
 * The error body as a JSON object. Error responses are not guaranteed to be
 * JSON (a proxy may answer with HTML), in which case the body reads as `{}`.
 */
export function errorBody(response: Response): JsonObject {
  try {
    return response.toArray(false);
  } catch (error) {
    if (error instanceof MalformedResponseError) {
      return {};
    }
    throw error;
  }
}

/**
 * A string field of the error body, or undefined when it is absent or not a
 * string. Diagnostic fields never fail the exception they belong to.
 */
export function errorField(response: Response, key: string): string | undefined {
  return stringField(errorBody(response), key);
}

/** Parser for the `awsJson1_0` and `awsJson1_1` protocols. */
export const awsJsonErrorParser: ErrorParser = {
  parse(response: Response): AwsErrorInfo {
    const body = errorBody(response);
    const info: AwsErrorInfo = {
      message: stringField(body, 'message') ?? stringField(body, 'Message'),
    };

    // Services migrated from the query protocol keep their legacy code here.
    const queryError = response.getHeader('x-amzn-query-error');
    if (queryError !== undefined && queryError !== '') {
      const [code, type] = queryError.split(';');
      info.code = code;
      info.type = type;
      return info;
    }

    const rawType = stringField(body, '__type');
    if (rawType !== undefined) {
      info.code = normalizeCode(rawType);
    }
    return info;
  },
};

/** Parser for the `restJson1` protocol. */
export const restJsonErrorParser: ErrorParser = {
  parse(response: Response): AwsErrorInfo {
    const body = errorBody(response);
    const rawCode =
      response.getHeader('x-amzn-errortype') ??
      stringField(body, '__type') ??
      stringField(body, 'code') ??
      stringField(body, 'Code') ??
      stringField(body, 'Type');

    return {
      code: rawCode === undefined ? undefined : normalizeCode(rawCode),
      message: stringField(body, 'message') ?? stringField(body, 'Message'),
      type: stringField(body, 'Type'),
    };
  },
};

/**
 * Build the exception for an error response. Known codes go through the
 * service factory, everything else by status: 5xx {@link ServerError},
 * 4xx {@link ClientError}, anything lower {@link RedirectionError}.
 */
export function createServiceError(
  response: Response,
  parser: ErrorParser,
  factory: ServiceErrorFactory,
): ServiceError {
  const info = parser.parse(response);
  if (info.code !== undefined) {
    const known = factory(info.code, response, info);
    if (known !== undefined) {
      return known;
    }
  }

  if (response.status >= 500) {
    return new ServerError(response, info);
  }
  if (response.status >= 400) {
    return new ClientError(response, info);
  }
  return new RedirectionError(response, info);
}

/** Bind a parser and a factory into the {@link ErrorFactory} a Response uses. */
export function errorFactoryFor(
  parser: ErrorParser,
  factory: ServiceErrorFactory,
): ErrorFactory {
  return (response) => createServiceError(response, parser, factory);
}

/**
 * Strip the namespace (`com.amazonaws.sqs#`) and any trailing `:<uri>`
 * from a raw code.
 */
export function normalizeCode(raw: string): string {
  const hash = raw.lastIndexOf('#');
  const unqualified = hash === -1 ? raw : raw.slice(hash + 1);
  const colon = unqualified.indexOf(':');
  return colon === -1 ? unqualified : unqualified.slice(0, colon);
}

function stringField(body: JsonObject, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

/** Narrow a raw code to a service's closed set of known codes. */
export function isKnownCode<C extends string>(
  codes: readonly C[],
  code: string,
): code is C {
  return codes.some((known) => known === code);
}
