/**
 * Lambda error codes and their exceptions. Every Lambda fault carries the
 * origin of the error (`User` or `Service`) in its `Type` body field.
 */

import { errorField, isKnownCode } from '../error-dispatch.js';
import { ClientError, ServerError } from '../errors.js';
import type { AwsErrorInfo, ServiceError } from '../errors.js';
import type { Response } from '../response.js';

// ---- Server faults ----

/**
 * Lambda couldn't decrypt the environment variables because the KMS key
 * used is disabled.
 */
export class KMSDisabledException extends ServerError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'KMSDisabledException';
    this.type = errorField(response, 'Type');
  }
}

/**
 * Lambda couldn't decrypt the environment variables because KMS access was
 * denied. Check the function's KMS permissions.
 */
export class KMSAccessDeniedException extends ServerError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'KMSAccessDeniedException';
    this.type = errorField(response, 'Type');
  }
}

/** The KMS key used to encrypt the environment variables was not found. */
export class KMSNotFoundException extends ServerError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'KMSNotFoundException';
    this.type = errorField(response, 'Type');
  }
}

/** The Lambda service encountered an internal error. */
export class ServiceException extends ServerError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'ServiceException';
    this.type = errorField(response, 'Type');
  }
}

// ---- Client faults ----

/** The resource specified in the request does not exist. */
export class ResourceNotFoundException extends ClientError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'ResourceNotFoundException';
    this.type = errorField(response, 'Type');
  }
}

/** One of the parameters in the request is not valid. */
export class InvalidParameterValueException extends ClientError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InvalidParameterValueException';
    this.type = errorField(response, 'Type');
  }
}

/** The request body could not be parsed as JSON. */
export class InvalidRequestContentException extends ClientError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InvalidRequestContentException';
    this.type = errorField(response, 'Type');
  }
}

/** The request payload exceeded the invocation payload limit. */
export class RequestTooLargeException extends ClientError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'RequestTooLargeException';
    this.type = errorField(response, 'Type');
  }
}

export class UnsupportedMediaTypeException extends ClientError {
  readonly type: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'UnsupportedMediaTypeException';
    this.type = errorField(response, 'Type');
  }
}

/** The request throughput limit was exceeded. */
export class TooManyRequestsException extends ClientError {
  readonly type: string | undefined;
  /** One of {@link ThrottleReason}. */
  readonly reason: string | undefined;
  /** Seconds to wait, from the `Retry-After` header. */
  readonly retryAfterSeconds: number | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'TooManyRequestsException';
    this.type = errorField(response, 'Type');
    this.reason = errorField(response, 'Reason');

    const raw = response.getHeader('retry-after');
    const parsed = raw === undefined ? NaN : parseFloat(raw);
    this.retryAfterSeconds = isNaN(parsed) ? undefined : parsed;
  }
}

export const LAMBDA_ERROR_CODES = [
  'KMSDisabledException',
  'KMSAccessDeniedException',
  'KMSNotFoundException',
  'ServiceException',
  'ResourceNotFoundException',
  'InvalidParameterValueException',
  'InvalidRequestContentException',
  'RequestTooLargeException',
  'UnsupportedMediaTypeException',
  'TooManyRequestsException',
] as const;

export type LambdaErrorCode = (typeof LAMBDA_ERROR_CODES)[number];

export function createLambdaError(
  code: string,
  response: Response,
  info: AwsErrorInfo,
): ServiceError | undefined {
  if (!isKnownCode(LAMBDA_ERROR_CODES, code)) {
    return undefined;
  }
  switch (code) {
    case 'KMSDisabledException':
      return new KMSDisabledException(response, info);
    case 'KMSAccessDeniedException':
      return new KMSAccessDeniedException(response, info);
    case 'KMSNotFoundException':
      return new KMSNotFoundException(response, info);
    case 'ServiceException':
      return new ServiceException(response, info);
    case 'ResourceNotFoundException':
      return new ResourceNotFoundException(response, info);
    case 'InvalidParameterValueException':
      return new InvalidParameterValueException(response, info);
    case 'InvalidRequestContentException':
      return new InvalidRequestContentException(response, info);
    case 'RequestTooLargeException':
      return new RequestTooLargeException(response, info);
    case 'UnsupportedMediaTypeException':
      return new UnsupportedMediaTypeException(response, info);
    case 'TooManyRequestsException':
      return new TooManyRequestsException(response, info);
  }
}
