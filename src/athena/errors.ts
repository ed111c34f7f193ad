/**
 * Athena error codes and their exceptions.
 */

import { errorField, isKnownCode } from '../error-dispatch.js';
import { ClientError, ServerError } from '../errors.js';
import type { AwsErrorInfo, ServiceError } from '../errors.js';
import type { Response } from '../response.js';

/** Indicates a platform issue, which may be due to a transient condition or outage. */
export class InternalServerException extends ServerError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InternalServerException';
  }
}

/**
 * Indicates that something is wrong with the input to the request, for
 * example a required parameter is missing or out of range.
 */
export class InvalidRequestException extends ClientError {
  /** Athena's own error code for the failure. */
  readonly athenaErrorCode: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InvalidRequestException';
    this.athenaErrorCode = errorField(response, 'AthenaErrorCode');
  }
}

/** A resource, such as a workgroup, was not found. */
export class ResourceNotFoundException extends ClientError {
  readonly resourceName: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'ResourceNotFoundException';
    this.resourceName = errorField(response, 'ResourceName');
  }
}

/** The session already exists. */
export class SessionAlreadyExistsException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'SessionAlreadyExistsException';
  }
}

/** Indicates that the request was throttled. */
export class TooManyRequestsException extends ClientError {
  /** One of {@link ThrottleReason}. */
  readonly reason: string | undefined;

  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'TooManyRequestsException';
    this.reason = errorField(response, 'Reason');
  }
}

export const ATHENA_ERROR_CODES = [
  'InternalServerException',
  'InvalidRequestException',
  'ResourceNotFoundException',
  'SessionAlreadyExistsException',
  'TooManyRequestsException',
] as const;

export type AthenaErrorCode = (typeof ATHENA_ERROR_CODES)[number];

export function createAthenaError(
  code: string,
  response: Response,
  info: AwsErrorInfo,
): ServiceError | undefined {
  if (!isKnownCode(ATHENA_ERROR_CODES, code)) {
    return undefined;
  }
  switch (code) {
    case 'InternalServerException':
      return new InternalServerException(response, info);
    case 'InvalidRequestException':
      return new InvalidRequestException(response, info);
    case 'ResourceNotFoundException':
      return new ResourceNotFoundException(response, info);
    case 'SessionAlreadyExistsException':
      return new SessionAlreadyExistsException(response, info);
    case 'TooManyRequestsException':
      return new TooManyRequestsException(response, info);
  }
}
