/**
 * SQS error codes and their exceptions. Every SQS fault is a client fault.
 */

import { ClientError } from '../errors.js';
import type { AwsErrorInfo, ServiceError } from '../errors.js';
import { isKnownCode } from '../error-dispatch.js';
import type { Response } from '../response.js';

/** A queue with this name already exists with different attributes. */
export class QueueNameExistsException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'QueueNameExistsException';
  }
}

/** A queue with this name was deleted less than 60 seconds ago. */
export class QueueDeletedRecentlyException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'QueueDeletedRecentlyException';
  }
}

/** The specified queue doesn't exist. */
export class QueueDoesNotExistException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'QueueDoesNotExistException';
  }
}

export class InvalidAttributeNameException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InvalidAttributeNameException';
  }
}

/** A queue attribute value is invalid. */
export class InvalidAttributeValueException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InvalidAttributeValueException';
  }
}

/** The request was denied due to request throttling. */
export class RequestThrottledException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'RequestThrottledException';
  }
}

export class UnsupportedOperationException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'UnsupportedOperationException';
  }
}

/** The request was not made over HTTPS or did not use SigV4. */
export class InvalidSecurityException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InvalidSecurityException';
  }
}

/** The accountId is invalid. */
export class InvalidAddressException extends ClientError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info);
    this.name = 'InvalidAddressException';
  }
}

/**
 * Codes SQS answers with. JSON-protocol codes and the legacy query-protocol
 * codes of the `x-amzn-query-error` header map to the same exception.
 */
export const SQS_ERROR_CODES = [
  'QueueAlreadyExists',
  'QueueNameExists',
  'AWS.SimpleQueueService.QueueDeletedRecently',
  'QueueDeletedRecently',
  'AWS.SimpleQueueService.NonExistentQueue',
  'QueueDoesNotExist',
  'InvalidAttributeName',
  'InvalidAttributeValue',
  'RequestThrottled',
  'AWS.SimpleQueueService.UnsupportedOperation',
  'UnsupportedOperation',
  'InvalidSecurity',
  'InvalidAddress',
] as const;

export type SqsErrorCode = (typeof SQS_ERROR_CODES)[number];

export function createSqsError(
  code: string,
  response: Response,
  info: AwsErrorInfo,
): ServiceError | undefined {
  if (!isKnownCode(SQS_ERROR_CODES, code)) {
    return undefined;
  }
  switch (code) {
    case 'QueueAlreadyExists':
    case 'QueueNameExists':
      return new QueueNameExistsException(response, info);
    case 'AWS.SimpleQueueService.QueueDeletedRecently':
    case 'QueueDeletedRecently':
      return new QueueDeletedRecentlyException(response, info);
    case 'AWS.SimpleQueueService.NonExistentQueue':
    case 'QueueDoesNotExist':
      return new QueueDoesNotExistException(response, info);
    case 'InvalidAttributeName':
      return new InvalidAttributeNameException(response, info);
    case 'InvalidAttributeValue':
      return new InvalidAttributeValueException(response, info);
    case 'RequestThrottled':
      return new RequestThrottledException(response, info);
    case 'AWS.SimpleQueueService.UnsupportedOperation':
    case 'UnsupportedOperation':
      return new UnsupportedOperationException(response, info);
    case 'InvalidSecurity':
      return new InvalidSecurityException(response, info);
    case 'InvalidAddress':
      return new InvalidAddressException(response, info);
  }
}
