/**
 * Error types raised while building requests, reading responses, and
 * mapping service error responses.
 */

import {
  CLIENT_ERROR,
  CONNECTION_ERROR,
  INVALID_ENUM_VALUE,
  MALFORMED_RESPONSE,
  MISSING_REQUIRED_FIELD,
  REDIRECTION,
  SERVER_ERROR,
} from './error-codes.js';
import type { ErrorCodeEntry } from './error-codes.js';
import type { Response } from './response.js';

/** Base error class for all errors raised by the library. */
export class CloudwireError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown> | undefined;
  readonly requestId: string | undefined;

  constructor(
    message: string,
    code: string,
    options?: {
      details?: Record<string, unknown> | undefined;
      requestId?: string | undefined;
      cause?: Error | undefined;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'CloudwireError';
    this.code = code;
    this.details = options?.details;
    this.requestId = options?.requestId;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      requestId: this.requestId,
    };
  }
}

// ---- Local faults ----

/** A required input field was unset when the request was built. */
export class MissingRequiredFieldError extends CloudwireError {
  readonly field: string;
  readonly owner: string;

  constructor(field: string, owner: string) {
    super(
      `Missing parameter "${field}" for "${owner}". The value cannot be null.`,
      MISSING_REQUIRED_FIELD.code,
      { details: { field, owner } },
    );
    this.name = 'MissingRequiredFieldError';
    this.field = field;
    this.owner = owner;
  }
}

/** An input field held a value outside its enum's closed value set. */
export class InvalidEnumValueError extends CloudwireError {
  readonly field: string;
  readonly value: string;
  readonly enumName: string;
  readonly owner: string;

  constructor(field: string, value: string, enumName: string, owner: string) {
    super(
      `Invalid parameter "${field}" for "${owner}". The value "${value}" is not a valid "${enumName}".`,
      INVALID_ENUM_VALUE.code,
      { details: { field, value, enum: enumName, owner } },
    );
    this.name = 'InvalidEnumValueError';
    this.field = field;
    this.value = value;
    this.enumName = enumName;
    this.owner = owner;
  }
}

/** A response body could not be read into its typed result. */
export class MalformedResponseError extends CloudwireError {
  /** Dotted path of the offending key, or empty for the body itself. */
  readonly path: string;

  constructor(message: string, path: string, cause?: Error) {
    super(message, MALFORMED_RESPONSE.code, { details: { path }, cause });
    this.name = 'MalformedResponseError';
    this.path = path;
  }
}

/** A network or connection error occurred in the bundled transport. */
export class ConnectionError extends CloudwireError {
  constructor(message: string, cause?: Error) {
    super(message, CONNECTION_ERROR.code, { cause });
    this.name = 'ConnectionError';
  }
}

// ---- Remote faults ----

/** Fields a protocol error parser extracts from an error response. */
export interface AwsErrorInfo {
  /** Service-defined discriminator (e.g., "KMSDisabledException"). */
  code?: string | undefined;
  message?: string | undefined;
  /** Fault origin reported by the service ("Sender", "User", ...). */
  type?: string | undefined;
  detail?: string | undefined;
}

/**
 * An error response returned by a service. Subclasses add the diagnostic
 * fields a given error code carries in its body.
 */
export class ServiceError extends CloudwireError {
  readonly statusCode: number;
  readonly awsCode: string | undefined;
  readonly awsMessage: string | undefined;
  readonly awsType: string | undefined;
  readonly awsDetail: string | undefined;
  readonly response: Response;

  constructor(response: Response, info: AwsErrorInfo, fallback: ErrorCodeEntry) {
    super(
      formatMessage(response, info),
      info.code ?? fallback.code,
      {
        requestId:
          response.getHeader('x-amzn-requestid') ??
          response.getHeader('x-amz-request-id'),
      },
    );
    this.name = 'ServiceError';
    this.statusCode = response.status;
    this.awsCode = info.code;
    this.awsMessage = info.message;
    this.awsType = info.type;
    this.awsDetail = info.detail;
    this.response = response;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
      awsMessage: this.awsMessage,
      awsType: this.awsType,
    };
  }
}

/** The service answered with a 3xx status. */
export class RedirectionError extends ServiceError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info, REDIRECTION);
    this.name = 'RedirectionError';
  }
}

/** The service rejected the request (4xx). */
export class ClientError extends ServiceError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info, CLIENT_ERROR);
    this.name = 'ClientError';
  }
}

/** The service failed to process the request (5xx). */
export class ServerError extends ServiceError {
  constructor(response: Response, info: AwsErrorInfo) {
    super(response, info, SERVER_ERROR);
    this.name = 'ServerError';
  }
}

function formatMessage(response: Response, info: AwsErrorInfo): string {
  const lines = [`HTTP ${response.status} returned for "${response.url}".`];
  if (info.code !== undefined) lines.push(`Code: ${info.code}`);
  if (info.message !== undefined) lines.push(`Message: ${info.message}`);
  if (info.type !== undefined) lines.push(`Type: ${info.type}`);
  if (info.detail !== undefined) lines.push(`Detail: ${info.detail}`);
  return lines.join('\n');
}
