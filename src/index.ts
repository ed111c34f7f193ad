/**
 * cloudwire: typed clients for AWS services over JSON wire protocols.
 *
 * Zero runtime dependencies. TypeScript-first. Full type safety.
 *
 * @example
 * ```ts
 * import { SqsClient, LambdaClient, AthenaClient } from 'cloudwire';
 * ```
 *
 * @packageDocumentation
 */

// ---- Service clients ----
export { SqsClient } from './sqs/client.js';
export { LambdaClient } from './lambda/client.js';
export { AthenaClient } from './athena/client.js';

// ---- Service namespaces (inputs, results, enums and errors) ----
export * as sqs from './sqs/index.js';
export * as lambda from './lambda/index.js';
export * as athena from './athena/index.js';

// ---- Client base ----
export { AbstractApi } from './client.js';
export type { CallOptions } from './client.js';
export { DEFAULT_REGION, resolveConfiguration, resolveEndpoint } from './configuration.js';
export type { ClientConfig, Configuration } from './configuration.js';

// ---- Requests & Responses ----
export { Input } from './input.js';
export type { InputOptions } from './input.js';
export { Request } from './request.js';
export type { HttpMethod } from './request.js';
export { Response } from './response.js';
export type { ErrorFactory } from './response.js';
export { awsJsonRequest } from './protocols.js';
export type { AwsJsonVersion } from './protocols.js';
export type { JsonValue, JsonObject } from './json.js';

// ---- Serialization & Hydration ----
export {
  requireField,
  assertEnumMember,
  encodeMap,
  encodeStringMap,
  encodeJsonBody,
  encodePathParameter,
} from './serialization.js';
export {
  asString,
  asNumber,
  asBoolean,
  asDate,
  asObject,
  readString,
  readNumber,
  readBoolean,
  readDate,
  readObject,
  readList,
  readMap,
  readStringMap,
} from './hydration.js';
export type { ValueReader } from './hydration.js';
export { isEnumMember } from './enum.js';
export type { EnumObject, EnumValue } from './enum.js';

// ---- Middleware ----
export { MiddlewareChain, composeRequest } from './middleware.js';
export type { CallContext, NextFunction, RequestMiddleware } from './middleware.js';

// ---- Transport ----
export { HttpTransport } from './transport/http.js';
export type {
  Transport,
  TransportConfig,
  TransportRequest,
  TransportResponse,
} from './transport/types.js';

// ---- Errors ----
export {
  CloudwireError,
  MissingRequiredFieldError,
  InvalidEnumValueError,
  MalformedResponseError,
  ConnectionError,
  ServiceError,
  RedirectionError,
  ClientError,
  ServerError,
} from './errors.js';
export type { AwsErrorInfo } from './errors.js';
export {
  awsJsonErrorParser,
  restJsonErrorParser,
  createServiceError,
  errorFactoryFor,
  errorBody,
  errorField,
  normalizeCode,
  isKnownCode,
} from './error-dispatch.js';
export type { ErrorParser, ServiceErrorFactory } from './error-dispatch.js';

// ---- Error Codes ----
export {
  MISSING_REQUIRED_FIELD,
  INVALID_ENUM_VALUE,
  MALFORMED_RESPONSE,
  CONNECTION_ERROR,
  REDIRECTION,
  CLIENT_ERROR,
  SERVER_ERROR,
  ALL_ERROR_CODES,
  lookupByCode,
} from './error-codes.js';
export type { ErrorCodeEntry } from './error-codes.js';
