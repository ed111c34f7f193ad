export { AthenaClient } from './client.js';
export { SessionState, ThrottleReason } from './enums.js';
export type { SessionStateValue, ThrottleReasonValue } from './enums.js';
export { StartSessionRequest, GetSessionRequest, ListSessionsRequest } from './input.js';
export type {
  StartSessionRequestInput,
  GetSessionRequestInput,
  ListSessionsRequestInput,
} from './input.js';
export {
  hydrateStartSessionResponse,
  hydrateGetSessionResponse,
  hydrateListSessionsResponse,
} from './result.js';
export type {
  StartSessionResponse,
  GetSessionResponse,
  ListSessionsResponse,
} from './result.js';
export {
  engineConfigurationBody,
  hydrateEngineConfiguration,
  hydrateEngineVersion,
  hydrateSessionConfiguration,
  hydrateSessionStatistics,
  hydrateSessionStatus,
  hydrateSessionSummary,
} from './types.js';
export type {
  EngineConfiguration,
  EngineVersion,
  SessionConfiguration,
  SessionStatistics,
  SessionStatus,
  SessionSummary,
} from './types.js';
export {
  ATHENA_ERROR_CODES,
  createAthenaError,
  InternalServerException,
  InvalidRequestException,
  ResourceNotFoundException,
  SessionAlreadyExistsException,
  TooManyRequestsException,
} from './errors.js';
export type { AthenaErrorCode } from './errors.js';
