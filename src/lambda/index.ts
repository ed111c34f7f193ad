export { LambdaClient } from './client.js';
export { InvocationType, LogType, ThrottleReason } from './enums.js';
export type { InvocationTypeValue, LogTypeValue, ThrottleReasonValue } from './enums.js';
export { InvocationRequest } from './input.js';
export type { InvocationRequestInput } from './input.js';
export { hydrateInvocationResponse } from './result.js';
export type { InvocationResponse } from './result.js';
export {
  LAMBDA_ERROR_CODES,
  createLambdaError,
  KMSDisabledException,
  KMSAccessDeniedException,
  KMSNotFoundException,
  ServiceException,
  ResourceNotFoundException,
  InvalidParameterValueException,
  InvalidRequestContentException,
  RequestTooLargeException,
  UnsupportedMediaTypeException,
  TooManyRequestsException,
} from './errors.js';
export type { LambdaErrorCode } from './errors.js';
