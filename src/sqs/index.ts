export { SqsClient } from './client.js';
export { QueueAttributeName } from './enums.js';
export type { QueueAttributeNameValue } from './enums.js';
export {
  CreateQueueRequest,
  GetQueueAttributesRequest,
  DeleteQueueRequest,
} from './input.js';
export type {
  CreateQueueRequestInput,
  GetQueueAttributesRequestInput,
  DeleteQueueRequestInput,
} from './input.js';
export {
  hydrateCreateQueueResult,
  hydrateGetQueueAttributesResult,
} from './result.js';
export type { CreateQueueResult, GetQueueAttributesResult } from './result.js';
export {
  SQS_ERROR_CODES,
  createSqsError,
  QueueNameExistsException,
  QueueDeletedRecentlyException,
  QueueDoesNotExistException,
  InvalidAttributeNameException,
  InvalidAttributeValueException,
  RequestThrottledException,
  UnsupportedOperationException,
  InvalidSecurityException,
  InvalidAddressException,
} from './errors.js';
export type { SqsErrorCode } from './errors.js';
