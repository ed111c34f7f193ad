/**
 * SQS operation results.
 */

import { readString, readStringMap } from '../hydration.js';
import type { JsonObject } from '../json.js';

export interface CreateQueueResult {
  /** The URL of the created queue. */
  readonly queueUrl?: string | undefined;
}

export function hydrateCreateQueueResult(data: JsonObject): CreateQueueResult {
  return {
    queueUrl: readString(data, 'QueueUrl'),
  };
}

export interface GetQueueAttributesResult {
  /** Attribute values keyed by attribute name. */
  readonly attributes?: Readonly<Record<string, string>> | undefined;
}

export function hydrateGetQueueAttributesResult(data: JsonObject): GetQueueAttributesResult {
  return {
    attributes: readStringMap(data, 'Attributes'),
  };
}
