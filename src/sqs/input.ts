/**
 * SQS operation inputs (awsJson1_0 protocol).
 */

import { Input } from '../input.js';
import type { InputOptions } from '../input.js';
import type { JsonObject } from '../json.js';
import { awsJsonRequest } from '../protocols.js';
import type { Request } from '../request.js';
import {
  assertEnumMember,
  encodeMap,
  encodeStringMap,
  requireField,
} from '../serialization.js';
import { QueueAttributeName } from './enums.js';
import type { QueueAttributeNameValue } from './enums.js';

const TARGET_PREFIX = 'AmazonSQS';

export interface CreateQueueRequestInput extends InputOptions {
  /**
   * The name of the new queue. Up to 80 alphanumeric characters, hyphens
   * and underscores; a FIFO queue name must end with `.fifo`. Required.
   */
  queueName?: string | null;
  /** Queue attributes, keyed by {@link QueueAttributeName}. */
  attributes?: Record<string, string> | null;
  /** Cost allocation tags. */
  tags?: Record<string, string> | null;
}

/** Creates a new standard or FIFO queue. */
export class CreateQueueRequest extends Input {
  queueName: string | undefined;
  attributes: Record<string, string> | undefined;
  tags: Record<string, string> | undefined;

  constructor(input: CreateQueueRequestInput = {}) {
    super(input);
    this.queueName = input.queueName ?? undefined;
    this.attributes = input.attributes ?? undefined;
    this.tags = input.tags ?? undefined;
  }

  static create(input: CreateQueueRequest | CreateQueueRequestInput): CreateQueueRequest {
    return input instanceof CreateQueueRequest ? input : new CreateQueueRequest(input);
  }

  request(): Request {
    return awsJsonRequest('1.0', `${TARGET_PREFIX}.CreateQueue`, this.requestBody());
  }

  private requestBody(): JsonObject {
    const owner = 'CreateQueueRequest';
    const payload: JsonObject = {};
    payload['QueueName'] = requireField(this.queueName, 'QueueName', owner);
    if (this.attributes !== undefined) {
      payload['Attributes'] = encodeMap(this.attributes, (value, name) => {
        assertEnumMember(QueueAttributeName, 'QueueAttributeName', name, 'Attributes', owner);
        return value;
      });
    }
    if (this.tags !== undefined) {
      payload['tags'] = encodeStringMap(this.tags);
    }
    return payload;
  }
}

export interface GetQueueAttributesRequestInput extends InputOptions {
  /** The URL of the queue. Required. */
  queueUrl?: string | null;
  /** Attributes to return; `All` returns every attribute. */
  attributeNames?: Array<QueueAttributeNameValue | (string & {})> | null;
}

/** Gets attributes for the specified queue. */
export class GetQueueAttributesRequest extends Input {
  queueUrl: string | undefined;
  attributeNames: Array<QueueAttributeNameValue | (string & {})> | undefined;

  constructor(input: GetQueueAttributesRequestInput = {}) {
    super(input);
    this.queueUrl = input.queueUrl ?? undefined;
    this.attributeNames = input.attributeNames ?? undefined;
  }

  static create(
    input: GetQueueAttributesRequest | GetQueueAttributesRequestInput,
  ): GetQueueAttributesRequest {
    return input instanceof GetQueueAttributesRequest ? input : new GetQueueAttributesRequest(input);
  }

  request(): Request {
    return awsJsonRequest('1.0', `${TARGET_PREFIX}.GetQueueAttributes`, this.requestBody());
  }

  private requestBody(): JsonObject {
    const owner = 'GetQueueAttributesRequest';
    const payload: JsonObject = {};
    payload['QueueUrl'] = requireField(this.queueUrl, 'QueueUrl', owner);
    if (this.attributeNames !== undefined) {
      payload['AttributeNames'] = this.attributeNames.map((name) =>
        assertEnumMember(QueueAttributeName, 'QueueAttributeName', name, 'AttributeNames', owner),
      );
    }
    return payload;
  }
}

export interface DeleteQueueRequestInput extends InputOptions {
  /** The URL of the queue to delete. Required. */
  queueUrl?: string | null;
}

/** Deletes the queue, regardless of its contents. */
export class DeleteQueueRequest extends Input {
  queueUrl: string | undefined;

  constructor(input: DeleteQueueRequestInput = {}) {
    super(input);
    this.queueUrl = input.queueUrl ?? undefined;
  }

  static create(input: DeleteQueueRequest | DeleteQueueRequestInput): DeleteQueueRequest {
    return input instanceof DeleteQueueRequest ? input : new DeleteQueueRequest(input);
  }

  request(): Request {
    return awsJsonRequest('1.0', `${TARGET_PREFIX}.DeleteQueue`, {
      QueueUrl: requireField(this.queueUrl, 'QueueUrl', 'DeleteQueueRequest'),
    });
  }
}
