import { AbstractApi } from '../client.js';
import type { CallOptions } from '../client.js';
import { awsJsonErrorParser, errorFactoryFor } from '../error-dispatch.js';
import {
  CreateQueueRequest,
  DeleteQueueRequest,
  GetQueueAttributesRequest,
} from './input.js';
import type {
  CreateQueueRequestInput,
  DeleteQueueRequestInput,
  GetQueueAttributesRequestInput,
} from './input.js';
import { createSqsError } from './errors.js';
import {
  hydrateCreateQueueResult,
  hydrateGetQueueAttributesResult,
} from './result.js';
import type { CreateQueueResult, GetQueueAttributesResult } from './result.js';

/**
 * Client for Amazon Simple Queue Service.
 *
 * @example
 * ```ts
 * const sqs = new SqsClient({ region: 'eu-west-1' });
 * const { queueUrl } = await sqs.createQueue({ queueName: 'orders.fifo', attributes: { FifoQueue: 'true' } });
 * ```
 */
export class SqsClient extends AbstractApi {
  protected readonly endpointPrefix = 'sqs';
  protected readonly errorFactory = errorFactoryFor(awsJsonErrorParser, createSqsError);

  /**
   * Creates a new standard or FIFO queue.
   *
   * @throws QueueDeletedRecentlyException
   * @throws QueueNameExistsException
   * @throws InvalidAttributeNameException
   * @throws InvalidAttributeValueException
   */
  async createQueue(
    input: CreateQueueRequest | CreateQueueRequestInput,
    options?: CallOptions,
  ): Promise<CreateQueueResult> {
    const response = await this.getResponse(CreateQueueRequest.create(input), 'CreateQueue', options);
    return hydrateCreateQueueResult(response.toArray());
  }

  /**
   * Gets attributes for the specified queue.
   *
   * @throws InvalidAttributeNameException
   * @throws QueueDoesNotExistException
   */
  async getQueueAttributes(
    input: GetQueueAttributesRequest | GetQueueAttributesRequestInput,
    options?: CallOptions,
  ): Promise<GetQueueAttributesResult> {
    const response = await this.getResponse(
      GetQueueAttributesRequest.create(input),
      'GetQueueAttributes',
      options,
    );
    return hydrateGetQueueAttributesResult(response.toArray());
  }

  /**
   * Deletes the queue specified by its URL.
   *
   * @throws QueueDoesNotExistException
   */
  async deleteQueue(
    input: DeleteQueueRequest | DeleteQueueRequestInput,
    options?: CallOptions,
  ): Promise<void> {
    await this.getResponse(DeleteQueueRequest.create(input), 'DeleteQueue', options);
  }
}
