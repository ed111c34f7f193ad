/**
 * Example: Creating, inspecting and deleting an SQS queue.
 *
 * Point AWS_ENDPOINT_URL at a local emulator (e.g. http://localhost:4566)
 * to run without an AWS account. Requests are not signed.
 */

import { SqsClient, sqs } from '../src/index.js';

const client = new SqsClient({ region: 'eu-west-1' });

// --- Create a FIFO queue ---
const { queueUrl } = await client.createQueue({
  queueName: 'orders.fifo',
  attributes: {
    [sqs.QueueAttributeName.FifoQueue]: 'true',
    [sqs.QueueAttributeName.ContentBasedDeduplication]: 'true',
  },
  tags: { team: 'billing' },
});
console.log(`Created queue: ${queueUrl}`);

if (queueUrl !== undefined) {
  // --- Read a few attributes back ---
  const { attributes } = await client.getQueueAttributes({
    queueUrl,
    attributeNames: ['QueueArn', 'VisibilityTimeout'],
  });
  console.log('Attributes:', attributes);

  // --- Delete it, tolerating a queue that is already gone ---
  try {
    await client.deleteQueue({ queueUrl });
    console.log('Deleted');
  } catch (error) {
    if (error instanceof sqs.QueueDoesNotExistException) {
      console.log(`Already gone (request ${error.requestId ?? 'unknown'})`);
    } else {
      throw error;
    }
  }
}
