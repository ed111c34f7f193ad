import type { EnumValue } from '../enum.js';

/** Queue attribute names accepted by CreateQueue, GetQueueAttributes and SetQueueAttributes. */
export const QueueAttributeName = {
  All: 'All',
  ApproximateNumberOfMessages: 'ApproximateNumberOfMessages',
  ApproximateNumberOfMessagesDelayed: 'ApproximateNumberOfMessagesDelayed',
  ApproximateNumberOfMessagesNotVisible: 'ApproximateNumberOfMessagesNotVisible',
  ContentBasedDeduplication: 'ContentBasedDeduplication',
  CreatedTimestamp: 'CreatedTimestamp',
  DeduplicationScope: 'DeduplicationScope',
  DelaySeconds: 'DelaySeconds',
  FifoQueue: 'FifoQueue',
  FifoThroughputLimit: 'FifoThroughputLimit',
  KmsDataKeyReusePeriodSeconds: 'KmsDataKeyReusePeriodSeconds',
  KmsMasterKeyId: 'KmsMasterKeyId',
  LastModifiedTimestamp: 'LastModifiedTimestamp',
  MaximumMessageSize: 'MaximumMessageSize',
  MessageRetentionPeriod: 'MessageRetentionPeriod',
  Policy: 'Policy',
  QueueArn: 'QueueArn',
  ReceiveMessageWaitTimeSeconds: 'ReceiveMessageWaitTimeSeconds',
  RedriveAllowPolicy: 'RedriveAllowPolicy',
  RedrivePolicy: 'RedrivePolicy',
  SqsManagedSseEnabled: 'SqsManagedSseEnabled',
  VisibilityTimeout: 'VisibilityTimeout',
} as const;

export type QueueAttributeNameValue = EnumValue<typeof QueueAttributeName>;
