/**
 * Why a capture ended up in the durable queue instead of being submitted
 */
export type QueueReason = 'offline' | 'rate_limited' | 'submit_failed';

export interface QueuedPayload {
  handle: string;
  imageBytes: Buffer;
  deviceIdentifier: string;
  enqueuedAt: Date;
  reason: QueueReason;
}

export type NewQueuedPayload = Omit<QueuedPayload, 'handle' | 'enqueuedAt'> & {
  enqueuedAt?: Date;
};
