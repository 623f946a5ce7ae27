import { NewQueuedPayload, QueuedPayload } from '../entities/QueuedPayload.js';

/**
 * Interface for durable storage of captures that have not been submitted yet
 */
export interface IScanQueueRepository {
  enqueue(payload: NewQueuedPayload): string;

  /**
   * All payloads in enqueue order. Does not delete anything.
   */
  drainAll(): QueuedPayload[];

  remove(handle: string): boolean;

  count(): number;
}
