import { BookMetadata } from './StreamEvent.js';
import { QueueReason } from './QueuedPayload.js';

/**
 * How a job ended, as seen by the orchestrator
 */
export type JobOutcome =
  | { status: 'completed'; books: BookMetadata[] }
  | { status: 'failed'; reason: string; code?: string; retryable: boolean }
  | { status: 'canceled'; reason: string };

/**
 * A job handed back before it acquired server resources
 */
export interface JobDeferral {
  reason: Exclude<QueueReason, 'offline'>;
  retryAfterSeconds?: number;
  error: string;
}
