import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IScanQueueRepository } from '../../../core/interfaces/IScanQueueRepository.js';
import { NewQueuedPayload, QueuedPayload, QueueReason } from '../../../core/entities/QueuedPayload.js';

interface QueuedScanRow {
  handle: string;
  image: Buffer;
  device_identifier: string;
  enqueued_at: string;
  reason: string;
}

const QUEUE_REASONS: readonly QueueReason[] = ['offline', 'rate_limited', 'submit_failed'];

function toQueueReason(value: string): QueueReason {
  return QUEUE_REASONS.find((reason) => reason === value) ?? 'offline';
}

/**
 * SQLite implementation of the durable capture queue
 */
export class ScanQueueRepository implements IScanQueueRepository {
  constructor(private db: Database.Database) {}

  enqueue(payload: NewQueuedPayload): string {
    const handle = randomUUID();
    const enqueuedAt = payload.enqueuedAt ?? new Date();

    this.db
      .prepare(
        `
      INSERT INTO queued_scans (handle, image, device_identifier, enqueued_at, reason)
      VALUES (?, ?, ?, ?, ?)
    `
      )
      .run(handle, payload.imageBytes, payload.deviceIdentifier, enqueuedAt.toISOString(), payload.reason);

    return handle;
  }

  drainAll(): QueuedPayload[] {
    const rows = this.db
      .prepare<[], QueuedScanRow>(
        'SELECT handle, image, device_identifier, enqueued_at, reason FROM queued_scans ORDER BY seq ASC'
      )
      .all();

    return rows.map((row) => ({
      handle: row.handle,
      imageBytes: row.image,
      deviceIdentifier: row.device_identifier,
      enqueuedAt: new Date(row.enqueued_at),
      reason: toQueueReason(row.reason),
    }));
  }

  remove(handle: string): boolean {
    const result = this.db.prepare('DELETE FROM queued_scans WHERE handle = ?').run(handle);
    return result.changes > 0;
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM queued_scans')
      .get();
    return row?.count ?? 0;
  }
}
