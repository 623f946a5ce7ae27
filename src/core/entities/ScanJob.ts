/**
 * Scan job domain entity
 */
export type ScanJobStatus =
  | 'queued'
  | 'submitted'
  | 'streaming'
  | 'completed'
  | 'failed'
  | 'canceled';

export interface ScanJob {
  localId: string; // client-side id, stable from capture onwards
  imageBytes: Buffer;
  deviceIdentifier: string;
  createdAt: Date;
  status: ScanJobStatus;
  jobId?: string; // server-assigned after submit
  authToken?: string; // server-issued, needed for stream/results/cleanup
  queueHandle?: string; // set when the job was drained from the durable queue
}

/**
 * Accepted submit response
 */
export interface SubmitResult {
  jobId: string;
  sseUrl: string;
  authToken?: string;
}

/**
 * What a stream connection needs to open
 */
export interface StreamHandle {
  jobId: string;
  sseUrl: string;
  authToken?: string;
}

export function isTerminalStatus(status: ScanJobStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'canceled';
}

/**
 * Records the server-assigned identity on a job. A job is submitted once;
 * its jobId and authToken never change afterwards.
 */
export function recordSubmission(job: ScanJob, result: SubmitResult): void {
  if (job.jobId !== undefined) {
    throw new Error(
      `Job ${job.localId} already submitted as ${job.jobId}; refusing to record ${result.jobId}`
    );
  }
  job.jobId = result.jobId;
  job.authToken = result.authToken;
  job.status = 'submitted';
}
