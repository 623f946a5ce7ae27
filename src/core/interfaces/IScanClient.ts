import { ScanJob, StreamHandle, SubmitResult } from '../entities/ScanJob.js';
import { BookMetadata, StreamEvent } from '../entities/StreamEvent.js';

export interface ConsumeStreamOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
}

/**
 * Interface for the recognition service client
 */
export interface IScanClient {
  /**
   * Upload the job's image; resolves with the server-side identity
   */
  submit(job: ScanJob, signal?: AbortSignal): Promise<SubmitResult>;

  /**
   * Events for one job, ending with exactly one terminal event
   * or throwing once connection retries are exhausted
   */
  consumeStream(handle: StreamHandle, options?: ConsumeStreamOptions): AsyncGenerator<StreamEvent>;

  /**
   * Follow-up fetch for a completed event that only carried a resultsUrl
   */
  fetchResults(resultsUrl: string, authToken?: string, signal?: AbortSignal): Promise<BookMetadata[]>;

  /**
   * Release server-side resources. Never rejects.
   */
  cleanup(jobId: string, authToken?: string): Promise<void>;
}
