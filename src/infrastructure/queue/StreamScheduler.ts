import { IScanClient } from '../../core/interfaces/IScanClient.js';
import { ICooldownTracker } from '../../core/interfaces/ICooldownTracker.js';
import { ScanJob, SubmitResult, isTerminalStatus, recordSubmission } from '../../core/entities/ScanJob.js';
import { BookMetadata, StreamEvent } from '../../core/entities/StreamEvent.js';
import { JobDeferral, JobOutcome } from '../../core/entities/JobOutcome.js';
import {
  ClientError,
  ConnectionFailureError,
  JobCanceledError,
  RateLimitedError,
  StreamRetriesExhaustedError,
  errorMessage,
} from '../../core/errors/ScanErrors.js';

export interface StreamSchedulerOptions {
  maxConcurrent?: number;
  maxStreamAttempts?: number;
  cooldown?: ICooldownTracker;
  debug?: boolean;
}

/**
 * Bookkeeping for one running job
 */
interface ActiveRun {
  job: ScanJob;
  controller: AbortController;
  startedAt: number;
  settled: boolean; // terminal outcome or deferral already emitted
  detached: boolean; // dropped by cancelAll
  cleanupFired: boolean;
}

export interface SchedulerStatistics {
  active: number;
  waiting: number;
  started: number;
  completed: number;
  failed: number;
  canceled: number;
  deferred: number;
  peakActive: number;
  maxConcurrent: number;
}

export type JobEventCallback = (job: ScanJob, event: StreamEvent) => void;
export type JobTerminalCallback = (job: ScanJob, outcome: JobOutcome) => void;
export type JobDeferredCallback = (job: ScanJob, deferral: JobDeferral) => void;
export type JobSubmittedCallback = (job: ScanJob) => void;
export type SlotReleasedCallback = () => void;

/**
 * Stream Scheduler
 * Runs submit-then-stream for each job with at most `maxConcurrent`
 * connections open; the rest wait in FIFO order.
 */
export class StreamScheduler {
  private pending: ScanJob[] = [];
  private running: Map<string, ActiveRun> = new Map();
  private maxConcurrent: number;
  private maxStreamAttempts: number | undefined;
  private cooldown?: ICooldownTracker;
  private debug: boolean;

  private counters = { started: 0, completed: 0, failed: 0, canceled: 0, deferred: 0, peakActive: 0 };

  private jobEventCallback?: JobEventCallback;
  private jobTerminalCallback?: JobTerminalCallback;
  private jobDeferredCallback?: JobDeferredCallback;
  private jobSubmittedCallback?: JobSubmittedCallback;
  private slotReleasedCallback?: SlotReleasedCallback;

  constructor(private client: IScanClient, options: StreamSchedulerOptions = {}) {
    this.maxConcurrent = options.maxConcurrent ?? 5;
    this.maxStreamAttempts = options.maxStreamAttempts;
    this.cooldown = options.cooldown;
    this.debug = options.debug ?? false;
  }

  /**
   * Start a job now, or queue it behind the running ones
   */
  start(job: ScanJob): void {
    if (isTerminalStatus(job.status) || this.isTracked(job)) {
      console.error(`[StreamScheduler] Ignoring start of job ${job.localId} (${job.status})`);
      return;
    }

    job.status = 'queued';
    this.pending.push(job);
    this.processQueue();
  }

  /**
   * Tear down everything. Active jobs that reached the server get a
   * cleanup request; nothing emits a terminal outcome.
   */
  cancelAll(): void {
    const waiting = this.pending.length;
    for (const job of this.pending) {
      job.status = 'canceled';
    }
    this.pending = [];

    const active = this.running.size;
    for (const run of this.running.values()) {
      run.detached = true;
      run.job.status = 'canceled';
      this.fireCleanup(run);
      run.controller.abort();
    }
    this.running.clear();

    if (active > 0 || waiting > 0) {
      console.error(`[StreamScheduler] Canceled ${active} active and ${waiting} waiting jobs`);
    }
  }

  getActiveCount(): number {
    return this.running.size;
  }

  getQueueDepth(): number {
    return this.pending.length;
  }

  getStatistics(): SchedulerStatistics {
    return {
      active: this.running.size,
      waiting: this.pending.length,
      ...this.counters,
      maxConcurrent: this.maxConcurrent,
    };
  }

  isTracked(job: ScanJob): boolean {
    return this.running.has(job.localId) || this.pending.some((j) => j.localId === job.localId);
  }

  onJobEvent(callback: JobEventCallback): void {
    this.jobEventCallback = callback;
  }

  onJobTerminal(callback: JobTerminalCallback): void {
    this.jobTerminalCallback = callback;
  }

  onJobDeferred(callback: JobDeferredCallback): void {
    this.jobDeferredCallback = callback;
  }

  onJobSubmitted(callback: JobSubmittedCallback): void {
    this.jobSubmittedCallback = callback;
  }

  /**
   * Called after a finished job gave up its slot and waiting jobs were promoted
   */
  onSlotReleased(callback: SlotReleasedCallback): void {
    this.slotReleasedCallback = callback;
  }

  /**
   * Promote waiting jobs while slots are free
   */
  private processQueue(): void {
    while (this.pending.length > 0 && this.running.size < this.maxConcurrent) {
      const job = this.pending.shift();
      if (job) {
        const run: ActiveRun = {
          job,
          controller: new AbortController(),
          startedAt: Date.now(),
          settled: false,
          detached: false,
          cleanupFired: false,
        };
        this.running.set(job.localId, run);
        this.counters.started++;
        this.counters.peakActive = Math.max(this.counters.peakActive, this.running.size);

        this.execute(run).catch((error) => {
          console.error(`[StreamScheduler] ✗ Unexpected error in job ${job.localId}:`, error);
        });
      }
    }
  }

  private async execute(run: ActiveRun): Promise<void> {
    const { job } = run;

    try {
      let result: SubmitResult;
      try {
        result = await this.client.submit(job, run.controller.signal);
      } catch (error) {
        this.handleSubmitError(run, error);
        return;
      }

      if (run.detached) {
        // Canceled while the upload was in flight
        this.client.cleanup(result.jobId, result.authToken).catch((error) => {
          console.error(`[StreamScheduler] ✗ Cleanup of job ${result.jobId} failed:`, error);
        });
        return;
      }

      recordSubmission(job, result);
      this.jobSubmittedCallback?.(job);

      job.status = 'streaming';
      const outcome = await this.consume(run, result);
      if (outcome) {
        this.finish(run, outcome);
      }
    } catch (error) {
      this.finish(run, this.outcomeFromError(error));
    } finally {
      this.fireCleanup(run);
      this.release(run);
    }
  }

  private handleSubmitError(run: ActiveRun, error: unknown): void {
    if (error instanceof RateLimitedError) {
      this.cooldown?.recordRateLimit(error.retryAfterSeconds);
      this.defer(run, {
        reason: 'rate_limited',
        retryAfterSeconds: error.retryAfterSeconds,
        error: error.message,
      });
      return;
    }

    if (error instanceof ConnectionFailureError) {
      this.defer(run, { reason: 'submit_failed', error: error.message });
      return;
    }

    this.finish(run, this.outcomeFromError(error));
  }

  /**
   * Iterate the stream until the first terminal event. Returns null when
   * the run was detached mid-stream.
   */
  private async consume(run: ActiveRun, result: SubmitResult): Promise<JobOutcome | null> {
    const { job, controller } = run;
    const collected: BookMetadata[] = [];

    const events = this.client.consumeStream(
      { jobId: result.jobId, sseUrl: result.sseUrl, authToken: result.authToken },
      { maxAttempts: this.maxStreamAttempts, signal: controller.signal }
    );

    for await (const event of events) {
      if (run.detached) {
        return null;
      }

      switch (event.type) {
        case 'completed':
          return this.resolveCompletion(run, event, collected);

        case 'failed':
          return {
            status: 'failed',
            reason: event.message,
            code: event.code,
            retryable: event.retryable,
          };

        case 'canceled':
          return { status: 'canceled', reason: 'Canceled by server' };

        case 'book_result':
          collected.push(event.book);
          this.emitEvent(job, event);
          break;

        default:
          this.emitEvent(job, event);
      }
    }

    return run.detached ? null : { status: 'failed', reason: 'Stream ended without a result', retryable: true };
  }

  private async resolveCompletion(
    run: ActiveRun,
    event: Extract<StreamEvent, { type: 'completed' }>,
    collected: BookMetadata[]
  ): Promise<JobOutcome | null> {
    if (event.books && event.books.length > 0) {
      return { status: 'completed', books: event.books };
    }

    if (event.resultsUrl) {
      try {
        const books = await this.client.fetchResults(
          event.resultsUrl,
          run.job.authToken,
          run.controller.signal
        );
        return { status: 'completed', books };
      } catch (error) {
        if (run.detached) {
          return null;
        }
        return {
          status: 'failed',
          reason: `Failed to retrieve results: ${errorMessage(error)}`,
          retryable: true,
        };
      }
    }

    if (collected.length > 0) {
      return { status: 'completed', books: collected };
    }

    if (event.books) {
      return { status: 'completed', books: [] };
    }

    return { status: 'failed', reason: 'No results available', retryable: false };
  }

  private outcomeFromError(error: unknown): JobOutcome {
    if (error instanceof JobCanceledError) {
      return { status: 'canceled', reason: error.message };
    }

    if (error instanceof StreamRetriesExhaustedError) {
      return { status: 'failed', reason: error.message, retryable: true };
    }

    if (error instanceof RateLimitedError) {
      this.cooldown?.recordRateLimit(error.retryAfterSeconds);
      return { status: 'failed', reason: error.message, code: 'RATE_LIMITED', retryable: true };
    }

    if (error instanceof ClientError) {
      return { status: 'failed', reason: error.message, code: error.code, retryable: false };
    }

    return { status: 'failed', reason: errorMessage(error), retryable: false };
  }

  private finish(run: ActiveRun, outcome: JobOutcome): void {
    const { job } = run;
    if (run.settled || run.detached) {
      return;
    }
    run.settled = true;

    job.status = outcome.status;
    this.counters[outcome.status]++;

    const elapsed = Date.now() - run.startedAt;
    if (outcome.status === 'completed') {
      console.error(
        `[StreamScheduler] ✓ Job ${job.localId} completed in ${elapsed}ms (${outcome.books.length} books)`
      );
    } else {
      console.error(`[StreamScheduler] ✗ Job ${job.localId} ${outcome.status} after ${elapsed}ms: ${outcome.reason}`);
    }

    try {
      this.jobTerminalCallback?.(job, outcome);
    } catch (error) {
      console.error(`[StreamScheduler] ✗ Terminal callback failed for job ${job.localId}:`, error);
    }
  }

  private defer(run: ActiveRun, deferral: JobDeferral): void {
    const { job } = run;
    if (run.settled || run.detached) {
      return;
    }
    run.settled = true;
    job.status = 'queued';
    this.counters.deferred++;

    console.error(`[StreamScheduler] Deferring job ${job.localId} (${deferral.reason}): ${deferral.error}`);

    try {
      this.jobDeferredCallback?.(job, deferral);
    } catch (error) {
      console.error(`[StreamScheduler] ✗ Deferral callback failed for job ${job.localId}:`, error);
    }
  }

  private emitEvent(job: ScanJob, event: StreamEvent): void {
    if (this.debug) {
      console.error(`[StreamScheduler] Job ${job.localId} event: ${event.type}`);
    }
    try {
      this.jobEventCallback?.(job, event);
    } catch (error) {
      console.error(`[StreamScheduler] ✗ Event callback failed for job ${job.localId}:`, error);
    }
  }

  /**
   * Ask the server to drop a submitted job, at most once per run
   */
  private fireCleanup(run: ActiveRun): void {
    const { job } = run;
    if (run.cleanupFired || job.jobId === undefined) {
      return;
    }
    run.cleanupFired = true;

    const jobId = job.jobId;
    this.client.cleanup(jobId, job.authToken).catch((error) => {
      console.error(`[StreamScheduler] ✗ Cleanup of job ${jobId} failed:`, error);
    });
  }

  private release(run: ActiveRun): void {
    if (this.running.get(run.job.localId) !== run) {
      return;
    }
    this.running.delete(run.job.localId);
    this.processQueue();
    this.slotReleasedCallback?.();
  }
}
