import { randomUUID } from 'crypto';
import { StreamScheduler } from '../../infrastructure/queue/StreamScheduler.js';
import { IScanQueueRepository } from '../../core/interfaces/IScanQueueRepository.js';
import { ICooldownTracker } from '../../core/interfaces/ICooldownTracker.js';
import { IConnectivityMonitor } from '../../core/interfaces/IConnectivityMonitor.js';
import { ICatalogStore, IScanProgressSink } from '../../core/interfaces/ICatalogStore.js';
import { ScanJob } from '../../core/entities/ScanJob.js';
import { StreamEvent } from '../../core/entities/StreamEvent.js';
import { JobDeferral, JobOutcome } from '../../core/entities/JobOutcome.js';
import { QueueReason } from '../../core/entities/QueuedPayload.js';

export type CaptureDisposition =
  | { disposition: 'started'; job: ScanJob }
  | { disposition: 'queued'; handle: string; reason: QueueReason };

export interface ScanOrchestratorDeps {
  scheduler: StreamScheduler;
  queue: IScanQueueRepository;
  cooldown: ICooldownTracker;
  connectivity: IConnectivityMonitor;
  catalog: ICatalogStore;
  deviceId: string;
  progressSink?: IScanProgressSink;
}

export interface OrchestratorStatus {
  online: boolean;
  active: number;
  waiting: number;
  queued: number;
  cooldownSecondsRemaining: number;
  deferredDuringCooldown: number;
}

/**
 * Scan Orchestrator
 * Routes captures to the scheduler or the durable queue and hands
 * results to the catalog.
 */
export class ScanOrchestrator {
  private scheduler: StreamScheduler;
  private queue: IScanQueueRepository;
  private cooldown: ICooldownTracker;
  private connectivity: IConnectivityMonitor;
  private catalog: ICatalogStore;
  private progressSink?: IScanProgressSink;
  private deviceId: string;

  private inFlightHandles: Set<string> = new Set();
  private delivered: WeakSet<ScanJob> = new WeakSet();
  private recoveryTimer: NodeJS.Timeout | null = null;
  private unsubscribeConnectivity: () => void;
  private idleCallback?: () => void;
  private stopped = false;

  constructor(deps: ScanOrchestratorDeps) {
    this.scheduler = deps.scheduler;
    this.queue = deps.queue;
    this.cooldown = deps.cooldown;
    this.connectivity = deps.connectivity;
    this.catalog = deps.catalog;
    this.progressSink = deps.progressSink;
    this.deviceId = deps.deviceId;

    this.scheduler.onJobEvent((job, event) => this.forwardEvent(job, event));
    this.scheduler.onJobTerminal((job, outcome) => this.handleTerminal(job, outcome));
    this.scheduler.onJobDeferred((job, deferral) => this.handleDeferral(job, deferral));
    this.scheduler.onJobSubmitted((job) => this.releaseQueueRow(job));
    this.scheduler.onSlotReleased(() => this.checkIdle());

    this.unsubscribeConnectivity = this.connectivity.onChange((online) => {
      if (online) {
        console.error('[ScanOrchestrator] Connectivity restored, draining queue');
        this.drainQueue();
      }
    });
  }

  /**
   * Entry point for a new capture
   */
  handleCapture(imageBytes: Buffer): CaptureDisposition {
    if (!this.connectivity.isOnline()) {
      return this.enqueue(imageBytes, this.deviceId, 'offline');
    }

    if (!this.cooldown.admit()) {
      this.cooldown.recordDeferred();
      this.armRecoveryTimer();
      return this.enqueue(imageBytes, this.deviceId, 'rate_limited');
    }

    const job = this.createJob(imageBytes, this.deviceId);
    this.scheduler.start(job);
    return { disposition: 'started', job };
  }

  /**
   * Start every queued payload that is not already in flight.
   * Returns the number of jobs started.
   */
  drainQueue(): number {
    if (this.stopped || !this.connectivity.isOnline()) {
      return 0;
    }

    if (!this.cooldown.admit()) {
      this.armRecoveryTimer();
      return 0;
    }

    let started = 0;
    for (const payload of this.queue.drainAll()) {
      if (this.inFlightHandles.has(payload.handle)) {
        continue;
      }
      if (this.cooldown.isActive()) {
        this.armRecoveryTimer();
        break;
      }

      const job = this.createJob(payload.imageBytes, payload.deviceIdentifier, payload.handle);
      this.inFlightHandles.add(payload.handle);
      this.scheduler.start(job);
      started++;
    }

    if (started > 0) {
      console.error(`[ScanOrchestrator] Started ${started} queued scans`);
    }
    this.checkIdle();
    return started;
  }

  getStatus(): OrchestratorStatus {
    const cooldown = this.cooldown.getState();
    return {
      online: this.connectivity.isOnline(),
      active: this.scheduler.getActiveCount(),
      waiting: this.scheduler.getQueueDepth(),
      queued: this.queue.count(),
      cooldownSecondsRemaining: this.cooldown.secondsRemaining(),
      deferredDuringCooldown: cooldown.backlogCount,
    };
  }

  /**
   * Nothing running, nothing waiting, no cooldown drain scheduled
   */
  isIdle(): boolean {
    return (
      this.scheduler.getActiveCount() === 0 &&
      this.scheduler.getQueueDepth() === 0 &&
      this.recoveryTimer === null
    );
  }

  onIdle(callback: () => void): void {
    this.idleCallback = callback;
  }

  shutdown(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.scheduler.cancelAll();
    this.clearRecoveryTimer();
    this.unsubscribeConnectivity();
    this.inFlightHandles.clear();
  }

  private createJob(imageBytes: Buffer, deviceIdentifier: string, queueHandle?: string): ScanJob {
    return {
      localId: randomUUID(),
      imageBytes,
      deviceIdentifier,
      createdAt: new Date(),
      status: 'queued',
      queueHandle,
    };
  }

  private enqueue(imageBytes: Buffer, deviceIdentifier: string, reason: QueueReason): CaptureDisposition {
    const handle = this.queue.enqueue({ imageBytes, deviceIdentifier, reason });
    console.error(`[ScanOrchestrator] Queued scan ${handle} (${reason}), ${this.queue.count()} waiting`);
    return { disposition: 'queued', handle, reason };
  }

  private handleDeferral(job: ScanJob, deferral: JobDeferral): void {
    if (job.queueHandle) {
      // Row still exists; the next drain picks it up again
      this.inFlightHandles.delete(job.queueHandle);
    } else {
      this.enqueue(job.imageBytes, job.deviceIdentifier, deferral.reason);
    }

    if (deferral.reason === 'rate_limited') {
      this.cooldown.recordDeferred();
      this.armRecoveryTimer();
    }
  }

  private handleTerminal(job: ScanJob, outcome: JobOutcome): void {
    if (this.delivered.has(job)) {
      return;
    }
    this.delivered.add(job);

    Promise.resolve()
      .then(() =>
        outcome.status === 'completed'
          ? this.catalog.saveBooks(job, outcome.books)
          : this.catalog.recordFailure(job, outcome.reason)
      )
      .catch((error) => {
        console.error(`[ScanOrchestrator] ✗ Failed to store outcome of job ${job.localId}:`, error);
      });

    // Terminal outcomes are final, including a submit the server rejected
    this.releaseQueueRow(job);
  }

  private releaseQueueRow(job: ScanJob): void {
    if (!job.queueHandle) {
      return;
    }
    this.queue.remove(job.queueHandle);
    this.inFlightHandles.delete(job.queueHandle);
  }

  private forwardEvent(job: ScanJob, event: StreamEvent): void {
    const sink = this.progressSink;
    if (!sink) {
      return;
    }

    switch (event.type) {
      case 'progress':
        sink.onProgress?.(job, event.message);
        break;
      case 'segmented_preview':
        sink.onSegmentedPreview?.(job, event.previewImage, event.totalDetected);
        break;
      case 'book_progress':
        sink.onBookProgress?.(job, event.currentIndex, event.totalCount, event.stage);
        break;
      case 'enrichment_degraded':
        sink.onEnrichmentDegraded?.(job, event.reason, event.partial);
        break;
      default:
        break;
    }
  }

  private armRecoveryTimer(): void {
    if (this.stopped || this.recoveryTimer) {
      return;
    }

    const delayMs = Math.max(1, this.cooldown.secondsRemaining()) * 1000;
    this.recoveryTimer = setTimeout(() => {
      this.recoveryTimer = null;
      this.drainQueue();
    }, delayMs);
  }

  private clearRecoveryTimer(): void {
    if (this.recoveryTimer) {
      clearTimeout(this.recoveryTimer);
      this.recoveryTimer = null;
    }
  }

  private checkIdle(): void {
    if (this.idleCallback && !this.stopped && this.isIdle()) {
      this.idleCallback();
    }
  }
}
