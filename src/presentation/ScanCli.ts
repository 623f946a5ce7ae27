import fs from 'fs';
import path from 'path';
import { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { ScanQueueRepository } from '../infrastructure/database/repositories/ScanQueueRepository.js';
import { DeviceIdentityRepository } from '../infrastructure/database/repositories/DeviceIdentityRepository.js';
import { ScanApiClient, FetchFn } from '../infrastructure/http/ScanApiClient.js';
import { StreamScheduler } from '../infrastructure/queue/StreamScheduler.js';
import { ConnectivityMonitor, dnsReachabilityCheck } from '../infrastructure/network/ConnectivityMonitor.js';
import { CooldownTracker } from '../application/services/CooldownTracker.js';
import { ScanOrchestrator } from '../application/services/ScanOrchestrator.js';
import { ConsoleReporter } from './ConsoleReporter.js';

export interface ScanCliOptions {
  fetch?: FetchFn;
  reporter?: ConsoleReporter;
  connectivity?: ConnectivityMonitor;
}

/**
 * Wires the scan pipeline together for the command line
 */
export class ScanCli {
  private dbConnection: DatabaseConnection;
  private queueRepository: ScanQueueRepository;
  private orchestrator: ScanOrchestrator;
  private scheduler: StreamScheduler;
  private connectivity: ConnectivityMonitor;
  private reporter: ConsoleReporter;
  private ownsConnectivity: boolean;
  private deviceId: string;
  private debugLog: (message: string) => void;
  private closed = false;

  constructor(private config: Config, options: ScanCliOptions = {}) {
    this.debugLog = (message: string) => {
      if (config.client.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.dbConnection = new DatabaseConnection(config.queue.dbPath);
    const db = this.dbConnection.getDatabase();
    this.queueRepository = new ScanQueueRepository(db);
    const identity = new DeviceIdentityRepository(db);
    const deviceId =
      config.api.deviceId ?? (config.api.resetDeviceId ? identity.reset() : identity.getOrCreate());
    this.deviceId = deviceId;
    this.debugLog(`Device id: ${deviceId}`);

    const client = new ScanApiClient({
      baseUrl: config.api.baseUrl,
      deviceId,
      fetch: options.fetch,
      retryConfig: {
        maxAttempts: config.streams.maxAttempts,
        initialDelayMs: config.streams.initialDelayMs,
        maxDelayMs: config.streams.maxDelayMs,
        multiplier: 2,
      },
      connectTimeoutMs: config.api.connectTimeoutMs,
      idleTimeoutMs: config.api.idleTimeoutMs,
      defaultRetryAfterSeconds: config.api.defaultRetryAfterSeconds,
      userAgent: `${config.client.name}/${config.client.version}`,
      debug: config.client.debug,
    });

    const cooldown = new CooldownTracker();
    this.scheduler = new StreamScheduler(client, {
      maxConcurrent: config.streams.maxConcurrent,
      maxStreamAttempts: config.streams.maxAttempts,
      cooldown,
      debug: config.client.debug,
    });

    this.ownsConnectivity = options.connectivity === undefined;
    this.connectivity = options.connectivity ?? new ConnectivityMonitor(true);
    this.reporter = options.reporter ?? new ConsoleReporter();

    this.orchestrator = new ScanOrchestrator({
      scheduler: this.scheduler,
      queue: this.queueRepository,
      cooldown,
      connectivity: this.connectivity,
      catalog: this.reporter,
      progressSink: this.reporter,
      deviceId,
    });
  }

  /**
   * Drain anything left from earlier runs, submit the given images and
   * resolve once nothing is running or scheduled.
   */
  async run(imagePaths: string[]): Promise<void> {
    if (this.ownsConnectivity) {
      this.connectivity.start(dnsReachabilityCheck(this.config.api.baseUrl));
    }

    const drained = this.orchestrator.drainQueue();
    if (drained > 0) {
      console.error(`📤 Resuming ${drained} queued scan${drained === 1 ? '' : 's'}`);
    }

    for (const imagePath of imagePaths) {
      const imageBytes = fs.readFileSync(imagePath);
      const disposition = this.orchestrator.handleCapture(imageBytes);

      if (disposition.disposition === 'started') {
        this.reporter.track(disposition.job, path.basename(imagePath));
        this.debugLog(`Started ${imagePath} as ${disposition.job.localId}`);
      } else {
        console.error(`📥 ${path.basename(imagePath)} queued (${disposition.reason})`);
      }
    }

    if (!this.orchestrator.isIdle()) {
      await new Promise<void>((resolve) => this.orchestrator.onIdle(resolve));
    }
  }

  printStats(): void {
    const status = this.orchestrator.getStatus();
    const stats = this.scheduler.getStatistics();
    const summary = this.reporter.getSummary();

    console.error(
      `\n📊 ${summary.completed} completed (${summary.books} books) | ${summary.failed} failed | ${status.queued} still queued`
    );
    console.error(
      `⚙️  Streams: ${stats.started} started | peak ${stats.peakActive}/${stats.maxConcurrent} | ${stats.deferred} deferred`
    );
    if (status.cooldownSecondsRemaining > 0) {
      console.error(`⏰ Rate limited for another ${status.cooldownSecondsRemaining}s`);
    }
  }

  getDeviceId(): string {
    return this.deviceId;
  }

  getOrchestrator(): ScanOrchestrator {
    return this.orchestrator;
  }

  shutdown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.orchestrator.shutdown();
    this.connectivity.stop();
    this.dbConnection.close();
  }
}
