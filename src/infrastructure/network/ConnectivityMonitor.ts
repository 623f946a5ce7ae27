import { EventEmitter } from 'events';
import { promises as dns } from 'dns';
import { IConnectivityMonitor } from '../../core/interfaces/IConnectivityMonitor.js';
import { errorMessage } from '../../core/errors/ScanErrors.js';

export type ReachabilityCheck = () => Promise<boolean>;

/**
 * Resolves the API host; a failed lookup counts as offline
 */
export function dnsReachabilityCheck(apiUrl: string): ReachabilityCheck {
  const { hostname } = new URL(apiUrl);
  return async () => {
    try {
      await dns.lookup(hostname);
      return true;
    } catch {
      return false;
    }
  };
}

/**
 * Tracks whether the service is reachable and notifies on transitions
 */
export class ConnectivityMonitor implements IConnectivityMonitor {
  private emitter = new EventEmitter();
  private online: boolean;
  private timer: NodeJS.Timeout | null = null;

  constructor(initiallyOnline: boolean = true) {
    this.online = initiallyOnline;
  }

  isOnline(): boolean {
    return this.online;
  }

  onChange(listener: (online: boolean) => void): () => void {
    this.emitter.on('change', listener);
    return () => {
      this.emitter.off('change', listener);
    };
  }

  /**
   * Record the current reachability; listeners fire only on a transition
   */
  setOnline(online: boolean): void {
    if (online === this.online) {
      return;
    }
    this.online = online;
    console.error(`[ConnectivityMonitor] ${online ? 'Back online' : 'Offline'}`);
    this.emitter.emit('change', online);
  }

  /**
   * Poll a reachability check until stop() is called
   */
  start(check: ReachabilityCheck, intervalMs: number = 15000): void {
    this.stop();

    const poll = () => {
      check().then(
        (online) => this.setOnline(online),
        (error: unknown) => {
          console.error('[ConnectivityMonitor] ✗ Reachability check failed:', errorMessage(error));
          this.setOnline(false);
        }
      );
    };

    poll();
    this.timer = setInterval(poll, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
