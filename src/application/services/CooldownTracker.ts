import { CooldownState } from '../../core/entities/CooldownState.js';
import { ICooldownTracker } from '../../core/interfaces/ICooldownTracker.js';

export type Clock = () => number;

/**
 * Cooldown Tracker Service
 * Holds the single rate-limit window shared by every job
 */
export class CooldownTracker implements ICooldownTracker {
  private active = false;
  private expiresAt: number | null = null;
  private backlogCount = 0;

  constructor(private clock: Clock = Date.now) {}

  /**
   * Start (or restart) the cooldown window after a 429
   */
  recordRateLimit(retryAfterSeconds: number): void {
    if (!(retryAfterSeconds > 0)) {
      console.error(`[CooldownTracker] Ignoring rate limit of ${retryAfterSeconds}s`);
      return;
    }

    this.active = true;
    this.expiresAt = this.clock() + retryAfterSeconds * 1000;
    console.error(`[CooldownTracker] Rate limited for ${retryAfterSeconds}s (${this.backlogCount} deferred)`);
  }

  /**
   * Count a job held back by the current window; no-op when none is open
   */
  recordDeferred(): void {
    if (this.active) {
      this.backlogCount++;
    }
  }

  admit(): boolean {
    if (!this.active) {
      return true;
    }
    if (this.expiresAt !== null && this.clock() < this.expiresAt) {
      return false;
    }

    console.error(`[CooldownTracker] Cooldown over, releasing ${this.backlogCount} deferred`);
    this.active = false;
    this.expiresAt = null;
    this.backlogCount = 0;
    return true;
  }

  secondsRemaining(): number {
    if (!this.active || this.expiresAt === null) {
      return 0;
    }
    return Math.max(0, Math.ceil((this.expiresAt - this.clock()) / 1000));
  }

  isActive(): boolean {
    this.admit();
    return this.active;
  }

  getState(): CooldownState {
    this.admit();
    return {
      isActive: this.active,
      expiresAt: this.expiresAt,
      backlogCount: this.backlogCount,
    };
  }
}
