import { CooldownState } from '../entities/CooldownState.js';

/**
 * Interface for the global rate-limit cooldown
 */
export interface ICooldownTracker {
  recordRateLimit(retryAfterSeconds: number): void;
  recordDeferred(): void;

  /**
   * False while a cooldown is running. Clears an expired cooldown.
   */
  admit(): boolean;

  secondsRemaining(): number;
  isActive(): boolean;
  getState(): CooldownState;
}
