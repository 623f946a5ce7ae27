/**
 * Global rate-limit state. Only the CooldownTracker writes it.
 */
export interface CooldownState {
  isActive: boolean;
  expiresAt: number | null; // epoch ms, null when inactive
  backlogCount: number;
}
