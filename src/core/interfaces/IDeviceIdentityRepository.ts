/**
 * Interface for the per-install device identifier
 */
export interface IDeviceIdentityRepository {
  /**
   * Stored identifier, generated and persisted on first call
   */
  getOrCreate(): string;

  reset(): string;
}
