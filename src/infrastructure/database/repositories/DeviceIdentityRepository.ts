import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { IDeviceIdentityRepository } from '../../../core/interfaces/IDeviceIdentityRepository.js';

const DEVICE_ID_KEY = 'device_id';

/**
 * Persists the per-install device identifier sent as X-Device-ID
 */
export class DeviceIdentityRepository implements IDeviceIdentityRepository {
  constructor(private db: Database.Database) {}

  getOrCreate(): string {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM device_settings WHERE key = ?')
      .get(DEVICE_ID_KEY);

    if (row) {
      return row.value;
    }
    return this.store(randomUUID());
  }

  reset(): string {
    return this.store(randomUUID());
  }

  private store(deviceId: string): string {
    this.db
      .prepare(
        `
      INSERT OR REPLACE INTO device_settings (key, value, updated_at)
      VALUES (?, ?, ?)
    `
      )
      .run(DEVICE_ID_KEY, deviceId, new Date().toISOString());

    console.error(`[DeviceIdentity] Using new device id ${deviceId}`);
    return deviceId;
  }
}
