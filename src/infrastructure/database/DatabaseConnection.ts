import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/scan-queue.db') {
    this.dbPath = dbPath === ':memory:' ? dbPath : path.resolve(process.cwd(), dbPath);

    if (this.dbPath !== ':memory:') {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS queued_scans (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        handle TEXT NOT NULL UNIQUE,
        image BLOB NOT NULL,
        device_identifier TEXT NOT NULL,
        enqueued_at TEXT NOT NULL,
        reason TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS device_settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): { queuedScans: number; databaseSize: number } {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM queued_scans')
      .get();

    let databaseSize = 0;
    if (this.dbPath !== ':memory:' && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      queuedScans: row?.count ?? 0,
      databaseSize,
    };
  }
}
