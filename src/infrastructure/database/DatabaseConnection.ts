import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const MEMORY_DATABASE = ':memory:';

/**
 * SQLite connection manager for job records and shared rate-limit admissions
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/jobs.db', busyTimeoutMs: number = 5000) {
    this.dbPath = resolveDatabasePath(dbPath);

    if (this.dbPath !== MEMORY_DATABASE) {
      // Ensure data directory exists
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    this.db = new Database(this.dbPath);
    // WAL lets request handlers read while the sweeper deletes
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma(`busy_timeout = ${Math.max(0, Math.floor(busyTimeoutMs))}`);

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        status TEXT NOT NULL,
        progress INTEGER NOT NULL DEFAULT 0,
        owner_key TEXT NOT NULL,
        user_id TEXT NOT NULL,
        sub_task_count INTEGER NOT NULL,
        sub_tasks_done INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        expires_at TEXT NOT NULL,
        partial TEXT,
        result TEXT,
        error TEXT,
        version INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_created ON jobs(created_at);
      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);

      CREATE TABLE IF NOT EXISTS rpm_admissions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        credential TEXT NOT NULL,
        admitted_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_rpm_credential_time ON rpm_admissions(credential, admitted_at);
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
}

export function resolveDatabasePath(dbPath: string): string {
  return dbPath === MEMORY_DATABASE ? dbPath : path.resolve(process.cwd(), dbPath);
}
