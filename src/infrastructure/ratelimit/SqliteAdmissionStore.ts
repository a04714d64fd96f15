import Database from 'better-sqlite3';
import type { AdmissionDecision, IAdmissionStore } from '../../core/interfaces/IAdmissionStore.js';

/**
 * Busy timeout for the coordination connection. better-sqlite3 waits synchronously,
 * so a peer holding the write lock must surface as SQLITE_BUSY almost at once.
 */
export const COORDINATION_BUSY_TIMEOUT_MS = 25;

interface AdmitArgs {
  key: string;
  limit: number;
  windowMs: number;
  now: number;
}

/**
 * Sliding-window log in a SQLite file shared by every process on the host.
 * Prune, count and insert run in one IMMEDIATE transaction, which takes the
 * write lock up front so two processes cannot both admit the last slot.
 */
export class SqliteAdmissionStore implements IAdmissionStore {
  readonly name = 'sqlite';
  private admit: (args: AdmitArgs) => AdmissionDecision;

  constructor(private db: Database.Database) {
    const prune = db.prepare<[string, number]>(
      'DELETE FROM rpm_admissions WHERE credential = ? AND admitted_at <= ?'
    );
    const count = db.prepare<[string], { total: number; oldest: number | null }>(
      'SELECT COUNT(*) AS total, MIN(admitted_at) AS oldest FROM rpm_admissions WHERE credential = ?'
    );
    const insert = db.prepare<[string, number]>(
      'INSERT INTO rpm_admissions (credential, admitted_at) VALUES (?, ?)'
    );

    const transaction = db.transaction(({ key, limit, windowMs, now }: AdmitArgs): AdmissionDecision => {
      prune.run(key, now - windowMs);
      const row = count.get(key);
      const total = row?.total ?? 0;
      if (total >= limit) {
        const oldest = row?.oldest ?? now;
        return { admitted: false, count: total, retryAfterMs: Math.max(1, oldest + windowMs - now) };
      }
      insert.run(key, now);
      return { admitted: true, count: total + 1, retryAfterMs: 0 };
    });

    this.admit = (args) => transaction.immediate(args);
  }

  async tryAdmit(key: string, limit: number, windowMs: number, now: number): Promise<AdmissionDecision> {
    return this.admit({ key, limit, windowMs, now });
  }
}
