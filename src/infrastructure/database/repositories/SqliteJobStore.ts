import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  Job,
  JobCreateInput,
  JobMutator,
  assertValidTransition,
  newJob,
} from '../../../core/entities/Job.js';
import { BatchAggregateSchema, JobErrorSchema } from '../../../core/entities/Outcome.js';
import { NotFoundError } from '../../../core/errors.js';
import type { IJobStore, JobStoreListener } from '../../../core/interfaces/IJobStore.js';
import { KeyedMutex } from '../../../utils/KeyedMutex.js';
import { assertCreateInput, JobStoreOptions } from '../../store/InMemoryJobStore.js';
import { JobStoreEvents } from '../../store/JobStoreEvents.js';

interface JobRow {
  id: string;
  kind: string;
  status: string;
  progress: number;
  owner_key: string;
  user_id: string;
  sub_task_count: number;
  sub_tasks_done: number;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  expires_at: string;
  partial: string | null;
  result: string | null;
  error: string | null;
  version: number;
}

type JobParams = Omit<JobRow, 'version'> & { version: number; expected_version: number };

const JobKindSchema = z.enum(['single', 'batch', 'classify']);
const JobStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed']);

// Attempts at a version compare-and-swap before giving up on an update
const MAX_CAS_ATTEMPTS = 5;

/**
 * SQLite implementation of the job store.
 *
 * Writes use optimistic concurrency on the `version` column so several processes
 * can share one database file; inside a process the keyed mutex serialises
 * updates so conflicts only arise from other processes.
 */
export class SqliteJobStore implements IJobStore {
  private locks = new KeyedMutex();
  private events = new JobStoreEvents();
  private now: () => Date;

  private insertStmt: Database.Statement<[JobParams]>;
  private selectStmt: Database.Statement<[string], JobRow>;
  private updateStmt: Database.Statement<[JobParams]>;

  constructor(
    private db: Database.Database,
    private options: JobStoreOptions
  ) {
    this.now = options.now ?? (() => new Date());

    this.insertStmt = this.db.prepare<[JobParams]>(`
      INSERT INTO jobs (id, kind, status, progress, owner_key, user_id, sub_task_count, sub_tasks_done,
                        created_at, started_at, completed_at, expires_at, partial, result, error, version)
      VALUES (@id, @kind, @status, @progress, @owner_key, @user_id, @sub_task_count, @sub_tasks_done,
              @created_at, @started_at, @completed_at, @expires_at, @partial, @result, @error, @version)
    `);
    this.selectStmt = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?');
    this.updateStmt = this.db.prepare<[JobParams]>(`
      UPDATE jobs SET
        status = @status, progress = @progress, sub_tasks_done = @sub_tasks_done,
        started_at = @started_at, completed_at = @completed_at,
        partial = @partial, result = @result, error = @error, version = @version
      WHERE id = @id AND version = @expected_version
    `);
  }

  async create(input: JobCreateInput): Promise<string> {
    assertCreateInput(input);
    const job = newJob(randomUUID(), input, this.now(), this.options.retentionMs);
    this.insertStmt.run(toParams(job, job.version));
    this.events.jobUpdated(job);
    return job.id;
  }

  async get(jobId: string): Promise<Job> {
    const job = this.load(jobId);
    if (!job || job.expiresAt.getTime() <= this.now().getTime()) {
      throw new NotFoundError(jobId);
    }
    return job;
  }

  update(jobId: string, mutator: JobMutator): Promise<Job> {
    return this.locks.runExclusive(jobId, async () => {
      for (let attempt = 1; ; attempt++) {
        const current = this.load(jobId);
        if (!current) throw new NotFoundError(jobId);

        const next = await mutator(structuredClone(current));
        assertValidTransition(current, next);

        const stored: Job = { ...next, version: current.version + 1 };
        const { changes } = this.updateStmt.run(toParams(stored, current.version));
        if (changes === 1) {
          this.events.jobUpdated(stored);
          return structuredClone(stored);
        }

        if (attempt >= MAX_CAS_ATTEMPTS) {
          throw new Error(`Job ${jobId} kept changing underneath ${MAX_CAS_ATTEMPTS} update attempts`);
        }
        console.error(`[JobStore] Version conflict on job ${jobId}, retrying (attempt ${attempt})`);
      }
    });
  }

  async deleteExpired(retentionMs: number, now: Date = this.now()): Promise<string[]> {
    const cutoff = new Date(now.getTime() - retentionMs).toISOString();

    const removeBatch = this.db.transaction((threshold: string): string[] => {
      const rows = this.db
        .prepare<[string], { id: string }>('SELECT id FROM jobs WHERE created_at < ?')
        .all(threshold);
      const remove = this.db.prepare<[string]>('DELETE FROM jobs WHERE id = ?');
      for (const row of rows) {
        remove.run(row.id);
      }
      return rows.map((row) => row.id);
    });

    const removed = removeBatch.immediate(cutoff);
    this.events.jobsDeleted(removed);
    return removed;
  }

  subscribe(listener: JobStoreListener): () => void {
    return this.events.subscribe(listener);
  }

  async healthCheck(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      console.error('[JobStore] ✗ Health check failed:', error);
      return false;
    }
  }

  close(): void {
    // the connection belongs to DatabaseConnection
  }

  private load(jobId: string): Job | null {
    const row = this.selectStmt.get(jobId);
    return row ? rowToJob(row) : null;
  }
}

function toParams(job: Job, expectedVersion: number): JobParams {
  return {
    id: job.id,
    kind: job.kind,
    status: job.status,
    progress: job.progress,
    owner_key: job.ownerKey,
    user_id: job.userId,
    sub_task_count: job.subTaskCount,
    sub_tasks_done: job.subTasksDone,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt ? job.startedAt.toISOString() : null,
    completed_at: job.completedAt ? job.completedAt.toISOString() : null,
    expires_at: job.expiresAt.toISOString(),
    partial: job.partial ? JSON.stringify(job.partial) : null,
    result: job.result !== undefined ? JSON.stringify(job.result) : null,
    error: job.error ? JSON.stringify(job.error) : null,
    version: job.version,
    expected_version: expectedVersion,
  };
}

function rowToJob(row: JobRow): Job {
  const parsedResult: unknown = row.result !== null ? JSON.parse(row.result) : undefined;
  return {
    id: row.id,
    kind: JobKindSchema.parse(row.kind),
    status: JobStatusSchema.parse(row.status),
    progress: row.progress,
    createdAt: new Date(row.created_at),
    startedAt: row.started_at ? new Date(row.started_at) : undefined,
    completedAt: row.completed_at ? new Date(row.completed_at) : undefined,
    expiresAt: new Date(row.expires_at),
    ownerKey: row.owner_key,
    userId: row.user_id,
    subTaskCount: row.sub_task_count,
    subTasksDone: row.sub_tasks_done,
    partial: row.partial ? BatchAggregateSchema.parse(JSON.parse(row.partial)) : undefined,
    result: parsedResult,
    error: row.error ? JobErrorSchema.parse(JSON.parse(row.error)) : undefined,
    version: row.version,
  };
}
