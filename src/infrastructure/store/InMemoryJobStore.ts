import { randomUUID } from 'crypto';
import {
  Job,
  JobCreateInput,
  JobMutator,
  assertValidTransition,
  newJob,
} from '../../core/entities/Job.js';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import type { IJobStore, JobStoreListener } from '../../core/interfaces/IJobStore.js';
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { JobStoreEvents } from './JobStoreEvents.js';

export interface JobStoreOptions {
  retentionMs: number;
  now?: () => Date;
}

/**
 * Process-local job registry. Updates for one job id are serialised by a keyed mutex.
 */
export class InMemoryJobStore implements IJobStore {
  private jobs: Map<string, Job> = new Map();
  private locks = new KeyedMutex();
  private events = new JobStoreEvents();
  private now: () => Date;

  constructor(private options: JobStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async create(input: JobCreateInput): Promise<string> {
    assertCreateInput(input);
    const job = newJob(randomUUID(), input, this.now(), this.options.retentionMs);
    this.jobs.set(job.id, job);
    this.events.jobUpdated(job);
    return job.id;
  }

  async get(jobId: string): Promise<Job> {
    const job = this.jobs.get(jobId);
    if (!job || job.expiresAt.getTime() <= this.now().getTime()) {
      throw new NotFoundError(jobId);
    }
    return structuredClone(job);
  }

  update(jobId: string, mutator: JobMutator): Promise<Job> {
    return this.locks.runExclusive(jobId, async () => {
      const current = this.jobs.get(jobId);
      if (!current) throw new NotFoundError(jobId);

      const next = await mutator(structuredClone(current));
      assertValidTransition(current, next);

      // the sweeper may have removed the record while the mutator was pending
      if (!this.jobs.has(jobId)) throw new NotFoundError(jobId);

      const stored: Job = { ...structuredClone(next), version: current.version + 1 };
      this.jobs.set(jobId, stored);
      this.events.jobUpdated(stored);
      return structuredClone(stored);
    });
  }

  async deleteExpired(retentionMs: number, now: Date = this.now()): Promise<string[]> {
    const removed: string[] = [];
    for (const [jobId, job] of this.jobs.entries()) {
      if (now.getTime() - job.createdAt.getTime() > retentionMs) {
        this.jobs.delete(jobId);
        removed.push(jobId);
      }
    }
    this.events.jobsDeleted(removed);
    return removed;
  }

  subscribe(listener: JobStoreListener): () => void {
    return this.events.subscribe(listener);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  close(): void {
    this.jobs.clear();
  }

  get size(): number {
    return this.jobs.size;
  }
}

export function assertCreateInput(input: JobCreateInput): void {
  const issues: string[] = [];
  if (!Number.isInteger(input.subTaskCount) || input.subTaskCount < 1) {
    issues.push('sub_task_count must be a positive integer');
  }
  if (!input.ownerKey) issues.push('owner_key is required');
  if (!input.userId) issues.push('user_id is required');
  if (issues.length > 0) {
    throw new ValidationError('Invalid job', issues);
  }
}
