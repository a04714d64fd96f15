import type { Job, JobCreateInput, JobMutator } from '../entities/Job.js';

/**
 * Notifications emitted by a job store after a change is committed
 */
export interface JobStoreListener {
  jobUpdated?(job: Job): void;
  jobsDeleted?(jobIds: string[]): void;
}

/**
 * Registry of job records; the single source of truth for status and progress
 */
export interface IJobStore {
  create(input: JobCreateInput): Promise<string>;

  /**
   * Rejects with NotFoundError for unknown or expired ids
   */
  get(jobId: string): Promise<Job>;

  /**
   * Atomic read-modify-write, linearizable per job id
   */
  update(jobId: string, mutator: JobMutator): Promise<Job>;

  /**
   * Removes every job older than the retention window, whatever its status
   */
  deleteExpired(retentionMs: number, now?: Date): Promise<string[]>;

  subscribe(listener: JobStoreListener): () => void;

  healthCheck(): Promise<boolean>;

  close(): void;
}
