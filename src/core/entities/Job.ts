import { InvalidTransitionError } from '../errors.js';
import type { BatchAggregate, JobError } from './Outcome.js';

/**
 * Job domain entity
 */
export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

export type JobKind = 'single' | 'batch' | 'classify';

export interface Job {
  id: string;
  kind: JobKind;
  status: JobStatus;
  progress: number; // 0-100
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  expiresAt: Date;
  ownerKey: string;
  userId: string;
  subTaskCount: number;
  subTasksDone: number;
  partial?: BatchAggregate; // batch only, while units are finishing
  result?: unknown;
  error?: JobError;
  version: number;
}

export interface JobCreateInput {
  kind: JobKind;
  ownerKey: string;
  userId: string;
  subTaskCount: number;
}

/**
 * Read-modify-write step applied atomically by a job store
 */
export type JobMutator = (job: Readonly<Job>) => Job | Promise<Job>;

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function newJob(id: string, input: JobCreateInput, createdAt: Date, retentionMs: number): Job {
  return {
    id,
    kind: input.kind,
    status: 'pending',
    progress: 0,
    createdAt,
    expiresAt: new Date(createdAt.getTime() + retentionMs),
    ownerKey: input.ownerKey,
    userId: input.userId,
    subTaskCount: input.subTaskCount,
    subTasksDone: 0,
    version: 0,
  };
}

export function markProcessing(job: Readonly<Job>, progress: number = 0): Job {
  if (job.status !== 'pending') {
    return advanceProgress(job, progress);
  }
  return {
    ...job,
    status: 'processing',
    startedAt: new Date(),
    progress: Math.max(job.progress, clampOpenProgress(progress)),
  };
}

/**
 * Raise progress on a running job; never lowers it and never reaches 100
 */
export function advanceProgress(job: Readonly<Job>, progress: number): Job {
  if (isTerminal(job.status)) return { ...job };
  return { ...job, progress: Math.max(job.progress, clampOpenProgress(progress)) };
}

export function completeJob(job: Readonly<Job>, result: unknown): Job {
  return {
    ...job,
    status: 'completed',
    progress: 100,
    completedAt: new Date(),
    startedAt: job.startedAt ?? new Date(),
    partial: undefined,
    result,
    error: undefined,
  };
}

export function failJob(job: Readonly<Job>, error: JobError): Job {
  return {
    ...job,
    status: 'failed',
    progress: 100,
    completedAt: new Date(),
    partial: undefined,
    result: undefined,
    error,
  };
}

function clampOpenProgress(progress: number): number {
  return Math.min(99, Math.max(0, Math.floor(progress)));
}

const ALLOWED_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  pending: ['pending', 'processing', 'completed', 'failed'],
  processing: ['processing', 'completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * Throws InvalidTransitionError when `next` is not a legal successor of `prev`
 */
export function assertValidTransition(prev: Readonly<Job>, next: Readonly<Job>): void {
  const fail = (reason: string): never => {
    throw new InvalidTransitionError(prev.id, reason);
  };

  if (isTerminal(prev.status)) fail(`job is already ${prev.status}`);
  if (!ALLOWED_TRANSITIONS[prev.status].includes(next.status)) {
    fail(`${prev.status} -> ${next.status}`);
  }

  if (
    next.id !== prev.id ||
    next.kind !== prev.kind ||
    next.ownerKey !== prev.ownerKey ||
    next.userId !== prev.userId ||
    next.subTaskCount !== prev.subTaskCount ||
    next.createdAt.getTime() !== prev.createdAt.getTime() ||
    next.expiresAt.getTime() !== prev.expiresAt.getTime()
  ) {
    fail('identity fields are immutable');
  }

  if (!Number.isInteger(next.progress) || next.progress < prev.progress) {
    fail(`progress ${prev.progress} -> ${next.progress}`);
  }
  if (next.subTasksDone < prev.subTasksDone || next.subTasksDone > next.subTaskCount) {
    fail(`sub_tasks_done ${prev.subTasksDone} -> ${next.subTasksDone} of ${next.subTaskCount}`);
  }

  if (isTerminal(next.status)) {
    if (next.progress !== 100) fail('terminal job must report progress 100');
    const hasResult = next.result !== undefined;
    const hasError = next.error !== undefined;
    if (hasResult === hasError) fail('terminal job needs exactly one of result or error');
  } else {
    if (next.progress >= 100) fail('progress 100 is reserved for terminal jobs');
    if (next.result !== undefined || next.error !== undefined) {
      fail('result and error are only set on terminal jobs');
    }
  }
}
