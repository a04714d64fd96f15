import {
  Job,
  advanceProgress,
  completeJob,
  failJob,
  isTerminal,
  markProcessing,
} from '../core/entities/Job.js';
import type { BatchAggregate, TaskOutcome, TaskRequest } from '../core/entities/Outcome.js';
import { errorMessage } from '../core/errors.js';
import type { IJobStore } from '../core/interfaces/IJobStore.js';
import type { AdmissionMode } from '../core/interfaces/IRateLimiter.js';
import { sleep, withWatchdog } from '../utils/async.js';
import {
  countSuccesses,
  emptyAggregate,
  recordUnitOutcome,
  toJobError,
  toTaskFailure,
} from './aggregation.js';
import type { TaskRunner } from './TaskRunner.js';

/**
 * One sub-task of a job. The request is built lazily so prompt loading runs
 * inside the unit's watchdog.
 */
export interface WorkUnit {
  unitId: string;
  buildRequest(): TaskRequest | Promise<TaskRequest>;
}

export interface BatchSchedulerOptions {
  staggerMs: number;
  unitDeadlineMs: number;
  debug?: boolean;
}

/**
 * Fans a job out into provider calls and drives its progress to a terminal state.
 * Nothing thrown inside a unit escapes: failures become that unit's outcome.
 */
export class BatchScheduler {
  constructor(
    private store: IJobStore,
    private runner: TaskRunner,
    private options: BatchSchedulerOptions
  ) {}

  /**
   * Starts unit i after i × stagger, records each outcome as it lands and
   * finalises the job with the update that records the last unit.
   */
  async runBatch(jobId: string, credential: string, units: WorkUnit[], mode: AdmissionMode): Promise<void> {
    let job: Job;
    try {
      job = await this.store.update(jobId, (current) => markProcessing(current, current.progress));
    } catch (error) {
      console.error(`[BatchScheduler] ✗ Could not start job ${jobId}: ${errorMessage(error)}`);
      return;
    }

    const unitOrder = units.map((unit) => unit.unitId);
    if (units.length !== job.subTaskCount || new Set(unitOrder).size !== units.length) {
      await this.finish(jobId, (current) =>
        failJob(current, {
          code: 'internal_error',
          message: `Job ${jobId} expects ${current.subTaskCount} distinct units, got ${units.length}`,
        })
      );
      return;
    }

    this.debugLog(`Job ${jobId}: starting ${units.length} unit(s), ${this.options.staggerMs}ms apart`);

    await Promise.all(
      units.map(async (unit, index) => {
        await sleep(index * this.options.staggerMs);
        const outcome = await this.runUnit(credential, unit, mode);
        await this.finish(jobId, (current) => applyBatchOutcome(current, unitOrder, unit.unitId, outcome));
      })
    );

    await this.logFinalState(jobId);
  }

  /**
   * Single-call path: success completes the job with the payload, failure fails it
   */
  async runSingle(jobId: string, credential: string, unit: WorkUnit, mode: AdmissionMode): Promise<void> {
    try {
      await this.store.update(jobId, (current) => markProcessing(current, current.progress));
    } catch (error) {
      console.error(`[BatchScheduler] ✗ Could not start job ${jobId}: ${errorMessage(error)}`);
      return;
    }

    const outcome = await this.runUnit(credential, unit, mode);
    await this.finish(jobId, (current) => {
      const done = { ...current, subTasksDone: current.subTaskCount };
      return outcome.ok ? completeJob(done, outcome.data) : failJob(done, toJobError(outcome.error));
    });

    await this.logFinalState(jobId);
  }

  private runUnit(credential: string, unit: WorkUnit, mode: AdmissionMode): Promise<TaskOutcome> {
    const started = Date.now();

    const work = (async (): Promise<TaskOutcome> => {
      try {
        const request = await unit.buildRequest();
        return await this.runner.run(credential, request, mode);
      } catch (error) {
        return { ok: false, error: toTaskFailure(error), latencyMs: Date.now() - started };
      }
    })();

    // a result arriving after the watchdog fired is dropped
    return withWatchdog(work, this.options.unitDeadlineMs, () => ({
      ok: false,
      error: {
        kind: 'watchdog',
        message: `Unit ${unit.unitId} did not finish within ${this.options.unitDeadlineMs}ms`,
      },
      latencyMs: Date.now() - started,
    }));
  }

  private async finish(jobId: string, mutator: (job: Readonly<Job>) => Job): Promise<void> {
    try {
      await this.store.update(jobId, mutator);
    } catch (error) {
      console.error(`[BatchScheduler] ✗ Failed to record progress for job ${jobId}: ${errorMessage(error)}`);
    }
  }

  private async logFinalState(jobId: string): Promise<void> {
    try {
      const job = await this.store.get(jobId);
      if (isTerminal(job.status)) {
        console.error(`[BatchScheduler] Job ${jobId} ${job.status} (${job.subTasksDone}/${job.subTaskCount} units)`);
      }
    } catch (error) {
      this.debugLog(`Job ${jobId} no longer readable: ${errorMessage(error)}`);
    }
  }

  private debugLog(message: string): void {
    if (this.options.debug) {
      console.error(`[BatchScheduler] ${message}`);
    }
  }
}

/**
 * Records one unit's outcome; when it is the last unit, also moves the job to its terminal state
 */
export function applyBatchOutcome(
  job: Readonly<Job>,
  unitOrder: readonly string[],
  unitId: string,
  outcome: TaskOutcome
): Job {
  const aggregate: BatchAggregate = recordUnitOutcome(job.partial ?? emptyAggregate(), unitOrder, unitId, outcome);
  const subTasksDone = job.subTasksDone + 1;

  if (subTasksDone < job.subTaskCount) {
    return {
      ...advanceProgress(job, Math.floor((100 * subTasksDone) / job.subTaskCount)),
      subTasksDone,
      partial: aggregate,
    };
  }

  const done = { ...job, subTasksDone };
  if (countSuccesses(aggregate) > 0) {
    return completeJob(done, aggregate);
  }
  return failJob(done, {
    code: 'all_units_failed',
    message: `All ${job.subTaskCount} unit(s) failed`,
    aggregate,
  });
}
