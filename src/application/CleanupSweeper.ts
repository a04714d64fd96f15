import { errorMessage } from '../core/errors.js';
import type { IArtifactCleaner } from '../core/interfaces/ICollaborators.js';
import type { IJobStore } from '../core/interfaces/IJobStore.js';

export interface CleanupSweeperOptions {
  retentionMs: number;
  intervalMs: number;
  now?: () => Date;
}

export interface SweepReport {
  removed: string[];
  cleanupFailures: number;
}

/**
 * Background loop that reclaims jobs older than the retention window, whatever
 * their status, and asks each registered cleaner to drop the job's artifacts.
 */
export class CleanupSweeper {
  private cleaners: IArtifactCleaner[] = [];
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<SweepReport> | null = null;
  private now: () => Date;

  constructor(
    private store: IJobStore,
    private options: CleanupSweeperOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  register(cleaner: IArtifactCleaner): void {
    this.cleaners.push(cleaner);
  }

  start(): void {
    if (this.timer) return;
    this.trigger();
    this.timer = setInterval(() => this.trigger(), this.options.intervalMs);
    this.timer.unref();
    console.error(
      `[CleanupSweeper] Started (retention ${Math.round(this.options.retentionMs / 60000)}m, every ${Math.round(this.options.intervalMs / 1000)}s)`
    );
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * One sweep cycle. Cleaner failures are logged and counted; they never abort the cycle.
   */
  async runOnce(now: Date = this.now()): Promise<SweepReport> {
    const removed = await this.store.deleteExpired(this.options.retentionMs, now);
    let cleanupFailures = 0;

    for (const jobId of removed) {
      for (const cleaner of this.cleaners) {
        try {
          await cleaner.cleanup(jobId);
        } catch (error) {
          cleanupFailures++;
          console.error(`[CleanupSweeper] ✗ ${cleaner.name} cleanup failed for job ${jobId}: ${errorMessage(error)}`);
        }
      }
    }

    if (removed.length > 0) {
      console.error(`[CleanupSweeper] Removed ${removed.length} expired job(s)`);
    }
    return { removed, cleanupFailures };
  }

  private trigger(): void {
    // skip the tick while the previous cycle is still running
    if (this.inFlight) return;

    this.inFlight = this.runOnce()
      .catch((error): SweepReport => {
        console.error(`[CleanupSweeper] ✗ Sweep failed: ${errorMessage(error)}`);
        return { removed: [], cleanupFailures: 0 };
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
