import type { Job } from '../../core/entities/Job.js';
import type { JobStoreListener } from '../../core/interfaces/IJobStore.js';

/**
 * Listener registry shared by the job store implementations.
 * A throwing listener is logged and never affects the committed change.
 */
export class JobStoreEvents {
  private listeners: Set<JobStoreListener> = new Set();

  subscribe(listener: JobStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  jobUpdated(job: Job): void {
    for (const listener of this.listeners) {
      try {
        listener.jobUpdated?.(structuredClone(job));
      } catch (error) {
        console.error(`[JobStore] ✗ jobUpdated listener failed for ${job.id}:`, error);
      }
    }
  }

  jobsDeleted(jobIds: string[]): void {
    if (jobIds.length === 0) return;
    for (const listener of this.listeners) {
      try {
        listener.jobsDeleted?.([...jobIds]);
      } catch (error) {
        console.error('[JobStore] ✗ jobsDeleted listener failed:', error);
      }
    }
  }
}
