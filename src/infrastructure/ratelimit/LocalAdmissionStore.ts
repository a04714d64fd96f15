import type { AdmissionDecision, IAdmissionStore } from '../../core/interfaces/IAdmissionStore.js';

/**
 * In-process sliding-window log. Each key keeps the timestamps of its admitted
 * calls inside the trailing window.
 */
export class LocalAdmissionStore implements IAdmissionStore {
  readonly name = 'local';
  private logs: Map<string, number[]> = new Map();

  async tryAdmit(key: string, limit: number, windowMs: number, now: number): Promise<AdmissionDecision> {
    const log = this.prune(key, windowMs, now);
    if (log.length >= limit) {
      return { admitted: false, count: log.length, retryAfterMs: Math.max(1, log[0] + windowMs - now) };
    }
    log.push(now);
    return { admitted: true, count: log.length, retryAfterMs: 0 };
  }

  /**
   * Adds an admission granted elsewhere so the local log can take over as a fallback
   */
  record(key: string, windowMs: number, now: number): void {
    this.prune(key, windowMs, now).push(now);
  }

  count(key: string, windowMs: number, now: number): number {
    return this.prune(key, windowMs, now).length;
  }

  get keys(): number {
    return this.logs.size;
  }

  private prune(key: string, windowMs: number, now: number): number[] {
    let log = this.logs.get(key);
    if (!log) {
      log = [];
      this.logs.set(key, log);
    }
    // entries at or before now - window have aged out
    let expired = 0;
    while (expired < log.length && log[expired] <= now - windowMs) {
      expired++;
    }
    if (expired > 0) log.splice(0, expired);
    return log;
  }
}
