import { RateLimitedError } from '../../core/errors.js';
import { fingerprintCredential } from './RateLimiter.js';

export interface JobQuotaOptions {
  maxJobsPerUser: number; // 0 disables
  maxJobsPerKey: number; // 0 disables
}

export interface QuotaReservation {
  release(): boolean;
}

/**
 * Caps the number of jobs running at once per end user and per provider credential
 */
export class JobQuota {
  private byUser: Map<string, number> = new Map();
  private byKey: Map<string, number> = new Map();

  constructor(private options: JobQuotaOptions) {}

  /**
   * Throws RateLimitedError (scope `jobs`) when either cap is already reached
   */
  reserve(userId: string, credential: string): QuotaReservation {
    const keyId = fingerprintCredential(credential);
    const userActive = this.byUser.get(userId) ?? 0;
    const keyActive = this.byKey.get(keyId) ?? 0;

    if (this.options.maxJobsPerUser > 0 && userActive >= this.options.maxJobsPerUser) {
      throw new RateLimitedError(
        `User ${userId} already has ${userActive} active job(s) (limit ${this.options.maxJobsPerUser})`,
        { timedOut: false, scope: 'jobs' }
      );
    }
    if (this.options.maxJobsPerKey > 0 && keyActive >= this.options.maxJobsPerKey) {
      throw new RateLimitedError(
        `Credential ${keyId} already has ${keyActive} active job(s) (limit ${this.options.maxJobsPerKey})`,
        { timedOut: false, scope: 'jobs' }
      );
    }

    this.byUser.set(userId, userActive + 1);
    this.byKey.set(keyId, keyActive + 1);

    let released = false;
    return {
      release: () => {
        if (released) return false;
        released = true;
        decrement(this.byUser, userId);
        decrement(this.byKey, keyId);
        return true;
      },
    };
  }

  activeFor(userId: string): number {
    return this.byUser.get(userId) ?? 0;
  }
}

function decrement(counts: Map<string, number>, key: string): void {
  const next = (counts.get(key) ?? 0) - 1;
  if (next > 0) {
    counts.set(key, next);
  } else {
    counts.delete(key);
  }
}
