import { createHash } from 'crypto';
import { RateLimitedError, errorMessage } from '../../core/errors.js';
import type { AdmissionDecision, IAdmissionStore } from '../../core/interfaces/IAdmissionStore.js';
import type { AdmissionMode, IRateLimiter, Permit } from '../../core/interfaces/IRateLimiter.js';
import { sleep } from '../../utils/async.js';
import { LocalAdmissionStore } from './LocalAdmissionStore.js';
import { Semaphore } from './Semaphore.js';

export interface RateLimiterOptions {
  rpmPerKey: number; // 0 disables the RPM check
  maxConcurrencyPerKey: number; // 0 disables
  maxConcurrency: number; // global cap, 0 disables
  maxDelayMs: number;
  windowMs?: number;
  permitLeaseMs?: number; // 0 disables the lease watchdog
  sharedStore?: IAdmissionStore;
  sharedStoreRetryMs?: number;
  debug?: boolean;
}

export interface RateLimiterStats {
  activePermits: number;
  credentials: number;
  forcedReleases: number;
  globalWaiting: number;
  sharedStore: string | null;
  sharedStoreHealthy: boolean;
}

interface CredentialState {
  semaphore: Semaphore | null;
}

export const DEFAULT_WINDOW_MS = 60_000;
const DEFAULT_SHARED_STORE_RETRY_MS = 30_000;

/**
 * Short, stable identifier for a credential, safe to log and to use as a store key
 */
export function fingerprintCredential(credential: string): string {
  return createHash('sha256').update(credential).digest('hex').slice(0, 12);
}

/**
 * Gates outbound provider calls per credential.
 *
 * Admission order is per-credential concurrency, then the global concurrency cap,
 * then the per-credential RPM sliding window. In block mode a single deadline
 * (start + maxDelayMs) bounds the whole acquisition, so time spent waiting for a
 * concurrency slot is no longer available for the RPM wait.
 */
export class RateLimiter implements IRateLimiter {
  private credentials: Map<string, CredentialState> = new Map();
  private global: Semaphore | null;
  private local = new LocalAdmissionStore();
  private windowMs: number;
  private nextPermitId = 1;
  private activePermits = 0;
  private forcedReleases = 0;
  private sharedStoreDown = false;
  private sharedStoreRetryAt = 0;

  constructor(private options: RateLimiterOptions) {
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.global = options.maxConcurrency > 0 ? new Semaphore(options.maxConcurrency) : null;
  }

  async acquire(credential: string, mode: AdmissionMode): Promise<Permit> {
    const credentialId = fingerprintCredential(credential);
    const state = this.stateFor(credentialId);
    const deadline = Date.now() + this.options.maxDelayMs;
    const held: Semaphore[] = [];

    try {
      if (state.semaphore) {
        await this.takeSlot(state.semaphore, mode, deadline, `credential ${credentialId}`);
        held.push(state.semaphore);
      }
      if (this.global) {
        await this.takeSlot(this.global, mode, deadline, 'global pool');
        held.push(this.global);
      }
      if (this.options.rpmPerKey > 0) {
        await this.admitRpm(credentialId, mode, deadline);
      }
    } catch (error) {
      for (const semaphore of held.reverse()) {
        semaphore.release();
      }
      throw error;
    }

    return this.issuePermit(credentialId, held);
  }

  stats(): RateLimiterStats {
    return {
      activePermits: this.activePermits,
      credentials: this.credentials.size,
      forcedReleases: this.forcedReleases,
      globalWaiting: this.global ? this.global.waiting : 0,
      sharedStore: this.options.sharedStore ? this.options.sharedStore.name : null,
      sharedStoreHealthy: this.options.sharedStore ? !this.sharedStoreDown : false,
    };
  }

  private stateFor(credentialId: string): CredentialState {
    let state = this.credentials.get(credentialId);
    if (!state) {
      const cap = this.options.maxConcurrencyPerKey;
      state = { semaphore: cap > 0 ? new Semaphore(cap) : null };
      this.credentials.set(credentialId, state);
    }
    return state;
  }

  private async takeSlot(semaphore: Semaphore, mode: AdmissionMode, deadline: number, label: string): Promise<void> {
    if (mode === 'fail_fast') {
      if (!semaphore.tryAcquire()) {
        throw new RateLimitedError(`Concurrency limit of ${semaphore.capacity} reached for ${label}`, {
          timedOut: false,
          scope: 'concurrency',
        });
      }
      return;
    }

    const acquired = await semaphore.acquire(deadline - Date.now());
    if (!acquired) {
      throw new RateLimitedError(
        `No concurrency slot for ${label} within ${this.options.maxDelayMs}ms`,
        { timedOut: true, scope: 'concurrency' }
      );
    }
  }

  private async admitRpm(credentialId: string, mode: AdmissionMode, deadline: number): Promise<void> {
    for (;;) {
      const now = Date.now();
      const decision = await this.tryAdmit(credentialId, now);
      if (decision.admitted) return;

      if (mode === 'fail_fast') {
        throw new RateLimitedError(
          `RPM limit of ${this.options.rpmPerKey} reached for credential ${credentialId}`,
          { timedOut: false, scope: 'rpm', retryAfterMs: decision.retryAfterMs }
        );
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new RateLimitedError(
          `RPM window for credential ${credentialId} did not open within ${this.options.maxDelayMs}ms`,
          { timedOut: true, scope: 'rpm', retryAfterMs: decision.retryAfterMs }
        );
      }
      this.debugLog(`RPM full for ${credentialId} (${decision.count}), waiting ${Math.min(decision.retryAfterMs, remaining)}ms`);
      await sleep(Math.min(decision.retryAfterMs, remaining));
    }
  }

  /**
   * Admission against the shared store when configured and reachable, else the local log.
   * Admissions granted by the shared store are also recorded locally so a later
   * fallback still holds the single-process cap.
   */
  private async tryAdmit(credentialId: string, now: number): Promise<AdmissionDecision> {
    const { sharedStore, rpmPerKey } = this.options;

    if (sharedStore && now >= this.sharedStoreRetryAt) {
      try {
        const decision = await sharedStore.tryAdmit(credentialId, rpmPerKey, this.windowMs, now);
        if (this.sharedStoreDown) {
          this.sharedStoreDown = false;
          console.error(`[RateLimiter] ✓ Shared admission store "${sharedStore.name}" reachable again`);
        }
        if (decision.admitted) {
          this.local.record(credentialId, this.windowMs, now);
        }
        return decision;
      } catch (error) {
        if (!this.sharedStoreDown) {
          console.error(
            `[RateLimiter] ✗ Shared admission store "${sharedStore.name}" failed, enforcing locally: ${errorMessage(error)}`
          );
        }
        this.sharedStoreDown = true;
        this.sharedStoreRetryAt = now + (this.options.sharedStoreRetryMs ?? DEFAULT_SHARED_STORE_RETRY_MS);
      }
    }

    return this.local.tryAdmit(credentialId, rpmPerKey, this.windowMs, now);
  }

  private issuePermit(credentialId: string, held: Semaphore[]): Permit {
    const id = this.nextPermitId++;
    let released = false;
    let leaseTimer: NodeJS.Timeout | undefined;
    this.activePermits++;

    const release = (): boolean => {
      if (released) return false;
      released = true;
      clearTimeout(leaseTimer);
      for (const semaphore of [...held].reverse()) {
        semaphore.release();
      }
      this.activePermits--;
      return true;
    };

    const leaseMs = this.options.permitLeaseMs ?? 0;
    if (leaseMs > 0) {
      leaseTimer = setTimeout(() => {
        if (release()) {
          this.forcedReleases++;
          console.error(
            `[RateLimiter] Permit ${id} for credential ${credentialId} exceeded its ${leaseMs}ms lease, force-released`
          );
        }
      }, leaseMs);
      leaseTimer.unref();
    }

    this.debugLog(`Permit ${id} granted for ${credentialId}`);
    return {
      id,
      credentialId,
      get released() {
        return released;
      },
      release,
    };
  }

  private debugLog(message: string): void {
    if (this.options.debug) {
      console.error(`[RateLimiter] ${message}`);
    }
  }
}
