export type AdmissionMode = 'fail_fast' | 'block';

/**
 * An admitted slot. Release is safe to call any number of times; only the first call frees the slot.
 */
export interface Permit {
  readonly id: number;
  readonly credentialId: string;
  readonly released: boolean;
  release(): boolean;
}

/**
 * Gate in front of every outbound provider call.
 * Rejects with RateLimitedError when admission is denied or times out.
 */
export interface IRateLimiter {
  acquire(credential: string, mode: AdmissionMode): Promise<Permit>;
}
