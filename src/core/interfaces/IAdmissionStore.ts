/**
 * Result of a sliding-window admission attempt
 */
export interface AdmissionDecision {
  admitted: boolean;
  count: number; // admissions in the window, including this one when admitted
  retryAfterMs: number; // 0 when admitted
}

/**
 * Backend that counts admitted calls per credential over a trailing window
 */
export interface IAdmissionStore {
  readonly name: string;

  tryAdmit(key: string, limit: number, windowMs: number, now: number): Promise<AdmissionDecision>;
}
