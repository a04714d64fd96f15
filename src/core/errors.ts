/**
 * Error taxonomy shared by the orchestration core and the HTTP layer
 */

export type ProviderErrorCategory =
  | 'auth'
  | 'quota'
  | 'timeout'
  | 'malformed_response'
  | 'invalid_request'
  | 'upstream';

export type RateLimitScope = 'concurrency' | 'rpm' | 'jobs';

export interface RateLimitedDetails {
  timedOut: boolean;
  scope: RateLimitScope;
  retryAfterMs?: number;
}

/**
 * Admission denied (fail-fast) or not granted within the block budget.
 * Retryable by the caller later.
 */
export class RateLimitedError extends Error {
  readonly timedOut: boolean;
  readonly scope: RateLimitScope;
  readonly retryAfterMs?: number;

  constructor(message: string, details: RateLimitedDetails) {
    super(message);
    this.name = 'RateLimitedError';
    this.timedOut = details.timedOut;
    this.scope = details.scope;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/**
 * The external completion call failed
 */
export class ProviderError extends Error {
  constructor(
    readonly category: ProviderErrorCategory,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class NotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * Malformed submission, rejected before any job is created
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class JobNotReadyError extends Error {
  constructor(
    readonly jobId: string,
    readonly status: string
  ) {
    super(`Job ${jobId} is not yet completed (status: ${status})`);
    this.name = 'JobNotReadyError';
  }
}

export class UnauthorizedError extends Error {
  constructor(message: string = 'Missing or invalid X-API-Key header') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

/**
 * A job update that would break the record's invariants
 */
export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    reason: string
  ) {
    super(`Invalid update for job ${jobId}: ${reason}`);
    this.name = 'InvalidTransitionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
