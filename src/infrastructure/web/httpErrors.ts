import {
  JobNotReadyError,
  NotFoundError,
  RateLimitedError,
  UnauthorizedError,
  ValidationError,
} from '../../core/errors.js';

export interface ErrorBody {
  success: false;
  error: string;
  details?: string[];
}

export interface HttpError {
  status: number;
  body: ErrorBody;
  retryAfterSeconds?: number;
}

/**
 * Maps the error taxonomy to an HTTP status and response body
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: { success: false, error: error.message, ...(error.issues.length > 0 ? { details: error.issues } : {}) },
    };
  }
  if (error instanceof UnauthorizedError) {
    return { status: 401, body: { success: false, error: error.message } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { success: false, error: error.message } };
  }
  if (error instanceof JobNotReadyError) {
    return { status: 409, body: { success: false, error: error.message } };
  }
  if (error instanceof RateLimitedError) {
    return {
      status: 429,
      body: { success: false, error: error.message },
      ...(error.retryAfterMs !== undefined ? { retryAfterSeconds: Math.ceil(error.retryAfterMs / 1000) } : {}),
    };
  }
  return { status: 500, body: { success: false, error: 'Internal server error' } };
}
