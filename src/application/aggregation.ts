import { ProviderError, RateLimitedError, ValidationError, errorMessage } from '../core/errors.js';
import type { BatchAggregate, JobError, TaskFailure, UnitOutcome } from '../core/entities/Outcome.js';
import { isPlainObject } from '../utils/json.js';

/**
 * Keys merged first, in this order, when building the combined extraction
 */
export const FIELD_ORDER = [
  'contact',
  'soft_skills',
  'tech_skills',
  'about',
  'experience',
  'projects',
  'education',
  'certifications',
] as const;

export function emptyAggregate(): BatchAggregate {
  return { fields: {}, units: {}, _execution_errors: {} };
}

/**
 * Adds one finished unit to the aggregate and recomputes the merged fields.
 * Each unit id is recorded once; a second outcome for the same id is an error.
 */
export function recordUnitOutcome(
  aggregate: BatchAggregate,
  unitOrder: readonly string[],
  unitId: string,
  outcome: UnitOutcome
): BatchAggregate {
  if (Object.prototype.hasOwnProperty.call(aggregate.units, unitId)) {
    throw new Error(`Outcome for unit ${unitId} was already recorded`);
  }

  const units = { ...aggregate.units, [unitId]: outcome };
  const executionErrors = { ...aggregate._execution_errors };
  if (!outcome.ok) {
    executionErrors[unitId] = outcome.error;
  }

  return {
    fields: mergeFields(unitOrder, units),
    units,
    _execution_errors: executionErrors,
  };
}

/**
 * Merges successful payloads: preferred keys first (first unit in submission order wins),
 * then every other key in submission order. Non-object payloads go under their unit id.
 */
export function mergeFields(
  unitOrder: readonly string[],
  units: Record<string, UnitOutcome>
): Record<string, unknown> {
  const payloads: Array<[string, unknown]> = [];
  for (const unitId of unitOrder) {
    const outcome = units[unitId];
    if (outcome && outcome.ok) payloads.push([unitId, outcome.data]);
  }

  const fields: Record<string, unknown> = {};
  const has = (key: string) => Object.prototype.hasOwnProperty.call(fields, key);

  for (const key of FIELD_ORDER) {
    for (const [, data] of payloads) {
      if (isPlainObject(data) && Object.prototype.hasOwnProperty.call(data, key)) {
        fields[key] = data[key];
        break;
      }
    }
  }

  for (const [unitId, data] of payloads) {
    if (!isPlainObject(data)) {
      if (!has(unitId)) fields[unitId] = data;
      continue;
    }
    for (const [key, value] of Object.entries(data)) {
      if (!has(key)) fields[key] = value;
    }
  }

  return fields;
}

export function countSuccesses(aggregate: BatchAggregate): number {
  return Object.values(aggregate.units).filter((outcome) => outcome.ok).length;
}

export function toTaskFailure(error: unknown): TaskFailure {
  if (error instanceof RateLimitedError) {
    return {
      kind: 'rate_limited',
      message: error.message,
      timedOut: error.timedOut,
      ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
    };
  }
  if (error instanceof ProviderError) {
    return { kind: 'provider', message: error.message, category: error.category };
  }
  return { kind: 'internal', message: errorMessage(error) };
}

export function toJobError(failure: TaskFailure): JobError {
  switch (failure.kind) {
    case 'rate_limited':
      return {
        code: 'rate_limited',
        message: failure.message,
        ...(failure.retryAfterMs !== undefined ? { retryAfterMs: failure.retryAfterMs } : {}),
      };
    case 'provider':
      return {
        code: 'provider_error',
        message: failure.message,
        ...(failure.category !== undefined ? { category: failure.category } : {}),
      };
    case 'watchdog':
      return { code: 'timeout', message: failure.message };
    case 'internal':
      return { code: 'internal_error', message: failure.message };
  }
}

/**
 * Maps an exception thrown while preparing a job to the error stored on it
 */
export function jobErrorFromException(error: unknown): JobError {
  if (error instanceof ValidationError) {
    return { code: 'validation_error', message: error.message };
  }
  return toJobError(toTaskFailure(error));
}
