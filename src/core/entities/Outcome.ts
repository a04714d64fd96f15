import { z } from 'zod';

/**
 * Outcome types for provider tasks and batch aggregation.
 * Declared as zod schemas so durable storage can validate what it reads back.
 */

export const ProviderErrorCategorySchema = z.enum([
  'auth',
  'quota',
  'timeout',
  'malformed_response',
  'invalid_request',
  'upstream',
]);

export const TaskFailureSchema = z.object({
  kind: z.enum(['rate_limited', 'provider', 'internal', 'watchdog']),
  message: z.string(),
  category: ProviderErrorCategorySchema.optional(),
  timedOut: z.boolean().optional(),
  retryAfterMs: z.number().optional(),
});

export const UnitOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    data: z.unknown(),
    latencyMs: z.number(),
  }),
  z.object({
    ok: z.literal(false),
    error: TaskFailureSchema,
    latencyMs: z.number(),
  }),
]);

export const BatchAggregateSchema = z.object({
  fields: z.record(z.string(), z.unknown()),
  units: z.record(z.string(), UnitOutcomeSchema),
  _execution_errors: z.record(z.string(), TaskFailureSchema),
});

export const JobErrorSchema = z.object({
  code: z.enum([
    'rate_limited',
    'provider_error',
    'validation_error',
    'internal_error',
    'all_units_failed',
    'timeout',
  ]),
  message: z.string(),
  category: ProviderErrorCategorySchema.optional(),
  retryAfterMs: z.number().optional(),
  aggregate: BatchAggregateSchema.optional(),
});

export type TaskFailure = z.infer<typeof TaskFailureSchema>;
export type UnitOutcome = z.infer<typeof UnitOutcomeSchema>;
export type BatchAggregate = z.infer<typeof BatchAggregateSchema>;
export type JobError = z.infer<typeof JobErrorSchema>;
export type JobErrorCode = JobError['code'];

/**
 * One provider call, fully prepared
 */
export interface TaskRequest {
  unitId: string;
  prompt: string;
  model: string;
  maxOutputTokens: number;
  temperatureZero: boolean;
}

export type TaskOutcome = UnitOutcome;
