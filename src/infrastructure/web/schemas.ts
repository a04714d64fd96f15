import { z } from 'zod';
import { ValidationError } from '../../core/errors.js';
import type { UploadedDocument } from '../../core/interfaces/ICollaborators.js';
import type {
  BatchSubmission,
  ClassifySubmission,
  SingleSubmission,
  SubmissionBase,
} from '../../application/services/JobService.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const DocumentSchema = z.object({
  filename: z.string().min(1, 'filename must not be empty'),
  content_base64: z
    .string()
    .min(1, 'content_base64 must not be empty')
    .transform((value) => value.replace(/\s+/g, ''))
    .refine((value) => BASE64_PATTERN.test(value) && value.length % 4 === 0, 'content_base64 is not valid base64'),
});

const BaseRequestSchema = z.object({
  user_id: z.string().min(1, 'user_id must not be empty'),
  openai_api_key: z.string().min(1, 'openai_api_key must not be empty'),
  model: z.string().min(1, 'model must not be empty'),
  max_output_tokens: z.number().int().positive().optional(),
  document: DocumentSchema,
});

const PromptItemSchema = z.object({
  prompt_type: z.string().min(1, 'prompt_type must not be empty'),
  prompt: z.string().optional(),
});

export const SingleExtractionRequestSchema = BaseRequestSchema.extend({
  prompt_type: z.string().min(1, 'prompt_type must not be empty'),
  prompt: z.string().optional(),
  temperature_zero: z.boolean().default(false),
});

export const BatchExtractionRequestSchema = BaseRequestSchema.extend({
  prompts: z.array(PromptItemSchema).min(1, 'prompts must contain at least one entry'),
  temperature_zero: z.boolean().default(false),
});

export const ClassificationRequestSchema = BaseRequestSchema.extend({
  temperature_zero: z.boolean().default(true),
});

export type SingleExtractionRequest = z.infer<typeof SingleExtractionRequestSchema>;
export type BatchExtractionRequest = z.infer<typeof BatchExtractionRequestSchema>;
export type ClassificationRequest = z.infer<typeof ClassificationRequestSchema>;

/**
 * Validates a request body, turning zod issues into a ValidationError
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => {
      const field = issue.path.join('.');
      return `${field || 'body'}: ${issue.message}`;
    });
    throw new ValidationError('Invalid request body', issues);
  }
  return parsed.data;
}

function toBase(request: z.infer<typeof BaseRequestSchema> & { temperature_zero: boolean }, ownerKey: string): SubmissionBase {
  const document: UploadedDocument = {
    filename: request.document.filename,
    content: Buffer.from(request.document.content_base64, 'base64'),
  };
  return {
    ownerKey,
    userId: request.user_id,
    credential: request.openai_api_key,
    model: request.model,
    maxOutputTokens: request.max_output_tokens,
    temperatureZero: request.temperature_zero,
    document,
  };
}

export function toSingleSubmission(body: unknown, ownerKey: string): SingleSubmission {
  const request = parseBody(SingleExtractionRequestSchema, body);
  return { ...toBase(request, ownerKey), promptType: request.prompt_type, prompt: request.prompt };
}

export function toBatchSubmission(body: unknown, ownerKey: string): BatchSubmission {
  const request = parseBody(BatchExtractionRequestSchema, body);
  return {
    ...toBase(request, ownerKey),
    prompts: request.prompts.map((item) => ({ promptType: item.prompt_type, prompt: item.prompt })),
  };
}

export function toClassifySubmission(body: unknown, ownerKey: string): ClassifySubmission {
  return toBase(parseBody(ClassificationRequestSchema, body), ownerKey);
}
