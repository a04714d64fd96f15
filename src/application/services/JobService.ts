import { Job, JobKind, failJob, isTerminal, markProcessing, advanceProgress } from '../../core/entities/Job.js';
import { BatchAggregateSchema, JobError, TaskFailure } from '../../core/entities/Outcome.js';
import { JobNotReadyError, ValidationError, errorMessage } from '../../core/errors.js';
import type {
  IArtifactStore,
  IPromptResolver,
  ITextExtractor,
  PromptSelection,
  UploadedDocument,
} from '../../core/interfaces/ICollaborators.js';
import type { IJobStore } from '../../core/interfaces/IJobStore.js';
import type { AdmissionMode } from '../../core/interfaces/IRateLimiter.js';
import { fillTemplate, isKnownPromptType } from '../../infrastructure/prompts/FilePromptResolver.js';
import type { JobQuota, QuotaReservation } from '../../infrastructure/ratelimit/JobQuota.js';
import { approxTokensFromChars, maxOutputTokensFor, TokenOperation } from '../../utils/tokens.js';
import { jobErrorFromException } from '../aggregation.js';
import type { BatchScheduler, WorkUnit } from '../BatchScheduler.js';

export const CLASSIFY_MIN_TOKENS = 64;
export const CLASSIFY_MAX_TOKENS = 8192;
const CLASSIFY_UNIT_ID = 'classify';

export interface SubmissionBase {
  ownerKey: string;
  userId: string;
  credential: string;
  model: string;
  maxOutputTokens?: number;
  temperatureZero: boolean;
  document: UploadedDocument;
}

export interface SingleSubmission extends SubmissionBase {
  promptType: string;
  prompt?: string;
}

export interface BatchSubmission extends SubmissionBase {
  prompts: PromptSelection[];
}

export type ClassifySubmission = SubmissionBase;

export interface SubmissionReceipt {
  job_id: string;
  status: 'pending';
  message: string;
}

export interface JobStatusView {
  job_id: string;
  status: Job['status'];
  progress: number;
  sub_tasks_done: number;
  sub_task_count: number;
  created_at: string;
  completed_at: string | null;
}

export interface JobResultView {
  job_id: string;
  status: Job['status'];
  result?: unknown;
  error?: JobError;
  created_at: string;
  completed_at: string | null;
}

export interface JobServiceOptions {
  maxFileBytes: number;
  admissionMode: AdmissionMode;
  debug?: boolean;
}

/**
 * Submission handlers: validate, create the job, then run it in the background
 */
export class JobService {
  private background: Set<Promise<void>> = new Set();

  constructor(
    private store: IJobStore,
    private scheduler: BatchScheduler,
    private quota: JobQuota,
    private extractor: ITextExtractor,
    private prompts: IPromptResolver,
    private artifacts: IArtifactStore,
    private options: JobServiceOptions
  ) {}

  async submitSingle(submission: SingleSubmission): Promise<SubmissionReceipt> {
    const issues = this.validateBase(submission);
    issues.push(...validateSelection({ promptType: submission.promptType, prompt: submission.prompt }, 'prompt_type'));
    throwIfInvalid('Invalid single extraction request', issues);

    const selection: PromptSelection = { promptType: submission.promptType, prompt: submission.prompt };
    const jobId = await this.createJob('single', submission, 1);
    this.dispatch(jobId, () =>
      this.executeSingle(jobId, submission, submission.promptType, selection, 'extract')
    );
    return receipt(jobId, 'Single extraction job submitted');
  }

  async submitBatch(submission: BatchSubmission): Promise<SubmissionReceipt> {
    const issues = this.validateBase(submission);
    if (submission.prompts.length === 0) {
      issues.push('prompts must contain at least one entry');
    }
    const seen = new Set<string>();
    submission.prompts.forEach((selection, index) => {
      issues.push(...validateSelection(selection, `prompts[${index}].prompt_type`));
      if (seen.has(selection.promptType)) {
        issues.push(`prompts[${index}].prompt_type "${selection.promptType}" is duplicated`);
      }
      seen.add(selection.promptType);
    });
    throwIfInvalid('Invalid batch extraction request', issues);

    const jobId = await this.createJob('batch', submission, submission.prompts.length);
    this.dispatch(jobId, () => this.executeBatch(jobId, submission));
    return receipt(jobId, `Batch extraction job submitted with ${submission.prompts.length} prompt(s)`);
  }

  async submitClassify(submission: ClassifySubmission): Promise<SubmissionReceipt> {
    const issues = this.validateBase(submission);
    const tokens = submission.maxOutputTokens;
    if (tokens !== undefined && (tokens < CLASSIFY_MIN_TOKENS || tokens > CLASSIFY_MAX_TOKENS)) {
      issues.push(`max_output_tokens must be between ${CLASSIFY_MIN_TOKENS} and ${CLASSIFY_MAX_TOKENS}`);
    }
    throwIfInvalid('Invalid classification request', issues);

    const jobId = await this.createJob('classify', submission, 1);
    this.dispatch(jobId, () =>
      this.executeSingle(jobId, submission, CLASSIFY_UNIT_ID, { promptType: CLASSIFY_UNIT_ID }, 'classify')
    );
    return receipt(jobId, 'Classification job submitted');
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.store.get(jobId);
    return {
      job_id: job.id,
      status: job.status,
      progress: job.progress,
      sub_tasks_done: job.subTasksDone,
      sub_task_count: job.subTaskCount,
      created_at: job.createdAt.toISOString(),
      completed_at: job.completedAt ? job.completedAt.toISOString() : null,
    };
  }

  /**
   * Terminal view of a job; JobNotReadyError while it is still running
   */
  async getResult(jobId: string): Promise<JobResultView> {
    const job = await this.store.get(jobId);
    if (!isTerminal(job.status)) {
      throw new JobNotReadyError(jobId, job.status);
    }
    return {
      job_id: job.id,
      status: job.status,
      ...(job.status === 'completed' ? { result: job.result } : { error: job.error }),
      created_at: job.createdAt.toISOString(),
      completed_at: job.completedAt ? job.completedAt.toISOString() : null,
    };
  }

  /**
   * Waits for every background execution started so far
   */
  async drain(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
  }

  get pending(): number {
    return this.background.size;
  }

  private validateBase(submission: SubmissionBase): string[] {
    const issues: string[] = [];
    if (submission.credential.trim() === '') issues.push('openai_api_key is required');
    if (submission.userId.trim() === '') issues.push('user_id is required');
    if (submission.model.trim() === '') issues.push('model is required');
    if (submission.document.filename.trim() === '') issues.push('document.filename is required');
    if (submission.document.content.length === 0) {
      issues.push('document is empty');
    } else if (submission.document.content.length > this.options.maxFileBytes) {
      issues.push(`document exceeds ${this.options.maxFileBytes} bytes`);
    }
    const tokens = submission.maxOutputTokens;
    if (tokens !== undefined && (!Number.isInteger(tokens) || tokens < 1)) {
      issues.push('max_output_tokens must be a positive integer');
    }
    return issues;
  }

  private async createJob(kind: JobKind, submission: SubmissionBase, subTaskCount: number): Promise<string> {
    const jobId = await this.store.create({
      kind,
      ownerKey: submission.ownerKey,
      userId: submission.userId,
      subTaskCount,
    });

    try {
      await this.artifacts.save(jobId, submission.document);
    } catch (error) {
      console.error(`[JobService] ✗ Could not store upload for job ${jobId}: ${errorMessage(error)}`);
      await this.failJob(jobId, { code: 'internal_error', message: 'Could not store the uploaded document' });
    }
    return jobId;
  }

  private dispatch(jobId: string, work: () => Promise<void>): void {
    const task: Promise<void> = (async () => {
      const job = await this.store.get(jobId);
      if (isTerminal(job.status)) return;
      await work();
    })()
      .catch((error) => {
        console.error(`[JobService] ✗ Background execution of job ${jobId} crashed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.background.delete(task);
      });
    this.background.add(task);
  }

  private async executeSingle(
    jobId: string,
    submission: SubmissionBase,
    unitId: string,
    selection: PromptSelection,
    operation: TokenOperation
  ): Promise<void> {
    await this.withQuota(jobId, submission, 10, async () => {
      const text = await this.extractor.extract(submission.document);
      await this.store.update(jobId, (job) => advanceProgress(job, 40));

      const unit = this.buildUnit(unitId, selection, text, submission, operation);
      await this.scheduler.runSingle(jobId, submission.credential, unit, this.options.admissionMode);
    });
  }

  private async executeBatch(jobId: string, submission: BatchSubmission): Promise<void> {
    await this.withQuota(jobId, submission, 0, async () => {
      const text = await this.extractor.extract(submission.document);
      const units = submission.prompts.map((selection) =>
        this.buildUnit(selection.promptType, selection, text, submission, 'extract')
      );
      await this.scheduler.runBatch(jobId, submission.credential, units, this.options.admissionMode);
    });
  }

  /**
   * Marks the job processing, holds a quota reservation around `work` and fails
   * the job with the mapped error when anything before the scheduler throws
   */
  private async withQuota(
    jobId: string,
    submission: SubmissionBase,
    startProgress: number,
    work: () => Promise<void>
  ): Promise<void> {
    let reservation: QuotaReservation | null = null;
    try {
      await this.store.update(jobId, (job) => markProcessing(job, startProgress));
      reservation = this.quota.reserve(submission.userId, submission.credential);
      await work();
    } catch (error) {
      this.debugLog(`Job ${jobId} failed before scheduling: ${errorMessage(error)}`);
      await this.failJob(jobId, jobErrorFromException(error));
    } finally {
      reservation?.release();
    }
  }

  private buildUnit(
    unitId: string,
    selection: PromptSelection,
    text: string,
    submission: SubmissionBase,
    operation: TokenOperation
  ): WorkUnit {
    const inputTokens = approxTokensFromChars(text.length);
    return {
      unitId,
      buildRequest: async () => ({
        unitId,
        prompt: fillTemplate(await this.prompts.resolve(selection), text),
        model: submission.model,
        maxOutputTokens: maxOutputTokensFor(inputTokens, operation, submission.maxOutputTokens),
        temperatureZero: submission.temperatureZero,
      }),
    };
  }

  private async failJob(jobId: string, error: JobError): Promise<void> {
    try {
      const job = await this.store.get(jobId);
      if (isTerminal(job.status)) return;
      await this.store.update(jobId, (current) => failJob(current, error));
    } catch (updateError) {
      console.error(`[JobService] ✗ Could not record failure for job ${jobId}: ${errorMessage(updateError)}`);
    }
  }

  private debugLog(message: string): void {
    if (this.options.debug) {
      console.error(`[JobService] ${message}`);
    }
  }
}

/**
 * True when the job, or any unit of it, failed on a provider authentication error
 */
export function hasProviderAuthError(view: JobResultView): boolean {
  if (view.error) {
    if (view.error.category === 'auth') return true;
    if (view.error.aggregate && hasAuthFailure(Object.values(view.error.aggregate._execution_errors))) {
      return true;
    }
  }

  const aggregate = BatchAggregateSchema.safeParse(view.result);
  return aggregate.success && hasAuthFailure(Object.values(aggregate.data._execution_errors));
}

function hasAuthFailure(failures: TaskFailure[]): boolean {
  return failures.some((failure) => failure.kind === 'provider' && failure.category === 'auth');
}

function validateSelection(selection: PromptSelection, label: string): string[] {
  if (selection.promptType.trim() === '') {
    return [`${label} is required`];
  }
  const hasCustomPrompt = selection.prompt !== undefined && selection.prompt.trim() !== '';
  if (!hasCustomPrompt && !isKnownPromptType(selection.promptType)) {
    return [`${label} "${selection.promptType}" is unknown and no prompt was given`];
  }
  return [];
}

function throwIfInvalid(message: string, issues: string[]): void {
  if (issues.length > 0) {
    throw new ValidationError(message, issues);
  }
}

function receipt(jobId: string, message: string): SubmissionReceipt {
  return { job_id: jobId, status: 'pending', message };
}
