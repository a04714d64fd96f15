import path from 'path';
import { BatchScheduler } from '../src/application/BatchScheduler.js';
import {
  JobResultView,
  JobService,
  SubmissionBase,
  hasProviderAuthError,
} from '../src/application/services/JobService.js';
import { TaskRunner } from '../src/application/TaskRunner.js';
import { JobNotReadyError, NotFoundError, ProviderError, ValidationError } from '../src/core/errors.js';
import type { IArtifactStore } from '../src/core/interfaces/ICollaborators.js';
import type { CompletionInput, ICompletionProvider } from '../src/core/interfaces/ICompletionProvider.js';
import { PlainTextExtractor } from '../src/infrastructure/files/PlainTextExtractor.js';
import { FilePromptResolver } from '../src/infrastructure/prompts/FilePromptResolver.js';
import { JobQuota } from '../src/infrastructure/ratelimit/JobQuota.js';
import { RateLimiter } from '../src/infrastructure/ratelimit/RateLimiter.js';
import { InMemoryJobStore } from '../src/infrastructure/store/InMemoryJobStore.js';
import { sleep } from '../src/utils/async.js';

const RESUME = 'Ada Lovelace\nAnalytical engine programmer';

class RecordingProvider implements ICompletionProvider {
  calls: CompletionInput[] = [];

  constructor(private respond: (input: CompletionInput) => Promise<string>) {}

  complete(input: CompletionInput): Promise<string> {
    this.calls.push(input);
    return this.respond(input);
  }
}

function base(overrides: Partial<SubmissionBase> = {}): SubmissionBase {
  return {
    ownerKey: 'anonymous',
    userId: 'user-1',
    credential: 'test-secret',
    model: 'gpt-4o-mini',
    temperatureZero: false,
    document: { filename: 'resume.txt', content: Buffer.from(RESUME) },
    ...overrides,
  };
}

describe('JobService', () => {
  let store: InMemoryJobStore;
  let provider: RecordingProvider;
  let artifacts: IArtifactStore & { save: jest.Mock; cleanup: jest.Mock };
  let service: JobService;
  let errorSpy: jest.SpyInstance;

  function build(respond: (input: CompletionInput) => Promise<string>, maxJobsPerUser: number = 1): void {
    provider = new RecordingProvider(respond);
    const limiter = new RateLimiter({ rpmPerKey: 0, maxConcurrencyPerKey: 5, maxConcurrency: 0, maxDelayMs: 1000 });
    const runner = new TaskRunner(limiter, provider, { requestTimeoutMs: 1000 });
    const scheduler = new BatchScheduler(store, runner, { staggerMs: 0, unitDeadlineMs: 2000 });
    service = new JobService(
      store,
      scheduler,
      new JobQuota({ maxJobsPerUser, maxJobsPerKey: 20 }),
      new PlainTextExtractor(),
      new FilePromptResolver(path.resolve(__dirname, '..', 'prompts')),
      artifacts,
      { maxFileBytes: 1024, admissionMode: 'block' }
    );
  }

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new InMemoryJobStore({ retentionMs: 60_000 });
    artifacts = {
      name: 'uploads',
      save: jest.fn(async () => '/uploads/resume.txt'),
      cleanup: jest.fn(async () => undefined),
    };
    build(async () => '{"contact": {"name": "Ada"}}');
  });

  afterEach(async () => {
    await service.drain();
    errorSpy.mockRestore();
  });

  describe('validation', () => {
    test('should reject a submission without a credential before creating a job', async () => {
      const submission = { ...base({ credential: '  ' }), promptType: 'contact' };

      await expect(service.submitSingle(submission)).rejects.toBeInstanceOf(ValidationError);
      expect(store.size).toBe(0);
      expect(artifacts.save).not.toHaveBeenCalled();
    });

    test('should list every problem found', async () => {
      const submission = {
        ...base({ userId: '', document: { filename: 'resume.txt', content: Buffer.alloc(2048, 'a') } }),
        promptType: 'contact',
      };

      await expect(service.submitSingle(submission)).rejects.toMatchObject({
        issues: ['user_id is required', 'document exceeds 1024 bytes'],
      });
    });

    test('should reject an empty or duplicated batch', async () => {
      await expect(service.submitBatch({ ...base(), prompts: [] })).rejects.toMatchObject({
        issues: ['prompts must contain at least one entry'],
      });
      await expect(
        service.submitBatch({ ...base(), prompts: [{ promptType: 'skills' }, { promptType: 'skills' }] })
      ).rejects.toMatchObject({ issues: ['prompts[1].prompt_type "skills" is duplicated'] });
      expect(store.size).toBe(0);
    });

    test('should require a known prompt type unless a prompt is given', async () => {
      await expect(service.submitSingle({ ...base(), promptType: 'hobbies' })).rejects.toMatchObject({
        issues: ['prompt_type "hobbies" is unknown and no prompt was given'],
      });

      const receipt = await service.submitSingle({
        ...base(),
        promptType: 'hobbies',
        prompt: 'List hobbies in: {{DOCUMENT_TEXT}}',
      });
      await service.drain();

      expect(receipt.status).toBe('pending');
      expect(provider.calls[0].prompt).toBe(`List hobbies in: ${RESUME}`);
    });

    test('should bound classification output tokens', async () => {
      await expect(service.submitClassify(base({ maxOutputTokens: 32 }))).rejects.toMatchObject({
        issues: ['max_output_tokens must be between 64 and 8192'],
      });
    });
  });

  describe('execution', () => {
    test('should run a single extraction to completion', async () => {
      const receipt = await service.submitSingle({ ...base(), promptType: 'contact' });
      expect(receipt).toEqual({
        job_id: receipt.job_id,
        status: 'pending',
        message: 'Single extraction job submitted',
      });
      expect(artifacts.save).toHaveBeenCalledWith(receipt.job_id, base().document);

      await service.drain();

      const view = await service.getResult(receipt.job_id);
      expect(view.status).toBe('completed');
      expect(view.result).toEqual({ contact: { name: 'Ada' } });
      expect(view.error).toBeUndefined();
      expect(provider.calls[0].prompt).toContain(RESUME);
      expect(provider.calls[0].credential).toBe('test-secret');

      const status = await service.getStatus(receipt.job_id);
      expect(status).toMatchObject({ status: 'completed', progress: 100, sub_tasks_done: 1, sub_task_count: 1 });
      expect(status.completed_at).not.toBeNull();
    });

    test('should size the output budget from the document', async () => {
      const document = { filename: 'resume.txt', content: Buffer.from('x'.repeat(40)) };

      await service.submitSingle({ ...base({ document }), promptType: 'skills' });
      await service.drain();
      await service.submitClassify(base({ document, userId: 'user-2', temperatureZero: true }));
      await service.drain();
      await service.submitSingle({ ...base({ document, userId: 'user-3', maxOutputTokens: 10 }), promptType: 'skills' });
      await service.drain();

      expect(provider.calls.map((call) => call.maxOutputTokens)).toEqual([80, 128, 16]);
      expect(provider.calls[1].temperatureZero).toBe(true);
      expect(provider.calls[1].prompt).toContain('resume_likelihood');
    });

    test('should fan a batch out into one call per prompt type', async () => {
      build(async (input) => {
        if (input.prompt.includes('soft and technical')) return '{"soft_skills": [], "tech_skills": ["ts"]}';
        return '{"contact": {"name": "Ada"}, "about": "Programmer"}';
      });

      const receipt = await service.submitBatch({ ...base(), prompts: [{ promptType: 'skills' }, { promptType: 'contact' }] });
      await service.drain();

      const view = await service.getResult(receipt.job_id);
      expect(view.status).toBe('completed');
      expect(view.result).toMatchObject({
        fields: { contact: { name: 'Ada' }, soft_skills: [], tech_skills: ['ts'], about: 'Programmer' },
        _execution_errors: {},
      });
      expect(provider.calls).toHaveLength(2);
      expect(hasProviderAuthError(view)).toBe(false);
    });

    test('should flag a batch whose unit failed authentication', async () => {
      build(async (input) => {
        if (input.prompt.includes('soft and technical')) {
          throw new ProviderError('auth', 'Provider API error 401: invalid_api_key', 401);
        }
        return '{"contact": {"name": "Ada"}}';
      });

      const receipt = await service.submitBatch({ ...base(), prompts: [{ promptType: 'skills' }, { promptType: 'contact' }] });
      await service.drain();

      const view = await service.getResult(receipt.job_id);
      expect(view.status).toBe('completed');
      expect(hasProviderAuthError(view)).toBe(true);
    });

    test('should answer JobNotReadyError while the job runs', async () => {
      build(async () => {
        await sleep(100);
        return '{}';
      });

      const receipt = await service.submitClassify(base());

      await expect(service.getResult(receipt.job_id)).rejects.toBeInstanceOf(JobNotReadyError);
      await service.drain();
      await expect(service.getResult(receipt.job_id)).resolves.toMatchObject({ status: 'completed' });
    });

    test('should fail a job whose user already has an active job', async () => {
      build(async () => {
        await sleep(50);
        return '{"ok": true}';
      });

      const first = await service.submitSingle({ ...base(), promptType: 'contact' });
      const second = await service.submitSingle({ ...base(), promptType: 'contact' });
      await service.drain();

      const views = [await service.getResult(first.job_id), await service.getResult(second.job_id)];
      const statuses = views.map((view) => view.status).sort();
      expect(statuses).toEqual(['completed', 'failed']);

      const failed = views.find((view) => view.status === 'failed');
      expect(failed?.error?.code).toBe('rate_limited');
      expect(provider.calls).toHaveLength(1);
    });

    test('should fail a job whose document cannot be read', async () => {
      const document = { filename: 'resume.pdf', content: Buffer.from('%PDF-1.7 binary') };

      const receipt = await service.submitSingle({ ...base({ document }), promptType: 'contact' });
      await service.drain();

      const view = await service.getResult(receipt.job_id);
      expect(view.status).toBe('failed');
      expect(view.error).toEqual({
        code: 'validation_error',
        message: 'Cannot read resume.pdf: PDF parsing is not available',
      });
      expect(provider.calls).toHaveLength(0);
    });

    test('should fail the job when its upload cannot be stored', async () => {
      artifacts.save.mockRejectedValueOnce(new Error('disk full'));

      const receipt = await service.submitSingle({ ...base(), promptType: 'contact' });
      await service.drain();

      const view = await service.getResult(receipt.job_id);
      expect(view.error).toEqual({ code: 'internal_error', message: 'Could not store the uploaded document' });
      expect(provider.calls).toHaveLength(0);
    });

    test('should report unknown jobs as not found', async () => {
      await expect(service.getStatus('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});

describe('hasProviderAuthError', () => {
  const common = { job_id: 'j', created_at: '2026-01-01T00:00:00.000Z', completed_at: '2026-01-01T00:00:01.000Z' };

  test('should detect a failed job with an auth category', () => {
    const view: JobResultView = {
      ...common,
      status: 'failed',
      error: { code: 'provider_error', message: 'denied', category: 'auth' },
    };
    expect(hasProviderAuthError(view)).toBe(true);
  });

  test('should detect auth failures inside an all-units-failed aggregate', () => {
    const view: JobResultView = {
      ...common,
      status: 'failed',
      error: {
        code: 'all_units_failed',
        message: 'All 1 unit(s) failed',
        aggregate: {
          fields: {},
          units: { a: { ok: false, error: { kind: 'provider', message: 'denied', category: 'auth' }, latencyMs: 3 } },
          _execution_errors: { a: { kind: 'provider', message: 'denied', category: 'auth' } },
        },
      },
    };
    expect(hasProviderAuthError(view)).toBe(true);
  });

  test('should ignore other failures and plain results', () => {
    expect(
      hasProviderAuthError({ ...common, status: 'failed', error: { code: 'rate_limited', message: 'busy' } })
    ).toBe(false);
    expect(hasProviderAuthError({ ...common, status: 'completed', result: { resume_likelihood: 0.4 } })).toBe(false);
  });
});
