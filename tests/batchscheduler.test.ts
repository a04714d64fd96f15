import { BatchScheduler, WorkUnit } from '../src/application/BatchScheduler.js';
import { TaskRunner } from '../src/application/TaskRunner.js';
import { mergeFields } from '../src/application/aggregation.js';
import { BatchAggregateSchema } from '../src/core/entities/Outcome.js';
import { ProviderError } from '../src/core/errors.js';
import type { CompletionInput, ICompletionProvider } from '../src/core/interfaces/ICompletionProvider.js';
import { RateLimiter } from '../src/infrastructure/ratelimit/RateLimiter.js';
import { InMemoryJobStore } from '../src/infrastructure/store/InMemoryJobStore.js';
import { sleep } from '../src/utils/async.js';

const CREDENTIAL = 'test-secret';

/**
 * Provider whose behaviour is picked by the prompt: `ok:<json>`, `fail:<category>`, `slow:<ms>`
 */
class ScriptedProvider implements ICompletionProvider {
  calls: Array<{ prompt: string; at: number }> = [];

  async complete(input: CompletionInput): Promise<string> {
    this.calls.push({ prompt: input.prompt, at: Date.now() });
    const [mode, arg] = splitOnce(input.prompt);
    if (mode === 'ok') return arg;
    if (mode === 'slow') {
      await sleep(Number(arg));
      return '{"late": true}';
    }
    if (mode === 'fail') throw new ProviderError(arg === 'auth' ? 'auth' : 'quota', `simulated ${arg}`);
    throw new Error(`unexpected prompt ${input.prompt}`);
  }
}

function splitOnce(value: string): [string, string] {
  const index = value.indexOf(':');
  return [value.slice(0, index), value.slice(index + 1)];
}

function unit(unitId: string, prompt: string): WorkUnit {
  return {
    unitId,
    buildRequest: () => ({ unitId, prompt, model: 'gpt-4o-mini', maxOutputTokens: 64, temperatureZero: false }),
  };
}

describe('BatchScheduler', () => {
  let store: InMemoryJobStore;
  let provider: ScriptedProvider;
  let scheduler: BatchScheduler;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    store = new InMemoryJobStore({ retentionMs: 60_000 });
    provider = new ScriptedProvider();
    const limiter = new RateLimiter({ rpmPerKey: 0, maxConcurrencyPerKey: 5, maxConcurrency: 0, maxDelayMs: 1000 });
    const runner = new TaskRunner(limiter, provider, { requestTimeoutMs: 1000 });
    scheduler = new BatchScheduler(store, runner, { staggerMs: 5, unitDeadlineMs: 1000 });
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  async function createJob(subTaskCount: number): Promise<string> {
    return store.create({ kind: 'batch', ownerKey: 'owner', userId: 'user', subTaskCount });
  }

  test('should complete a batch with partial failures and list only the failed units', async () => {
    const jobId = await createJob(5);
    const units = [
      unit('contact', 'ok:{"contact": {"name": "Ada"}}'),
      unit('skills', 'fail:quota'),
      unit('experience', 'ok:{"experience": []}'),
      unit('projects', 'fail:quota'),
      unit('education', 'ok:{"education": []}'),
    ];

    await scheduler.runBatch(jobId, CREDENTIAL, units, 'block');

    const job = await store.get(jobId);
    expect(job.status).toBe('completed');
    expect(job.progress).toBe(100);
    expect(job.subTasksDone).toBe(5);
    expect(job.partial).toBeUndefined();

    const result = BatchAggregateSchema.parse(job.result);
    expect(Object.keys(result.units).sort()).toEqual(['contact', 'education', 'experience', 'projects', 'skills']);
    expect(Object.keys(result._execution_errors).sort()).toEqual(['projects', 'skills']);
    expect(result._execution_errors.skills).toEqual({ kind: 'provider', message: 'simulated quota', category: 'quota' });
    expect(result.fields).toEqual({ contact: { name: 'Ada' }, experience: [], education: [] });
  });

  test('should fail a batch in which every unit failed', async () => {
    const jobId = await createJob(3);
    const units = [unit('a', 'fail:quota'), unit('b', 'fail:auth'), unit('c', 'fail:quota')];

    await scheduler.runBatch(jobId, CREDENTIAL, units, 'block');

    const job = await store.get(jobId);
    expect(job.status).toBe('failed');
    expect(job.progress).toBe(100);
    expect(job.subTasksDone).toBe(3);
    expect(job.result).toBeUndefined();
    expect(job.error?.code).toBe('all_units_failed');
    expect(job.error?.message).toBe('All 3 unit(s) failed');

    const aggregate = job.error?.aggregate;
    expect(aggregate && Object.values(aggregate.units).filter((outcome) => outcome.ok)).toEqual([]);
    expect(aggregate && Object.keys(aggregate._execution_errors).sort()).toEqual(['a', 'b', 'c']);
  });

  test('should report monotonic progress below 100 until the job is terminal', async () => {
    const jobId = await createJob(4);
    const seen: Array<[string, number, number]> = [];
    store.subscribe({ jobUpdated: (job) => seen.push([job.status, job.progress, job.subTasksDone]) });

    await scheduler.runBatch(
      jobId,
      CREDENTIAL,
      [unit('a', 'ok:{}'), unit('b', 'fail:quota'), unit('c', 'ok:{}'), unit('d', 'ok:{}')],
      'block'
    );

    const progress = seen.map(([, value]) => value);
    expect(progress).toEqual([...progress].sort((x, y) => x - y));
    expect(seen.map(([, , done]) => done)).toEqual([0, 1, 2, 3, 4]);
    expect(seen.slice(0, -1).every(([status, value]) => status === 'processing' && value < 100)).toBe(true);
    expect(seen[seen.length - 1]).toEqual(['completed', 100, 4]);
    expect(seen.map(([, value]) => value)).toEqual([0, 25, 50, 75, 100]);
  });

  test('should stagger unit start times', async () => {
    const runner = new TaskRunner(
      new RateLimiter({ rpmPerKey: 0, maxConcurrencyPerKey: 0, maxConcurrency: 0, maxDelayMs: 1000 }),
      provider,
      { requestTimeoutMs: 1000 }
    );
    const staggered = new BatchScheduler(store, runner, { staggerMs: 40, unitDeadlineMs: 1000 });
    const jobId = await createJob(3);

    await staggered.runBatch(jobId, CREDENTIAL, [unit('a', 'ok:{}'), unit('b', 'ok:{}'), unit('c', 'ok:{}')], 'block');

    const starts = provider.calls.map((call) => call.at);
    expect(starts).toHaveLength(3);
    expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(30);
    expect(starts[2] - starts[0]).toBeGreaterThanOrEqual(70);
  });

  test('should resolve a stuck unit through its watchdog', async () => {
    const runner = new TaskRunner(
      new RateLimiter({ rpmPerKey: 0, maxConcurrencyPerKey: 0, maxConcurrency: 0, maxDelayMs: 1000 }),
      provider,
      { requestTimeoutMs: 1000 }
    );
    const guarded = new BatchScheduler(store, runner, { staggerMs: 0, unitDeadlineMs: 50 });
    const jobId = await createJob(2);

    await guarded.runBatch(jobId, CREDENTIAL, [unit('fast', 'ok:{"about": "x"}'), unit('stuck', 'slow:200')], 'block');

    const job = await store.get(jobId);
    expect(job.status).toBe('completed');
    const result = BatchAggregateSchema.parse(job.result);
    expect(result._execution_errors.stuck).toEqual({
      kind: 'watchdog',
      message: 'Unit stuck did not finish within 50ms',
    });
    expect(result.fields).toEqual({ about: 'x' });

    // the late completion must not touch the finished job
    await sleep(250);
    const after = await store.get(jobId);
    expect(after.version).toBe(job.version);
  });

  test('should turn prompt preparation errors into unit failures', async () => {
    const jobId = await createJob(2);
    const broken: WorkUnit = {
      unitId: 'broken',
      buildRequest: async () => {
        throw new Error('template missing');
      },
    };

    await scheduler.runBatch(jobId, CREDENTIAL, [unit('ok', 'ok:{"about": "y"}'), broken], 'block');

    const result = BatchAggregateSchema.parse((await store.get(jobId)).result);
    expect(result._execution_errors.broken).toEqual({ kind: 'internal', message: 'template missing' });
  });

  test('should fail the job when units do not match its sub-task count', async () => {
    const jobId = await createJob(2);

    await scheduler.runBatch(jobId, CREDENTIAL, [unit('a', 'ok:{}')], 'block');

    const job = await store.get(jobId);
    expect(job.status).toBe('failed');
    expect(job.error?.code).toBe('internal_error');
    expect(provider.calls).toHaveLength(0);
  });

  test('should complete a single job with its payload', async () => {
    const jobId = await store.create({ kind: 'classify', ownerKey: 'owner', userId: 'user', subTaskCount: 1 });

    await scheduler.runSingle(jobId, CREDENTIAL, unit('classify', 'ok:{"resume_likelihood": 0.9}'), 'block');

    const job = await store.get(jobId);
    expect(job.status).toBe('completed');
    expect(job.subTasksDone).toBe(1);
    expect(job.result).toEqual({ resume_likelihood: 0.9 });
  });

  test('should fail a single job with the mapped provider error', async () => {
    const jobId = await store.create({ kind: 'single', ownerKey: 'owner', userId: 'user', subTaskCount: 1 });

    await scheduler.runSingle(jobId, CREDENTIAL, unit('skills', 'fail:auth'), 'block');

    const job = await store.get(jobId);
    expect(job.status).toBe('failed');
    expect(job.error).toEqual({ code: 'provider_error', message: 'simulated auth', category: 'auth' });
  });
});

describe('mergeFields', () => {
  test('should take preferred keys first, then the rest in submission order', () => {
    const fields = mergeFields(['skills', 'experience', 'contact'], {
      skills: { ok: true, data: { tech_skills: ['ts'], extra: 1 }, latencyMs: 1 },
      experience: { ok: true, data: { experience: ['e'], contact: { name: 'B' } }, latencyMs: 1 },
      contact: { ok: true, data: { contact: { name: 'A' }, about: 'hi', extra: 2 }, latencyMs: 1 },
    });

    expect(Object.keys(fields)).toEqual(['contact', 'tech_skills', 'about', 'experience', 'extra']);
    expect(fields.contact).toEqual({ name: 'B' });
    expect(fields.extra).toBe(1);
  });

  test('should skip failed units and file non-object payloads under their unit id', () => {
    const fields = mergeFields(['list', 'failed'], {
      list: { ok: true, data: [1, 2], latencyMs: 1 },
      failed: { ok: false, error: { kind: 'internal', message: 'x' }, latencyMs: 1 },
    });

    expect(fields).toEqual({ list: [1, 2] });
  });
});
