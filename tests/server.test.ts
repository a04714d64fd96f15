import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '../src/config.js';
import type { CompletionInput, ICompletionProvider } from '../src/core/interfaces/ICompletionProvider.js';
import { JobServer } from '../src/presentation/JobServer.js';
import { buildPdf } from './helpers/pdf.js';

class EchoProvider implements ICompletionProvider {
  calls: CompletionInput[] = [];

  async complete(input: CompletionInput): Promise<string> {
    this.calls.push(input);
    return '{"resume_likelihood": 0.9, "is_resume": true}';
  }
}

describe('JobServer', () => {
  let dir: string;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobserver-'));
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('should run a job through the sqlite stack and reclaim it', async () => {
    const dbPath = path.join(dir, 'jobs.db');
    const uploadDir = path.join(dir, 'uploads');
    const config = loadConfig(
      [
        '--storage', 'sqlite',
        '--database', dbPath,
        '--coordination-store', dbPath,
        '--upload-dir', uploadDir,
        '--prompts-dir', path.resolve(__dirname, '..', 'prompts'),
      ],
      {}
    );
    const provider = new EchoProvider();
    const server = new JobServer(config, provider);

    try {
      const receipt = await server.jobService.submitClassify({
        ownerKey: 'anonymous',
        userId: 'user-1',
        credential: 'test-secret',
        model: 'gpt-4o-mini',
        temperatureZero: true,
        document: { filename: 'cv.txt', content: Buffer.from('Grace Hopper\nCompiler pioneer') },
      });
      await server.jobService.drain();

      const view = await server.jobService.getResult(receipt.job_id);
      expect(view.status).toBe('completed');
      expect(view.result).toEqual({ resume_likelihood: 0.9, is_resume: true });
      expect(provider.calls).toHaveLength(1);
      expect(server.limiter.stats()).toMatchObject({ activePermits: 0, sharedStore: 'sqlite', sharedStoreHealthy: true });
      expect(fs.existsSync(path.join(uploadDir, receipt.job_id, 'cv.txt'))).toBe(true);

      const report = await server.sweeper.runOnce(new Date(Date.now() + 61 * 60_000));

      expect(report).toEqual({ removed: [receipt.job_id], cleanupFailures: 0 });
      expect(fs.existsSync(path.join(uploadDir, receipt.job_id))).toBe(false);
    } finally {
      await server.shutdown();
    }
  });

  test('should keep jobs in memory and read PDF uploads', async () => {
    const config = loadConfig(
      ['--storage', 'memory', '--upload-dir', path.join(dir, 'uploads'), '--prompts-dir', path.resolve(__dirname, '..', 'prompts')],
      {}
    );
    const provider = new EchoProvider();
    const server = new JobServer(config, provider);

    try {
      expect(await server.store.healthCheck()).toBe(true);
      expect(fs.existsSync(path.join(dir, 'jobs.db'))).toBe(false);

      const receipt = await server.jobService.submitClassify({
        ownerKey: 'anonymous',
        userId: 'user-1',
        credential: 'test-secret',
        model: 'gpt-4o-mini',
        temperatureZero: true,
        document: { filename: 'cv.pdf', content: buildPdf(['Lovelace']) },
      });
      await server.jobService.drain();

      expect((await server.jobService.getResult(receipt.job_id)).status).toBe('completed');
      expect(provider.calls[0].prompt).toContain('Lovelace');
    } finally {
      await server.shutdown();
    }
  });
});
