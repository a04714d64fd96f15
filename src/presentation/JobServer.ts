import { Config, SERVICE_VERSION } from '../config.js';
import { BatchScheduler } from '../application/BatchScheduler.js';
import { CleanupSweeper } from '../application/CleanupSweeper.js';
import { JobService } from '../application/services/JobService.js';
import { TaskRunner } from '../application/TaskRunner.js';
import type { IAdmissionStore } from '../core/interfaces/IAdmissionStore.js';
import type { ICompletionProvider } from '../core/interfaces/ICompletionProvider.js';
import type { IJobStore } from '../core/interfaces/IJobStore.js';
import { DatabaseConnection, resolveDatabasePath } from '../infrastructure/database/DatabaseConnection.js';
import { SqliteJobStore } from '../infrastructure/database/repositories/SqliteJobStore.js';
import { PdfTextExtractor } from '../infrastructure/files/PdfTextExtractor.js';
import { PlainTextExtractor } from '../infrastructure/files/PlainTextExtractor.js';
import { UploadStore } from '../infrastructure/files/UploadStore.js';
import { OpenAIResponsesClient } from '../infrastructure/http/OpenAIResponsesClient.js';
import { FilePromptResolver } from '../infrastructure/prompts/FilePromptResolver.js';
import { JobQuota } from '../infrastructure/ratelimit/JobQuota.js';
import { RateLimiter } from '../infrastructure/ratelimit/RateLimiter.js';
import { COORDINATION_BUSY_TIMEOUT_MS, SqliteAdmissionStore } from '../infrastructure/ratelimit/SqliteAdmissionStore.js';
import { InMemoryJobStore } from '../infrastructure/store/InMemoryJobStore.js';
import { createAuthenticator } from '../infrastructure/web/auth.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { withWatchdog } from '../utils/async.js';

const SHUTDOWN_GRACE_MS = 10_000;
// base64 inflates uploads by 4/3; leave room for the other JSON fields
const BODY_OVERHEAD_BYTES = 64 * 1024;

/**
 * Composition root: wires storage, rate limiting, scheduling and the HTTP surface
 */
export class JobServer {
  readonly store: IJobStore;
  readonly limiter: RateLimiter;
  readonly jobService: JobService;
  readonly sweeper: CleanupSweeper;
  private webServer: WebServer;
  private connections: DatabaseConnection[] = [];
  private debugLog: (message: string) => void;

  constructor(
    private config: Config,
    provider?: ICompletionProvider
  ) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    const retentionMs = config.jobs.retentionMinutes * 60_000;

    // Initialize job storage
    if (config.storage.backend === 'sqlite') {
      const connection = this.openDatabase(config.storage.databasePath);
      this.store = new SqliteJobStore(connection.getDatabase(), { retentionMs });
      this.debugLog(`Job database at ${connection.getDatabasePath()}`);
    } else {
      this.store = new InMemoryJobStore({ retentionMs });
    }

    // Initialize rate limiting
    let sharedStore: IAdmissionStore | undefined;
    if (config.rateLimit.coordinationStorePath !== '') {
      // own connection, never the job store's: its busy timeout is COORDINATION_BUSY_TIMEOUT_MS
      const connection = new DatabaseConnection(config.rateLimit.coordinationStorePath, COORDINATION_BUSY_TIMEOUT_MS);
      this.connections.push(connection);
      sharedStore = new SqliteAdmissionStore(connection.getDatabase());
      this.debugLog(`Shared admission store at ${connection.getDatabasePath()}`);
    }

    this.limiter = new RateLimiter({
      rpmPerKey: config.rateLimit.rpmPerKey,
      maxConcurrencyPerKey: config.rateLimit.maxConcurrencyPerKey,
      maxConcurrency: config.rateLimit.maxConcurrency,
      maxDelayMs: config.rateLimit.maxDelayMs,
      permitLeaseMs: config.rateLimit.permitLeaseMs,
      sharedStore,
      debug: config.server.debug,
    });

    // Initialize execution pipeline
    const runner = new TaskRunner(
      this.limiter,
      provider ?? new OpenAIResponsesClient(config.provider.apiUrl, config.provider.timeoutMs),
      { requestTimeoutMs: config.provider.timeoutMs, debug: config.server.debug }
    );
    const scheduler = new BatchScheduler(this.store, runner, {
      staggerMs: config.jobs.staggerMs,
      unitDeadlineMs: config.jobs.unitDeadlineMs,
      debug: config.server.debug,
    });

    const uploads = new UploadStore(config.storage.uploadDir);
    this.jobService = new JobService(
      this.store,
      scheduler,
      new JobQuota({
        maxJobsPerUser: config.jobs.maxJobsPerUser,
        maxJobsPerKey: config.jobs.maxJobsPerApiKey,
      }),
      new PdfTextExtractor(new PlainTextExtractor()),
      new FilePromptResolver(config.storage.promptsDir),
      uploads,
      {
        maxFileBytes: config.server.maxFileBytes,
        admissionMode: config.rateLimit.failFast ? 'fail_fast' : 'block',
        debug: config.server.debug,
      }
    );

    this.sweeper = new CleanupSweeper(this.store, {
      retentionMs,
      intervalMs: config.jobs.cleanupIntervalSeconds * 1000,
    });
    this.sweeper.register(uploads);

    this.webServer = new WebServer(
      this.jobService,
      this.store,
      this.limiter,
      createAuthenticator(config.server.apiKeys),
      {
        port: config.server.port,
        version: SERVICE_VERSION,
        maxBodyBytes: Math.ceil((config.server.maxFileBytes * 4) / 3) + BODY_OVERHEAD_BYTES,
      }
    );
  }

  async start(): Promise<void> {
    this.sweeper.start();
    await this.webServer.start();
  }

  printStats(): void {
    const stats = this.limiter.stats();
    console.error(
      `Rate limiter: ${stats.activePermits} active permit(s), ${stats.credentials} credential(s), ` +
        `shared store ${stats.sharedStore ?? 'none'}`
    );
  }

  /**
   * Graceful shutdown: stop sweeping, give running jobs a grace period, then close everything
   */
  async shutdown(): Promise<void> {
    console.error('\nShutting down gracefully...');

    await this.sweeper.stop();

    const drained = await withWatchdog(
      this.jobService.drain().then(() => true),
      SHUTDOWN_GRACE_MS,
      () => false
    );
    if (!drained) {
      console.error(`[JobServer] ${this.jobService.pending} job(s) still running after ${SHUTDOWN_GRACE_MS}ms`);
    }

    await this.webServer.stop();
    this.store.close();
    for (const connection of this.connections) {
      connection.close();
    }
    this.connections = [];
  }

  private openDatabase(dbPath: string): DatabaseConnection {
    const resolved = resolveDatabasePath(dbPath);
    const existing = this.connections.find((connection) => connection.getDatabasePath() === resolved);
    if (existing) return existing;
    const connection = new DatabaseConnection(dbPath);
    this.connections.push(connection);
    return connection;
  }
}
