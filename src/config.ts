import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export const SERVICE_VERSION = '1.0.0';

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65535),
    debug: z.boolean(),
    apiKeys: z.array(z.string().min(1)),
    maxFileBytes: z.number().int().min(1),
  }),
  storage: z.object({
    backend: z.enum(['memory', 'sqlite']),
    databasePath: z.string().min(1, 'Database path must not be empty'),
    uploadDir: z.string().min(1, 'Upload directory must not be empty'),
    promptsDir: z.string().min(1, 'Prompts directory must not be empty'),
  }),
  provider: z.object({
    apiUrl: z.string().url('Invalid provider URL format'),
    timeoutMs: z.number().int().min(1000),
  }),
  rateLimit: z.object({
    rpmPerKey: z.number().int().min(0),
    failFast: z.boolean(),
    maxDelayMs: z.number().int().min(0),
    maxConcurrencyPerKey: z.number().int().min(0),
    maxConcurrency: z.number().int().min(0),
    coordinationStorePath: z.string(),
    permitLeaseMs: z.number().int().min(0),
  }),
  jobs: z.object({
    retentionMinutes: z.number().int().min(1),
    cleanupIntervalSeconds: z.number().int().min(1),
    staggerMs: z.number().int().min(0),
    unitDeadlineMs: z.number().int().min(1),
    maxJobsPerUser: z.number().int().min(0),
    maxJobsPerApiKey: z.number().int().min(0),
  }),
}).superRefine((config, ctx) => {
  // a lease shorter than a provider call would free slots that are still in use
  const lease = config.rateLimit.permitLeaseMs;
  if (lease !== 0 && lease <= config.provider.timeoutMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['rateLimit', 'permitLeaseMs'],
      message: `Permit lease must be 0 or longer than the provider timeout (${config.provider.timeoutMs}ms)`,
    });
  }
});

export type Config = z.infer<typeof ConfigSchema>;

type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --rpm-per-key 480 --storage memory --debug
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, then environment, then defaults.
 * Throws ZodError when the result is invalid.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): Config {
  const cliArgs = parseArgs(argv);

  const raw = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    const envValue = env[envKey];
    return envValue !== undefined && envValue !== '' ? envValue : undefined;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    return raw(cliKey, envKey) ?? defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] === true) return true;
    const value = raw(cliKey, envKey)?.toLowerCase();
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    return defaultValue;
  };

  // unparseable numbers become NaN and are reported by the schema
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = raw(cliKey, envKey);
    return value !== undefined ? Number(value) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string): string[] => {
    const value = raw(cliKey, envKey);
    if (!value) return [];
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '');
  };

  const providerTimeoutMs = getNumber('provider-timeout', 'OPENAI_TIMEOUT_MS', 300_000);
  const maxDelayMs = getNumber('rpm-max-delay', 'OPENAI_RPM_MAX_DELAY_MS', 3_600_000);

  const rawConfig = {
    server: {
      port: getNumber('port', 'PORT', 8000),
      debug: getBoolean('debug', 'DEBUG', false),
      apiKeys: getStringArray('api-keys', 'SERVICE_API_KEYS'),
      maxFileBytes: getNumber('max-file-bytes', 'MAX_FILE_BYTES', 5 * 1024 * 1024),
    },
    storage: {
      backend: getString('storage', 'JOB_STORAGE', 'sqlite'),
      databasePath: getString('database', 'DATABASE_PATH', 'data/jobs.db'),
      uploadDir: getString('upload-dir', 'UPLOAD_DIR', 'data/uploads'),
      promptsDir: getString('prompts-dir', 'PROMPTS_DIR', 'prompts'),
    },
    provider: {
      apiUrl: getString('provider-url', 'OPENAI_API_URL', 'https://api.openai.com/v1/responses'),
      timeoutMs: providerTimeoutMs,
    },
    rateLimit: {
      rpmPerKey: getNumber('rpm-per-key', 'OPENAI_RPM_PER_KEY', 480),
      failFast: getBoolean('rpm-fail-fast', 'OPENAI_RPM_FAIL_FAST', false),
      maxDelayMs,
      maxConcurrencyPerKey: getNumber('max-concurrency-per-key', 'OPENAI_MAX_CONCURRENCY_PER_KEY', 20),
      maxConcurrency: getNumber('max-concurrency', 'OPENAI_MAX_CONCURRENCY', 0),
      coordinationStorePath: getString('coordination-store', 'RATE_LIMIT_STORE_PATH', ''),
      permitLeaseMs: getNumber('permit-lease', 'PERMIT_LEASE_MS', providerTimeoutMs + 60_000),
    },
    jobs: {
      retentionMinutes: getNumber('retention-minutes', 'JOB_RETENTION_MINUTES', 60),
      cleanupIntervalSeconds: getNumber('cleanup-interval', 'CLEANUP_INTERVAL_SECONDS', 300),
      staggerMs: getNumber('stagger', 'PARALLEL_STAGGER_MS', 250),
      unitDeadlineMs: getNumber('unit-deadline', 'UNIT_DEADLINE_MS', maxDelayMs + providerTimeoutMs + 5_000),
      maxJobsPerUser: getNumber('max-jobs-per-user', 'MAX_JOBS_PER_USER', 1),
      maxJobsPerApiKey: getNumber('max-jobs-per-key', 'MAX_JOBS_PER_API_KEY', 20),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from CLI arguments and the environment.
 * Prints every invalid field and exits when validation fails.
 */
export function getConfig(): Config {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n✗ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\nTips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - JOB_STORAGE must be "memory" or "sqlite"');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print the effective configuration
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║             Document Job Orchestrator - Configuration            ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\nServer: port ${config.server.port} v${SERVICE_VERSION} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(
    `Auth: ${config.server.apiKeys.length > 0 ? `${config.server.apiKeys.length} API key(s)` : 'disabled (anonymous)'}`
  );
  console.error(
    `Storage: ${config.storage.backend}${config.storage.backend === 'sqlite' ? ` (${config.storage.databasePath})` : ''}`
  );
  console.error(`Uploads: ${config.storage.uploadDir} | Prompts: ${config.storage.promptsDir}`);
  console.error(`Provider: ${config.provider.apiUrl} (timeout ${config.provider.timeoutMs}ms)`);

  const rl = config.rateLimit;
  console.error(
    `\nRate limit: ${rl.rpmPerKey || 'unlimited'} RPM/key | ${rl.maxConcurrencyPerKey || 'unlimited'} concurrent/key | ` +
      `${rl.maxConcurrency || 'unlimited'} concurrent total`
  );
  console.error(
    `   Mode: ${rl.failFast ? 'fail-fast' : `block (max ${rl.maxDelayMs}ms)`} | ` +
      `Coordination: ${rl.coordinationStorePath || 'local only'}`
  );

  const jobs = config.jobs;
  console.error(
    `Jobs: retention ${jobs.retentionMinutes}m, sweep every ${jobs.cleanupIntervalSeconds}s, ` +
      `stagger ${jobs.staggerMs}ms, ${jobs.maxJobsPerUser}/user, ${jobs.maxJobsPerApiKey}/key`
  );

  console.error('\n' + '─'.repeat(68));
}
