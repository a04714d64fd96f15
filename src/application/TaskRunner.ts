import type { TaskOutcome, TaskRequest } from '../core/entities/Outcome.js';
import { ProviderError, errorMessage } from '../core/errors.js';
import type { ICompletionProvider } from '../core/interfaces/ICompletionProvider.js';
import type { AdmissionMode, IRateLimiter, Permit } from '../core/interfaces/IRateLimiter.js';
import { withDeadline } from '../utils/async.js';
import { parseCompletionJson } from '../utils/json.js';
import { toTaskFailure } from './aggregation.js';

export interface TaskRunnerOptions {
  requestTimeoutMs: number;
  debug?: boolean;
}

/**
 * Runs one provider call behind the rate limiter and turns every exit into a TaskOutcome
 */
export class TaskRunner {
  constructor(
    private limiter: IRateLimiter,
    private provider: ICompletionProvider,
    private options: TaskRunnerOptions
  ) {}

  async run(credential: string, request: TaskRequest, mode: AdmissionMode): Promise<TaskOutcome> {
    const started = Date.now();

    let permit: Permit;
    try {
      permit = await this.limiter.acquire(credential, mode);
    } catch (error) {
      this.debugLog(`Unit ${request.unitId} not admitted: ${errorMessage(error)}`);
      return { ok: false, error: toTaskFailure(error), latencyMs: Date.now() - started };
    }

    try {
      const text = await withDeadline(
        this.provider.complete({
          prompt: request.prompt,
          model: request.model,
          credential,
          maxOutputTokens: request.maxOutputTokens,
          temperatureZero: request.temperatureZero,
        }),
        this.options.requestTimeoutMs,
        () => new ProviderError('timeout', `Provider call exceeded ${this.options.requestTimeoutMs}ms`)
      );

      let data: unknown;
      try {
        data = parseCompletionJson(text);
      } catch (error) {
        throw new ProviderError('malformed_response', `Completion is not valid JSON: ${errorMessage(error)}`);
      }

      this.debugLog(`Unit ${request.unitId} succeeded in ${Date.now() - started}ms`);
      return { ok: true, data, latencyMs: Date.now() - started };
    } catch (error) {
      this.debugLog(`Unit ${request.unitId} failed: ${errorMessage(error)}`);
      return { ok: false, error: toTaskFailure(error), latencyMs: Date.now() - started };
    } finally {
      permit.release();
    }
  }

  private debugLog(message: string): void {
    if (this.options.debug) {
      console.error(`[TaskRunner] ${message}`);
    }
  }
}
