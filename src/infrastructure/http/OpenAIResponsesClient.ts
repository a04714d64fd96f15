import fetch, { FetchError, Response } from 'node-fetch';
import { ProviderError, ProviderErrorCategory, errorMessage } from '../../core/errors.js';
import type { CompletionInput, ICompletionProvider } from '../../core/interfaces/ICompletionProvider.js';
import { isPlainObject } from '../../utils/json.js';
import { modelSupportsTemperature } from '../../utils/tokens.js';

/**
 * Client for the OpenAI Responses API, asking for JSON object output.
 * Errors are mapped to ProviderError categories; nothing is retried here because
 * every attempt would spend a rate-limit admission.
 */
export class OpenAIResponsesClient implements ICompletionProvider {
  constructor(
    private apiUrl: string,
    private timeoutMs: number
  ) {}

  async complete(input: CompletionInput): Promise<string> {
    const payload: Record<string, unknown> = {
      model: input.model,
      input: input.prompt,
      max_output_tokens: input.maxOutputTokens,
      text: { format: { type: 'json_object' } },
    };
    if (input.temperatureZero && modelSupportsTemperature(input.model)) {
      payload.temperature = 0;
    }

    let res: Response;
    try {
      res = await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${input.credential}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      if (error instanceof FetchError && error.type === 'request-timeout') {
        throw new ProviderError('timeout', `Provider did not answer within ${this.timeoutMs}ms`);
      }
      throw new ProviderError('upstream', `Provider request failed: ${errorMessage(error)}`);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new ProviderError(
        categorizeStatus(res.status),
        `Provider API error ${res.status}: ${body.slice(0, 500)}`,
        res.status
      );
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (error) {
      throw new ProviderError('malformed_response', `Provider returned invalid JSON: ${errorMessage(error)}`);
    }

    return extractResponseText(data);
  }
}

export function categorizeStatus(status: number): ProviderErrorCategory {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'quota';
  if (status === 408 || status === 504) return 'timeout';
  if (status >= 400 && status < 500) return 'invalid_request';
  return 'upstream';
}

/**
 * Pulls the generated text out of a Responses API payload
 */
export function extractResponseText(data: unknown): string {
  if (!isPlainObject(data)) {
    throw new ProviderError('malformed_response', 'Provider response is not an object');
  }

  if (data.status !== 'completed') {
    const details = isPlainObject(data.incomplete_details) ? data.incomplete_details : {};
    const reason = typeof details.reason === 'string' ? details.reason : 'unknown';
    throw new ProviderError('malformed_response', `Provider response not completed: ${reason}`);
  }

  if (typeof data.output_text === 'string') return data.output_text;
  if (typeof data.content === 'string') return data.content;

  const output = Array.isArray(data.output) ? data.output : [];
  for (const item of output) {
    if (!isPlainObject(item)) continue;
    if (Array.isArray(item.content)) {
      for (const part of item.content) {
        if (!isPlainObject(part) || (part.type !== 'output_text' && part.type !== 'text')) continue;
        const text = textValue(part.text);
        if (text !== null) return text;
      }
    }
    const text = textValue(item.text);
    if (text !== null) return text;
  }

  throw new ProviderError('malformed_response', 'No text found in provider response');
}

function textValue(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (isPlainObject(value) && 'value' in value) return String(value.value);
  return null;
}
