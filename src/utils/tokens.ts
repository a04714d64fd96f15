/**
 * Output token budgets for provider calls
 */

export const CHARS_PER_TOKEN = 4;
export const MIN_OUTPUT_TOKENS = 16;
export const EXTRACT_TOKEN_MULTIPLIER = 8;
export const CLASSIFY_DEFAULT_TOKENS = 128;

export type TokenOperation = 'extract' | 'classify';

export function approxTokensFromChars(chars: number): number {
  return Math.max(1, Math.ceil(chars / CHARS_PER_TOKEN));
}

export function maxOutputTokensFor(
  inputTokens: number,
  operation: TokenOperation,
  provided?: number
): number {
  if (provided !== undefined) {
    return Math.max(MIN_OUTPUT_TOKENS, provided);
  }
  if (operation === 'extract') {
    return Math.max(MIN_OUTPUT_TOKENS, inputTokens * EXTRACT_TOKEN_MULTIPLIER);
  }
  return CLASSIFY_DEFAULT_TOKENS;
}

/**
 * Only some model families accept an explicit temperature
 */
export function modelSupportsTemperature(model: string): boolean {
  return model.startsWith('gpt-4.1') || model.startsWith('gpt-4o');
}
