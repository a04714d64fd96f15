/**
 * Input of one completion call
 */
export interface CompletionInput {
  prompt: string;
  model: string;
  credential: string;
  maxOutputTokens: number;
  temperatureZero: boolean;
}

/**
 * External AI provider. Rejects with ProviderError on failure.
 */
export interface ICompletionProvider {
  complete(input: CompletionInput): Promise<string>;
}
