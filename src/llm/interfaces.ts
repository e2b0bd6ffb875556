export interface CompletionOptions {
  system?: string;
  // Ask the provider for a single JSON object.
  json?: boolean;
}

/**
 * Text-in / text-out language model. Implementations throw
 * `ProviderUnavailable` or `ProviderTimeout` and nothing else for provider problems.
 */
export interface LLM {
  name: string;
  complete(prompt: string, opts?: CompletionOptions): Promise<string>;
}
