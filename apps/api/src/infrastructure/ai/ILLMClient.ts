export interface CompletionOptions {
  /** Sent as a system message ahead of the prompt. */
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Interface for LLM clients - allows swapping providers
 *
 * Implementations reject with an LLMError subclass.
 */
export interface ILLMClient {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
