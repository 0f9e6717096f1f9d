/**
 * LLM Service Interface
 *
 * Black-box reasoning endpoint used for entity ranking, query analysis and
 * answer synthesis. Allows swapping implementations without affecting consumers.
 */

/**
 * Options for a completion request
 */
export interface CompletionOptions {
  /** Maximum tokens to generate */
  maxTokens?: number;
  /** Sampling temperature */
  temperature?: number;
}

export interface ILLMService {
  /**
   * Returns the generated text for a system prompt and a user prompt.
   * Rejects when the provider call fails.
   */
  complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<string>;
}
