/**
 * Port for LLM (Large Language Model) interactions.
 * Provides abstraction over the hosted completion service.
 */

/**
 * Represents a message in an LLM conversation.
 */
export interface LLMMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

/**
 * Response from an LLM chat completion.
 */
export interface LLMResponse {
  content: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Options for LLM chat requests.
 */
export interface LLMChatOptions {
  temperature?: number; // 0.0 to 1.0, controls randomness
  maxTokens?: number; // Max tokens to generate
  stopSequences?: string[]; // Stop generation at these strings
  timeoutMs?: number; // Abort the request after this many milliseconds
}

/**
 * Port interface for LLM providers.
 * Implementations should handle API-specific details (authentication, request shape, errors).
 * Failures are reported as `LLMProviderError`.
 */
export interface ILLMProvider {
  /**
   * Send a chat message and receive a complete response.
   */
  chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse>;

  /**
   * Get the name of the LLM provider (e.g., "OpenAI").
   */
  getProviderName(): string;

  /**
   * Get the model name being used (e.g., "gpt-3.5-turbo").
   */
  getModelName(): string;

  /**
   * Estimate the number of tokens in a text string.
   * Used to fit document text into a prompt token budget.
   */
  estimateTokens(text: string): number;
}
