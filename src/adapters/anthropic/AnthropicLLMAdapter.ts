import { LLMProviderError } from '@/domain/errors';
import type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from '@/ports';

/**
 * Anthropic API message format.
 */
interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Anthropic API request body for message creation.
 */
interface AnthropicMessageRequest {
  model: string;
  messages: AnthropicMessage[];
  max_tokens: number;
  temperature?: number;
  stop_sequences?: string[];
  system?: string;
}

/**
 * Anthropic API response for non-streaming requests.
 */
interface AnthropicMessageResponse {
  id: string;
  type: 'message';
  role: 'assistant';
  content: Array<{
    type: 'text';
    text: string;
  }>;
  model: string;
  stop_reason: string | null;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}

/**
 * Configuration for the Anthropic LLM adapter.
 */
export interface AnthropicLLMConfig {
  apiKey: string;
  model?: string; // Default: claude-3-5-sonnet-20241022
  maxTokens?: number; // Default: 2048
  temperature?: number; // Default: 0.7
  timeoutMs?: number; // Default: 30000
  apiVersion?: string; // Default: 2023-06-01
  baseUrl?: string;
}

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

/**
 * Adapter for Anthropic's Claude Messages API.
 * Implements the ILLMProvider port over plain fetch.
 */
export class AnthropicLLMAdapter implements ILLMProvider {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly defaultMaxTokens: number;
  private readonly defaultTemperature: number;
  private readonly defaultTimeoutMs: number;
  private readonly apiVersion: string;
  private readonly baseUrl: string;

  constructor(config: AnthropicLLMConfig) {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw new Error('Anthropic API key is required');
    }
    this.apiKey = config.apiKey;
    this.model = config.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.defaultMaxTokens = config.maxTokens ?? 2048;
    this.defaultTemperature = config.temperature ?? 0.7;
    this.defaultTimeoutMs = config.timeoutMs ?? 30000;
    this.apiVersion = config.apiVersion ?? '2023-06-01';
    this.baseUrl = config.baseUrl ?? 'https://api.anthropic.com/v1';
  }

  async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
    const { systemMessage, userMessages } = this.separateSystemMessage(messages);
    const requestBody = this.buildRequestBody(systemMessage, userMessages, options);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/messages`, {
        method: 'POST',
        headers: this.buildHeaders(),
        body: JSON.stringify(requestBody),
        signal: AbortSignal.timeout(options?.timeoutMs ?? this.defaultTimeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new LLMProviderError('Anthropic request timed out', 'Anthropic', 408, {
          cause: error,
        });
      }
      throw new LLMProviderError('Anthropic request failed', 'Anthropic', undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new LLMProviderError(
        `Anthropic API error (${response.status}): ${errorText}`,
        'Anthropic',
        response.status,
      );
    }

    const data = (await response.json()) as AnthropicMessageResponse;

    return {
      content: data.content.map((c) => c.text).join(''),
      usage: {
        inputTokens: data.usage.input_tokens,
        outputTokens: data.usage.output_tokens,
      },
    };
  }

  getProviderName(): string {
    return 'Anthropic';
  }

  getModelName(): string {
    return this.model;
  }

  estimateTokens(text: string): number {
    // Rough estimation: ~4 characters per token for English text
    // Add 20% safety margin to avoid underestimating
    const baseEstimate = Math.ceil(text.length / 4);
    return Math.ceil(baseEstimate * 1.2);
  }

  /**
   * Separate system messages from user/assistant messages.
   * Anthropic API requires system messages to be passed separately.
   */
  private separateSystemMessage(messages: LLMMessage[]): {
    systemMessage: string | undefined;
    userMessages: AnthropicMessage[];
  } {
    const systemMessages: string[] = [];
    const userMessages: AnthropicMessage[] = [];

    for (const message of messages) {
      if (message.role === 'system') {
        systemMessages.push(message.content);
      } else {
        userMessages.push({ role: message.role, content: message.content });
      }
    }

    const systemMessage = systemMessages.length > 0 ? systemMessages.join('\n\n') : undefined;

    return { systemMessage, userMessages };
  }

  private buildRequestBody(
    systemMessage: string | undefined,
    userMessages: AnthropicMessage[],
    options: LLMChatOptions | undefined,
  ): AnthropicMessageRequest {
    const requestBody: AnthropicMessageRequest = {
      model: this.model,
      messages: userMessages,
      max_tokens: options?.maxTokens ?? this.defaultMaxTokens,
      temperature: options?.temperature ?? this.defaultTemperature,
    };

    if (systemMessage) {
      requestBody.system = systemMessage;
    }

    if (options?.stopSequences) {
      requestBody.stop_sequences = options.stopSequences;
    }

    return requestBody;
  }

  private buildHeaders(): Record<string, string> {
    return {
      'x-api-key': this.apiKey,
      'anthropic-version': this.apiVersion,
      'content-type': 'application/json',
    };
  }
}
