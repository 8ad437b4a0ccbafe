import { LLMProviderError } from '@/domain/errors';
import type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from '@/ports';
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

/**
 * Configuration for the OpenAI chat adapter
 */
export interface OpenAILLMConfig {
	apiKey: string;
	model: string;
	temperature: number;
	maxTokens: number;
	timeoutMs: number;
	baseURL?: string;
}

/**
 * Default configuration for OpenAI chat adapter
 */
export const DEFAULT_OPENAI_LLM_CONFIG: Omit<OpenAILLMConfig, 'apiKey'> = {
	model: 'gpt-3.5-turbo',
	temperature: 0.7,
	maxTokens: 2048,
	timeoutMs: 30000,
};

/**
 * OpenAI chat completion provider implementation
 */
export class OpenAILLMAdapter implements ILLMProvider {
	private client: OpenAI;
	private config: OpenAILLMConfig;

	constructor(config: Partial<OpenAILLMConfig> & { apiKey: string }) {
		if (!config.apiKey || config.apiKey.trim().length === 0) {
			throw new Error('OpenAI API key is required');
		}
		this.config = { ...DEFAULT_OPENAI_LLM_CONFIG, ...config };
		// Failures are terminal for the request; the caller falls back instead of retrying
		this.client = new OpenAI({
			apiKey: config.apiKey,
			baseURL: config.baseURL,
			maxRetries: 0,
			timeout: this.config.timeoutMs,
		});
	}

	async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
		try {
			const completion = await this.client.chat.completions.create(
				{
					model: this.config.model,
					messages: messages.map(toChatCompletionMessage),
					temperature: options?.temperature ?? this.config.temperature,
					max_tokens: options?.maxTokens ?? this.config.maxTokens,
					stop: options?.stopSequences,
				},
				{ timeout: options?.timeoutMs ?? this.config.timeoutMs },
			);

			const content = completion.choices[0]?.message?.content ?? '';

			return {
				content,
				usage: completion.usage
					? {
							inputTokens: completion.usage.prompt_tokens,
							outputTokens: completion.usage.completion_tokens,
						}
					: undefined,
			};
		} catch (error) {
			throw this.toProviderError(error);
		}
	}

	getProviderName(): string {
		return 'OpenAI';
	}

	getModelName(): string {
		return this.config.model;
	}

	/**
	 * Estimate tokens using a simple approximation
	 * OpenAI's cl100k_base tokenizer averages ~4 chars per token for English
	 */
	estimateTokens(text: string): number {
		if (!text) return 0;

		// Count CJK characters (they typically use more tokens)
		const cjkPattern = /[\u4e00-\u9fff\u3400-\u4dbf\uac00-\ud7af\u3040-\u309f\u30a0-\u30ff]/g;
		const cjkCount = text.match(cjkPattern)?.length ?? 0;

		const nonCjkTokens = Math.ceil((text.length - cjkCount) / 4);
		return nonCjkTokens + cjkCount;
	}

	private toProviderError(error: unknown): LLMProviderError {
		if (error instanceof OpenAI.APIConnectionTimeoutError) {
			return new LLMProviderError('OpenAI request timed out', 'OpenAI', 408, { cause: error });
		}
		if (error instanceof OpenAI.APIError) {
			return new LLMProviderError(
				`OpenAI API error (${error.status ?? 'no status'}): ${error.message}`,
				'OpenAI',
				error.status,
				{ cause: error },
			);
		}
		const message = error instanceof Error ? error.message : String(error);
		return new LLMProviderError(`OpenAI request failed: ${message}`, 'OpenAI', undefined, {
			cause: error,
		});
	}
}

function toChatCompletionMessage(message: LLMMessage): ChatCompletionMessageParam {
	switch (message.role) {
		case 'system':
			return { role: 'system', content: message.content };
		case 'assistant':
			return { role: 'assistant', content: message.content };
		case 'user':
			return { role: 'user', content: message.content };
	}
}
