import type { LLMConfig } from '@/config';
import type { ILLMProvider } from '@/ports';
import { AnthropicLLMAdapter } from './anthropic/AnthropicLLMAdapter';
import { MockLLMAdapter } from './mock/MockLLMAdapter';
import { OpenAILLMAdapter } from './openai/OpenAILLMAdapter';

/**
 * Create the LLM adapter selected by configuration
 */
export function createLLMProvider(config: LLMConfig): ILLMProvider {
  switch (config.provider) {
    case 'openai':
      return new OpenAILLMAdapter({
        apiKey: config.apiKey,
        temperature: config.temperature,
        timeoutMs: config.timeoutMs,
        ...(config.model ? { model: config.model } : {}),
      });
    case 'anthropic':
      return new AnthropicLLMAdapter({
        apiKey: config.apiKey,
        model: config.model,
        temperature: config.temperature,
        timeoutMs: config.timeoutMs,
      });
    case 'mock':
      return new MockLLMAdapter(config.model ? { model: config.model } : {});
  }
}
