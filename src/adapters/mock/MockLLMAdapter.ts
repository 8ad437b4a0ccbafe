import type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from '@/ports';

/**
 * A scripted reply: fixed text, a function of the conversation, or an error to throw.
 */
export type MockReply = string | Error | ((messages: LLMMessage[]) => string);

/**
 * Rule for replying based on pattern matching against the last user message
 */
export interface ReplyRule {
  /** Pattern to match against the prompt text */
  pattern: RegExp;
  /** Reply to produce when the pattern matches */
  reply: MockReply;
}

/**
 * Record of an LLM call for testing
 */
export interface LLMCallRecord {
  messages: LLMMessage[];
  options?: LLMChatOptions;
  timestamp: number;
}

export interface MockLLMConfig {
  model: string;
  /** Used when no queued reply or rule applies */
  defaultReply: string;
}

const DEFAULT_MOCK_CONFIG: MockLLMConfig = {
  model: 'mock-tutor',
  defaultReply: 'This is a mock response.',
};

function buildQuizReply(messages: LLMMessage[]): string {
  const prompt = lastUserContent(messages);
  const count = Number.parseInt(prompt.match(/exactly (\d+) multiple-choice/)?.[1] ?? '3', 10);
  const subject = prompt.match(/^Subject: (.+)$/m)?.[1] ?? 'the subject';

  const blocks: string[] = [];
  for (let i = 1; i <= count; i++) {
    blocks.push(
      [
        `Question ${i}: Which statement about ${subject} (item ${i}) is correct?`,
        'A) The first statement',
        'B) The second statement',
        'C) The third statement',
        'D) The fourth statement',
        'Correct Answer: B',
        `Explanation: The second statement is the accurate one for item ${i}.`,
      ].join('\n'),
    );
  }
  return blocks.join('\n\n');
}

/**
 * Default rules, one per prompt family, so the mock can serve every endpoint
 */
const DEFAULT_REPLY_RULES: ReplyRule[] = [
  {
    pattern: /multiple-choice questions/,
    reply: buildQuizReply,
  },
  {
    pattern: /study flashcards/,
    reply: [
      'Topic: Key Concepts',
      'Question: What is the main idea of the document?',
      'Answer: The document introduces its central topic and defines the key terms.',
      '---',
      'Topic: Definitions',
      'Question: Which term does the document define first?',
      'Answer: The first defined term in the document.',
    ].join('\n'),
  },
  {
    pattern: /Summarize the following document/,
    reply: '## Summary\n\n- The document covers its central topic.\n- It defines the key terms.',
  },
  {
    pattern: /Student question:/,
    reply: 'Based on the provided document, the answer is explained in the first section.',
  },
  {
    pattern: /Explain the following question/,
    reply: '### Explanation\n\nHere is a step-by-step explanation tailored to your preferences.',
  },
];

function lastUserContent(messages: LLMMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') {
      return messages[i].content;
    }
  }
  return '';
}

/**
 * Mock implementation of ILLMProvider for tests and offline runs
 *
 * Replies come from, in order: queued replies, reply rules, then the default reply.
 */
export class MockLLMAdapter implements ILLMProvider {
  private config: MockLLMConfig;
  private rules: ReplyRule[];
  private queue: MockReply[] = [];
  private callHistory: LLMCallRecord[] = [];

  constructor(config?: Partial<MockLLMConfig>) {
    this.config = { ...DEFAULT_MOCK_CONFIG, ...config };
    this.rules = [...DEFAULT_REPLY_RULES];
  }

  async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
    this.callHistory.push({ messages, options, timestamp: Date.now() });

    const reply = this.queue.shift() ?? this.findRule(messages) ?? this.config.defaultReply;
    if (reply instanceof Error) {
      throw reply;
    }

    const content = typeof reply === 'function' ? reply(messages) : reply;
    const input = messages.map((m) => m.content).join('\n');

    return {
      content,
      usage: {
        inputTokens: this.estimateTokens(input),
        outputTokens: this.estimateTokens(content),
      },
    };
  }

  getProviderName(): string {
    return 'Mock';
  }

  getModelName(): string {
    return this.config.model;
  }

  estimateTokens(text: string): number {
    // Rough estimate: ~4 characters per token
    return Math.ceil(text.length / 4);
  }

  private findRule(messages: LLMMessage[]): MockReply | undefined {
    const prompt = lastUserContent(messages);
    return this.rules.find((rule) => rule.pattern.test(prompt))?.reply;
  }

  // ============ Test Helpers ============

  /**
   * Get call history for testing
   */
  _getCallHistory(): LLMCallRecord[] {
    return [...this.callHistory];
  }

  /**
   * Clear call history
   */
  _clearCallHistory(): void {
    this.callHistory = [];
  }

  /**
   * Queue replies returned by the next calls, ahead of any rule
   */
  _queueReply(...replies: MockReply[]): void {
    this.queue.push(...replies);
  }

  /**
   * Add a single reply rule
   */
  _addRule(rule: ReplyRule): void {
    // Add to beginning for priority
    this.rules.unshift(rule);
  }

  /**
   * Reset to default rules and drop queued replies
   */
  _resetRules(): void {
    this.rules = [...DEFAULT_REPLY_RULES];
    this.queue = [];
  }
}
