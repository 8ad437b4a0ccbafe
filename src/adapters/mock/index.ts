export { MockLLMAdapter } from './MockLLMAdapter';
export type { LLMCallRecord, MockLLMConfig, MockReply, ReplyRule } from './MockLLMAdapter';
export { FakeTextExtractor } from './FakeTextExtractor';
