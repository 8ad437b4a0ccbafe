export {
  DISCUSS_NOT_GENERATED_MESSAGE,
  DISCUSS_UNAVAILABLE_MESSAGE,
  DocumentService,
  SUMMARY_NOT_GENERATED_MESSAGE,
  SUMMARY_UNAVAILABLE_MESSAGE,
} from './DocumentService';
export type { DiscussResult, DocumentServiceOptions } from './DocumentService';
export {
  DISCUSS_SYSTEM_PROMPT,
  FLASHCARD_SYSTEM_PROMPT,
  SUMMARY_SYSTEM_PROMPT,
  buildDiscussPrompt,
  buildFlashcardPrompt,
  buildSummaryPrompt,
  parseFlashcardResponse,
  parseSummaryResponse,
} from './prompts';
export { chunkText, formatChunksForPrompt, normalizeWhitespace } from './textPreparation';
export {
  DEFAULT_CHUNK_OPTIONS,
  DEFAULT_FLASHCARD_COUNT,
  DEFAULT_FLASHCARD_TOPIC,
  DEFAULT_MAX_CHUNKS,
  DEFAULT_MAX_PROMPT_TOKENS,
} from './types';
export type { ChunkOptions, DiscussRequest, Flashcard, ProcessedDocument } from './types';
