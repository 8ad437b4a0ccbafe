/**
 * Data models for uploaded study documents.
 */

/**
 * A front/back study card generated from a document.
 */
export interface Flashcard {
  topic: string;
  question: string;
  answer: string;
}

/**
 * Result of processing an uploaded document.
 * `fallback` is true when the summary or the flashcards are fixed content instead of model output.
 */
export interface ProcessedDocument {
  filename: string;
  content: string;
  summary: string;
  flashcards: Flashcard[];
  pageCount: number;
  chunkCount: number;
  fallback: boolean;
}

/**
 * A question about a previously processed document.
 */
export interface DiscussRequest {
  question: string;
  content: string;
  summary?: string;
}

/**
 * Chunking settings for document text
 */
export interface ChunkOptions {
  /** Target chunk length in characters */
  chunkSize: number;
  /** Characters repeated at the start of the next chunk */
  overlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 2000,
  overlap: 200,
};

export const DEFAULT_MAX_CHUNKS = 6;
export const DEFAULT_MAX_PROMPT_TOKENS = 4000;
export const DEFAULT_FLASHCARD_COUNT = 10;
export const DEFAULT_FLASHCARD_TOPIC = 'General';
