import { DocumentError, ValidationError } from '@/domain/errors';
import { requireText } from '@/domain/preferences';
import type { IDocumentTextExtractor, ILLMProvider, LLMMessage, UploadedDocument } from '@/ports';
import {
  FLASHCARD_SYSTEM_PROMPT,
  SUMMARY_SYSTEM_PROMPT,
  buildDiscussPrompt,
  buildFlashcardPrompt,
  buildSummaryPrompt,
  parseFlashcardResponse,
  parseSummaryResponse,
} from './prompts';
import { chunkText, formatChunksForPrompt, normalizeWhitespace } from './textPreparation';
import {
  DEFAULT_CHUNK_OPTIONS,
  DEFAULT_FLASHCARD_COUNT,
  DEFAULT_MAX_CHUNKS,
  DEFAULT_MAX_PROMPT_TOKENS,
  type DiscussRequest,
  type Flashcard,
  type ProcessedDocument,
} from './types';

export const SUMMARY_UNAVAILABLE_MESSAGE =
  'A summary could not be generated right now. The extracted text is still available.';

export const SUMMARY_NOT_GENERATED_MESSAGE = 'Sorry, I could not generate a summary for this document.';

export const DISCUSS_UNAVAILABLE_MESSAGE =
  'The tutor is unavailable right now. Please try asking about your document again in a moment.';

export const DISCUSS_NOT_GENERATED_MESSAGE =
  'Sorry, I could not generate an answer about this document. Please try rephrasing your question.';

export interface DocumentServiceOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** Chunks of document text included in each prompt */
  maxChunks: number;
  /** Estimated tokens of document text allowed in one prompt; whole chunks are dropped to fit */
  maxPromptTokens: number;
  flashcardCount: number;
  temperature: number;
  timeoutMs?: number;
}

const DEFAULT_DOCUMENT_SERVICE_OPTIONS: DocumentServiceOptions = {
  chunkSize: DEFAULT_CHUNK_OPTIONS.chunkSize,
  chunkOverlap: DEFAULT_CHUNK_OPTIONS.overlap,
  maxChunks: DEFAULT_MAX_CHUNKS,
  maxPromptTokens: DEFAULT_MAX_PROMPT_TOKENS,
  flashcardCount: DEFAULT_FLASHCARD_COUNT,
  temperature: 0.7,
};

/**
 * Answer returned for a question about a document.
 */
export interface DiscussResult {
  response: string;
  fallback: boolean;
}

interface GeneratedPart<T> {
  value: T;
  fallback: boolean;
}

/**
 * Service for uploaded study documents: summaries, flashcards and questions.
 */
export class DocumentService {
  private options: DocumentServiceOptions;

  constructor(
    private llmProvider: ILLMProvider,
    private textExtractor: IDocumentTextExtractor,
    options: Partial<DocumentServiceOptions> = {},
  ) {
    this.options = { ...DEFAULT_DOCUMENT_SERVICE_OPTIONS, ...options };
  }

  /**
   * Extract an uploaded document and generate its summary and flashcards.
   * Unsupported files throw `ValidationError`; unreadable or empty ones throw `DocumentError`.
   */
  async process(upload: UploadedDocument): Promise<ProcessedDocument> {
    if (!this.textExtractor.supports(upload)) {
      throw new ValidationError(`Unsupported file type for ${upload.filename}. Upload a PDF document.`, 'file');
    }

    const extracted = await this.textExtractor.extract(upload);
    const content = normalizeWhitespace(extracted.text);
    if (!content) {
      throw new DocumentError(`No text could be extracted from ${upload.filename}`);
    }

    const chunks = this.chunk(content);
    const promptText = this.selectPromptText(chunks);
    console.log(
      `[DocumentService] Extracted ${content.length} characters from ${upload.filename} ` +
        `(${extracted.pageCount} pages, ${chunks.length} chunks)`,
    );

    const [summary, flashcards] = await Promise.all([
      this.summarize(promptText),
      this.generateFlashcards(promptText),
    ]);

    return {
      filename: upload.filename,
      content,
      summary: summary.value,
      flashcards: flashcards.value,
      pageCount: extracted.pageCount,
      chunkCount: chunks.length,
      fallback: summary.fallback || flashcards.fallback,
    };
  }

  /**
   * Answer a question using only the given document content.
   * An empty question or document throws `ValidationError` before the model is called.
   */
  async discuss(request: DiscussRequest): Promise<DiscussResult> {
    const question = requireText(request.question, 'question');
    const content = normalizeWhitespace(requireText(request.content, 'content'));
    const promptText = this.selectPromptText(this.chunk(content));

    let reply: string;
    try {
      reply = await this.complete(buildDiscussPrompt(question, promptText, request.summary), 1000);
    } catch (error) {
      console.error('[DocumentService] Document question failed:', error);
      return { response: DISCUSS_UNAVAILABLE_MESSAGE, fallback: true };
    }

    const answer = reply.trim();
    if (!answer) {
      console.warn('[DocumentService] Model returned an empty answer');
      return { response: DISCUSS_NOT_GENERATED_MESSAGE, fallback: true };
    }
    return { response: answer, fallback: false };
  }

  private chunk(content: string): string[] {
    return chunkText(content, {
      chunkSize: this.options.chunkSize,
      overlap: this.options.chunkOverlap,
    });
  }

  /**
   * Format the leading chunks, dropping trailing ones until the estimate fits
   * the token budget. The first chunk is always kept.
   */
  private selectPromptText(chunks: string[]): string {
    let count = Math.min(this.options.maxChunks, chunks.length);
    let promptText = formatChunksForPrompt(chunks, count);

    while (count > 1 && this.llmProvider.estimateTokens(promptText) > this.options.maxPromptTokens) {
      count--;
      promptText = formatChunksForPrompt(chunks, count);
    }

    if (count < Math.min(this.options.maxChunks, chunks.length)) {
      console.log(`[DocumentService] Trimmed document text to ${count} chunks to fit the prompt budget`);
    }
    return promptText;
  }

  private async summarize(documentText: string): Promise<GeneratedPart<string>> {
    try {
      const reply = await this.complete(
        [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: buildSummaryPrompt(documentText) },
        ],
        800,
      );
      const summary = parseSummaryResponse(reply);
      if (!summary) {
        console.warn('[DocumentService] Model returned an empty summary');
        return { value: SUMMARY_NOT_GENERATED_MESSAGE, fallback: true };
      }
      return { value: summary, fallback: false };
    } catch (error) {
      console.error('[DocumentService] Summary request failed:', error);
      return { value: SUMMARY_UNAVAILABLE_MESSAGE, fallback: true };
    }
  }

  private async generateFlashcards(documentText: string): Promise<GeneratedPart<Flashcard[]>> {
    try {
      const reply = await this.complete(
        [
          { role: 'system', content: FLASHCARD_SYSTEM_PROMPT },
          { role: 'user', content: buildFlashcardPrompt(documentText, this.options.flashcardCount) },
        ],
        1500,
      );
      const cards = parseFlashcardResponse(reply).slice(0, this.options.flashcardCount);
      if (cards.length === 0) {
        console.warn('[DocumentService] No flashcards could be parsed from the reply');
        return { value: [], fallback: true };
      }
      return { value: cards, fallback: false };
    } catch (error) {
      console.error('[DocumentService] Flashcard request failed:', error);
      return { value: [], fallback: true };
    }
  }

  private async complete(messages: LLMMessage[], maxTokens: number): Promise<string> {
    const response = await this.llmProvider.chat(messages, {
      temperature: this.options.temperature,
      maxTokens,
      timeoutMs: this.options.timeoutMs,
    });
    return response.content;
  }
}
