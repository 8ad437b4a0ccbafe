import { DEFAULT_CHUNK_OPTIONS, type ChunkOptions } from './types';

/**
 * Normalize whitespace in extracted text
 * - Normalize line endings and drop form feeds left between pages
 * - Collapse multiple newlines to double newlines
 * - Collapse multiple spaces to single space
 * - Trim leading/trailing whitespace
 */
export function normalizeWhitespace(content: string): string {
  return content
    .replace(/\r\n?/g, '\n')
    .replace(/\f/g, '\n\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/^ +| +$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

const SENTENCE_ENDERS = ['. ', '! ', '? ', '.\n', '!\n', '?\n', '。', '！', '？'];

/**
 * Find the end of the last sentence that finishes between `from` and `to`.
 * Returns -1 when there is none.
 */
function findLastSentenceBreak(text: string, from: number, to: number): number {
  let lastBreak = -1;
  for (const ender of SENTENCE_ENDERS) {
    const pos = text.lastIndexOf(ender, to - ender.length);
    if (pos >= from) {
      // Keep the punctuation, drop the trailing whitespace
      lastBreak = Math.max(lastBreak, pos + ender.trimEnd().length);
    }
  }
  return lastBreak;
}

/**
 * Pick where a chunk starting at `start` should end.
 * Prefers a paragraph break, then a sentence break, then a word break, in the
 * second half of the window.
 */
function findChunkEnd(text: string, start: number, chunkSize: number): number {
  const hardEnd = start + chunkSize;
  if (hardEnd >= text.length) {
    return text.length;
  }

  const minEnd = start + Math.floor(chunkSize / 2);

  const paragraphBreak = text.lastIndexOf('\n\n', hardEnd);
  if (paragraphBreak > minEnd) {
    return paragraphBreak;
  }

  const sentenceBreak = findLastSentenceBreak(text, minEnd, hardEnd);
  if (sentenceBreak > minEnd) {
    return sentenceBreak;
  }

  const wordBreak = text.lastIndexOf(' ', hardEnd);
  if (wordBreak > minEnd) {
    return wordBreak;
  }

  return hardEnd;
}

/**
 * Split text into overlapping chunks of at most `chunkSize` characters.
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): string[] {
  const { chunkSize, overlap } = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  if (chunkSize <= 0) {
    throw new RangeError('chunkSize must be positive');
  }
  if (overlap < 0 || overlap >= chunkSize) {
    throw new RangeError('overlap must be at least 0 and smaller than chunkSize');
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    const end = findChunkEnd(text, start, chunkSize);
    const chunk = text.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }
    if (end >= text.length) {
      break;
    }
    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}

/**
 * Join the first `maxChunks` chunks into one labelled block for a prompt.
 */
export function formatChunksForPrompt(chunks: string[], maxChunks: number): string {
  const selected = chunks.slice(0, Math.max(1, maxChunks));
  if (selected.length <= 1) {
    return selected[0] ?? '';
  }
  return selected.map((chunk, i) => `[Part ${i + 1}]\n${chunk}`).join('\n\n');
}
