import { FakeTextExtractor, MockLLMAdapter } from '@/adapters/mock';
import { DocumentError, LLMProviderError, ValidationError } from '@/domain/errors';
import type { UploadedDocument } from '@/ports';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DISCUSS_NOT_GENERATED_MESSAGE,
  DISCUSS_UNAVAILABLE_MESSAGE,
  DocumentService,
  SUMMARY_NOT_GENERATED_MESSAGE,
  SUMMARY_UNAVAILABLE_MESSAGE,
} from '../DocumentService';

const MOCK_SUMMARY = '## Summary\n\n- The document covers its central topic.\n- It defines the key terms.';

function pdfUpload(text: string, filename = 'notes.pdf'): UploadedDocument {
  return { filename, mimeType: 'application/pdf', data: Buffer.from(text) };
}

describe('DocumentService', () => {
  let llm: MockLLMAdapter;
  let extractor: FakeTextExtractor;
  let service: DocumentService;

  beforeEach(() => {
    llm = new MockLLMAdapter();
    extractor = new FakeTextExtractor();
    service = new DocumentService(llm, extractor, { timeoutMs: 5000 });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('process', () => {
    it('returns the text, summary and flashcards', async () => {
      const result = await service.process(
        pdfUpload('Cells are the basic unit of life.\n\n\n\nThey contain DNA.'),
      );

      expect(result).toEqual({
        filename: 'notes.pdf',
        content: 'Cells are the basic unit of life.\n\nThey contain DNA.',
        summary: MOCK_SUMMARY,
        flashcards: [
          {
            topic: 'Key Concepts',
            question: 'What is the main idea of the document?',
            answer: 'The document introduces its central topic and defines the key terms.',
          },
          {
            topic: 'Definitions',
            question: 'Which term does the document define first?',
            answer: 'The first defined term in the document.',
          },
        ],
        pageCount: 1,
        chunkCount: 1,
        fallback: false,
      });
    });

    it('makes one summary call and one flashcard call', async () => {
      await service.process(pdfUpload('Cells are the basic unit of life.'));

      const prompts = llm._getCallHistory().map((call) => call.messages[1].content);
      expect(prompts).toHaveLength(2);
      expect(prompts.filter((p) => p.includes('Summarize the following document'))).toHaveLength(1);
      expect(prompts.filter((p) => p.includes('Create up to 10 study flashcards'))).toHaveLength(1);
      for (const prompt of prompts) {
        expect(prompt).toContain('Cells are the basic unit of life.');
      }
      for (const call of llm._getCallHistory()) {
        expect(call.options?.timeoutMs).toBe(5000);
        expect(call.options?.temperature).toBe(0.7);
      }
    });

    it('rejects files the extractor does not support', async () => {
      const upload = { filename: 'notes.txt', mimeType: 'text/plain', data: Buffer.from('text') };

      await expect(service.process(upload)).rejects.toBeInstanceOf(ValidationError);
      expect(extractor._getExtracted()).toHaveLength(0);
      expect(llm._getCallHistory()).toHaveLength(0);
    });

    it('rejects a document without text', async () => {
      extractor._setResult({ text: ' \n\f ', pageCount: 2 });

      await expect(service.process(pdfUpload('', 'scan.pdf'))).rejects.toThrow(
        new DocumentError('No text could be extracted from scan.pdf'),
      );
      expect(llm._getCallHistory()).toHaveLength(0);
    });

    it('passes extractor failures through', async () => {
      extractor._setResult(new DocumentError('broken.pdf is not a valid PDF file'));

      await expect(service.process(pdfUpload('x', 'broken.pdf'))).rejects.toThrow(
        'broken.pdf is not a valid PDF file',
      );
    });

    it('falls back for the summary alone when its call fails', async () => {
      llm._addRule({
        pattern: /Summarize the following document/,
        reply: new LLMProviderError('OpenAI request timed out', 'OpenAI', 408),
      });

      const result = await service.process(pdfUpload('Cells are the basic unit of life.'));

      expect(result.summary).toBe(SUMMARY_UNAVAILABLE_MESSAGE);
      expect(result.flashcards).toHaveLength(2);
      expect(result.fallback).toBe(true);
    });

    it('uses the could-not-generate summary for an empty reply', async () => {
      llm._addRule({ pattern: /Summarize the following document/, reply: '  ' });

      const result = await service.process(pdfUpload('Cells are the basic unit of life.'));

      expect(result.summary).toBe(SUMMARY_NOT_GENERATED_MESSAGE);
    });

    it('returns no flashcards when none parse', async () => {
      llm._addRule({ pattern: /study flashcards/, reply: 'Nothing to study here.' });

      const result = await service.process(pdfUpload('Cells are the basic unit of life.'));

      expect(result.summary).toBe(MOCK_SUMMARY);
      expect(result.flashcards).toEqual([]);
      expect(result.fallback).toBe(true);
    });

    it('limits the number of flashcards', async () => {
      service = new DocumentService(llm, extractor, { flashcardCount: 1 });

      const result = await service.process(pdfUpload('Cells are the basic unit of life.'));

      expect(result.flashcards).toHaveLength(1);
      const prompts = llm._getCallHistory().map((call) => call.messages[1].content);
      expect(prompts.some((p) => p.includes('Create up to 1 study flashcards'))).toBe(true);
    });

    it('sends only the first chunks of a long document', async () => {
      service = new DocumentService(llm, extractor, { chunkSize: 100, chunkOverlap: 0, maxChunks: 2 });
      const text = ['a'.repeat(80), 'b'.repeat(80), 'c'.repeat(80)].join('\n\n');

      const result = await service.process(pdfUpload(text));

      expect(result.chunkCount).toBe(3);
      expect(result.content).toBe(text);
      const summaryPrompt = llm
        ._getCallHistory()
        .map((call) => call.messages[1].content)
        .find((p) => p.includes('Summarize the following document'));
      expect(summaryPrompt).toContain(`[Part 1]\n${'a'.repeat(80)}\n\n[Part 2]\n${'b'.repeat(80)}`);
      expect(summaryPrompt).not.toContain('c'.repeat(80));
    });

    it('drops trailing chunks that exceed the prompt token budget', async () => {
      // Two labelled parts are 180 characters (45 tokens), three are 271 (68 tokens)
      service = new DocumentService(llm, extractor, {
        chunkSize: 100,
        chunkOverlap: 0,
        maxChunks: 3,
        maxPromptTokens: 50,
      });
      const text = ['a'.repeat(80), 'b'.repeat(80), 'c'.repeat(80)].join('\n\n');

      const result = await service.process(pdfUpload(text));

      expect(result.chunkCount).toBe(3);
      const summaryPrompt = llm
        ._getCallHistory()
        .map((call) => call.messages[1].content)
        .find((p) => p.includes('Summarize the following document'));
      expect(summaryPrompt).toContain(`[Part 1]\n${'a'.repeat(80)}\n\n[Part 2]\n${'b'.repeat(80)}`);
      expect(summaryPrompt).not.toContain('c'.repeat(80));
    });
  });

  describe('discuss', () => {
    it('answers from the document', async () => {
      const result = await service.discuss({
        question: '  What is ATP?  ',
        content: 'ATP stores energy in cells.',
        summary: 'Energy in cells.',
      });

      expect(result).toEqual({
        response: 'Based on the provided document, the answer is explained in the first section.',
        fallback: false,
      });
      const [call] = llm._getCallHistory();
      expect(call.messages[0].role).toBe('system');
      expect(call.messages[1].content).toBe(
        'Document summary:\nEnergy in cells.\n\nDocument content:\n"""\nATP stores energy in cells.\n"""\n\nStudent question: What is ATP?',
      );
      expect(call.options).toEqual({ temperature: 0.7, maxTokens: 1000, timeoutMs: 5000 });
    });

    it('keeps the first chunk when the document is over the token budget', async () => {
      service = new DocumentService(llm, extractor, {
        chunkSize: 100,
        chunkOverlap: 0,
        maxPromptTokens: 30,
      });
      const content = ['a'.repeat(80), 'b'.repeat(80)].join('\n\n');

      await service.discuss({ question: 'Why?', content });

      const [call] = llm._getCallHistory();
      expect(call.messages[1].content).toBe(
        `Document content:\n"""\n${'a'.repeat(80)}\n"""\n\nStudent question: Why?`,
      );
    });

    it.each(['', '   '])('rejects question %j before calling the model', async (question) => {
      await expect(service.discuss({ question, content: 'Some text.' })).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(llm._getCallHistory()).toHaveLength(0);
    });

    it('rejects empty document content', async () => {
      await expect(service.discuss({ question: 'Why?', content: ' ' })).rejects.toThrow(
        'content cannot be empty',
      );
    });

    it('returns the fallback message when the provider fails', async () => {
      llm._queueReply(new LLMProviderError('Anthropic API error (529): overloaded', 'Anthropic', 529));

      const result = await service.discuss({ question: 'Why?', content: 'Some text.' });

      expect(result).toEqual({ response: DISCUSS_UNAVAILABLE_MESSAGE, fallback: true });
    });

    it('returns the could-not-generate message for an empty reply', async () => {
      llm._queueReply('');

      const result = await service.discuss({ question: 'Why?', content: 'Some text.' });

      expect(result).toEqual({ response: DISCUSS_NOT_GENERATED_MESSAGE, fallback: true });
    });
  });
});
