import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-api-key' });

    expect(config).toEqual({
      port: 8000,
      corsOrigins: [],
      maxUploadBytes: 10 * 1024 * 1024,
      llm: {
        provider: 'openai',
        apiKey: 'test-api-key',
        model: undefined,
        temperature: 0.7,
        timeoutMs: 30000,
      },
      document: {
        chunkSize: 2000,
        chunkOverlap: 200,
        maxChunks: 6,
        maxPromptTokens: 4000,
        flashcardCount: 10,
      },
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      PORT: '3001',
      LLM_PROVIDER: 'Anthropic',
      ANTHROPIC_API_KEY: ' test-anthropic-key ',
      LLM_MODEL: 'claude-3-5-haiku-20241022',
      LLM_TEMPERATURE: '0.2',
      LLM_TIMEOUT_MS: '5000',
      CORS_ORIGINS: 'http://localhost:8501, https://tutor.example.com,',
      MAX_UPLOAD_BYTES: '1024',
      DOCUMENT_CHUNK_SIZE: '1000',
      DOCUMENT_CHUNK_OVERLAP: '100',
      DOCUMENT_MAX_CHUNKS: '3',
      DOCUMENT_MAX_PROMPT_TOKENS: '2500',
      FLASHCARD_COUNT: '5',
    });

    expect(config).toEqual({
      port: 3001,
      corsOrigins: ['http://localhost:8501', 'https://tutor.example.com'],
      maxUploadBytes: 1024,
      llm: {
        provider: 'anthropic',
        apiKey: 'test-anthropic-key',
        model: 'claude-3-5-haiku-20241022',
        temperature: 0.2,
        timeoutMs: 5000,
      },
      document: {
        chunkSize: 1000,
        chunkOverlap: 100,
        maxChunks: 3,
        maxPromptTokens: 2500,
        flashcardCount: 5,
      },
    });
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ LLM_PROVIDER: 'mock', PORT: '', LLM_MODEL: '  ' });

    expect(config.port).toBe(8000);
    expect(config.llm).toEqual({ provider: 'mock', model: undefined, temperature: 0.7, timeoutMs: 30000 });
  });

  it('requires the key of the selected provider', () => {
    expect(() => loadConfig({ ANTHROPIC_API_KEY: 'test-api-key' })).toThrow(
      'Invalid configuration: OPENAI_API_KEY is required when LLM_PROVIDER is openai',
    );
  });

  it('does not require a key for the mock provider', () => {
    expect(loadConfig({ LLM_PROVIDER: 'mock' }).llm.provider).toBe('mock');
  });

  it.each([
    [{ PORT: 'eighty' }, 'PORT'],
    [{ PORT: '70000' }, 'PORT'],
    [{ LLM_PROVIDER: 'gemini' }, 'LLM_PROVIDER'],
    [{ LLM_TEMPERATURE: '3' }, 'LLM_TEMPERATURE'],
    [{ DOCUMENT_CHUNK_SIZE: '500', DOCUMENT_CHUNK_OVERLAP: '500' }, 'DOCUMENT_CHUNK_OVERLAP'],
  ])('rejects %o', (env, variable) => {
    const load = () => loadConfig({ OPENAI_API_KEY: 'test-api-key', ...env });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow(variable);
  });
});
