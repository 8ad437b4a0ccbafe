import { z } from 'zod';

/**
 * Hosted model settings. Every provider except the mock needs an API key.
 */
export type LLMConfig =
  | {
      provider: 'openai' | 'anthropic';
      apiKey: string;
      model?: string;
      temperature: number;
      timeoutMs: number;
    }
  | {
      provider: 'mock';
      model?: string;
      temperature: number;
      timeoutMs: number;
    };

/**
 * Application configuration, read from the environment at start-up
 */
export interface AppConfig {
  port: number;
  /** Allowed CORS origins; empty allows any origin */
  corsOrigins: string[];
  maxUploadBytes: number;
  llm: LLMConfig;
  document: {
    chunkSize: number;
    chunkOverlap: number;
    maxChunks: number;
    /** Estimated token budget for the document text in one prompt */
    maxPromptTokens: number;
    flashcardCount: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Unset and blank variables both take the default
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankAsUndefined, z.string().trim().optional());

function integer(defaultValue: number, min: number, max = Number.MAX_SAFE_INTEGER) {
  return z.preprocess(blankAsUndefined, z.coerce.number().int().min(min).max(max).default(defaultValue));
}

const envSchema = z
  .object({
    PORT: integer(8000, 0, 65535),
    LLM_PROVIDER: z.preprocess(
      (value) => (typeof value === 'string' ? blankAsUndefined(value.trim().toLowerCase()) : value),
      z.enum(['openai', 'anthropic', 'mock']).default('openai'),
    ),
    OPENAI_API_KEY: optionalText,
    ANTHROPIC_API_KEY: optionalText,
    LLM_MODEL: optionalText,
    LLM_TEMPERATURE: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(2).default(0.7)),
    LLM_TIMEOUT_MS: integer(30000, 1),
    CORS_ORIGINS: optionalText,
    MAX_UPLOAD_BYTES: integer(10 * 1024 * 1024, 1),
    DOCUMENT_CHUNK_SIZE: integer(2000, 100),
    DOCUMENT_CHUNK_OVERLAP: integer(200, 0),
    DOCUMENT_MAX_CHUNKS: integer(6, 1),
    DOCUMENT_MAX_PROMPT_TOKENS: integer(4000, 100),
    FLASHCARD_COUNT: integer(10, 1, 50),
  })
  .transform((env, ctx): AppConfig => {
    if (env.DOCUMENT_CHUNK_OVERLAP >= env.DOCUMENT_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DOCUMENT_CHUNK_OVERLAP'],
        message: 'must be smaller than DOCUMENT_CHUNK_SIZE',
      });
      return z.NEVER;
    }

    const shared = {
      model: env.LLM_MODEL,
      temperature: env.LLM_TEMPERATURE,
      timeoutMs: env.LLM_TIMEOUT_MS,
    };

    let llm: LLMConfig;
    if (env.LLM_PROVIDER === 'mock') {
      llm = { provider: 'mock', ...shared };
    } else {
      const keyName = env.LLM_PROVIDER === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY';
      const apiKey = env[keyName];
      if (!apiKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [keyName],
          message: `is required when LLM_PROVIDER is ${env.LLM_PROVIDER}`,
        });
        return z.NEVER;
      }
      llm = { provider: env.LLM_PROVIDER, apiKey, ...shared };
    }

    return {
      port: env.PORT,
      corsOrigins: (env.CORS_ORIGINS ?? '')
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean),
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
      llm,
      document: {
        chunkSize: env.DOCUMENT_CHUNK_SIZE,
        chunkOverlap: env.DOCUMENT_CHUNK_OVERLAP,
        maxChunks: env.DOCUMENT_MAX_CHUNKS,
        maxPromptTokens: env.DOCUMENT_MAX_PROMPT_TOKENS,
        flashcardCount: env.FLASHCARD_COUNT,
      },
    };
  });

/**
 * Validate environment variables and build the application configuration.
 * Throws `ConfigError` listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}
