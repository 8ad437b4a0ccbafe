/**
 * Error types shared by the domain services and adapters.
 * The HTTP layer maps each of them to a status code.
 */

/**
 * Input failed a domain rule (empty question, unsupported option...).
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * An uploaded document could not be read or holds no text.
 */
export class DocumentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentError';
  }
}

/**
 * The hosted model could not be reached, rejected the request, or timed out.
 */
export class LLMProviderError extends Error {
  constructor(
    message: string,
    readonly provider: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LLMProviderError';
  }

  get isTimeout(): boolean {
    return this.status === 408;
  }
}

/**
 * Get a printable message from anything that was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
