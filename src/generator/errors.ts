import { APIConnectionError, APIError, APIUserAbortError, AuthenticationError, RateLimitError } from 'openai';

export type GenerationErrorKind =
  | 'ClientNotConfigured'
  | 'PromptNotLoaded'
  | 'ConnectionError'
  | 'RateLimitError'
  | 'AuthError'
  | 'ModelStatusError'
  | 'ParseError'
  | 'UnexpectedError';

/** A failed round. `message` is what viewers see on the stream. */
export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;
  readonly status?: number;
  /** Model output that could not be parsed, kept for diagnostics. */
  readonly rawText?: string;

  constructor(kind: GenerationErrorKind, message: string, extra?: { status?: number; rawText?: string; cause?: unknown }) {
    super(message, extra?.cause !== undefined ? { cause: extra.cause } : undefined);
    this.name = 'GenerationError';
    this.kind = kind;
    this.status = extra?.status;
    this.rawText = extra?.rawText;
  }
}

/**
 * Maps whatever the model client threw onto a GenerationError.
 * Order matters: the specific SDK errors all extend APIError.
 */
export function toGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;

  if (err instanceof APIConnectionError) {
    return new GenerationError('ConnectionError', `API Connection Error: ${err.message}`, { cause: err });
  }
  if (err instanceof APIUserAbortError) {
    return new GenerationError('ConnectionError', 'API Connection Error: request timed out', { cause: err });
  }
  if (err instanceof RateLimitError) {
    return new GenerationError('RateLimitError', `API Rate Limit Error: ${err.message}`, { status: err.status, cause: err });
  }
  if (err instanceof AuthenticationError) {
    return new GenerationError('AuthError', `API Authentication Error: ${err.message}. Check your API key.`, {
      status: err.status,
      cause: err,
    });
  }
  if (err instanceof APIError) {
    return new GenerationError('ModelStatusError', `API Status Error: ${err.status ?? 'unknown'}`, {
      status: err.status,
      cause: err,
    });
  }
  return new GenerationError('UnexpectedError', `Unexpected API Error: ${err instanceof Error ? err.message : String(err)}`, {
    cause: err,
  });
}
