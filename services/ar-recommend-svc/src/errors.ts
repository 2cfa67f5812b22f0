import { ServiceError } from '@ar/common';

export type EmbeddingErrorKind = 'unavailable' | 'malformed';

/**
 * Raised when the query embedding cannot be produced. An unreachable provider
 * maps to 503; a vector of the wrong shape maps to 500.
 */
export class EmbeddingError extends ServiceError {
  public readonly kind: EmbeddingErrorKind;

  constructor(kind: EmbeddingErrorKind, message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
    super(message, {
      statusCode: kind === 'unavailable' ? 503 : 500,
      code: kind === 'unavailable' ? 'embedding_unavailable' : 'embedding_malformed',
      details: options.details,
      cause: options.cause
    });
    this.name = 'EmbeddingError';
    this.kind = kind;
  }
}
