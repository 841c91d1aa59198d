/**
 * Response Cache Errors
 * Only InvalidPatternError is ever surfaced to callers; the rest are
 * raised internally and folded into a miss or a best-effort no-op.
 */

export class ResponseCacheError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseCacheError';
  }
}

export class StoreUnavailableError extends ResponseCacheError {
  constructor(
    operation: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Backing store unavailable during ${operation}${originalError ? `: ${originalError.message}` : ''}`,
    );
    this.name = 'StoreUnavailableError';
  }
}

export class EmbeddingUnavailableError extends ResponseCacheError {
  constructor(public readonly originalError?: Error) {
    super(
      `Embedding provider unavailable${originalError ? `: ${originalError.message}` : ''}`,
    );
    this.name = 'EmbeddingUnavailableError';
  }
}

export class SemanticIndexUnavailableError extends ResponseCacheError {
  constructor(
    operation: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Semantic index unavailable during ${operation}${originalError ? `: ${originalError.message}` : ''}`,
    );
    this.name = 'SemanticIndexUnavailableError';
  }
}

export class InvalidPatternError extends ResponseCacheError {
  constructor(
    public readonly pattern: string,
    reason: string,
  ) {
    super(`Invalid invalidation pattern "${pattern}": ${reason}`);
    this.name = 'InvalidPatternError';
  }
}

export class CacheSerializationError extends ResponseCacheError {
  constructor(
    public readonly key: string,
    reason: string,
  ) {
    super(`Stored entry "${key}" could not be decoded: ${reason}`);
    this.name = 'CacheSerializationError';
  }
}

export class TimeoutError extends ResponseCacheError {
  constructor(
    operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
