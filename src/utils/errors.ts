/**
 * Standardized error types for docsearch.
 *
 * All errors extend from DocSearchError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 *
 * ## Usage
 *
 * ```typescript
 * import { RetrievalBackendError, RetrievalError } from './errors.js';
 *
 * try {
 *   await vectorIndex.search(embedding, k);
 * } catch (err) {
 *   throw new RetrievalError('Retrieval failed', 'RETRIEVAL_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all docsearch errors.
 *
 * - `code`: Programmatic error identifier (e.g., 'CORPUS_NOT_FOUND')
 * - `cause`: Original error that caused this one
 * - `name`: Error class name (e.g., 'RerankModelError')
 */
export class DocSearchError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof DocSearchError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Index Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The lexical corpus cannot back a query index. Fatal at startup.
 *
 * Common codes:
 * - `CORPUS_NOT_FOUND`: Snapshot file missing
 * - `CORPUS_PARSE_FAILED`: A snapshot line is not a valid record
 * - `CORPUS_EMPTY`: No indexable chunks
 * - `INVALID_CHUNK`: A chunk with blank text reached the index
 */
export class IndexUnavailableError extends DocSearchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Backend Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Query-time failure of the vector branch (vector store or query embedding).
 *
 * Common codes:
 * - `VECTOR_STORE_UNREACHABLE`: No response from the store
 * - `COLLECTION_NOT_FOUND`: Collection absent
 * - `AUTH_FAILED`: Store rejected the credentials
 * - `VECTOR_SEARCH_FAILED`: Any other store-side failure
 * - `VECTOR_SEARCH_TIMEOUT`: Store did not answer within the timeout
 * - `DIMENSION_MISMATCH`: Query vector length differs from the collection's
 * - `INVALID_SCORE`: Store returned a non-finite similarity
 * - `EMBEDDING_FAILED`: Query embedding could not be computed
 */
export class RetrievalBackendError extends DocSearchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * Batched cross-encoder scoring failed.
 *
 * Common codes:
 * - `RERANK_FAILED`: Model call threw
 * - `RERANK_TIMEOUT`: Model call exceeded the timeout
 * - `SCORE_COUNT_MISMATCH`: Model returned a different number of scores
 * - `INVALID_SCORE`: Model returned a non-finite score
 * - `NO_MODEL`: Model not loaded
 */
export class RerankModelError extends DocSearchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The single typed failure the retrieval pipeline surfaces to callers.
 *
 * Common codes:
 * - `INVALID_QUERY`: Query is empty
 * - `INVALID_K`: k is not a positive integer
 * - `RETRIEVAL_FAILED`: Backend failure that could not be degraded around
 */
export class RetrievalError extends DocSearchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `UNKNOWN_MODEL`: Model id not in the registry
 */
export class ConfigError extends DocSearchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a docsearch error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof DocSearchError && error.code === code;
}

export function isIndexUnavailableError(error: unknown): error is IndexUnavailableError {
  return error instanceof IndexUnavailableError;
}

export function isRetrievalBackendError(error: unknown): error is RetrievalBackendError {
  return error instanceof RetrievalBackendError;
}

export function isRerankModelError(error: unknown): error is RerankModelError {
  return error instanceof RerankModelError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a DocSearchError.
 *
 * If the error is already a DocSearchError, returns it unchanged.
 * Otherwise wraps it in a new DocSearchError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): DocSearchError {
  if (error instanceof DocSearchError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new DocSearchError(errorMessage, 'UNKNOWN', error);
}
