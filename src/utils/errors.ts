/**
 * Standardized error types for duorank.
 *
 * All errors extend from DuorankError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { IndexStoreError, EmbeddingProviderError } from './errors.js';
 *
 * // Throw a store error
 * throw new IndexStoreError('Upsert transaction failed', 'UPSERT_FAILED', err);
 *
 * // Retryable provider failure
 * throw new EmbeddingProviderError('Rate limited', 'RATE_LIMITED', { retryable: true });
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all duorank errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'UPSERT_FAILED')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'IndexStoreError')
 */
export class DuorankError extends Error {
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

    // Capture stack trace (V8 only)
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
      if (this.cause instanceof DuorankError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Invalid configuration or call parameters. Never retried.
 *
 * Common codes:
 * - `INVALID_CHUNK_SIZE` / `INVALID_OVERLAP`: Chunker parameters out of range
 * - `INVALID_DIMENSIONS`: Dense dimension is not a positive integer
 * - `DIMENSION_MISMATCH`: Vector or collection dimension differs from the configured one
 * - `INVALID_TOP_K` / `INVALID_TOP_N` / `INVALID_RRF_K` / `INVALID_WEIGHT`: Retrieval parameters
 * - `INVALID_SOURCE_ID`: Empty document source identifier
 * - `INVALID_URL`: Cannot derive a collection name from a URL
 * - `CONFIG_INVALID`: Loaded configuration failed validation
 * - `MISSING_API_KEY`: Dense provider has no API key
 * - `UNKNOWN_MODEL`: Sparse model name is not registered
 */
export class ConfigurationError extends DuorankError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Embedding Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Failure of an embedding provider or model.
 *
 * Common codes:
 * - `AUTH_FAILED`: Provider rejected the credentials (not retryable)
 * - `RATE_LIMITED`: Provider throttled the request
 * - `NETWORK`: Connection failed before a response arrived
 * - `TIMEOUT`: Call exceeded its time bound
 * - `PROVIDER_ERROR`: Provider returned an error response
 * - `BAD_RESPONSE`: Response had the wrong shape or dimension
 * - `RETRY_EXHAUSTED`: All retry attempts failed
 */
export class EmbeddingProviderError extends DuorankError {
  /** Whether retrying the same call may succeed */
  readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, code, options.cause);
    this.retryable = options.retryable ?? false;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the index store. Surfaced immediately, never swallowed.
 *
 * Common codes:
 * - `DB_OPEN_FAILED`: Cannot open or migrate the database
 * - `LOAD_FAILED`: Cannot read a collection into memory
 * - `UPSERT_FAILED`: Replace transaction failed (rolled back)
 * - `DELETE_FAILED`: Delete transaction failed (rolled back)
 * - `SEARCH_FAILED`: Similarity search failed
 * - `PARENT_MISMATCH`: Chunk does not belong to the document being upserted
 * - `CORRUPT_VECTOR`: Stored vector blob has an unexpected size
 */
export class IndexStoreError extends DuorankError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the ingest and query paths.
 *
 * Common codes:
 * - `ALL_REPRESENTATIONS_FAILED`: Neither dense nor sparse query embedding succeeded
 * - `INGEST_FAILED`: Document ingestion failed for a reason outside the other categories
 */
export class RetrievalError extends DuorankError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * The caller aborted the operation through its AbortSignal.
 */
export class CancelledError extends DuorankError {
  constructor(message = 'Operation cancelled', cause?: unknown) {
    super(message, 'CANCELLED', cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a duorank error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof DuorankError && error.code === code;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isEmbeddingProviderError(error: unknown): error is EmbeddingProviderError {
  return error instanceof EmbeddingProviderError;
}

export function isIndexStoreError(error: unknown): error is IndexStoreError {
  return error instanceof IndexStoreError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a DuorankError.
 *
 * If the error is already a DuorankError, returns it unchanged.
 * Otherwise wraps it in a new DuorankError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): DuorankError {
  if (error instanceof DuorankError) {
    return error;
  }

  return new DuorankError(message ?? errorMessage(error), 'UNKNOWN', error);
}
