/**
 * Retrieval Core Error Types
 *
 * Error taxonomy for indexing and retrieval. Provider errors carry a
 * retryable flag the caller can surface; the core never retries on its own.
 */

import type { SourceType } from './transcript.js';

/**
 * Provider error codes (embedding and answer generation)
 */
export type ProviderErrorCode =
  | 'rate_limit'        // Rate limit exceeded
  | 'timeout'           // Request timed out
  | 'authentication'    // Authentication failed
  | 'server_error'      // Server-side error
  | 'empty_response'    // Provider returned nothing usable
  | 'unknown';

export type ProviderKind = 'embedding' | 'answer';

/**
 * Embedding or answer-generation service unavailable, rate-limited or timed out
 */
export class ProviderError extends Error {
  public readonly code: ProviderErrorCode;
  public readonly provider: ProviderKind;
  public readonly retryable: boolean;
  public readonly statusCode?: number;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ProviderErrorCode,
    provider: ProviderKind,
    retryable: boolean,
    statusCode?: number,
    cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
    this.code = code;
    this.provider = provider;
    this.retryable = retryable;
    this.statusCode = statusCode;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProviderError);
    }
  }

  /**
   * Classify an unknown provider failure
   */
  static fromError(error: unknown, provider: ProviderKind): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    if (error instanceof Error) {
      const status = readStatus(error);
      const message = error.message.toLowerCase();

      if (status === 429 || message.includes('rate limit') || message.includes('429')) {
        return new ProviderError(error.message, 'rate_limit', provider, true, 429, error);
      }

      if (message.includes('timeout') || message.includes('timed out')) {
        return new ProviderError(error.message, 'timeout', provider, true, status, error);
      }

      if (status === 401 || message.includes('unauthorized') || message.includes('authentication')) {
        return new ProviderError(error.message, 'authentication', provider, false, 401, error);
      }

      if ((status !== undefined && status >= 500) || message.includes('server error')) {
        return new ProviderError(error.message, 'server_error', provider, true, status ?? 500, error);
      }

      return new ProviderError(error.message, 'unknown', provider, false, status, error);
    }

    return new ProviderError(String(error), 'unknown', provider, false);
  }
}

/**
 * Vector index unreachable or failing
 */
export class IndexUnavailableError extends Error {
  public readonly operation: string;
  public readonly cause?: Error;

  constructor(message: string, operation: string, cause?: Error) {
    super(message);
    this.name = 'IndexUnavailableError';
    this.operation = operation;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IndexUnavailableError);
    }
  }

  static fromError(error: unknown, operation: string): IndexUnavailableError {
    if (error instanceof IndexUnavailableError) {
      return error;
    }
    if (error instanceof Error) {
      return new IndexUnavailableError(`Vector index ${operation} failed: ${error.message}`, operation, error);
    }
    return new IndexUnavailableError(`Vector index ${operation} failed: ${String(error)}`, operation);
  }
}

/**
 * Operation requires a source the relational store does not know
 */
export class SourceNotFoundError extends Error {
  constructor(
    public readonly sourceId: string,
    public readonly sourceType: SourceType
  ) {
    super(`Source not found: ${sourceType}/${sourceId}`);
    this.name = 'SourceNotFoundError';
  }
}

/**
 * Indexing failed for a source. `transcriptSaved` tells the caller whether the
 * relational record was written before the failure, i.e. whether a later
 * re-index can reconcile it.
 */
export class IndexingError extends Error {
  public readonly cause: Error;

  constructor(
    message: string,
    public readonly sourceId: string,
    public readonly sourceType: SourceType,
    public readonly transcriptSaved: boolean,
    cause: Error
  ) {
    super(message);
    this.name = 'IndexingError';
    this.cause = cause;
  }

  get retryable(): boolean {
    return this.cause instanceof ProviderError ? this.cause.retryable : this.cause instanceof IndexUnavailableError;
  }
}

function readStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
