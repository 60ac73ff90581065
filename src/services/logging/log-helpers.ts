/**
 * Structured logging helpers for common event types
 * Provides consistent logging patterns across indexing and retrieval
 */

import { logger } from './logger.js';
import type { SourceType } from '../../types/transcript.js';
import type { DocumentType } from '../../types/vector-db.js';

export type IndexOperation = 'store' | 'prune' | 'delete' | 'patch_title' | 'reindex';

/**
 * Category-based logging helpers
 */
export const loggers = {
  /**
   * Log a write against the vector index for one source
   * @param params - Operation, affected source and document counts
   */
  indexOperation(params: {
    operation: IndexOperation;
    sourceId: string;
    sourceType: SourceType;
    documentType?: DocumentType;
    count: number;
    latency_ms?: number;
  }) {
    logger.info({
      category: 'index',
      event: `index_${params.operation}`,
      ...params,
    }, `Index ${params.operation} ${params.sourceType}/${params.sourceId}: ${params.count} document(s)`);
  },

  /**
   * Log a retrieval request with its result sizes
   */
  retrieval(params: {
    stage: 'search' | 'summary' | 'chunks' | 'answer';
    resultCount: number;
    latency_ms: number;
    sourceType?: SourceType;
    sourceId?: string;
  }) {
    logger.debug({
      category: 'retrieval',
      event: `retrieval_${params.stage}`,
      ...params,
    }, `Retrieval ${params.stage}: ${params.resultCount} result(s) in ${params.latency_ms}ms`);
  },

  /**
   * Log segments dropped during document construction
   */
  malformedInput(sourceId: string, skipped: number, reasons: string[]) {
    logger.warn({
      category: 'validation',
      event: 'segments_skipped',
      sourceId,
      skipped,
      reasons,
    }, `Skipped ${skipped} malformed segment(s) for ${sourceId}`);
  },

  /**
   * Log database operations with performance metrics
   * @param operation - Type of operation (select, insert, update, delete)
   * @param table - Database table name
   * @param latency_ms - Operation duration in milliseconds
   * @param success - Whether operation succeeded
   * @param rowCount - Optional number of rows affected
   */
  dbOperation(
    operation: string,
    table: string,
    latency_ms: number,
    success: boolean,
    rowCount?: number
  ) {
    logger.debug({
      category: 'database',
      event: 'db_query',
      operation,
      table,
      latency_ms,
      success,
      rowCount,
    }, `DB ${operation} on ${table} (${latency_ms}ms)`);
  },

  /**
   * Log errors with full context and stack traces
   */
  error(message: string, error: unknown, context?: Record<string, unknown>) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({
      category: 'error',
      event: 'error_occurred',
      error: {
        message: err.message,
        stack: err.stack,
        name: err.name,
      },
      ...context,
    }, message);
  },
};

/**
 * Performance timing helper
 * Returns a function that logs the duration when called
 *
 * @example
 * const endTimer = startTimer();
 * await index.upsert(collection, documents);
 * endTimer('vector_upsert', { sourceId: 'video123' });
 */
export function startTimer() {
  const start = Date.now();
  return (operation: string, context?: Record<string, unknown>) => {
    const duration = Date.now() - start;
    logger.debug({
      category: 'performance',
      event: 'operation_timed',
      operation,
      duration_ms: duration,
      ...context,
    }, `${operation} completed in ${duration}ms`);
    return duration;
  };
}
