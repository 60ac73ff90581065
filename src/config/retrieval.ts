/**
 * Retrieval Configuration
 *
 * Document building, indexing and question-answering settings loaded from
 * environment variables.
 */

import { config } from 'dotenv';
import type { EmbeddingProviderName } from '../types/vector-db.js';
import { getEnvBool, getEnvFloat, getEnvInt, getEnvVar } from './env.js';

// Load environment variables
config();

export type DeleteConsistency = 'best_effort' | 'strict';

export interface RetrievalConfig {
  embedding: {
    provider: EmbeddingProviderName;
    model: string;
    dimensions: number;
    batchSize: number;
  };
  documents: {
    /** Token budget for one summary document before it is split */
    summaryMaxTokens: number;
    /** How far a single sentence may exceed the budget before it is cut */
    chunkToleranceRatio: number;
    /** Subtopic label for summary text outside any heading */
    defaultSubtopicLabel: string;
  };
  search: {
    defaultResults: number;
    defaultTranscriptResults: number;
    defaultSummaryResults: number;
    maxResults: number;
  };
  /** Invoke the answer generator even when retrieval found nothing */
  answerOnEmptyEvidence: boolean;
  deleteConsistency: DeleteConsistency;
}

function parseEmbeddingProvider(value: string): EmbeddingProviderName {
  if (value !== 'openai' && value !== 'openrouter') {
    throw new Error(`Invalid embedding provider: ${value}. Must be 'openai' or 'openrouter'`);
  }
  return value;
}

function parseDeleteConsistency(value: string): DeleteConsistency {
  if (value !== 'best_effort' && value !== 'strict') {
    throw new Error(`Invalid DELETE_CONSISTENCY: ${value}. Must be 'best_effort' or 'strict'`);
  }
  return value;
}

/**
 * Build retrieval configuration from the current environment
 *
 * Environment variables:
 * - EMBEDDING_PROVIDER: 'openai' | 'openrouter' (default: 'openai')
 * - EMBEDDING_MODEL: embedding model (default: 'text-embedding-3-small')
 * - EMBEDDING_DIMENSIONS: vector length (default: 1536)
 * - EMBEDDING_BATCH_SIZE: texts per embedding request (default: 100)
 * - SUMMARY_MAX_TOKENS: token budget per summary document (default: 500)
 * - CHUNK_TOLERANCE_RATIO: sentence overflow tolerance (default: 0.2)
 * - DEFAULT_SUBTOPIC_LABEL: label for unheaded summary text (default: '전체')
 * - SEARCH_MAX_RESULTS: upper bound for n_results (default: 50)
 * - ANSWER_ON_EMPTY_EVIDENCE: call the model with no evidence (default: true)
 * - DELETE_CONSISTENCY: 'best_effort' | 'strict' (default: 'best_effort')
 */
export function loadRetrievalConfig(): RetrievalConfig {
  return {
    embedding: {
      provider: parseEmbeddingProvider(getEnvVar('EMBEDDING_PROVIDER', false, 'openai')),
      model: getEnvVar('EMBEDDING_MODEL', false, 'text-embedding-3-small'),
      dimensions: getEnvInt('EMBEDDING_DIMENSIONS', 1536),
      batchSize: getEnvInt('EMBEDDING_BATCH_SIZE', 100),
    },
    documents: {
      summaryMaxTokens: getEnvInt('SUMMARY_MAX_TOKENS', 500),
      chunkToleranceRatio: getEnvFloat('CHUNK_TOLERANCE_RATIO', 0.2),
      defaultSubtopicLabel: getEnvVar('DEFAULT_SUBTOPIC_LABEL', false, '전체'),
    },
    search: {
      defaultResults: 5,
      defaultTranscriptResults: 5,
      defaultSummaryResults: 3,
      maxResults: getEnvInt('SEARCH_MAX_RESULTS', 50),
    },
    answerOnEmptyEvidence: getEnvBool('ANSWER_ON_EMPTY_EVIDENCE', true),
    deleteConsistency: parseDeleteConsistency(getEnvVar('DELETE_CONSISTENCY', false, 'best_effort')),
  };
}

/**
 * Validate configuration at startup
 */
export function validateRetrievalConfig(cfg: RetrievalConfig): void {
  const errors: string[] = [];

  if (cfg.embedding.dimensions <= 0) {
    errors.push('EMBEDDING_DIMENSIONS must be > 0');
  }

  if (cfg.embedding.batchSize < 1 || cfg.embedding.batchSize > 2048) {
    errors.push('EMBEDDING_BATCH_SIZE must be between 1 and 2048');
  }

  if (cfg.documents.summaryMaxTokens < 20) {
    errors.push('SUMMARY_MAX_TOKENS must be >= 20');
  }

  if (cfg.documents.chunkToleranceRatio < 0 || cfg.documents.chunkToleranceRatio > 1) {
    errors.push('CHUNK_TOLERANCE_RATIO must be between 0 and 1');
  }

  if (cfg.search.maxResults < 1) {
    errors.push('SEARCH_MAX_RESULTS must be >= 1');
  }

  if (errors.length > 0) {
    throw new Error(`Retrieval configuration validation failed:\n${errors.join('\n')}`);
  }
}

