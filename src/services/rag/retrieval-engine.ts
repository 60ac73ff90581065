/**
 * Retrieval Engine
 *
 * Filtered similarity search over transcript chunks, and two-stage question
 * answering: top summary sections and top transcript chunks are retrieved
 * independently and handed to the answer generator as separate groups.
 */

import type { SourceType } from '../../types/transcript.js';
import {
  CHUNK_COLLECTIONS,
  SUMMARY_COLLECTION,
  type CollectionName,
  type Embedder,
  type SearchHit,
  type VectorFilter,
  type VectorIndexClient,
} from '../../types/vector-db.js';
import { IndexUnavailableError, ProviderError } from '../../types/errors.js';
import { loggers, startTimer } from '../logging/log-helpers.js';
import type { AnswerGenerator } from './answer-generator.js';

export interface RetrievalEngineConfig {
  defaultResults: number;
  defaultTranscriptResults: number;
  defaultSummaryResults: number;
  /** Upper bound applied to every n */
  maxResults: number;
  /** Call the answer generator even when both evidence groups are empty */
  answerOnEmptyEvidence: boolean;
  /** Returned instead of a model answer when the call is skipped */
  noEvidenceAnswer: string;
}

export const DEFAULT_RETRIEVAL_ENGINE_CONFIG: RetrievalEngineConfig = {
  defaultResults: 5,
  defaultTranscriptResults: 5,
  defaultSummaryResults: 3,
  maxResults: 50,
  answerOnEmptyEvidence: true,
  noEvidenceAnswer: 'No relevant transcript content was found for this question.',
};

export interface SearchOptions {
  sourceType?: SourceType;
  sourceId?: string;
  nResults?: number;
}

export interface AnswerOptions {
  transcriptN?: number;
  summaryN?: number;
}

export interface AnswerResult {
  answer: string;
  summaryHits: SearchHit[];
  chunkHits: SearchHit[];
}

function segmentOrder(hit: SearchHit): number {
  return hit.metadata.documentType === 'chunk' ? hit.metadata.segmentId : Number.MAX_SAFE_INTEGER;
}

/**
 * Ascending distance; ties by segmentId, then id
 */
export function compareHits(a: SearchHit, b: SearchHit): number {
  return a.distance - b.distance || segmentOrder(a) - segmentOrder(b) || a.id.localeCompare(b.id);
}

export class RetrievalEngine {
  private config: RetrievalEngineConfig;

  constructor(
    private vectorIndex: VectorIndexClient,
    private embedder: Embedder,
    private answerGenerator: AnswerGenerator,
    config?: Partial<RetrievalEngineConfig>
  ) {
    this.config = { ...DEFAULT_RETRIEVAL_ENGINE_CONFIG, ...config };
  }

  /**
   * Chunk documents most similar to the query, optionally restricted to one
   * source type and/or source. Returns at most nResults hits.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const n = this.limit(options.nResults, this.config.defaultResults);
    if (n === 0 || !query.trim()) return [];

    const timer = startTimer();
    const embedding = await this.embedQuery(query);
    const hits = await this.searchChunks(embedding, n, options.sourceType, options.sourceId);

    loggers.retrieval({
      stage: 'search',
      resultCount: hits.length,
      latency_ms: timer('retrieval_search'),
      sourceType: options.sourceType,
      sourceId: options.sourceId,
    });
    return hits;
  }

  /**
   * Two-stage answer: summaries and chunks are retrieved independently with
   * one query embedding, never merged or deduplicated.
   */
  async answerQuestion(question: string, options: AnswerOptions = {}): Promise<AnswerResult> {
    const summaryN = this.limit(options.summaryN, this.config.defaultSummaryResults);
    const transcriptN = this.limit(options.transcriptN, this.config.defaultTranscriptResults);

    let summaryHits: SearchHit[] = [];
    let chunkHits: SearchHit[] = [];

    if (summaryN > 0 || transcriptN > 0) {
      const embedding = await this.embedQuery(question);

      if (summaryN > 0) {
        const timer = startTimer();
        summaryHits = await this.queryCollection(SUMMARY_COLLECTION, embedding, summaryN, { documentType: 'summary' });
        summaryHits.sort(compareHits);
        loggers.retrieval({ stage: 'summary', resultCount: summaryHits.length, latency_ms: timer('retrieval_summary') });
      }

      if (transcriptN > 0) {
        const timer = startTimer();
        chunkHits = await this.searchChunks(embedding, transcriptN);
        loggers.retrieval({ stage: 'chunks', resultCount: chunkHits.length, latency_ms: timer('retrieval_chunks') });
      }
    }

    if (summaryHits.length === 0 && chunkHits.length === 0 && !this.config.answerOnEmptyEvidence) {
      return { answer: this.config.noEvidenceAnswer, summaryHits, chunkHits };
    }

    const timer = startTimer();
    const answer = await this.answerGenerator.generateAnswer(question, summaryHits, chunkHits);
    if (!answer.trim()) {
      throw new ProviderError('Answer generator returned empty text', 'empty_response', 'answer', true);
    }
    loggers.retrieval({ stage: 'answer', resultCount: 1, latency_ms: timer('retrieval_answer') });

    return { answer, summaryHits, chunkHits };
  }

  private limit(requested: number | undefined, fallback: number): number {
    const n = requested ?? fallback;
    if (!Number.isFinite(n) || n <= 0) return 0;
    return Math.min(Math.floor(n), this.config.maxResults);
  }

  private async embedQuery(text: string): Promise<number[]> {
    try {
      return await this.embedder.embed(text);
    } catch (error) {
      throw ProviderError.fromError(error, 'embedding');
    }
  }

  private async searchChunks(
    embedding: number[],
    n: number,
    sourceType?: SourceType,
    sourceId?: string
  ): Promise<SearchHit[]> {
    const types: SourceType[] = sourceType ? [sourceType] : ['youtube', 'audio'];
    const groups = await Promise.all(
      types.map(type =>
        this.queryCollection(CHUNK_COLLECTIONS[type], embedding, n, {
          documentType: 'chunk',
          ...(sourceId !== undefined ? { sourceId } : {}),
        })
      )
    );

    return groups.flat().sort(compareHits).slice(0, n);
  }

  private async queryCollection(
    collection: CollectionName,
    embedding: number[],
    n: number,
    filter: VectorFilter
  ): Promise<SearchHit[]> {
    try {
      return await this.vectorIndex.query(collection, embedding, n, filter);
    } catch (error) {
      throw IndexUnavailableError.fromError(error, 'query');
    }
  }
}
