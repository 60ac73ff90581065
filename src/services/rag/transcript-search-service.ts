/**
 * Transcript Search Service
 *
 * Entry point for indexing and querying transcripts. Coordinates the
 * relational source store with the index manager and retrieval engine, and
 * owns the ordering rules between them: a source record is written before its
 * documents are indexed, and index documents are removed before the record.
 * Writes to one source run one whole operation at a time, in call order.
 */

import {
  SegmentSchema,
  type Segment,
  type SourceListing,
  type SourceStore,
  type SourceType,
} from '../../types/transcript.js';
import type { DocumentMetadata, SearchHit } from '../../types/vector-db.js';
import { IndexingError, SourceNotFoundError } from '../../types/errors.js';
import type { DeleteConsistency } from '../../config/retrieval.js';
import { KeyedLock } from '../../utils/keyed-lock.js';
import { createSourceLogger } from '../logging/logger.js';
import { loggers } from '../logging/log-helpers.js';
import type { DocumentLabels } from './document-builder.js';
import { sourceLockKey, type IndexManager } from './index-manager.js';
import type { AnswerOptions, RetrievalEngine, SearchOptions } from './retrieval-engine.js';

export interface IndexSourceInput {
  sourceId: string;
  sourceType: SourceType;
  /** Raw transcription output; malformed entries are skipped and counted */
  segments: ReadonlyArray<unknown>;
  title?: string | null;
  filename?: string | null;
  url?: string | null;
}

export interface IndexSourceResult {
  chunksStored: number;
  skipped: number;
}

export interface IndexSummaryInput {
  sourceId: string;
  sourceType: SourceType;
  summary: string;
  createdAt?: Date;
}

export interface RemoveSourceResult {
  deletedFromIndex: number;
  deletedFromMetadata: boolean;
  /** Index cleanup failed and was skipped under the best-effort policy */
  indexCleanupFailed: boolean;
}

export interface SearchResultItem {
  id: string;
  documentText: string;
  metadata: DocumentMetadata;
  distance: number;
}

export interface AskResult {
  answer: string;
  summaryResults: SearchResultItem[];
  chunkResults: SearchResultItem[];
  summaryResultsCount: number;
  chunkResultsCount: number;
}

export interface UpdateTitleResult {
  updatedInIndex: number;
  updatedInMetadata: boolean;
}

export interface ReindexResult {
  chunksStored: number;
  summariesStored: number;
}

/**
 * Where a source is present. Index documents without a record are left
 * behind by a best-effort delete whose index cleanup failed.
 */
export interface SourceStatus {
  existsInMetadata: boolean;
  indexedChunks: number;
  indexedSummaries: number;
}

export interface TranscriptSearchServiceOptions {
  deleteConsistency?: DeleteConsistency;
}

function toResultItem(hit: SearchHit): SearchResultItem {
  return {
    id: hit.id,
    documentText: hit.text,
    metadata: hit.metadata,
    distance: hit.distance,
  };
}

function labelsFor(sourceType: SourceType, title?: string | null, filename?: string | null): DocumentLabels {
  return {
    ...(title ? { title } : {}),
    ...(sourceType === 'audio' && filename ? { filename } : {}),
  };
}

function asIndexingError(
  error: unknown,
  sourceId: string,
  sourceType: SourceType,
  transcriptSaved: boolean
): IndexingError {
  const cause = error instanceof Error ? error : new Error(String(error));
  return new IndexingError(
    `Indexing failed for ${sourceType}/${sourceId}: ${cause.message}`,
    sourceId,
    sourceType,
    transcriptSaved,
    cause
  );
}

export class TranscriptSearchService {
  private deleteConsistency: DeleteConsistency;
  // Orders whole two-store operations per source; taken before the index manager's queue
  private writes = new KeyedLock();

  constructor(
    private sources: SourceStore,
    private indexManager: IndexManager,
    private retrieval: RetrievalEngine,
    options: TranscriptSearchServiceOptions = {}
  ) {
    this.deleteConsistency = options.deleteConsistency ?? 'best_effort';
  }

  /**
   * Save the source record and its segments, then index chunk documents.
   * An indexing failure leaves the record in place; `reindexSource` can
   * reconcile it later.
   */
  async indexSource(input: IndexSourceInput): Promise<IndexSourceResult> {
    const log = createSourceLogger(input.sourceId, input.sourceType);

    const segments: Segment[] = [];
    for (const raw of input.segments) {
      const parsed = SegmentSchema.safeParse(raw);
      if (parsed.success) segments.push(parsed.data);
    }

    return this.writes.withLock(sourceLockKey(input.sourceId, input.sourceType), async () => {
      await this.sources.saveSource({
        sourceId: input.sourceId,
        sourceType: input.sourceType,
        title: input.title ?? null,
        filename: input.filename ?? null,
        url: input.url ?? null,
        segments,
      });
      log.info({ segmentCount: segments.length }, 'Source record saved');

      try {
        const result = await this.indexManager.storeChunks(
          input.sourceId,
          input.sourceType,
          input.segments,
          labelsFor(input.sourceType, input.title, input.filename)
        );
        return { chunksStored: result.stored, skipped: result.skipped };
      } catch (error) {
        loggers.error('Chunk indexing failed after source was saved', error, {
          sourceId: input.sourceId,
          sourceType: input.sourceType,
        });
        throw asIndexingError(error, input.sourceId, input.sourceType, true);
      }
    });
  }

  /**
   * Store the summary on the source record and replace its summary documents
   */
  async indexSummary(input: IndexSummaryInput): Promise<{ summariesStored: number }> {
    return this.writes.withLock(sourceLockKey(input.sourceId, input.sourceType), async () => {
      const record = await this.sources.getSource(input.sourceId, input.sourceType);
      if (!record) {
        throw new SourceNotFoundError(input.sourceId, input.sourceType);
      }

      await this.sources.saveSummary(input.sourceId, input.sourceType, input.summary);

      try {
        const result = await this.indexManager.storeSummary(input.sourceId, input.sourceType, input.summary, {
          ...labelsFor(input.sourceType, record.title, record.filename),
          ...(input.createdAt ? { createdAt: input.createdAt } : {}),
        });
        return { summariesStored: result.stored };
      } catch (error) {
        loggers.error('Summary indexing failed', error, { sourceId: input.sourceId, sourceType: input.sourceType });
        throw asIndexingError(error, input.sourceId, input.sourceType, true);
      }
    });
  }

  /**
   * Remove index documents, then the source record (segments cascade).
   * Under 'best_effort' an index failure is logged and the record is still
   * deleted; under 'strict' it is rethrown and the record kept.
   */
  async removeSource(sourceId: string, sourceType: SourceType): Promise<RemoveSourceResult> {
    return this.writes.withLock(sourceLockKey(sourceId, sourceType), async () => {
      const log = createSourceLogger(sourceId, sourceType);
      let deletedFromIndex = 0;
      let indexCleanupFailed = false;

      try {
        deletedFromIndex = await this.indexManager.deleteSource(sourceId, sourceType);
      } catch (error) {
        if (this.deleteConsistency === 'strict') {
          throw error;
        }
        indexCleanupFailed = true;
        log.warn({ err: error }, 'Vector index cleanup failed; deleting source record anyway');
      }

      const deletedFromMetadata = await this.sources.deleteSourceRecord(sourceId, sourceType);
      log.info({ deletedFromIndex, deletedFromMetadata, indexCleanupFailed }, 'Source removed');

      return { deletedFromIndex, deletedFromMetadata, indexCleanupFailed };
    });
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResultItem[]> {
    const hits = await this.retrieval.search(query, options);
    return hits.map(toResultItem);
  }

  async ask(question: string, options: AnswerOptions = {}): Promise<AskResult> {
    const result = await this.retrieval.answerQuestion(question, options);
    return {
      answer: result.answer,
      summaryResults: result.summaryHits.map(toResultItem),
      chunkResults: result.chunkHits.map(toResultItem),
      summaryResultsCount: result.summaryHits.length,
      chunkResultsCount: result.chunkHits.length,
    };
  }

  /**
   * Rename a source in the relational store and on its index documents
   */
  async updateTitle(sourceId: string, sourceType: SourceType, title: string): Promise<UpdateTitleResult> {
    return this.writes.withLock(sourceLockKey(sourceId, sourceType), async () => {
      const updatedInMetadata = await this.sources.updateTitle(sourceId, sourceType, title);
      if (!updatedInMetadata) {
        throw new SourceNotFoundError(sourceId, sourceType);
      }

      const updatedInIndex = await this.indexManager.updateTitle(sourceId, sourceType, title);
      return { updatedInIndex, updatedInMetadata };
    });
  }

  /**
   * Rebuild every index document of a source from the relational store
   */
  async reindexSource(sourceId: string, sourceType: SourceType): Promise<ReindexResult> {
    return this.writes.withLock(sourceLockKey(sourceId, sourceType), async () => {
      const record = await this.sources.getSource(sourceId, sourceType);
      if (!record) {
        throw new SourceNotFoundError(sourceId, sourceType);
      }

      const segments = await this.sources.getSegments(sourceId, sourceType);
      const labels = labelsFor(sourceType, record.title, record.filename);

      try {
        const chunks = await this.indexManager.storeChunks(sourceId, sourceType, segments, labels);
        // An absent summary prunes any summary documents left from before
        const summaries = await this.indexManager.storeSummary(sourceId, sourceType, record.summary ?? '', labels);

        loggers.indexOperation({
          operation: 'reindex',
          sourceId,
          sourceType,
          count: chunks.stored + summaries.stored,
        });
        return { chunksStored: chunks.stored, summariesStored: summaries.stored };
      } catch (error) {
        throw asIndexingError(error, sourceId, sourceType, true);
      }
    });
  }

  /**
   * Summary as indexed; falls back to the stored summary text
   */
  async getSummary(sourceId: string, sourceType: SourceType): Promise<string | null> {
    const indexed = await this.indexManager.getSummary(sourceId, sourceType);
    if (indexed !== null) return indexed;

    const record = await this.sources.getSource(sourceId, sourceType);
    return record?.summary ?? null;
  }

  async getSourceStatus(sourceId: string, sourceType: SourceType): Promise<SourceStatus> {
    const [existsInMetadata, counts] = await Promise.all([
      this.sources.sourceExists(sourceId, sourceType),
      this.indexManager.countDocuments(sourceId, sourceType),
    ]);

    if (!existsInMetadata && counts.chunks === 0 && counts.summaries === 0) {
      throw new SourceNotFoundError(sourceId, sourceType);
    }

    return {
      existsInMetadata,
      indexedChunks: counts.chunks,
      indexedSummaries: counts.summaries,
    };
  }

  async listSources(sourceType?: SourceType): Promise<SourceListing[]> {
    return this.sources.listSources(sourceType);
  }
}
