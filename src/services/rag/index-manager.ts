/**
 * Index Manager
 *
 * Keeps the vector index consistent with the relational store. The unit of
 * consistency is every document of one (source, document type). Writes to a
 * source take its place in the per-source queue on entry, so they apply in
 * call order. A store embeds the new set, upserts it and only then prunes ids
 * that are no longer part of it: readers see the old set or the new one,
 * never an empty window.
 */

import pino from 'pino';
import type { SourceType } from '../../types/transcript.js';
import {
  CHUNK_COLLECTIONS,
  SUMMARY_COLLECTION,
  applyMetadataPatch,
  type CollectionName,
  type DocumentType,
  type Embedder,
  type IndexedDocument,
  type MetadataPatch,
  type PreparedDocument,
  type VectorFilter,
  type VectorIndexClient,
} from '../../types/vector-db.js';
import { IndexUnavailableError, ProviderError } from '../../types/errors.js';
import { KeyedLock } from '../../utils/keyed-lock.js';
import { loggers, startTimer } from '../logging/log-helpers.js';
import {
  DEFAULT_SUBTOPIC_LABEL,
  assembleSummary,
  buildChunkDocuments,
  buildSummaryDocuments,
  type DocumentLabels,
} from './document-builder.js';

const logger = pino({
  name: 'index-manager',
  level: process.env.LOG_LEVEL || 'info',
});

export interface IndexManagerConfig {
  summaryMaxTokens: number;
  chunkToleranceRatio: number;
  defaultSubtopicLabel: string;
}

export const DEFAULT_INDEX_MANAGER_CONFIG: IndexManagerConfig = {
  summaryMaxTokens: 500,
  chunkToleranceRatio: 0.2,
  defaultSubtopicLabel: DEFAULT_SUBTOPIC_LABEL,
};

export interface StoreChunksResult {
  stored: number;
  skipped: number;
}

export interface StoreSummaryResult {
  stored: number;
}

export interface SummaryStoreOptions extends DocumentLabels {
  createdAt?: Date;
}

export interface DocumentCounts {
  chunks: number;
  summaries: number;
}

export function sourceLockKey(sourceId: string, sourceType: SourceType): string {
  return `${sourceType}:${sourceId}`;
}

export class IndexManager {
  private config: IndexManagerConfig;

  constructor(
    private vectorIndex: VectorIndexClient,
    private embedder: Embedder,
    config?: Partial<IndexManagerConfig>,
    private lock: KeyedLock = new KeyedLock()
  ) {
    this.config = { ...DEFAULT_INDEX_MANAGER_CONFIG, ...config };
  }

  /**
   * Replace the chunk documents of a source with one document per valid,
   * non-empty segment
   */
  async storeChunks(
    sourceId: string,
    sourceType: SourceType,
    segments: ReadonlyArray<unknown>,
    labels: DocumentLabels = {}
  ): Promise<StoreChunksResult> {
    const { documents, skipped, skipReasons } = buildChunkDocuments(sourceId, sourceType, segments, labels);

    if (skipped > 0) {
      loggers.malformedInput(sourceId, skipped, skipReasons);
    }

    const stored = await this.replaceDocuments(
      CHUNK_COLLECTIONS[sourceType],
      sourceId,
      sourceType,
      'chunk',
      documents
    );

    return { stored, skipped };
  }

  /**
   * Replace the summary documents of a source
   */
  async storeSummary(
    sourceId: string,
    sourceType: SourceType,
    summaryMarkdown: string,
    options: SummaryStoreOptions = {}
  ): Promise<StoreSummaryResult> {
    const documents = buildSummaryDocuments(
      sourceId,
      sourceType,
      summaryMarkdown,
      options.createdAt ?? new Date(),
      {
        ...(options.filename !== undefined ? { filename: options.filename } : {}),
        ...(options.title !== undefined ? { title: options.title } : {}),
        maxTokens: this.config.summaryMaxTokens,
        toleranceRatio: this.config.chunkToleranceRatio,
        defaultSubtopicLabel: this.config.defaultSubtopicLabel,
      }
    );

    const stored = await this.replaceDocuments(SUMMARY_COLLECTION, sourceId, sourceType, 'summary', documents);
    return { stored };
  }

  /**
   * Delete every chunk and summary document of a source.
   * Returns the exact number removed; 0 when nothing was indexed.
   */
  async deleteSource(sourceId: string, sourceType: SourceType): Promise<number> {
    const timer = startTimer();

    return this.lock.withLock(sourceLockKey(sourceId, sourceType), async () => {
      const chunks = await this.indexCall('delete', () =>
        this.vectorIndex.deleteByFilter(
          CHUNK_COLLECTIONS[sourceType],
          { sourceId, sourceType, documentType: 'chunk' }
        )
      );
      const summaries = await this.indexCall('delete', () =>
        this.vectorIndex.deleteByFilter(
          SUMMARY_COLLECTION,
          { sourceId, sourceType, documentType: 'summary' }
        )
      );

      const count = chunks + summaries;
      loggers.indexOperation({
        operation: 'delete',
        sourceId,
        sourceType,
        count,
        latency_ms: timer('index_delete', { sourceId }),
      });
      return count;
    });
  }

  /**
   * Patch the title (and file name, for audio) on every document of a source
   * without re-embedding anything
   */
  async updateTitle(sourceId: string, sourceType: SourceType, title: string): Promise<number> {
    const patch: MetadataPatch = sourceType === 'audio' ? { title, filename: title } : { title };

    return this.lock.withLock(sourceLockKey(sourceId, sourceType), async () => {
      const chunks = await this.patchCollection(
        CHUNK_COLLECTIONS[sourceType],
        { sourceId, sourceType, documentType: 'chunk' },
        patch
      );
      const summaries = await this.patchCollection(
        SUMMARY_COLLECTION,
        { sourceId, sourceType, documentType: 'summary' },
        patch
      );

      const count = chunks + summaries;
      loggers.indexOperation({ operation: 'patch_title', sourceId, sourceType, count });
      return count;
    });
  }

  /**
   * Summary text as indexed, ordered by subtopic then part; null when none
   */
  async getSummary(sourceId: string, sourceType: SourceType): Promise<string | null> {
    const documents = await this.indexCall('get', () =>
      this.vectorIndex.get(SUMMARY_COLLECTION, { sourceId, sourceType, documentType: 'summary' })
    );

    const summaries = documents.flatMap(doc =>
      doc.metadata.documentType === 'summary' ? [{ text: doc.text, metadata: doc.metadata }] : []
    );

    return summaries.length > 0 ? assembleSummary(summaries) : null;
  }

  async countDocuments(sourceId: string, sourceType: SourceType): Promise<DocumentCounts> {
    const [chunkIds, summaryIds] = await Promise.all([
      this.indexCall('list_ids', () =>
        this.vectorIndex.listIds(CHUNK_COLLECTIONS[sourceType], { sourceId, sourceType, documentType: 'chunk' })
      ),
      this.indexCall('list_ids', () =>
        this.vectorIndex.listIds(SUMMARY_COLLECTION, { sourceId, sourceType, documentType: 'summary' })
      ),
    ]);
    return { chunks: chunkIds.length, summaries: summaryIds.length };
  }

  /**
   * Embed, upsert, then prune stale ids, all in the source's queue slot
   */
  private async replaceDocuments(
    collection: CollectionName,
    sourceId: string,
    sourceType: SourceType,
    documentType: DocumentType,
    prepared: PreparedDocument[]
  ): Promise<number> {
    const timer = startTimer();
    const filter: VectorFilter = { sourceId, sourceType, documentType };

    return this.lock.withLock(sourceLockKey(sourceId, sourceType), async () => {
      const documents = await this.embedDocuments(prepared);
      await this.indexCall('upsert', () => this.vectorIndex.upsert(collection, documents));

      const keep = new Set(documents.map(doc => doc.id));
      const existing = await this.indexCall('list_ids', () => this.vectorIndex.listIds(collection, filter));
      const stale = existing.filter(id => !keep.has(id));

      if (stale.length > 0) {
        const pruned = await this.indexCall('delete', () => this.vectorIndex.deleteByIds(collection, stale));
        loggers.indexOperation({ operation: 'prune', sourceId, sourceType, documentType, count: pruned });
      }

      loggers.indexOperation({
        operation: 'store',
        sourceId,
        sourceType,
        documentType,
        count: documents.length,
        latency_ms: timer('index_store', { sourceId, documentType }),
      });

      return documents.length;
    });
  }

  private async embedDocuments(prepared: PreparedDocument[]): Promise<IndexedDocument[]> {
    if (prepared.length === 0) return [];

    let embeddings: number[][];
    try {
      embeddings = await this.embedder.embedBatch(prepared.map(doc => doc.text));
    } catch (error) {
      throw ProviderError.fromError(error, 'embedding');
    }

    if (embeddings.length !== prepared.length) {
      throw new ProviderError(
        `Embedding provider returned ${embeddings.length} vectors for ${prepared.length} texts`,
        'empty_response',
        'embedding',
        true
      );
    }

    return prepared.map((doc, index) => {
      const embedding = embeddings[index];
      if (!embedding || embedding.length === 0) {
        throw new ProviderError(`Empty embedding for document ${doc.id}`, 'empty_response', 'embedding', true);
      }
      return { ...doc, embedding };
    });
  }

  private async patchCollection(
    collection: CollectionName,
    filter: VectorFilter,
    patch: MetadataPatch
  ): Promise<number> {
    if (this.vectorIndex.patchMetadata) {
      const ids = await this.indexCall('list_ids', () => this.vectorIndex.listIds(collection, filter));
      if (ids.length === 0) return 0;
      return this.indexCall('patch_metadata', async () => {
        if (!this.vectorIndex.patchMetadata) return 0;
        return this.vectorIndex.patchMetadata(collection, ids, patch);
      });
    }

    // No native patch: overwrite each document with its stored embedding
    const documents = await this.indexCall('get', () => this.vectorIndex.get(collection, filter));
    if (documents.length === 0) return 0;

    const patched = documents.map(doc => ({ ...doc, metadata: applyMetadataPatch(doc.metadata, patch) }));
    await this.indexCall('upsert', () => this.vectorIndex.upsert(collection, patched));
    logger.debug({ collection, count: patched.length }, 'Re-inserted documents with patched metadata');
    return patched.length;
  }

  private async indexCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw IndexUnavailableError.fromError(error, operation);
    }
  }
}
