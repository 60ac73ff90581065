/**
 * Vector Database Types
 * Indexed documents, metadata schema and the vector index contract used for transcript RAG
 */

import { z } from 'zod';
import { SOURCE_TYPES, type SourceType } from './transcript.js';

export type DocumentType = 'chunk' | 'summary';

/**
 * Logical collections of the vector index
 */
export type CollectionName = 'transcript_chunks_youtube' | 'transcript_chunks_audio' | 'summaries';

export const CHUNK_COLLECTIONS: Record<SourceType, CollectionName> = {
  youtube: 'transcript_chunks_youtube',
  audio: 'transcript_chunks_audio',
};

export const SUMMARY_COLLECTION: CollectionName = 'summaries';

const BaseMetadataSchema = z.object({
  sourceId: z.string().min(1),
  sourceType: z.enum(SOURCE_TYPES),
  filename: z.string().optional(),
  title: z.string().optional(),
});

export const ChunkMetadataSchema = BaseMetadataSchema.extend({
  documentType: z.literal('chunk'),
  speaker: z.string(),
  startTime: z.number(),
  endTime: z.number().nullable(),
  confidence: z.number(),
  segmentId: z.number().int(),
  originalLanguage: z.string().optional(),
});

export const SummaryMetadataSchema = BaseMetadataSchema.extend({
  documentType: z.literal('summary'),
  subtopic: z.string(),
  subtopicIndex: z.number().int(),
  partIndex: z.number().int(),
  createdAt: z.string(),
  /** Transcript segments the subtopic cites; documents stored without it read back as [] */
  citedSegmentIds: z.array(z.number().int()).default([]),
});

export const DocumentMetadataSchema = z.discriminatedUnion('documentType', [
  ChunkMetadataSchema,
  SummaryMetadataSchema,
]);

export type ChunkMetadata = z.infer<typeof ChunkMetadataSchema>;
export type SummaryMetadata = z.infer<typeof SummaryMetadataSchema>;
export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;

/**
 * Unit of storage in the vector index
 */
export interface IndexedDocument<M extends DocumentMetadata = DocumentMetadata> {
  id: string;
  text: string;
  embedding: number[];
  metadata: M;
}

/**
 * Document before the embedding provider has run
 */
export type PreparedDocument<M extends DocumentMetadata = DocumentMetadata> = Omit<IndexedDocument<M>, 'embedding'>;

/**
 * Exact-match metadata filter. All present keys must match.
 */
export interface VectorFilter {
  sourceId?: string;
  sourceType?: SourceType;
  documentType?: DocumentType;
}

/**
 * Fields that may be patched without re-embedding
 */
export interface MetadataPatch {
  title?: string;
  filename?: string;
}

export interface SearchHit {
  id: string;
  text: string;
  metadata: DocumentMetadata;
  distance: number;              // Lower is more similar
}

export interface VectorIndexClient {
  /** Backend name for logs and health output */
  readonly provider: VectorDBProvider;

  /**
   * Insert or overwrite documents by id
   */
  upsert(collection: CollectionName, documents: IndexedDocument[]): Promise<void>;

  /**
   * Nearest neighbours ordered by ascending distance
   */
  query(
    collection: CollectionName,
    embedding: number[],
    topK: number,
    filter?: VectorFilter
  ): Promise<SearchHit[]>;

  /**
   * Fetch every matching document, embeddings included
   */
  get(collection: CollectionName, filter: VectorFilter): Promise<IndexedDocument[]>;

  /**
   * Ids of every matching document
   */
  listIds(collection: CollectionName, filter: VectorFilter): Promise<string[]>;

  /**
   * Delete by filter and return the number of removed documents
   */
  deleteByFilter(collection: CollectionName, filter: VectorFilter): Promise<number>;

  deleteByIds(collection: CollectionName, ids: string[]): Promise<number>;

  /**
   * Metadata-only update. Backends without a native primitive leave this undefined
   * and callers fall back to delete + reinsert with the stored embeddings.
   */
  patchMetadata?(collection: CollectionName, ids: string[], patch: MetadataPatch): Promise<number>;

  /**
   * Health check
   */
  ping(): Promise<boolean>;
}

export type VectorDBProvider = 'pgvector' | 'chroma' | 'memory';

export type EmbeddingProviderName = 'openai' | 'openrouter';

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
  batchSize: number;
}

export const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  provider: 'openai',
  model: 'text-embedding-3-small',
  dimensions: 1536,
  batchSize: 100, // OpenAI limit is 2048
};

/**
 * Embedding Provider capability consumed by the index manager and retrieval engine
 */
export interface Embedder {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Does a document satisfy an exact-match filter
 */
export function matchesFilter(metadata: DocumentMetadata, filter: VectorFilter | undefined): boolean {
  if (!filter) return true;
  if (filter.sourceId !== undefined && metadata.sourceId !== filter.sourceId) return false;
  if (filter.sourceType !== undefined && metadata.sourceType !== filter.sourceType) return false;
  if (filter.documentType !== undefined && metadata.documentType !== filter.documentType) return false;
  return true;
}

/**
 * Apply a title/filename patch to metadata without touching other fields
 */
export function applyMetadataPatch<M extends DocumentMetadata>(metadata: M, patch: MetadataPatch): M {
  return {
    ...metadata,
    ...(patch.title !== undefined ? { title: patch.title } : {}),
    ...(patch.filename !== undefined ? { filename: patch.filename } : {}),
  };
}
