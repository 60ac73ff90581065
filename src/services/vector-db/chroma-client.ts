/**
 * ChromaDB Vector Index Client
 * Implements VectorIndexClient for ChromaDB (local/self-hosted alternative)
 *
 * Each logical collection maps to one Chroma collection created with cosine
 * space. Chroma metadata cannot hold null, so absent values are omitted on
 * write and restored on read.
 */

import { ChromaClient, IncludeEnum, type Collection, type Metadata, type Where } from 'chromadb';
import pino from 'pino';
import {
  DocumentMetadataSchema,
  type CollectionName,
  type DocumentMetadata,
  type IndexedDocument,
  type MetadataPatch,
  type SearchHit,
  type VectorFilter,
  type VectorIndexClient,
} from '../../types/vector-db.js';
import { IndexUnavailableError } from '../../types/errors.js';

const logger = pino({
  name: 'chroma-client',
  level: process.env.LOG_LEVEL || 'info',
});

export interface ChromaConfig {
  host: string;
  port: number;
  collectionPrefix: string;
}

const DEFAULT_CHROMA_CONFIG: ChromaConfig = {
  host: 'localhost',
  port: 8000,
  collectionPrefix: '',
};

/**
 * Metadata in Chroma's flat shape: nulls dropped, id lists joined with commas
 */
export function toChromaMetadata(metadata: DocumentMetadata): Metadata {
  const flat: Metadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[key] = value;
    } else if (Array.isArray(value)) {
      flat[key] = value.join(',');
    }
  }
  return flat;
}

function parseIdList(value: string): number[] {
  return value
    .split(',')
    .filter(part => part.trim() !== '')
    .map(part => Number(part));
}

export function fromChromaMetadata(metadata: Metadata | null | undefined): DocumentMetadata | null {
  const citedSegmentIds = metadata?.citedSegmentIds;
  const parsed = DocumentMetadataSchema.safeParse({
    endTime: null,
    ...metadata,
    ...(typeof citedSegmentIds === 'string' ? { citedSegmentIds: parseIdList(citedSegmentIds) } : {}),
  });
  return parsed.success ? parsed.data : null;
}

/**
 * Exact-match filter as a Chroma where clause; several keys need $and
 */
export function toChromaWhere(filter: VectorFilter | undefined): Where | undefined {
  const clauses: Where[] = [];
  if (filter?.sourceId !== undefined) clauses.push({ sourceId: filter.sourceId });
  if (filter?.sourceType !== undefined) clauses.push({ sourceType: filter.sourceType });
  if (filter?.documentType !== undefined) clauses.push({ documentType: filter.documentType });

  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}

export class ChromaVectorClient implements VectorIndexClient {
  readonly provider = 'chroma' as const;
  private client: ChromaClient;
  private collections = new Map<CollectionName, Collection>();
  private config: ChromaConfig;

  constructor(config?: Partial<ChromaConfig>) {
    this.config = { ...DEFAULT_CHROMA_CONFIG, ...config };
    this.client = new ChromaClient({
      path: `http://${this.config.host}:${this.config.port}`,
    });
  }

  private async getCollection(name: CollectionName): Promise<Collection> {
    const cached = this.collections.get(name);
    if (cached) return cached;

    const collection = await this.client.getOrCreateCollection({
      name: `${this.config.collectionPrefix}${name}`,
      metadata: { 'hnsw:space': 'cosine', description: `Transcript retrieval: ${name}` },
    });
    this.collections.set(name, collection);
    return collection;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.error({ err: error, operation }, 'ChromaDB operation failed');
      throw IndexUnavailableError.fromError(error, operation);
    }
  }

  async upsert(collection: CollectionName, documents: IndexedDocument[]): Promise<void> {
    if (documents.length === 0) return;

    await this.run('upsert', async () => {
      const target = await this.getCollection(collection);
      await target.upsert({
        ids: documents.map(d => d.id),
        embeddings: documents.map(d => d.embedding),
        documents: documents.map(d => d.text),
        metadatas: documents.map(d => toChromaMetadata(d.metadata)),
      });
      logger.debug({ collection, count: documents.length }, 'Upserted vectors to ChromaDB');
    });
  }

  async query(
    collection: CollectionName,
    embedding: number[],
    topK: number,
    filter?: VectorFilter
  ): Promise<SearchHit[]> {
    if (topK <= 0) return [];

    return this.run('query', async () => {
      const target = await this.getCollection(collection);
      const response = await target.query({
        queryEmbeddings: [embedding],
        nResults: topK,
        where: toChromaWhere(filter),
      });

      const ids = response.ids[0] ?? [];
      const hits: SearchHit[] = [];

      ids.forEach((id, index) => {
        const metadata = fromChromaMetadata(response.metadatas[0]?.[index]);
        if (!metadata) {
          logger.warn({ id, collection }, 'Skipping document with invalid metadata');
          return;
        }
        hits.push({
          id,
          text: response.documents[0]?.[index] ?? '',
          metadata,
          distance: response.distances?.[0]?.[index] ?? 1,
        });
      });

      return hits;
    });
  }

  async get(collection: CollectionName, filter: VectorFilter): Promise<IndexedDocument[]> {
    return this.run('get', async () => {
      const target = await this.getCollection(collection);
      const response = await target.get({
        where: toChromaWhere(filter),
        include: [IncludeEnum.Documents, IncludeEnum.Metadatas, IncludeEnum.Embeddings],
      });

      const documents: IndexedDocument[] = [];
      response.ids.forEach((id, index) => {
        const metadata = fromChromaMetadata(response.metadatas[index]);
        const embedding = response.embeddings?.[index];
        if (!metadata || !embedding) {
          logger.warn({ id, collection }, 'Skipping incomplete document');
          return;
        }
        documents.push({
          id,
          text: response.documents[index] ?? '',
          metadata,
          embedding: [...embedding],
        });
      });
      return documents;
    });
  }

  async listIds(collection: CollectionName, filter: VectorFilter): Promise<string[]> {
    return this.run('list_ids', async () => {
      const target = await this.getCollection(collection);
      const response = await target.get({ where: toChromaWhere(filter), include: [] });
      return response.ids;
    });
  }

  /**
   * Chroma does not report how many documents a delete removed, so matching
   * ids are listed first and deleted by id
   */
  async deleteByFilter(collection: CollectionName, filter: VectorFilter): Promise<number> {
    const ids = await this.listIds(collection, filter);
    return this.deleteByIds(collection, ids);
  }

  async deleteByIds(collection: CollectionName, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;

    return this.run('delete', async () => {
      const target = await this.getCollection(collection);
      await target.delete({ ids });
      return ids.length;
    });
  }

  /**
   * Chroma merges metadata keys on update
   */
  async patchMetadata(collection: CollectionName, ids: string[], patch: MetadataPatch): Promise<number> {
    if (ids.length === 0) return 0;

    const fields: Metadata = {};
    if (patch.title !== undefined) fields.title = patch.title;
    if (patch.filename !== undefined) fields.filename = patch.filename;

    return this.run('patch_metadata', async () => {
      const target = await this.getCollection(collection);
      await target.update({ ids, metadatas: ids.map(() => ({ ...fields })) });
      return ids.length;
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.heartbeat();
      return true;
    } catch (error) {
      logger.error({ err: error }, 'ChromaDB ping failed');
      return false;
    }
  }
}

// Factory function for creating ChromaDB client with environment config
export function createChromaClient(): ChromaVectorClient {
  return new ChromaVectorClient({
    host: process.env.CHROMA_HOST || 'localhost',
    port: parseInt(process.env.CHROMA_PORT || '8000', 10),
    collectionPrefix: process.env.CHROMA_COLLECTION_PREFIX || '',
  });
}
