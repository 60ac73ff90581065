/**
 * pgvector Vector Index Client
 * Implements VectorIndexClient for PostgreSQL with the pgvector extension
 *
 * All three collections live in one table keyed by (collection, id). Source
 * and document type are real columns so filtered search and delete-by-filter
 * stay on indexes; the full metadata is kept as JSONB.
 */

import pino from 'pino';
import type { Pool } from 'pg';
import { z } from 'zod';
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
  name: 'pgvector-client',
  level: process.env.LOG_LEVEL || 'info',
});

export interface PgVectorConfig {
  tableName?: string;
  dimensions?: number;
}

const DEFAULT_CONFIG: Required<PgVectorConfig> = {
  tableName: 'transcript_vectors',
  dimensions: 1536, // OpenAI text-embedding-3-small dimensions
};

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

const EmbeddingSchema = z.array(z.number());

interface VectorRow {
  id: string;
  content: string;
  metadata: unknown;
}

interface SearchRow extends VectorRow {
  distance: number;
}

interface StoredRow extends VectorRow {
  embedding: string;
}

/**
 * Format embedding as pgvector expects: [0.1,0.2,...]
 */
export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

export function parseVectorLiteral(literal: string): number[] {
  return EmbeddingSchema.parse(JSON.parse(literal));
}

/**
 * Build the WHERE clause for a collection plus exact-match filter
 */
export function buildWhereClause(
  collection: CollectionName,
  filter: VectorFilter | undefined,
  firstParam: number = 1
): { clause: string; params: unknown[] } {
  const conditions = [`collection = $${firstParam}`];
  const params: unknown[] = [collection];
  let index = firstParam + 1;

  if (filter?.sourceId !== undefined) {
    conditions.push(`source_id = $${index++}`);
    params.push(filter.sourceId);
  }
  if (filter?.sourceType !== undefined) {
    conditions.push(`source_type = $${index++}`);
    params.push(filter.sourceType);
  }
  if (filter?.documentType !== undefined) {
    conditions.push(`document_type = $${index++}`);
    params.push(filter.documentType);
  }

  return { clause: conditions.join(' AND '), params };
}

export class PgVectorClient implements VectorIndexClient {
  readonly provider = 'pgvector' as const;
  private config: Required<PgVectorConfig>;
  private initialization: Promise<void> | null = null;

  constructor(private pool: Pool, config?: PgVectorConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!TABLE_NAME_PATTERN.test(this.config.tableName)) {
      throw new Error(`Invalid pgvector table name: ${this.config.tableName}`);
    }
  }

  /**
   * Ensure pgvector extension and table exist
   */
  private ensureInitialized(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.initialize().catch((error: unknown) => {
        this.initialization = null;
        throw error;
      });
    }
    return this.initialization;
  }

  private async initialize(): Promise<void> {
    const table = this.config.tableName;

    await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector');

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${table} (
        collection TEXT NOT NULL,
        id TEXT NOT NULL,
        source_id TEXT NOT NULL,
        source_type TEXT NOT NULL,
        document_type TEXT NOT NULL,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL,
        embedding vector(${this.config.dimensions}) NOT NULL,
        created_at TIMESTAMPTZ DEFAULT NOW(),
        updated_at TIMESTAMPTZ DEFAULT NOW(),
        PRIMARY KEY (collection, id)
      )
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS ${table}_embedding_idx
      ON ${table}
      USING hnsw (embedding vector_cosine_ops)
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS ${table}_source_idx
      ON ${table} (collection, source_id, document_type)
    `);

    logger.info({ table }, 'pgvector initialized successfully');
  }

  /**
   * Run an operation, converting any failure to IndexUnavailableError
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await this.ensureInitialized();
      return await fn();
    } catch (error) {
      logger.error({ err: error, operation }, 'pgvector operation failed');
      throw IndexUnavailableError.fromError(error, operation);
    }
  }

  private toMetadata(row: VectorRow): DocumentMetadata | null {
    const parsed = DocumentMetadataSchema.safeParse(row.metadata);
    if (!parsed.success) {
      logger.warn({ id: row.id, issues: parsed.error.issues }, 'Skipping document with invalid metadata');
      return null;
    }
    return parsed.data;
  }

  async upsert(collection: CollectionName, documents: IndexedDocument[]): Promise<void> {
    if (documents.length === 0) return;

    await this.run('upsert', async () => {
      const client = await this.pool.connect();
      try {
        await client.query('BEGIN');

        for (const doc of documents) {
          await client.query(
            `
            INSERT INTO ${this.config.tableName} (
              collection, id, source_id, source_type, document_type,
              content, metadata, embedding, updated_at
            ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, NOW())
            ON CONFLICT (collection, id) DO UPDATE SET
              source_id = EXCLUDED.source_id,
              source_type = EXCLUDED.source_type,
              document_type = EXCLUDED.document_type,
              content = EXCLUDED.content,
              metadata = EXCLUDED.metadata,
              embedding = EXCLUDED.embedding,
              updated_at = NOW()
            `,
            [
              collection,
              doc.id,
              doc.metadata.sourceId,
              doc.metadata.sourceType,
              doc.metadata.documentType,
              doc.text,
              JSON.stringify(doc.metadata),
              toVectorLiteral(doc.embedding),
            ]
          );
        }

        await client.query('COMMIT');
        logger.debug({ collection, count: documents.length }, 'Upserted vectors to pgvector');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      } finally {
        client.release();
      }
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
      const { clause, params } = buildWhereClause(collection, filter, 2);
      const limitParam = params.length + 2;

      const result = await this.pool.query<SearchRow>(
        `
        SELECT id, content, metadata, embedding <=> $1::vector AS distance
        FROM ${this.config.tableName}
        WHERE ${clause}
        ORDER BY embedding <=> $1::vector, id
        LIMIT $${limitParam}
        `,
        [toVectorLiteral(embedding), ...params, topK]
      );

      const hits: SearchHit[] = [];
      for (const row of result.rows) {
        const metadata = this.toMetadata(row);
        if (metadata) {
          hits.push({ id: row.id, text: row.content, metadata, distance: Number(row.distance) });
        }
      }
      return hits;
    });
  }

  async get(collection: CollectionName, filter: VectorFilter): Promise<IndexedDocument[]> {
    return this.run('get', async () => {
      const { clause, params } = buildWhereClause(collection, filter);
      const result = await this.pool.query<StoredRow>(
        `SELECT id, content, metadata, embedding::text AS embedding FROM ${this.config.tableName} WHERE ${clause} ORDER BY id`,
        params
      );

      const documents: IndexedDocument[] = [];
      for (const row of result.rows) {
        const metadata = this.toMetadata(row);
        if (metadata) {
          documents.push({ id: row.id, text: row.content, metadata, embedding: parseVectorLiteral(row.embedding) });
        }
      }
      return documents;
    });
  }

  async listIds(collection: CollectionName, filter: VectorFilter): Promise<string[]> {
    return this.run('list_ids', async () => {
      const { clause, params } = buildWhereClause(collection, filter);
      const result = await this.pool.query<{ id: string }>(
        `SELECT id FROM ${this.config.tableName} WHERE ${clause} ORDER BY id`,
        params
      );
      return result.rows.map(row => row.id);
    });
  }

  async deleteByFilter(collection: CollectionName, filter: VectorFilter): Promise<number> {
    return this.run('delete', async () => {
      const { clause, params } = buildWhereClause(collection, filter);
      const result = await this.pool.query(
        `DELETE FROM ${this.config.tableName} WHERE ${clause}`,
        params
      );
      return result.rowCount ?? 0;
    });
  }

  async deleteByIds(collection: CollectionName, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;

    return this.run('delete', async () => {
      const result = await this.pool.query(
        `DELETE FROM ${this.config.tableName} WHERE collection = $1 AND id = ANY($2::text[])`,
        [collection, ids]
      );
      return result.rowCount ?? 0;
    });
  }

  async patchMetadata(collection: CollectionName, ids: string[], patch: MetadataPatch): Promise<number> {
    if (ids.length === 0) return 0;

    return this.run('patch_metadata', async () => {
      const result = await this.pool.query(
        `
        UPDATE ${this.config.tableName}
        SET metadata = metadata || $3::jsonb, updated_at = NOW()
        WHERE collection = $1 AND id = ANY($2::text[])
        `,
        [collection, ids, JSON.stringify(patch)]
      );
      return result.rowCount ?? 0;
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.ensureInitialized();
      const result = await this.pool.query('SELECT 1');
      return result.rows.length > 0;
    } catch (error) {
      logger.error({ err: error }, 'pgvector ping failed');
      return false;
    }
  }
}

/**
 * Factory function for creating pgvector client on the shared pool
 */
export function createPgVectorClient(pool: Pool): PgVectorClient {
  return new PgVectorClient(pool, {
    tableName: process.env.PGVECTOR_TABLE_NAME || DEFAULT_CONFIG.tableName,
    dimensions: parseInt(process.env.PGVECTOR_DIMENSIONS || process.env.EMBEDDING_DIMENSIONS || '1536', 10),
  });
}
