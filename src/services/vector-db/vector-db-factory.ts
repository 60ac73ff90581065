/**
 * Vector Index Factory
 * Creates the vector index client selected by environment configuration
 */

import pino from 'pino';
import type { Pool } from 'pg';
import type { VectorDBProvider, VectorIndexClient } from '../../types/vector-db.js';
import { createChromaClient } from './chroma-client.js';
import { createPgVectorClient } from './pgvector-client.js';
import { MemoryVectorClient } from './memory-vector-client.js';

const logger = pino({
  name: 'vector-db-factory',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Get the configured vector index provider.
 * Defaults to pgvector, which shares the relational database.
 */
export function getVectorDBProvider(): VectorDBProvider {
  const provider = process.env.VECTOR_DB_PROVIDER?.toLowerCase();

  switch (provider) {
    case 'chroma':
      return 'chroma';
    case 'memory':
      return 'memory';
    case 'pgvector':
    case undefined:
    case '':
      return 'pgvector';
    default:
      throw new Error(`Invalid VECTOR_DB_PROVIDER: ${provider}. Must be 'pgvector', 'chroma' or 'memory'`);
  }
}

/**
 * Create the vector index client. pgvector runs on the given pool.
 */
export function createVectorIndexClient(pool: Pool, provider: VectorDBProvider = getVectorDBProvider()): VectorIndexClient {
  switch (provider) {
    case 'chroma':
      logger.info('Using ChromaDB vector index');
      return createChromaClient();

    case 'memory':
      logger.warn('Using in-memory vector index - documents are lost on restart');
      return new MemoryVectorClient();

    case 'pgvector':
      logger.info('Using pgvector (PostgreSQL) vector index');
      return createPgVectorClient(pool);
  }
}

/**
 * Get vector index configuration status, secrets masked
 */
export function getVectorDBStatus(): {
  provider: VectorDBProvider;
  config: Record<string, string | undefined>;
} {
  return {
    provider: getVectorDBProvider(),
    config: {
      VECTOR_DB_PROVIDER: process.env.VECTOR_DB_PROVIDER,
      CHROMA_HOST: process.env.CHROMA_HOST,
      CHROMA_PORT: process.env.CHROMA_PORT,
      CHROMA_COLLECTION_PREFIX: process.env.CHROMA_COLLECTION_PREFIX,
      PGVECTOR_TABLE_NAME: process.env.PGVECTOR_TABLE_NAME,
      PGVECTOR_DIMENSIONS: process.env.PGVECTOR_DIMENSIONS,
      DATABASE_URL: process.env.DATABASE_URL ? '***' : undefined,
    },
  };
}
