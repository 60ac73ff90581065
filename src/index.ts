/**
 * Transcript Retrieval Server
 * Main entry point: wires collaborators, runs migrations and starts Express
 */

// Load environment variables FIRST - before any other imports
// This ensures process.env is populated when modules initialize
import { config } from 'dotenv';
config();

import type { Server } from 'http';
import { createApp } from './app.js';
import { closePool, pool, testConnection } from './db/connection.js';
import { runMigrationsOnStartup } from './db/runMigrations.js';
import { PgSourceRepository } from './db/repositories/source-repository.js';
import { loadRetrievalConfig, validateRetrievalConfig } from './config/retrieval.js';
import { llmConfig, validateLLMConfig } from './config/llm.js';
import { logger, logShutdown, logStartup } from './services/logging/logger.js';
import { LLMClient } from './services/llm/client.js';
import { EmbeddingService } from './services/rag/embedding-service.js';
import { IndexManager } from './services/rag/index-manager.js';
import { RetrievalEngine } from './services/rag/retrieval-engine.js';
import { LLMAnswerGenerator } from './services/rag/answer-generator.js';
import { TranscriptSearchService } from './services/rag/transcript-search-service.js';
import { createVectorIndexClient, getVectorDBStatus } from './services/vector-db/vector-db-factory.js';

const PORT = process.env.PORT || 3000;

let server: Server | null = null;

/**
 * Build every collaborator explicitly; nothing below holds module-level state
 */
function buildServices() {
  const retrievalConfig = loadRetrievalConfig();
  validateRetrievalConfig(retrievalConfig);
  validateLLMConfig();

  logger.info(getVectorDBStatus(), 'Vector index configuration');
  const vectorIndex = createVectorIndexClient(pool);
  const embedder = new EmbeddingService(retrievalConfig.embedding);
  const sources = new PgSourceRepository(pool);

  const indexManager = new IndexManager(vectorIndex, embedder, {
    summaryMaxTokens: retrievalConfig.documents.summaryMaxTokens,
    chunkToleranceRatio: retrievalConfig.documents.chunkToleranceRatio,
    defaultSubtopicLabel: retrievalConfig.documents.defaultSubtopicLabel,
  });

  const answerGenerator = new LLMAnswerGenerator(new LLMClient(llmConfig));
  const retrieval = new RetrievalEngine(vectorIndex, embedder, answerGenerator, {
    ...retrievalConfig.search,
    answerOnEmptyEvidence: retrievalConfig.answerOnEmptyEvidence,
  });

  const service = new TranscriptSearchService(sources, indexManager, retrieval, {
    deleteConsistency: retrievalConfig.deleteConsistency,
  });

  return { service, vectorIndex };
}

/**
 * Start the server
 * Runs database migrations first, then starts accepting requests
 */
async function start() {
  try {
    const migrationResult = await runMigrationsOnStartup(pool);

    if (!migrationResult.success) {
      logger.error(
        { error: migrationResult.error },
        'Database migration failed - server not started'
      );
      process.exit(1);
    }

    const { service, vectorIndex } = buildServices();
    const app = createApp({ service, vectorIndex, checkDatabase: testConnection });

    server = app.listen(PORT, () => {
      logStartup(PORT);
    });

    server.on('error', (error: Error) => {
      logger.error({ err: error }, 'Server error');
      process.exit(1);
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string) {
  logShutdown(signal);

  if (server) {
    server.close(() => {
      logger.info('HTTP server closed');
    });
  }

  try {
    await closePool();
    process.exit(0);
  } catch (error) {
    logger.error({ err: error }, 'Error during shutdown');
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('uncaughtException', (error: Error) => {
  logger.error({ err: error }, 'Uncaught exception');
  void shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  void shutdown('unhandledRejection');
});

void start();
