/**
 * Express application
 * Built from injected collaborators so tests can run it without a database
 */

import express, { type Request, type Response } from 'express';
import type { VectorIndexClient } from './types/vector-db.js';
import type { TranscriptSearchService } from './services/rag/transcript-search-service.js';
import { createTranscriptRoutes } from './routes/transcript-routes.js';
import { errorHandler, requestLogger } from './middleware/request-logger.js';

export interface AppDependencies {
  service: TranscriptSearchService;
  vectorIndex: VectorIndexClient;
  /** Relational store health check */
  checkDatabase?: () => Promise<boolean>;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Enable CORS for all routes
  app.use((req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', process.env.CORS_ORIGIN || '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    next();
  });

  app.use(express.json({ limit: process.env.JSON_BODY_LIMIT || '10mb' }));
  app.use(requestLogger);

  /**
   * GET /health
   * Reports the vector index backend and whether it answers
   */
  app.get('/health', async (_req: Request, res: Response) => {
    const [vectorIndexUp, databaseUp] = await Promise.all([
      deps.vectorIndex.ping(),
      deps.checkDatabase ? deps.checkDatabase() : Promise.resolve(true),
    ]);
    const healthy = vectorIndexUp && databaseUp;

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      vectorIndex: { provider: deps.vectorIndex.provider, up: vectorIndexUp },
      database: { up: databaseUp },
    });
  });

  app.use('/api/transcripts', createTranscriptRoutes(deps.service));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  app.use(errorHandler);

  return app;
}
