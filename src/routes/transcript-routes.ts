/**
 * Transcript Routes
 *
 * REST API for indexing, searching and asking questions over transcripts.
 * Mounted under /api/transcripts.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { SOURCE_TYPES, type SourceType } from '../types/transcript.js';
import {
  IndexUnavailableError,
  IndexingError,
  ProviderError,
  SourceNotFoundError,
} from '../types/errors.js';
import { createLogger } from '../services/logging/logger.js';
import type { TranscriptSearchService } from '../services/rag/transcript-search-service.js';

const logger = createLogger({ module: 'TranscriptRoutes' });

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

const SourceTypeSchema = z.enum(SOURCE_TYPES);

const SourceParamsSchema = z.object({
  sourceType: SourceTypeSchema,
  sourceId: z.string().min(1).max(256),
});

const IndexSourceSchema = z.object({
  sourceId: z.string().min(1).max(256),
  sourceType: SourceTypeSchema,
  title: z.string().max(500).nullish(),
  filename: z.string().max(500).nullish(),
  url: z.string().url().nullish(),
  // Entries are validated one by one when documents are built
  segments: z.array(z.unknown()),
});

const IndexSummarySchema = z.object({
  // Checked, not trimmed: the stored summary keeps its exact text
  summary: z.string().refine(text => text.trim().length > 0, 'Summary must not be blank'),
  createdAt: z.coerce.date().optional(),
});

const UpdateTitleSchema = z.object({
  title: z.string().trim().min(1).max(500),
});

const ListSourcesQuerySchema = z.object({
  sourceType: SourceTypeSchema.optional(),
});

const SearchSchema = z.object({
  query: z.string().trim().min(1),
  sourceType: SourceTypeSchema.optional(),
  sourceId: z.string().min(1).optional(),
  nResults: z.number().int().min(0).max(100).optional(),
});

const AskSchema = z.object({
  question: z.string().trim().min(1),
  transcriptN: z.number().int().min(0).max(100).optional(),
  summaryN: z.number().int().min(0).max(100).optional(),
});

// ============================================================================
// ERROR MAPPING
// ============================================================================

function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: 'Invalid request', details: error.errors });
}

/**
 * Map domain errors onto HTTP responses
 */
export function sendServiceError(res: Response, error: unknown, action: string): void {
  if (error instanceof SourceNotFoundError) {
    res.status(404).json({
      error: 'Source not found',
      sourceId: error.sourceId,
      sourceType: error.sourceType,
    });
    return;
  }

  if (error instanceof IndexingError) {
    logger.error({ err: error.cause, sourceId: error.sourceId }, `${action} failed during indexing`);
    res.status(502).json({
      error: 'Indexing failed',
      message: error.message,
      transcriptSaved: error.transcriptSaved,
      retryable: error.retryable,
    });
    return;
  }

  if (error instanceof ProviderError) {
    logger.error({ code: error.code, provider: error.provider }, `${action} failed at provider`);
    res.status(502).json({
      error: 'Provider error',
      code: error.code,
      provider: error.provider,
      message: error.message,
      retryable: error.retryable,
    });
    return;
  }

  if (error instanceof IndexUnavailableError) {
    logger.error({ operation: error.operation }, `${action} failed: vector index unavailable`);
    res.status(503).json({
      error: 'Vector index unavailable',
      operation: error.operation,
      retryable: true,
    });
    return;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.error({ errorMessage }, `${action} failed`);
  res.status(500).json({ error: `Failed to ${action}`, message: errorMessage });
}

function parseSourceParams(req: Request, res: Response): { sourceId: string; sourceType: SourceType } | null {
  const parsed = SourceParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    sendValidationError(res, parsed.error);
    return null;
  }
  return parsed.data;
}

// ============================================================================
// ROUTE FACTORY
// ============================================================================

export function createTranscriptRoutes(service: TranscriptSearchService): Router {
  const router = Router();

  /**
   * POST /api/transcripts/sources
   * Save a transcribed source and index its segments
   */
  router.post('/sources', async (req: Request, res: Response) => {
    const parsed = IndexSourceSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await service.indexSource(parsed.data);
      logger.info({ sourceId: parsed.data.sourceId, ...result }, 'Source indexed');
      res.status(201).json({ success: true, ...result });
    } catch (error) {
      sendServiceError(res, error, 'index source');
    }
  });

  /**
   * GET /api/transcripts/sources?sourceType=youtube
   */
  router.get('/sources', async (req: Request, res: Response) => {
    const parsed = ListSourcesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const sources = await service.listSources(parsed.data.sourceType);
      res.json({ success: true, sources, count: sources.length });
    } catch (error) {
      sendServiceError(res, error, 'list sources');
    }
  });

  /**
   * POST /api/transcripts/sources/:sourceType/:sourceId/summary
   * Store a markdown summary and replace its summary documents
   */
  router.post('/sources/:sourceType/:sourceId/summary', async (req: Request, res: Response) => {
    const params = parseSourceParams(req, res);
    if (!params) return;

    const parsed = IndexSummarySchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await service.indexSummary({
        ...params,
        summary: parsed.data.summary,
        ...(parsed.data.createdAt ? { createdAt: parsed.data.createdAt } : {}),
      });
      res.json({ success: true, ...result });
    } catch (error) {
      sendServiceError(res, error, 'index summary');
    }
  });

  /**
   * GET /api/transcripts/sources/:sourceType/:sourceId/summary
   */
  router.get('/sources/:sourceType/:sourceId/summary', async (req: Request, res: Response) => {
    const params = parseSourceParams(req, res);
    if (!params) return;

    try {
      const summary = await service.getSummary(params.sourceId, params.sourceType);
      if (summary === null) {
        res.status(404).json({ error: 'Summary not found' });
        return;
      }
      res.json({ success: true, summary });
    } catch (error) {
      sendServiceError(res, error, 'get summary');
    }
  });

  /**
   * GET /api/transcripts/sources/:sourceType/:sourceId/status
   * Record presence and indexed document counts
   */
  router.get('/sources/:sourceType/:sourceId/status', async (req: Request, res: Response) => {
    const params = parseSourceParams(req, res);
    if (!params) return;

    try {
      const status = await service.getSourceStatus(params.sourceId, params.sourceType);
      res.json({ success: true, ...status });
    } catch (error) {
      sendServiceError(res, error, 'get source status');
    }
  });

  /**
   * PATCH /api/transcripts/sources/:sourceType/:sourceId/title
   */
  router.patch('/sources/:sourceType/:sourceId/title', async (req: Request, res: Response) => {
    const params = parseSourceParams(req, res);
    if (!params) return;

    const parsed = UpdateTitleSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const result = await service.updateTitle(params.sourceId, params.sourceType, parsed.data.title);
      res.json({ success: true, ...result });
    } catch (error) {
      sendServiceError(res, error, 'update title');
    }
  });

  /**
   * POST /api/transcripts/sources/:sourceType/:sourceId/reindex
   * Rebuild index documents from the stored transcript and summary
   */
  router.post('/sources/:sourceType/:sourceId/reindex', async (req: Request, res: Response) => {
    const params = parseSourceParams(req, res);
    if (!params) return;

    try {
      const result = await service.reindexSource(params.sourceId, params.sourceType);
      res.json({ success: true, ...result });
    } catch (error) {
      sendServiceError(res, error, 'reindex source');
    }
  });

  /**
   * DELETE /api/transcripts/sources/:sourceType/:sourceId
   */
  router.delete('/sources/:sourceType/:sourceId', async (req: Request, res: Response) => {
    const params = parseSourceParams(req, res);
    if (!params) return;

    try {
      const result = await service.removeSource(params.sourceId, params.sourceType);
      logger.info({ ...params, ...result }, 'Source removed');
      res.json({ success: true, ...result });
    } catch (error) {
      sendServiceError(res, error, 'remove source');
    }
  });

  /**
   * POST /api/transcripts/search
   */
  router.post('/search', async (req: Request, res: Response) => {
    const parsed = SearchSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const { query, ...options } = parsed.data;
      const results = await service.search(query, options);
      res.json({ success: true, results, count: results.length });
    } catch (error) {
      sendServiceError(res, error, 'search');
    }
  });

  /**
   * POST /api/transcripts/ask
   * Two-stage question answering over summaries and transcript chunks
   */
  router.post('/ask', async (req: Request, res: Response) => {
    const parsed = AskSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const { question, ...options } = parsed.data;
      const result = await service.ask(question, options);
      res.json({ success: true, ...result });
    } catch (error) {
      sendServiceError(res, error, 'answer question');
    }
  });

  return router;
}
