/**
 * HTTP request logging middleware
 * Logs incoming requests and completed responses with duration
 */

import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import { logger } from '../services/logging/logger.js';

/**
 * Request logger middleware. The request id is kept in res.locals for
 * the error logger.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startTime = Date.now();
  const requestId = `req_${randomUUID()}`;
  res.locals.requestId = requestId;

  logger.debug({
    category: 'http',
    event: 'request_received',
    requestId,
    method: req.method,
    path: req.path,
    ip: req.ip,
  }, `${req.method} ${req.path}`);

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = getLogLevel(res.statusCode);

    logger[level]({
      category: 'http',
      event: 'request_completed',
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration_ms: duration,
    }, `${req.method} ${req.path} ${res.statusCode} (${duration}ms)`);
  });

  next();
}

function getLogLevel(statusCode: number): 'info' | 'warn' | 'error' {
  if (statusCode >= 500) {
    return 'error';
  }
  if (statusCode >= 400) {
    return 'warn';
  }
  return 'info';
}

/**
 * Final error handler: logs and answers 500 (400 for malformed JSON bodies)
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const requestId = typeof res.locals.requestId === 'string' ? res.locals.requestId : 'unknown';

  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  logger.error({
    category: 'http',
    event: 'unhandled_error',
    requestId,
    method: req.method,
    path: req.path,
    error: {
      message: err.message,
      stack: err.stack,
      name: err.name,
    },
  }, `Unhandled error: ${err.message}`);

  res.status(500).json({
    error: 'Internal server error',
    message: process.env.NODE_ENV === 'development' ? err.message : undefined,
  });
}
