/**
 * Application logger using Pino
 * Structured logging with source context for indexing and retrieval
 */

import pino from 'pino';
import type { SourceType } from '../../types/transcript.js';

/**
 * Development transport configuration with pretty printing
 */
const developmentTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{levelLabel} - {msg}',
  },
};

/**
 * Production logger configuration (JSON format for log aggregation)
 */
const productionConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      hostname: bindings.hostname,
      node_version: process.version,
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env.NODE_ENV,
  },
};

const developmentConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'debug',
  transport: developmentTransport,
};

// Tests log plain JSON at the configured level; the pretty transport spawns a worker
const testConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'silent',
};

function selectConfig(): pino.LoggerOptions {
  switch (process.env.NODE_ENV) {
    case 'production':
      return productionConfig;
    case 'test':
      return testConfig;
    default:
      return developmentConfig;
  }
}

/**
 * Main logger instance
 */
export const logger = pino(selectConfig());

/**
 * Child logger bound to one source
 */
export function createSourceLogger(sourceId: string, sourceType: SourceType) {
  return logger.child({ sourceId, sourceType, context: 'source' });
}

/**
 * Create a child logger with custom context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export function logStartup(port: number | string) {
  logger.info(
    {
      port,
      nodeEnv: process.env.NODE_ENV,
      nodeVersion: process.version,
      logLevel: logger.level,
    },
    'Server starting'
  );
}

export function logShutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully');
}
