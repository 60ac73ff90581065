/**
 * Logging service exports
 */

export {
  logger,
  createSourceLogger,
  createLogger,
  logStartup,
  logShutdown,
} from './logger.js';

export {
  loggers,
  startTimer,
  type IndexOperation,
} from './log-helpers.js';
