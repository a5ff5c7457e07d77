/**
 * Logger Module
 *
 * Centralized logging for the playlist curator.
 */

export {
  Logger,
  createLogger,
  formatError,
  getLogLevel,
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from './logger';
