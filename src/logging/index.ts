/**
 * Logging Module
 *
 * Structured JSON logging for the hostwatch service.
 */

export {
  LOG_LEVELS,
  type LogLevel,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  createLogger,
  isLogLevel,
} from './logger.js';
