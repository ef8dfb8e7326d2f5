/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and child
 * loggers. Every entry is a single JSON line carrying the service name and a
 * correlation ID so request and background-dispatch logs can be joined.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  component?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Output sink for log entries. Defaults to one JSON line on stdout.
 * Replaced in tests to capture entries.
 */
export type LogOutput = (entry: LogEntry) => void;

const defaultLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every log entry. Defaults to 'hostwatch'. */
  service?: string;
  /** Minimum log level to emit. Defaults to 'info'. */
  level?: LogLevel;
  /** Base context merged into every log entry. */
  context?: LogContext;
  /** Custom output sink. Defaults to JSON on stdout. */
  output?: LogOutput;
}

// ─── Implementation ──────────────────────────────────────────────────────────

function describeError(error: Error): ErrorInfo {
  const info: ErrorInfo = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if ('code' in error && typeof error.code === 'string') {
    info.code = error.code;
  }
  return info;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'hostwatch';
  const minLevel = options.level ?? 'info';
  const baseContext: LogContext = {
    ...options.context,
  };
  if (!baseContext.correlationId) {
    baseContext.correlationId = randomUUID();
  }
  if (!baseContext.service) {
    baseContext.service = service;
  }
  const output = options.output ?? defaultLogOutput;

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: baseContext.service ?? service,
      correlationId: baseContext.correlationId ?? '',
    };

    if (baseContext.component) entry.component = baseContext.component;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;
    if (error) entry.error = describeError(error);

    return entry;
  }

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message: string, metadata?: LogMetadata): void {
      log('debug', message, undefined, metadata);
    },
    info(message: string, metadata?: LogMetadata): void {
      log('info', message, undefined, metadata);
    },
    warn(message: string, metadata?: LogMetadata): void {
      log('warn', message, undefined, metadata);
    },
    error(message: string, error?: Error, metadata?: LogMetadata): void {
      log('error', message, error, metadata);
    },
    fatal(message: string, error?: Error, metadata?: LogMetadata): void {
      log('fatal', message, error, metadata);
    },
    child(context: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...baseContext, ...context },
        output,
      });
    },
  };
}
