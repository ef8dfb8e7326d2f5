/**
 * Request logging middleware.
 *
 * Assigns every request a correlation ID (reusing the caller's
 * `x-correlation-id` header when present), echoes it on the response, and
 * logs request start and completion with the response status and duration.
 *
 * @module middleware/requestLogger
 */

import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logging/index.js';

export const CORRELATION_HEADER = 'x-correlation-id';

function getOrCreateCorrelationId(req: Request): string {
  const existing = req.get(CORRELATION_HEADER);
  if (existing && existing.length > 0) return existing;
  return randomUUID();
}

/** The correlation ID assigned by {@link requestLogger}, if it ran. */
export function getCorrelationId(res: Response): string | undefined {
  const value: unknown = res.locals['correlationId'];
  return typeof value === 'string' ? value : undefined;
}

/** The request-scoped logger assigned by {@link requestLogger}, or `fallback`. */
export function getRequestLogger(res: Response, fallback: Logger): Logger {
  const value: unknown = res.locals['logger'];
  return isLogger(value) ? value : fallback;
}

function isLogger(value: unknown): value is Logger {
  return typeof value === 'object' && value !== null && 'child' in value && 'info' in value;
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = getOrCreateCorrelationId(req);
    const child = logger.child({ correlationId, component: 'http' });
    res.locals['correlationId'] = correlationId;
    res.locals['logger'] = child;
    res.setHeader(CORRELATION_HEADER, correlationId);

    const start = Date.now();
    const method = req.method;
    const url = req.originalUrl;

    child.debug('request started', { method, url });

    res.on('finish', () => {
      child.info('request completed', {
        method,
        url,
        statusCode: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    next();
  };
}
