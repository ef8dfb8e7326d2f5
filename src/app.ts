/**
 * Express application factory with dependency injection.
 *
 * Middleware is wired in order:
 * 1. Request logging (correlation ID, timing)
 * 2. Host metrics routes under /api
 * 3. JSON 404 for unmatched routes
 * 4. Global error handling
 *
 * The factory takes every collaborator as a parameter so tests can swap in
 * fake providers and notifiers.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { AlertOrchestrator } from './alerting/orchestrator.js';
import type { AlertRule } from './alerting/types.js';
import { MetricsUnavailableError, toError } from './errors/index.js';
import type { Logger } from './logging/index.js';
import { getCorrelationId, getRequestLogger, requestLogger } from './middleware/requestLogger.js';
import type { MetricSampler } from './metrics/sampler.js';
import type { MetricsProvider } from './metrics/types.js';
import { createSystemRoutes } from './routes/systemRoutes.js';
import {
  formatInternalError,
  formatMetricsUnavailable,
  formatNotFound,
  getHttpStatusForError,
} from './utils/responses.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

/** All dependencies required to create the Express application. */
export interface AppDependencies {
  /** Source of raw host counters. */
  provider: MetricsProvider;

  /** Sampler feeding the alert pass on /api/system-stats. */
  sampler: MetricSampler;

  /** Alert evaluation pass. */
  orchestrator: AlertOrchestrator;

  /** Configured alert rules. */
  rules: readonly AlertRule[];

  /** Name reported by /api/health and in logs. */
  serviceName: string;

  logger: Logger;

  /** Wall clock for response timestamps. */
  clock?: () => Date;
}

// ─── Application Factory ────────────────────────────────────────────────────

/**
 * Create a configured Express application.
 *
 * @param deps - All injected dependencies
 * @returns A fully configured Express application
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger(deps.logger));

  app.use(
    '/api',
    createSystemRoutes({
      provider: deps.provider,
      sampler: deps.sampler,
      orchestrator: deps.orchestrator,
      rules: deps.rules,
      serviceName: deps.serviceName,
      logger: deps.logger,
      clock: deps.clock,
    }),
  );

  app.use((req: Request, res: Response) => {
    res.status(404).json(formatNotFound(req.path, getCorrelationId(res)));
  });

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const logger = getRequestLogger(res, deps.logger);
    const requestId = getCorrelationId(res);

    if (err instanceof MetricsUnavailableError) {
      logger.warn('metrics unavailable', { path: req.path, reason: err.message });
      res.status(getHttpStatusForError(err.code)).json(formatMetricsUnavailable(requestId));
      return;
    }

    logger.error('unhandled error', toError(err), { path: req.path });
    res.status(500).json(formatInternalError(requestId));
  });

  return app;
}
