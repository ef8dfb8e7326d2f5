/**
 * Host metrics routes.
 *
 * All routes are read-only JSON. `GET /system-stats` additionally runs one
 * alert evaluation pass over the sampled values; a failing pass is logged
 * and never changes the response.
 *
 * @module routes/systemRoutes
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';

import type { AlertOrchestrator } from '../alerting/orchestrator.js';
import type { AlertRule } from '../alerting/types.js';
import { toError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import { getRequestLogger } from '../middleware/requestLogger.js';
import type { MetricSampler } from '../metrics/sampler.js';
import type { MetricsProvider } from '../metrics/types.js';

export interface SystemRoutesDependencies {
  provider: MetricsProvider;
  sampler: MetricSampler;
  orchestrator: AlertOrchestrator;
  rules: readonly AlertRule[];
  serviceName: string;
  logger: Logger;
  /** Wall clock for the health payload. Defaults to `() => new Date()`. */
  clock?: () => Date;
}

export function createSystemRoutes(deps: SystemRoutesDependencies): Router {
  const router = Router();
  const clock = deps.clock ?? (() => new Date());

  // GET /system-stats (samples and evaluates alerts)
  router.get('/system-stats', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { stats, snapshot } = await deps.sampler.sampleWithStats();

      try {
        await deps.orchestrator.evaluateAndDispatch(snapshot, deps.rules);
      } catch (err) {
        getRequestLogger(res, deps.logger).error('alert evaluation failed', toError(err));
      }

      res.status(200).json(stats);
    } catch (err) {
      next(err);
    }
  });

  // GET /processes
  router.get('/processes', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(await deps.provider.getProcesses());
    } catch (err) {
      next(err);
    }
  });

  // GET /disk
  router.get('/disk', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(await deps.provider.getDiskInfo());
    } catch (err) {
      next(err);
    }
  });

  // GET /network
  router.get('/network', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.status(200).json(await deps.provider.getNetworkCounters());
    } catch (err) {
      next(err);
    }
  });

  // GET /health
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: clock().toISOString(),
      service: deps.serviceName,
    });
  });

  return router;
}
