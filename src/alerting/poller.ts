/**
 * Alert Poller
 *
 * Samples on a fixed interval and runs an evaluation pass, so thresholds are
 * checked even when nobody is calling the stats API. A tick that comes due
 * while the previous one is still running is skipped.
 *
 * @module alerting/poller
 */

import { toError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import type { MetricSampler } from '../metrics/sampler.js';
import type { AlertOrchestrator } from './orchestrator.js';
import type { AlertRule } from './types.js';

export interface AlertPoller {
  start(): void;
  stop(): void;
  /** Run one sampling and evaluation pass. Never rejects. */
  tick(): Promise<void>;
  readonly running: boolean;
}

export interface AlertPollerOptions {
  sampler: MetricSampler;
  orchestrator: AlertOrchestrator;
  rules: readonly AlertRule[];
  intervalMs: number;
  logger: Logger;
}

export function createAlertPoller(options: AlertPollerOptions): AlertPoller {
  const { sampler, orchestrator, rules, intervalMs } = options;
  if (intervalMs <= 0) throw new Error('Poll interval must be positive');

  const logger = options.logger.child({ component: 'poller' });
  let timer: NodeJS.Timeout | undefined;
  let busy = false;

  async function tick(): Promise<void> {
    if (busy) {
      logger.debug('poll skipped: previous pass still running');
      return;
    }

    busy = true;
    try {
      const snapshot = await sampler.sample();
      const fired = await orchestrator.evaluateAndDispatch(snapshot, rules);
      if (fired.length > 0) {
        logger.info('poll fired alerts', { metrics: fired.map((e) => e.metricId) });
      }
    } catch (err) {
      logger.warn('poll failed', { error: toError(err).message });
    } finally {
      busy = false;
    }
  }

  return {
    start(): void {
      if (timer) return;
      timer = setInterval(() => {
        void tick();
      }, intervalMs);
      timer.unref();
      logger.info('poller started', { intervalMs });
    },

    stop(): void {
      if (!timer) return;
      clearInterval(timer);
      timer = undefined;
      logger.info('poller stopped');
    },

    tick,

    get running(): boolean {
      return timer !== undefined;
    },
  };
}
