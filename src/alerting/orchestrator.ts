/**
 * Alert Orchestrator
 *
 * Runs one evaluation pass over a snapshot: every rule whose metric is present
 * goes through the {@link CooldownGate}, and every opened gate becomes an
 * {@link AlertEvent} handed to the dispatcher. The pass resolves as soon as
 * the gate decisions are made; delivery happens in the background.
 *
 * @module alerting/orchestrator
 */

import type { Logger } from '../logging/index.js';
import type { MetricSnapshot } from '../metrics/snapshot.js';
import type { CooldownGate } from './cooldownGate.js';
import type { AlertDispatcher } from './dispatcher.js';
import { monotonicNow, type AlertEvent, type AlertRule, type MonotonicClock } from './types.js';

export interface AlertOrchestrator {
  /**
   * Evaluate `snapshot` against `rules` and return the events handed to the
   * dispatcher. An event dropped at dispatcher capacity still consumes its
   * cooldown but is left out of the result.
   */
  evaluateAndDispatch(
    snapshot: MetricSnapshot,
    rules: readonly AlertRule[],
  ): Promise<readonly AlertEvent[]>;
}

export interface AlertOrchestratorOptions {
  gate: CooldownGate;
  dispatcher: AlertDispatcher;
  logger: Logger;
  /** When false every pass is a no-op. Defaults to true. */
  enabled?: boolean;
  /** Clock for cooldown decisions. Defaults to `performance.now()`. */
  clock?: MonotonicClock;
  /** Clock for the event's `firedAt`. Defaults to `() => new Date()`. */
  wallClock?: () => Date;
}

export function createAlertOrchestrator(options: AlertOrchestratorOptions): AlertOrchestrator {
  const { gate, dispatcher } = options;
  const enabled = options.enabled ?? true;
  const clock = options.clock ?? monotonicNow;
  const wallClock = options.wallClock ?? (() => new Date());
  const logger = options.logger.child({ component: 'orchestrator' });

  return {
    async evaluateAndDispatch(
      snapshot: MetricSnapshot,
      rules: readonly AlertRule[],
    ): Promise<readonly AlertEvent[]> {
      if (!enabled) return [];

      const now = clock();
      const fired: AlertEvent[] = [];

      for (const rule of rules) {
        const value = snapshot.values.get(rule.metricId);
        if (value === undefined) continue;

        const open = await gate.shouldFire(rule.metricId, value, rule, now);
        if (!open) {
          logger.debug('alert not fired', { metricId: rule.metricId, value });
          continue;
        }

        const event: AlertEvent = {
          metricId: rule.metricId,
          currentValue: value,
          threshold: rule.threshold,
          firedAt: wallClock(),
        };
        if (!dispatcher.dispatch(event)) {
          logger.warn('alert fired but not dispatched', { metricId: rule.metricId, value });
          continue;
        }
        fired.push(event);
      }

      return fired;
    },
  };
}
