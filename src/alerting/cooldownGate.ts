/**
 * Cooldown Gate
 *
 * Combines the threshold check with {@link AlertState} to decide whether a
 * sample should fire a notification now or be suppressed.
 *
 * @module alerting/cooldownGate
 */

import type { MetricId } from '../metrics/types.js';
import type { AlertState } from './alertState.js';
import { exceeds } from './thresholdEvaluator.js';
import type { AlertRule } from './types.js';

/**
 * Whether the cooldown since `last` has run out at `now`.
 * An unrecorded metric is always eligible. With a cooldown of 0 any later
 * instant is eligible, but a second call at the same instant is not.
 */
export function cooldownElapsed(last: number | undefined, now: number, cooldownMs: number): boolean {
  if (last === undefined) return true;
  return now - last > cooldownMs;
}

export class CooldownGate {
  constructor(private readonly state: AlertState) {}

  /**
   * Decide whether `currentValue` should fire for `metricId` at monotonic
   * instant `now`, recording `now` as the last alert when it does.
   *
   * Values under the threshold return false without taking the lock or
   * touching state.
   */
  async shouldFire(
    metricId: MetricId,
    currentValue: number,
    rule: AlertRule,
    now: number,
  ): Promise<boolean> {
    if (!exceeds(currentValue, rule.threshold)) return false;

    return this.state.runExclusive(metricId, (entry) => {
      if (!cooldownElapsed(entry.lastAlertAt, now, rule.cooldownMs)) return false;
      entry.record(now);
      return true;
    });
  }
}
