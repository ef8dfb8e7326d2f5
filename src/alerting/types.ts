/**
 * Alerting data types.
 *
 * @module alerting/types
 */

import type { MetricId } from '../metrics/types.js';

/** Threshold and cooldown for one metric. Immutable after configuration load. */
export interface AlertRule {
  readonly metricId: MetricId;
  /** Percentage (0–100) the value must reach or exceed. */
  readonly threshold: number;
  /** Minimum interval between two alerts for the metric, in milliseconds. */
  readonly cooldownMs: number;
}

/** A notification-worthy threshold crossing, built when the gate opens. */
export interface AlertEvent {
  readonly metricId: MetricId;
  readonly currentValue: number;
  readonly threshold: number;
  readonly firedAt: Date;
}

/**
 * Monotonic millisecond clock used for cooldown decisions. Never a wall clock:
 * system time adjustments must not reopen a cooling-down gate.
 */
export type MonotonicClock = () => number;

export const monotonicNow: MonotonicClock = () => performance.now();
