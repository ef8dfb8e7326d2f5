/**
 * Alert State
 *
 * Last-alert instants per metric for the life of the process. One instance is
 * created at startup and injected; nothing here is module-global.
 *
 * All mutation goes through {@link AlertState.runExclusive}, which serialises
 * callers per metric id. The gate's read-check-write sequence runs inside it,
 * so two concurrent requests cannot both observe an expired cooldown.
 *
 * @module alerting/alertState
 */

import type { MetricId } from '../metrics/types.js';
import { Mutex } from './mutex.js';

/** Read/write view handed to a critical section. Valid only inside it. */
export interface AlertStateEntry {
  /** Monotonic instant of the last alert, or undefined if the metric never fired. */
  readonly lastAlertAt: number | undefined;
  /** Record a new alert instant. Instants earlier than the recorded one are rejected. */
  record(at: number): void;
}

export class AlertState {
  private readonly lastAlertAt = new Map<MetricId, number>();
  private readonly locks = new Map<MetricId, Mutex>();

  /** Last recorded alert instant for a metric. */
  get(metricId: MetricId): number | undefined {
    return this.lastAlertAt.get(metricId);
  }

  /** Copy of every recorded instant. */
  entries(): ReadonlyMap<MetricId, number> {
    return new Map(this.lastAlertAt);
  }

  /**
   * Run `fn` with exclusive access to the metric's entry. Other calls for
   * the same metric wait; calls for other metrics proceed.
   */
  runExclusive<T>(
    metricId: MetricId,
    fn: (entry: AlertStateEntry) => T | Promise<T>,
  ): Promise<T> {
    const instants = this.lastAlertAt;
    return this.lockFor(metricId).runExclusive(() => {
      const entry: AlertStateEntry = {
        get lastAlertAt() {
          return instants.get(metricId);
        },
        record(at: number) {
          const previous = instants.get(metricId);
          if (previous !== undefined && at < previous) {
            throw new RangeError(
              `Alert instant for ${metricId} moved backwards: ${at} < ${previous}`,
            );
          }
          instants.set(metricId, at);
        },
      };
      return fn(entry);
    });
  }

  private lockFor(metricId: MetricId): Mutex {
    let lock = this.locks.get(metricId);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(metricId, lock);
    }
    return lock;
  }
}
