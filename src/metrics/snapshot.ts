/**
 * Immutable record of one sampling pass.
 *
 * @module metrics/snapshot
 */

import type { MetricId } from './types.js';

export interface MetricSnapshot {
  readonly timestamp: Date;
  readonly values: ReadonlyMap<MetricId, number>;
}

/**
 * Build a frozen snapshot. The input entries are copied so later changes to
 * the caller's map cannot leak into the snapshot.
 */
export function createSnapshot(
  timestamp: Date,
  values: Iterable<readonly [MetricId, number]>,
): MetricSnapshot {
  return Object.freeze({
    timestamp: new Date(timestamp.getTime()),
    values: new Map(values),
  });
}
