/**
 * Metric Sampler
 *
 * Reads host stats from a {@link MetricsProvider} and turns them into a
 * {@link MetricSnapshot} for alert evaluation. Any provider failure or
 * malformed reading is reported as a {@link MetricsUnavailableError}; the
 * sampler never retries and never fabricates partial data.
 *
 * @module metrics/sampler
 */

import { MetricsUnavailableError } from '../errors/index.js';
import { createSnapshot, type MetricSnapshot } from './snapshot.js';
import type { MetricId, MetricsProvider, SystemStats } from './types.js';

export interface SampledStats {
  stats: SystemStats;
  snapshot: MetricSnapshot;
}

export interface MetricSampler {
  sample(): Promise<MetricSnapshot>;
  /** Like {@link MetricSampler.sample} but also returns the raw stats of the same read. */
  sampleWithStats(): Promise<SampledStats>;
}

// ─── Validation ──────────────────────────────────────────────────────────────

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Extract the alertable percentages from a stats reading.
 * Throws {@link MetricsUnavailableError} naming every malformed field.
 */
export function extractMetricValues(stats: SystemStats): Array<[MetricId, number]> {
  const candidates: Array<[MetricId, string, unknown]> = [
    ['cpu', 'cpu_percent', stats.cpu_percent],
    ['memory', 'memory.percent', stats.memory?.percent],
    ['disk', 'disk.percent', stats.disk?.percent],
  ];

  const malformed = candidates.filter(([, , value]) => !isFiniteNumber(value)).map(([, f]) => f);
  if (malformed.length > 0) {
    throw new MetricsUnavailableError(`Provider returned malformed fields: ${malformed.join(', ')}`);
  }

  const values: Array<[MetricId, number]> = [];
  for (const [id, , value] of candidates) {
    if (isFiniteNumber(value)) values.push([id, value]);
  }
  return values;
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export interface MetricSamplerOptions {
  provider: MetricsProvider;
  /** Wall clock for the snapshot timestamp. Defaults to `() => new Date()`. */
  clock?: () => Date;
}

export function createMetricSampler(options: MetricSamplerOptions): MetricSampler {
  const { provider } = options;
  const clock = options.clock ?? (() => new Date());

  async function read(): Promise<SampledStats> {
    let stats: SystemStats;
    try {
      stats = await provider.getSystemStats();
    } catch (err) {
      if (err instanceof MetricsUnavailableError) throw err;
      throw new MetricsUnavailableError('Metrics provider could not be read', err);
    }

    const raw: unknown = stats;
    if (typeof raw !== 'object' || raw === null) {
      throw new MetricsUnavailableError('Metrics provider returned no data');
    }

    const snapshot = createSnapshot(clock(), extractMetricValues(stats));
    return { stats, snapshot };
  }

  return {
    async sample(): Promise<MetricSnapshot> {
      const { snapshot } = await read();
      return snapshot;
    },

    sampleWithStats(): Promise<SampledStats> {
      return read();
    },
  };
}
