/**
 * Unit tests for the metric sampler.
 */

import { describe, it, expect } from 'vitest';
import { MetricsUnavailableError } from '../errors/index.js';
import { createMetricSampler, extractMetricValues } from './sampler.js';
import { createFakeMetricsProvider, makeSystemStats } from '../test/fakes.js';

const NOW = new Date('2026-01-15T10:00:05.000Z');

describe('extractMetricValues', () => {
  it('reads cpu, memory and disk percentages', () => {
    expect(extractMetricValues(makeSystemStats())).toEqual([
      ['cpu', 42.5],
      ['memory', 55],
      ['disk', 60],
    ]);
  });

  it('names every malformed field', () => {
    const stats = makeSystemStats({
      cpu_percent: Number.NaN,
      disk: { total: 0, used: 0, free: 0, percent: Number.POSITIVE_INFINITY },
    });

    expect(() => extractMetricValues(stats)).toThrow(
      'Provider returned malformed fields: cpu_percent, disk.percent',
    );
  });
});

describe('createMetricSampler', () => {
  it('builds a snapshot from one provider read', async () => {
    const provider = createFakeMetricsProvider();
    const sampler = createMetricSampler({ provider, clock: () => NOW });

    const snapshot = await sampler.sample();

    expect(snapshot.timestamp).toEqual(NOW);
    expect(snapshot.values.get('cpu')).toBe(42.5);
    expect(snapshot.values.get('memory')).toBe(55);
    expect(snapshot.values.get('disk')).toBe(60);
    expect(provider.statsReads).toBe(1);
  });

  it('returns the raw stats alongside the snapshot of the same read', async () => {
    const provider = createFakeMetricsProvider(makeSystemStats({ cpu_percent: 97 }));
    const sampler = createMetricSampler({ provider, clock: () => NOW });

    const { stats, snapshot } = await sampler.sampleWithStats();

    expect(stats.cpu_percent).toBe(97);
    expect(snapshot.values.get('cpu')).toBe(97);
    expect(provider.statsReads).toBe(1);
  });

  it('wraps provider errors as MetricsUnavailableError', async () => {
    const provider = createFakeMetricsProvider();
    const cause = new Error('EACCES');
    provider.failure = cause;
    const sampler = createMetricSampler({ provider });

    const error = await sampler.sample().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MetricsUnavailableError);
    if (error instanceof MetricsUnavailableError) {
      expect(error.message).toBe('Metrics provider could not be read');
      expect(error.cause).toBe(cause);
    }
  });

  it('passes MetricsUnavailableError through unchanged', async () => {
    const provider = createFakeMetricsProvider();
    const original = new MetricsUnavailableError('No filesystem is mounted at /');
    provider.failure = original;

    await expect(createMetricSampler({ provider }).sample()).rejects.toBe(original);
  });

  it('rejects malformed readings instead of sampling partial data', async () => {
    const provider = createFakeMetricsProvider(makeSystemStats({ cpu_percent: Number.NaN }));

    await expect(createMetricSampler({ provider }).sample()).rejects.toThrow(
      'Provider returned malformed fields: cpu_percent',
    );
  });
});
