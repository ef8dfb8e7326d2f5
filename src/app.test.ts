/**
 * Unit tests for the Express application factory (src/app.ts).
 *
 * Wires the real sampler, gate and dispatcher around a fake metrics provider
 * and a recording notifier to verify:
 * - Every endpoint returns the provider's data
 * - /api/system-stats runs an alert pass without delaying the response
 * - Provider failures map to 503, unknown routes to 404
 * - Correlation IDs are echoed on responses and error bodies
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from './app.js';
import { AlertState } from './alerting/alertState.js';
import { CooldownGate } from './alerting/cooldownGate.js';
import { createAlertDispatcher, type AlertDispatcher } from './alerting/dispatcher.js';
import { createAlertOrchestrator, type AlertOrchestrator } from './alerting/orchestrator.js';
import type { Notifier } from './alerting/notifiers.js';
import { MetricsUnavailableError } from './errors/index.js';
import type { LogEntry } from './logging/index.js';
import { CORRELATION_HEADER } from './middleware/requestLogger.js';
import { createMetricSampler } from './metrics/sampler.js';
import {
  SAMPLE_DISK,
  SAMPLE_NETWORK,
  SAMPLE_PROCESSES,
  createCapturingLogger,
  createFakeMetricsProvider,
  createFailingNotifier,
  createRecordingNotifier,
  makeRule,
  makeSystemStats,
  type FakeMetricsProvider,
} from './test/fakes.js';

const NOW = new Date('2026-01-15T10:00:00.000Z');

const RULES = [
  makeRule({ metricId: 'cpu', threshold: 90 }),
  makeRule({ metricId: 'memory', threshold: 90 }),
  makeRule({ metricId: 'disk', threshold: 90 }),
];

// ─── Harness ─────────────────────────────────────────────────────────────────

interface Harness {
  app: Express;
  provider: FakeMetricsProvider;
  dispatcher: AlertDispatcher;
  state: AlertState;
  entries: LogEntry[];
}

function buildApp(
  options: { notifier?: Notifier; orchestrator?: AlertOrchestrator; clock?: () => number } = {},
): Harness {
  const { logger, entries } = createCapturingLogger();
  const provider = createFakeMetricsProvider();
  const state = new AlertState();
  const dispatcher = createAlertDispatcher({
    notifier: options.notifier ?? createRecordingNotifier(),
    logger,
    timeoutMs: 1000,
    maxInFlight: 8,
  });
  const orchestrator =
    options.orchestrator ??
    createAlertOrchestrator({
      gate: new CooldownGate(state),
      dispatcher,
      logger,
      clock: options.clock ?? (() => 0),
      wallClock: () => NOW,
    });

  const app = createApp({
    provider,
    sampler: createMetricSampler({ provider, clock: () => NOW }),
    orchestrator,
    rules: RULES,
    serviceName: 'hostwatch-test',
    logger,
    clock: () => NOW,
  });

  return { app, provider, dispatcher, state, entries };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('createApp', () => {
  let h: Harness;

  beforeEach(() => {
    h = buildApp();
  });

  describe('GET /api/system-stats', () => {
    it('returns the sampled stats', async () => {
      const res = await request(h.app).get('/api/system-stats');

      expect(res.status).toBe(200);
      expect(res.body).toEqual(makeSystemStats());
      expect(h.provider.statsReads).toBe(1);
    });

    it('fires an alert when a metric crosses its threshold', async () => {
      const notifier = createRecordingNotifier();
      h = buildApp({ notifier });
      h.provider.stats = makeSystemStats({ cpu_percent: 96.5 });

      const res = await request(h.app).get('/api/system-stats');
      await h.dispatcher.drain();

      expect(res.status).toBe(200);
      expect(res.body.cpu_percent).toBe(96.5);
      expect(notifier.events).toEqual([
        { metricId: 'cpu', currentValue: 96.5, threshold: 90, firedAt: NOW },
      ]);
      expect(h.state.get('cpu')).toBe(0);
    });

    it('suppresses a second alert inside the cooldown', async () => {
      const notifier = createRecordingNotifier();
      let now = 0;
      h = buildApp({ notifier, clock: () => now });
      h.provider.stats = makeSystemStats({ cpu_percent: 95 });

      await request(h.app).get('/api/system-stats');
      now = 60_000;
      await request(h.app).get('/api/system-stats');
      await h.dispatcher.drain();

      expect(notifier.events).toHaveLength(1);
    });

    it('responds 200 even when alert delivery fails', async () => {
      const notifier = createFailingNotifier();
      h = buildApp({ notifier });
      h.provider.stats = makeSystemStats({ cpu_percent: 99 });

      const res = await request(h.app).get('/api/system-stats');
      await h.dispatcher.drain();

      expect(res.status).toBe(200);
      expect(notifier.attempts).toBe(1);
      expect(h.state.get('cpu')).toBe(0);
    });

    it('responds 200 when the alert pass itself throws', async () => {
      const evaluateAndDispatch = vi.fn().mockRejectedValue(new Error('gate exploded'));
      h = buildApp({ orchestrator: { evaluateAndDispatch } });

      const res = await request(h.app).get('/api/system-stats');

      expect(res.status).toBe(200);
      const logged = h.entries.find((e) => e.message === 'alert evaluation failed');
      expect(logged?.error?.message).toBe('gate exploded');
    });

    it('returns 503 when the provider fails', async () => {
      h.provider.failure = new Error('EACCES');

      const res = await request(h.app).get('/api/system-stats');

      expect(res.status).toBe(503);
      expect(res.body.success).toBe(false);
      expect(res.body.error).toEqual({
        code: 'METRICS_UNAVAILABLE',
        message: 'Host metrics are currently unavailable.',
      });
    });
  });

  describe('read-only endpoints', () => {
    it('GET /api/processes returns the process list', async () => {
      const res = await request(h.app).get('/api/processes');
      expect(res.status).toBe(200);
      expect(res.body).toEqual(SAMPLE_PROCESSES);
    });

    it('GET /api/disk returns root usage and partitions', async () => {
      const res = await request(h.app).get('/api/disk');
      expect(res.status).toBe(200);
      expect(res.body).toEqual(SAMPLE_DISK);
    });

    it('GET /api/network returns cumulative counters', async () => {
      const res = await request(h.app).get('/api/network');
      expect(res.status).toBe(200);
      expect(res.body).toEqual(SAMPLE_NETWORK);
    });

    it('GET /api/health reports the service as healthy', async () => {
      const res = await request(h.app).get('/api/health');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        status: 'healthy',
        timestamp: '2026-01-15T10:00:00.000Z',
        service: 'hostwatch-test',
      });
    });

    it('does not run an alert pass outside /api/system-stats', async () => {
      h.provider.stats = makeSystemStats({ cpu_percent: 99 });

      await request(h.app).get('/api/processes');
      await request(h.app).get('/api/health');

      expect(h.state.get('cpu')).toBeUndefined();
      expect(h.provider.statsReads).toBe(0);
    });

    it('returns 503 from any endpoint whose provider read fails', async () => {
      h.provider.failure = new MetricsUnavailableError('Failed to read network counters');

      const res = await request(h.app).get('/api/network');

      expect(res.status).toBe(503);
      expect(res.body.error.code).toBe('METRICS_UNAVAILABLE');
    });
  });

  describe('error handling', () => {
    it('returns a JSON 404 for unknown routes', async () => {
      const res = await request(h.app).get('/api/unknown');

      expect(res.status).toBe(404);
      expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'No route for /api/unknown' });
    });

    it('returns 500 for errors that are not metrics failures', async () => {
      const processes = vi.spyOn(h.provider, 'getProcesses').mockRejectedValue(new TypeError('boom'));

      const res = await request(h.app).get('/api/processes');

      expect(processes).toHaveBeenCalledTimes(1);
      expect(res.status).toBe(500);
      expect(res.body.error.code).toBe('INTERNAL_ERROR');
      expect(res.body.error.message).not.toContain('boom');
    });

    it('does not advertise the framework', async () => {
      const res = await request(h.app).get('/api/health');
      expect(res.headers['x-powered-by']).toBeUndefined();
    });
  });

  describe('correlation IDs', () => {
    it('echoes the caller supplied ID', async () => {
      const res = await request(h.app).get('/api/health').set(CORRELATION_HEADER, 'req-123');
      expect(res.headers[CORRELATION_HEADER]).toBe('req-123');
    });

    it('uses the correlation ID as the error requestId', async () => {
      h.provider.failure = new Error('EACCES');

      const res = await request(h.app).get('/api/disk').set(CORRELATION_HEADER, 'req-456');

      expect(res.body.requestId).toBe('req-456');
    });

    it('generates an ID when none is supplied', async () => {
      const res = await request(h.app).get('/api/health');
      expect(res.headers[CORRELATION_HEADER]).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it('logs request completion with the status code', async () => {
      await request(h.app).get('/api/health').set(CORRELATION_HEADER, 'req-789');

      const completed = h.entries.find((e) => e.message === 'request completed');
      expect(completed?.correlationId).toBe('req-789');
      expect(completed?.metadata).toMatchObject({ method: 'GET', url: '/api/health', statusCode: 200 });
    });
  });
});
