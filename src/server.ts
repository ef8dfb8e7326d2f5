/**
 * Service entry point.
 *
 * Loads configuration, wires the alerting pipeline, and starts the HTTP
 * server. Invalid configuration is fatal: the process exits before listening.
 *
 * @module server
 */

import type { Server } from 'node:http';

import { createApp } from './app.js';
import {
  AlertState,
  CooldownGate,
  createAlertDispatcher,
  createAlertOrchestrator,
  createAlertPoller,
  createNotifier,
  type AlertPoller,
} from './alerting/index.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { ConfigInvalidError, toError } from './errors/index.js';
import { createLogger, type Logger } from './logging/index.js';
import { createMetricSampler } from './metrics/sampler.js';
import { createSystemMetricsProvider } from './metrics/systemProvider.js';

const ENDPOINTS = [
  'GET /api/system-stats',
  'GET /api/processes',
  'GET /api/disk',
  'GET /api/network',
  'GET /api/health',
];

function readConfig(bootLogger: Logger): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    const error = toError(err);
    const issues = err instanceof ConfigInvalidError ? err.issues : [error.message];
    bootLogger.fatal('refusing to start with invalid configuration', error, { issues });
    process.exit(1);
  }
}

function main(): void {
  const config = readConfig(createLogger());
  const { server: serverConfig, alerts } = config;

  const logger = createLogger({ service: serverConfig.serviceName, level: serverConfig.logLevel });

  const provider = createSystemMetricsProvider();
  const sampler = createMetricSampler({ provider });
  const notifier = createNotifier(alerts.notifier, {
    logger: logger.child({ component: 'notifier' }),
    serviceName: serverConfig.serviceName,
  });
  const dispatcher = createAlertDispatcher({
    notifier,
    logger,
    timeoutMs: alerts.dispatchTimeoutMs,
    maxInFlight: alerts.maxInFlight,
  });
  const orchestrator = createAlertOrchestrator({
    gate: new CooldownGate(new AlertState()),
    dispatcher,
    logger,
    enabled: alerts.enabled,
  });

  let poller: AlertPoller | undefined;
  if (alerts.enabled && alerts.pollIntervalMs > 0) {
    poller = createAlertPoller({
      sampler,
      orchestrator,
      rules: alerts.rules,
      intervalMs: alerts.pollIntervalMs,
      logger,
    });
    poller.start();
  }

  const app = createApp({
    provider,
    sampler,
    orchestrator,
    rules: alerts.rules,
    serviceName: serverConfig.serviceName,
    logger,
  });

  const server: Server = app.listen(serverConfig.port, serverConfig.host, () => {
    logger.info('server listening', {
      host: serverConfig.host,
      port: serverConfig.port,
      endpoints: ENDPOINTS,
      alertsEnabled: alerts.enabled,
      notifier: notifier.kind,
      rules: alerts.rules.map((r) => ({
        metricId: r.metricId,
        threshold: r.threshold,
        cooldownSeconds: r.cooldownMs / 1000,
      })),
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('shutting down', { signal });

    poller?.stop();
    server.close((closeErr) => {
      if (closeErr) logger.error('server close failed', closeErr);
      dispatcher
        .drain()
        .then(() => process.exit(closeErr ? 1 : 0))
        .catch((err: unknown) => {
          logger.error('dispatcher drain failed', toError(err));
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main();
