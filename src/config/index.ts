/**
 * Service configuration.
 *
 * Loaded once at startup from environment variables. Transport credentials
 * are expected to be injected by the deployment's secret store; nothing here
 * carries a default for them. Every problem found is collected and reported
 * together in a single {@link ConfigInvalidError}.
 *
 * @module config
 */

import type { NotifierSettings } from '../alerting/notifiers.js';
import type { AlertRule } from '../alerting/types.js';
import { DEFAULT_DISPATCH_TIMEOUT_MS, DEFAULT_MAX_IN_FLIGHT } from '../alerting/dispatcher.js';
import { ConfigInvalidError } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../logging/index.js';
import { METRIC_IDS, type MetricId } from '../metrics/types.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ServerConfig {
  port: number;
  host: string;
  serviceName: string;
  logLevel: LogLevel;
}

export interface AlertConfig {
  enabled: boolean;
  rules: readonly AlertRule[];
  notifier: NotifierSettings;
  dispatchTimeoutMs: number;
  maxInFlight: number;
  /** Background sampling interval; 0 disables the poller. */
  pollIntervalMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  alerts: AlertConfig;
}

export type Env = Record<string, string | undefined>;

// ─── Defaults ────────────────────────────────────────────────────────────────

const DEFAULT_PORT = 5000;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_SERVICE_NAME = 'hostwatch';
const DEFAULT_THRESHOLD = 90;
const DEFAULT_COOLDOWN_SECONDS = 300;

const MS_PER_SECOND = 1000;

// ─── Parsing Helpers ─────────────────────────────────────────────────────────

/** Reads typed values from an env map, recording problems instead of throwing. */
class EnvReader {
  readonly issues: string[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const raw = this.env[name]?.trim();
    return raw ? raw : undefined;
  }

  required(name: string, reason: string): string {
    const value = this.string(name);
    if (value === undefined) {
      this.issues.push(`${name} is required ${reason}`);
      return '';
    }
    return value;
  }

  number(name: string, fallback: number, check?: (n: number) => string | undefined): number {
    const raw = this.string(name);
    if (raw === undefined) return fallback;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.issues.push(`${name} must be a number, got "${raw}"`);
      return fallback;
    }
    const problem = check?.(value);
    if (problem) {
      this.issues.push(`${name} ${problem}, got ${value}`);
      return fallback;
    }
    return value;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    if (['true', '1', 'yes', 'on'].includes(raw)) return true;
    if (['false', '0', 'no', 'off'].includes(raw)) return false;
    this.issues.push(`${name} must be a boolean, got "${raw}"`);
    return fallback;
  }
}

const inPercentRange = (n: number): string | undefined =>
  n < 0 || n > 100 ? 'must be between 0 and 100' : undefined;

const nonNegative = (n: number): string | undefined =>
  n < 0 ? 'must not be negative' : undefined;

const positiveInteger = (n: number): string | undefined =>
  !Number.isInteger(n) || n <= 0 ? 'must be a positive integer' : undefined;

const validPort = (n: number): string | undefined =>
  !Number.isInteger(n) || n < 0 || n > 65535 ? 'must be a port number' : undefined;

// ─── Sections ────────────────────────────────────────────────────────────────

function envPrefix(metricId: MetricId): string {
  return `ALERT_${metricId.toUpperCase()}`;
}

function readRules(reader: EnvReader): AlertRule[] {
  return METRIC_IDS.map((metricId) => {
    const prefix = envPrefix(metricId);
    const threshold = reader.number(`${prefix}_THRESHOLD`, DEFAULT_THRESHOLD, inPercentRange);
    const cooldownSeconds = reader.number(
      `${prefix}_COOLDOWN_SECONDS`,
      DEFAULT_COOLDOWN_SECONDS,
      nonNegative,
    );
    return Object.freeze({ metricId, threshold, cooldownMs: cooldownSeconds * MS_PER_SECOND });
  });
}

function readNotifier(reader: EnvReader, enabled: boolean): NotifierSettings {
  const kind = reader.string('ALERT_NOTIFIER') ?? 'log';
  // Transport credentials only matter when alerts can actually be sent.
  if (!enabled) return { kind: 'log' };

  switch (kind) {
    case 'log':
      return { kind: 'log' };
    case 'webhook':
      return {
        kind: 'webhook',
        url: reader.required('ALERT_WEBHOOK_URL', 'when ALERT_NOTIFIER=webhook'),
        token: reader.string('ALERT_WEBHOOK_TOKEN'),
      };
    case 'mail': {
      const reason = 'when ALERT_NOTIFIER=mail';
      return {
        kind: 'mail',
        endpoint: reader.required('ALERT_MAIL_ENDPOINT', reason),
        apiKey: reader.required('ALERT_MAIL_API_KEY', reason),
        to: reader.required('ALERT_MAIL_TO', reason),
        from: reader.required('ALERT_MAIL_FROM', reason),
      };
    }
    default:
      reader.issues.push(`ALERT_NOTIFIER must be one of log, webhook, mail, got "${kind}"`);
      return { kind: 'log' };
  }
}

function readServer(reader: EnvReader): ServerConfig {
  const rawLevel = reader.string('LOG_LEVEL') ?? 'info';
  let logLevel: LogLevel = 'info';
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else {
    reader.issues.push(`LOG_LEVEL must be one of debug, info, warn, error, fatal, got "${rawLevel}"`);
  }

  return {
    port: reader.number('PORT', DEFAULT_PORT, validPort),
    host: reader.string('HOST') ?? DEFAULT_HOST,
    serviceName: reader.string('SERVICE_NAME') ?? DEFAULT_SERVICE_NAME,
    logLevel,
  };
}

function readAlerts(reader: EnvReader): AlertConfig {
  const enabled = reader.boolean('ALERTS_ENABLED', true);
  return {
    enabled,
    rules: Object.freeze(readRules(reader)),
    notifier: Object.freeze(readNotifier(reader, enabled)),
    dispatchTimeoutMs: reader.number(
      'ALERT_DISPATCH_TIMEOUT_MS',
      DEFAULT_DISPATCH_TIMEOUT_MS,
      positiveInteger,
    ),
    maxInFlight: reader.number('ALERT_MAX_IN_FLIGHT', DEFAULT_MAX_IN_FLIGHT, positiveInteger),
    pollIntervalMs:
      reader.number('ALERT_POLL_INTERVAL_SECONDS', 0, nonNegative) * MS_PER_SECOND,
  };
}

// ─── Loader ──────────────────────────────────────────────────────────────────

/**
 * Load and validate the full configuration.
 *
 * @throws {ConfigInvalidError} listing every invalid or missing setting
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const reader = new EnvReader(env);
  const server = readServer(reader);
  const alerts = readAlerts(reader);

  if (reader.issues.length > 0) {
    throw new ConfigInvalidError(reader.issues);
  }

  return Object.freeze({
    server: Object.freeze(server),
    alerts: Object.freeze(alerts),
  });
}
