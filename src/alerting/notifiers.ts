/**
 * Alert Notifiers
 *
 * Notifier implementations for the log sink, webhook and mail transports.
 * Every notifier formats the alert for its channel and reports the outcome as
 * a {@link NotifyResult}; none of them throws. Failures come back as a
 * {@link NotifierTransportError} for the dispatcher to log.
 *
 * The transport layer is injected so production code can use real HTTP
 * clients while tests use in-memory stand-ins.
 *
 * @module alerting/notifiers
 */

import { NotifierTransportError, toError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import type { MetricId } from '../metrics/types.js';
import type { AlertEvent } from './types.js';

// ─── Contract ────────────────────────────────────────────────────────────────

export type NotifierKind = 'log' | 'webhook' | 'mail';

export type NotifyResult = { success: true } | { success: false; error: NotifierTransportError };

export interface Notifier {
  readonly kind: NotifierKind;
  /**
   * Deliver one alert. `signal` is aborted when the dispatcher gives up on
   * the delivery; transports should stop work when it fires.
   */
  send(event: AlertEvent, signal?: AbortSignal): Promise<NotifyResult>;
}

/** Transport settings chosen at startup. */
export type NotifierSettings =
  | { kind: 'log' }
  | { kind: 'webhook'; url: string; token?: string }
  | { kind: 'mail'; endpoint: string; apiKey: string; to: string; from: string };

/** The subset of `fetch` the HTTP transports use. */
export type FetchFn = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal?: AbortSignal },
) => Promise<{ ok: boolean; status: number }>;

// ─── Message Formatting ──────────────────────────────────────────────────────

const METRIC_LABELS: Record<MetricId, string> = {
  cpu: 'CPU usage',
  memory: 'Memory usage',
  disk: 'Disk usage',
};

function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

/** Subject line, e.g. `[hostwatch] CPU usage at 92.0% (threshold 90.0%)`. */
export function formatSubject(event: AlertEvent, serviceName: string): string {
  const label = METRIC_LABELS[event.metricId];
  return `[${serviceName}] ${label} at ${formatPercent(event.currentValue)} (threshold ${formatPercent(event.threshold)})`;
}

/** Plain-text body used by the mail and webhook transports. */
export function formatBody(event: AlertEvent, serviceName: string): string {
  return [
    `Service: ${serviceName}`,
    `Metric: ${event.metricId}`,
    `Value: ${formatPercent(event.currentValue)}`,
    `Threshold: ${formatPercent(event.threshold)}`,
    `Fired at: ${event.firedAt.toISOString()}`,
  ].join('\n');
}

function failure(message: string, transport: NotifierKind, cause?: unknown): NotifyResult {
  return { success: false, error: new NotifierTransportError(message, transport, cause) };
}

// ─── Log Sink ────────────────────────────────────────────────────────────────

/** Writes alerts to the log. Used when no transport is configured or for dry runs. */
export function createLogNotifier(logger: Logger): Notifier {
  return {
    kind: 'log',
    async send(event: AlertEvent): Promise<NotifyResult> {
      logger.warn('alert fired', {
        metricId: event.metricId,
        value: event.currentValue,
        threshold: event.threshold,
        firedAt: event.firedAt.toISOString(),
      });
      return { success: true };
    },
  };
}

// ─── Webhook ─────────────────────────────────────────────────────────────────

export interface WebhookNotifierConfig {
  url: string;
  /** Sent as a bearer token when present. */
  token?: string;
  serviceName: string;
}

/** Posts alerts as JSON to a webhook endpoint. */
export function createWebhookNotifier(
  config: WebhookNotifierConfig,
  fetchFn: FetchFn = fetch,
): Notifier {
  if (!config.url) throw new Error('Webhook notifier requires a non-empty url');

  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (config.token) headers['authorization'] = `Bearer ${config.token}`;

  return {
    kind: 'webhook',
    async send(event: AlertEvent, signal?: AbortSignal): Promise<NotifyResult> {
      const payload = {
        subject: formatSubject(event, config.serviceName),
        body: formatBody(event, config.serviceName),
        metadata: {
          service: config.serviceName,
          metricId: event.metricId,
          value: event.currentValue,
          threshold: event.threshold,
          firedAt: event.firedAt.toISOString(),
        },
      };

      try {
        const res = await fetchFn(config.url, {
          method: 'POST',
          headers,
          body: JSON.stringify(payload),
          signal,
        });
        if (!res.ok) return failure(`Webhook responded with ${res.status}`, 'webhook');
        return { success: true };
      } catch (err) {
        return failure(`Webhook request failed: ${toError(err).message}`, 'webhook', err);
      }
    },
  };
}

// ─── Mail ────────────────────────────────────────────────────────────────────

export interface MailMessage {
  to: string;
  from: string;
  subject: string;
  text: string;
}

/**
 * Delivers a mail message. Implementations may use SMTP, a mail API or an
 * in-memory store for tests.
 */
export interface MailTransport {
  sendMail(message: MailMessage, signal?: AbortSignal): Promise<void>;
}

export interface MailNotifierConfig {
  to: string;
  from: string;
  serviceName: string;
}

export function createMailNotifier(config: MailNotifierConfig, transport: MailTransport): Notifier {
  if (!config.to) throw new Error('Mail notifier requires a non-empty recipient');
  if (!config.from) throw new Error('Mail notifier requires a non-empty from address');

  return {
    kind: 'mail',
    async send(event: AlertEvent, signal?: AbortSignal): Promise<NotifyResult> {
      try {
        await transport.sendMail(
          {
            to: config.to,
            from: config.from,
            subject: formatSubject(event, config.serviceName),
            text: formatBody(event, config.serviceName),
          },
          signal,
        );
        return { success: true };
      } catch (err) {
        return failure(`Mail delivery failed: ${toError(err).message}`, 'mail', err);
      }
    },
  };
}

export interface HttpMailTransportConfig {
  /** Mail API endpoint accepting `{ to, from, subject, text }` as JSON. */
  endpoint: string;
  apiKey: string;
}

/** A {@link MailTransport} that posts messages to an HTTP mail API. */
export function createHttpMailTransport(
  config: HttpMailTransportConfig,
  fetchFn: FetchFn = fetch,
): MailTransport {
  if (!config.endpoint) throw new Error('Mail transport requires a non-empty endpoint');

  return {
    async sendMail(message: MailMessage, signal?: AbortSignal): Promise<void> {
      const res = await fetchFn(config.endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify(message),
        signal,
      });
      if (!res.ok) throw new Error(`Mail API responded with ${res.status}`);
    },
  };
}

/** A mail transport that stores messages for inspection. */
export function createInMemoryMailTransport(): MailTransport & { messages: MailMessage[] } {
  const messages: MailMessage[] = [];
  return {
    messages,
    async sendMail(message: MailMessage): Promise<void> {
      messages.push(message);
    },
  };
}

// ─── Selection ───────────────────────────────────────────────────────────────

export interface NotifierDependencies {
  logger: Logger;
  serviceName: string;
  fetchFn?: FetchFn;
}

/** Build the notifier named by the configured settings. */
export function createNotifier(settings: NotifierSettings, deps: NotifierDependencies): Notifier {
  switch (settings.kind) {
    case 'log':
      return createLogNotifier(deps.logger);
    case 'webhook':
      return createWebhookNotifier(
        { url: settings.url, token: settings.token, serviceName: deps.serviceName },
        deps.fetchFn,
      );
    case 'mail':
      return createMailNotifier(
        { to: settings.to, from: settings.from, serviceName: deps.serviceName },
        createHttpMailTransport({ endpoint: settings.endpoint, apiKey: settings.apiKey }, deps.fetchFn),
      );
  }
}
