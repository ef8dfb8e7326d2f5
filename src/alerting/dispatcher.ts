/**
 * Alert Dispatcher
 *
 * Hands alert events to the notifier off the request path. Each delivery runs
 * as a detached task bounded by a timeout; when the timeout fires the
 * notifier's abort signal is triggered and the delivery is reported as a
 * {@link NotifierTransportError}. A cap on concurrent deliveries keeps a hung
 * transport from accumulating background work: events over the cap are
 * dropped and logged.
 *
 * Failures are logged and swallowed. Nothing is retried.
 *
 * @module alerting/dispatcher
 */

import { NotifierTransportError, toError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import type { Notifier, NotifyResult } from './notifiers.js';
import type { AlertEvent } from './types.js';

export interface AlertDispatcher {
  /** Start delivering `event` in the background. Returns false if it was dropped. */
  dispatch(event: AlertEvent): boolean;
  /** Resolve once every in-flight delivery has settled. */
  drain(): Promise<void>;
  /** Number of deliveries currently running. */
  readonly inFlight: number;
}

export interface AlertDispatcherOptions {
  notifier: Notifier;
  logger: Logger;
  /** Upper bound for one delivery, in milliseconds. */
  timeoutMs: number;
  /** Maximum number of concurrent deliveries. */
  maxInFlight: number;
}

export const DEFAULT_DISPATCH_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_IN_FLIGHT = 32;

export function createAlertDispatcher(options: AlertDispatcherOptions): AlertDispatcher {
  const { notifier, timeoutMs, maxInFlight } = options;
  if (timeoutMs <= 0) throw new Error('Dispatch timeout must be positive');
  if (maxInFlight <= 0) throw new Error('Dispatch capacity must be positive');

  const logger = options.logger.child({ component: 'dispatcher' });
  const pending = new Set<Promise<void>>();

  async function sendWithTimeout(event: AlertEvent): Promise<NotifyResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timedOut = new Promise<NotifyResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          success: false,
          error: new NotifierTransportError(
            `Delivery timed out after ${timeoutMs}ms`,
            notifier.kind,
          ),
        });
      }, timeoutMs);
    });

    // A synchronous throw from send() lands in the catch below.
    const sent = Promise.resolve()
      .then(() => notifier.send(event, controller.signal))
      .catch(
        (err: unknown): NotifyResult => ({
          success: false,
          error: new NotifierTransportError(toError(err).message, notifier.kind, err),
        }),
      );

    try {
      return await Promise.race([sent, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  async function deliver(event: AlertEvent): Promise<void> {
    const started = Date.now();
    const result = await sendWithTimeout(event);
    const meta = {
      metricId: event.metricId,
      value: event.currentValue,
      transport: notifier.kind,
      durationMs: Date.now() - started,
    };

    if (result.success) {
      logger.info('alert delivered', meta);
    } else {
      logger.error('alert delivery failed', result.error, meta);
    }
  }

  return {
    dispatch(event: AlertEvent): boolean {
      if (pending.size >= maxInFlight) {
        logger.warn('alert dropped: dispatcher at capacity', {
          metricId: event.metricId,
          inFlight: pending.size,
        });
        return false;
      }

      const task: Promise<void> = deliver(event).finally(() => {
        pending.delete(task);
      });
      pending.add(task);
      return true;
    },

    async drain(): Promise<void> {
      while (pending.size > 0) {
        await Promise.all([...pending]);
      }
    },

    get inFlight(): number {
      return pending.size;
    },
  };
}
