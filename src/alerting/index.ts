/**
 * Alerting Module
 *
 * Threshold evaluation, per-metric cooldowns and background notification
 * dispatch for host metrics.
 */

export { exceeds } from './thresholdEvaluator.js';

export { Mutex } from './mutex.js';

export { AlertState, type AlertStateEntry } from './alertState.js';

export { CooldownGate, cooldownElapsed } from './cooldownGate.js';

export {
  createLogNotifier,
  createWebhookNotifier,
  createMailNotifier,
  createHttpMailTransport,
  createInMemoryMailTransport,
  createNotifier,
  formatSubject,
  formatBody,
  type Notifier,
  type NotifierKind,
  type NotifierSettings,
  type NotifierDependencies,
  type NotifyResult,
  type FetchFn,
  type MailMessage,
  type MailTransport,
  type MailNotifierConfig,
  type WebhookNotifierConfig,
  type HttpMailTransportConfig,
} from './notifiers.js';

export {
  createAlertDispatcher,
  DEFAULT_DISPATCH_TIMEOUT_MS,
  DEFAULT_MAX_IN_FLIGHT,
  type AlertDispatcher,
  type AlertDispatcherOptions,
} from './dispatcher.js';

export {
  createAlertOrchestrator,
  type AlertOrchestrator,
  type AlertOrchestratorOptions,
} from './orchestrator.js';

export { createAlertPoller, type AlertPoller, type AlertPollerOptions } from './poller.js';

export { monotonicNow, type AlertEvent, type AlertRule, type MonotonicClock } from './types.js';
