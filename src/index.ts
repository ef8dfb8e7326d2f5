/**
 * hostwatch – Library Entry Point
 *
 * Re-exports the alerting core, metrics sampling, configuration and the
 * Express application factory so the service can be embedded or tested
 * without starting the standalone server.
 *
 * @module hostwatch
 */

// ─── Alerting ───
export * from './alerting/index.js';

// ─── Metrics ───
export { createSnapshot, type MetricSnapshot } from './metrics/snapshot.js';
export {
  createMetricSampler,
  extractMetricValues,
  type MetricSampler,
  type MetricSamplerOptions,
  type SampledStats,
} from './metrics/sampler.js';
export {
  createSystemMetricsProvider,
  parseNetDev,
  PROCESS_LIMIT,
  type SystemMetricsProviderOptions,
} from './metrics/systemProvider.js';
export {
  METRIC_IDS,
  type MetricId,
  type MetricsProvider,
  type SystemStats,
  type MemoryStats,
  type DiskUsage,
  type DiskInfo,
  type DiskPartition,
  type ProcessInfo,
  type NetworkCounters,
} from './metrics/types.js';

// ─── Configuration ───
export {
  loadConfig,
  type AppConfig,
  type AlertConfig,
  type ServerConfig,
  type Env,
} from './config/index.js';

// ─── Errors ───
export {
  ERROR_CODES,
  MetricsUnavailableError,
  NotifierTransportError,
  ConfigInvalidError,
  type ErrorCode,
} from './errors/index.js';

// ─── Logging ───
export * from './logging/index.js';

// ─── HTTP ───
export { createApp, type AppDependencies } from './app.js';
