/**
 * Host metric types and the provider contract.
 *
 * Field names of the wire types mirror the JSON served by the `/api/*`
 * routes, so provider output can be returned to callers unchanged.
 *
 * @module metrics/types
 */

// ─── Metric Identifiers ──────────────────────────────────────────────────────

export const METRIC_IDS = ['cpu', 'memory', 'disk'] as const;

/** A metric that can carry an alert rule. */
export type MetricId = (typeof METRIC_IDS)[number];

// ─── Raw Host Data ───────────────────────────────────────────────────────────

export interface MemoryStats {
  total: number;
  available: number;
  percent: number;
  used: number;
  free: number;
}

export interface DiskUsage {
  total: number;
  used: number;
  free: number;
  percent: number;
}

export interface SystemStats {
  timestamp: string;
  cpu_percent: number;
  memory: MemoryStats;
  disk: DiskUsage;
  uptime_seconds: number;
  cpu_count: number;
}

export interface ProcessInfo {
  pid: number;
  name: string;
  status: string;
  memory_percent: number;
  cpu_percent: number;
}

export interface DiskPartition {
  device: string;
  mountpoint: string;
}

export interface DiskInfo {
  root: DiskUsage;
  partitions: DiskPartition[];
}

export interface NetworkCounters {
  bytes_sent: number;
  bytes_recv: number;
  packets_sent: number;
  packets_recv: number;
}

// ─── Provider Contract ───────────────────────────────────────────────────────

/**
 * Source of raw host counters. The alerting core only depends on
 * {@link MetricsProvider.getSystemStats}; the other reads back the
 * informational routes.
 */
export interface MetricsProvider {
  getSystemStats(): Promise<SystemStats>;
  /** At most 15 processes, largest memory share first. */
  getProcesses(): Promise<ProcessInfo[]>;
  getDiskInfo(): Promise<DiskInfo>;
  getNetworkCounters(): Promise<NetworkCounters>;
}
