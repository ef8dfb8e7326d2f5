/**
 * Host metrics provider backed by `systeminformation`.
 *
 * Network counters come from `/proc/net/dev`, which carries packet counts that
 * `systeminformation` does not expose; on hosts without it the network read
 * fails with {@link MetricsUnavailableError}.
 *
 * @module metrics/systemProvider
 */

import { cpus } from 'node:os';
import { readFile } from 'node:fs/promises';
import * as si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';

import { MetricsUnavailableError } from '../errors/index.js';
import type {
  DiskInfo,
  DiskUsage,
  MemoryStats,
  MetricsProvider,
  NetworkCounters,
  ProcessInfo,
  SystemStats,
} from './types.js';

/** Maximum number of entries served by `/api/processes`. */
export const PROCESS_LIMIT = 15;

const DEFAULT_NET_DEV_PATH = '/proc/net/dev';

// ─── Mapping ─────────────────────────────────────────────────────────────────

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function percentOf(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return round1((part / whole) * 100);
}

export function toMemoryStats(
  mem: Pick<Systeminformation.MemData, 'total' | 'available' | 'active' | 'free'>,
): MemoryStats {
  return {
    total: mem.total,
    available: mem.available,
    percent: percentOf(mem.total - mem.available, mem.total),
    used: mem.active,
    free: mem.free,
  };
}

export function toDiskUsage(
  fs: Pick<Systeminformation.FsSizeData, 'size' | 'used' | 'available'>,
): DiskUsage {
  return {
    total: fs.size,
    used: fs.used,
    free: fs.available,
    percent: percentOf(fs.used, fs.used + fs.available),
  };
}

/** Pick the filesystem mounted at `/`. */
export function findRootFilesystem<T extends Pick<Systeminformation.FsSizeData, 'mount'>>(
  filesystems: readonly T[],
): T {
  const root = filesystems.find((fs) => fs.mount === '/');
  if (!root) {
    throw new MetricsUnavailableError('No filesystem is mounted at /');
  }
  return root;
}

/** The `limit` processes with the largest memory share, largest first. */
export function toProcessList(
  processes: ReadonlyArray<
    Pick<Systeminformation.ProcessesProcessData, 'pid' | 'name' | 'state' | 'mem' | 'cpu'>
  >,
  limit: number = PROCESS_LIMIT,
): ProcessInfo[] {
  return processes
    .map((p) => ({
      pid: p.pid,
      name: p.name,
      status: p.state,
      memory_percent: p.mem,
      cpu_percent: p.cpu,
    }))
    .sort((a, b) => b.memory_percent - a.memory_percent)
    .slice(0, limit);
}

/**
 * Sum the byte and packet counters of every interface in a `/proc/net/dev`
 * listing. The first two lines are headers.
 */
export function parseNetDev(text: string): NetworkCounters {
  const totals: NetworkCounters = {
    bytes_sent: 0,
    bytes_recv: 0,
    packets_sent: 0,
    packets_recv: 0,
  };
  const lines = text.split('\n').slice(2);

  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const fields = line
      .slice(colon + 1)
      .trim()
      .split(/\s+/)
      .map((f) => Number(f));
    if (fields.length < 10 || fields.some((f) => !Number.isFinite(f))) {
      throw new MetricsUnavailableError(`Malformed network counters: ${line.trim()}`);
    }

    totals.bytes_recv += fields[0] ?? 0;
    totals.packets_recv += fields[1] ?? 0;
    totals.bytes_sent += fields[8] ?? 0;
    totals.packets_sent += fields[9] ?? 0;
  }

  return totals;
}

// ─── Provider ────────────────────────────────────────────────────────────────

export interface SystemMetricsProviderOptions {
  /** Path to the kernel network counters. Defaults to `/proc/net/dev`. */
  netDevPath?: string;
}

async function guarded<T>(what: string, read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (err) {
    if (err instanceof MetricsUnavailableError) throw err;
    throw new MetricsUnavailableError(`Failed to read ${what}`, err);
  }
}

export function createSystemMetricsProvider(
  options: SystemMetricsProviderOptions = {},
): MetricsProvider {
  const netDevPath = options.netDevPath ?? DEFAULT_NET_DEV_PATH;

  return {
    getSystemStats(): Promise<SystemStats> {
      return guarded('system stats', async () => {
        const [load, mem, filesystems] = await Promise.all([
          si.currentLoad(),
          si.mem(),
          si.fsSize(),
        ]);
        return {
          timestamp: new Date().toISOString(),
          cpu_percent: round1(load.currentLoad),
          memory: toMemoryStats(mem),
          disk: toDiskUsage(findRootFilesystem(filesystems)),
          uptime_seconds: si.time().uptime,
          cpu_count: cpus().length,
        };
      });
    },

    getProcesses(): Promise<ProcessInfo[]> {
      return guarded('process list', async () => {
        const data = await si.processes();
        return toProcessList(data.list);
      });
    },

    getDiskInfo(): Promise<DiskInfo> {
      return guarded('disk usage', async () => {
        const filesystems = await si.fsSize();
        return {
          root: toDiskUsage(findRootFilesystem(filesystems)),
          partitions: filesystems.map((fs) => ({ device: fs.fs, mountpoint: fs.mount })),
        };
      });
    },

    getNetworkCounters(): Promise<NetworkCounters> {
      return guarded('network counters', async () =>
        parseNetDev(await readFile(netDevPath, 'utf8')),
      );
    },
  };
}
