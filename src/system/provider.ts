import si from 'systeminformation';
import { logger, describeError } from '../observability/logger.js';
import type { MetricsProvider, SystemSnapshot } from './types.js';

function roundPercent(value: number): number {
  return parseFloat(value.toFixed(2));
}

/**
 * Samples the host through systeminformation. The root filesystem (or the
 * first one reported) stands for disk usage.
 */
export class SystemInformationProvider implements MetricsProvider {
  async snapshot(): Promise<SystemSnapshot> {
    const [load, mem, disks] = await Promise.all([
      si.currentLoad(),
      si.mem(),
      si.fsSize(),
    ]);

    const root = disks.find(d => d.mount === '/') ?? disks[0];

    const snapshot: SystemSnapshot = {
      cpu_usage: roundPercent(load.currentLoad),
      memory_usage: roundPercent(mem.total > 0 ? (mem.active / mem.total) * 100 : 0),
      timestamp: Date.now(),
    };

    if (root) {
      snapshot.disk_usage = roundPercent(root.use);
    }

    return snapshot;
  }
}

export type SnapshotFailureListener = (error: unknown) => void;

/**
 * Reads a snapshot without letting a provider failure escape: a failed
 * collection degrades to an empty reading.
 */
export async function safeSnapshot(
  provider: MetricsProvider,
  onFailure?: SnapshotFailureListener
): Promise<SystemSnapshot> {
  try {
    return await provider.snapshot();
  } catch (error) {
    logger.warn('metrics_unavailable', 'Metrics snapshot failed, using empty reading', {
      code: 'METRICS_UNAVAILABLE',
      error: describeError(error),
    });
    onFailure?.(error);
    return {};
  }
}
