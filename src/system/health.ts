import type { SystemSnapshot } from './types.js';

export type HealthStatus = 'healthy' | 'degraded' | 'critical' | 'unknown';

export interface HealthThresholds {
  degraded: number;
  critical: number;
}

export interface HealthReport {
  status: HealthStatus;
  breaches: Array<{ metric: string; value: number; threshold: number }>;
}

export const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = {
  degraded: 80,
  critical: 90,
};

// Threshold scoring only; anomaly models stay outside this service.
export function assessHealth(
  snapshot: SystemSnapshot,
  thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS
): HealthReport {
  const readings: Array<[string, number | undefined]> = [
    ['cpu_usage', snapshot.cpu_usage],
    ['memory_usage', snapshot.memory_usage],
    ['disk_usage', snapshot.disk_usage],
  ];

  const present = readings.filter((r): r is [string, number] => r[1] !== undefined);
  if (present.length === 0) {
    return { status: 'unknown', breaches: [] };
  }

  const breaches: HealthReport['breaches'] = [];
  let status: HealthStatus = 'healthy';

  for (const [metric, value] of present) {
    if (value > thresholds.critical) {
      breaches.push({ metric, value, threshold: thresholds.critical });
      status = 'critical';
    } else if (value > thresholds.degraded) {
      breaches.push({ metric, value, threshold: thresholds.degraded });
      if (status === 'healthy') status = 'degraded';
    }
  }

  return { status, breaches };
}
