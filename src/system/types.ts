export type MetricName = 'cpu_usage' | 'memory_usage' | 'disk_usage';

export const METRIC_NAMES: readonly MetricName[] = ['cpu_usage', 'memory_usage', 'disk_usage'];

/**
 * Point-in-time reading of the monitored host. Any metric may be missing;
 * an empty object is what a failed collection degrades to.
 */
export type SystemSnapshot = Partial<Record<MetricName, number>> & {
  timestamp?: number;
};

export interface MetricsProvider {
  snapshot(): Promise<SystemSnapshot>;
}
