import type { MetricName, SystemSnapshot } from '../system/types.js';

/**
 * Mean relative drop of the affected metrics between the injection-time
 * snapshot and the current one. A metric contributes only when it is
 * present in both and has gone down; with no contributions the result is 0.
 */
export function calculateImprovement(
  metricsAffected: readonly MetricName[],
  initial: SystemSnapshot,
  current: SystemSnapshot
): number {
  const samples: number[] = [];

  for (const metric of metricsAffected) {
    const before = initial[metric];
    const after = current[metric];

    if (before === undefined || after === undefined) continue;
    if (before > after) {
      samples.push((before - after) / before);
    }
  }

  if (samples.length === 0) return 0;
  return samples.reduce((sum, s) => sum + s, 0) / samples.length;
}
