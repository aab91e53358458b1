import type { FaultKind } from '../faults/types.js';
import { METRIC_NAMES } from './types.js';
import type { MetricName, MetricsProvider, SystemSnapshot } from './types.js';

interface Overlay {
  metrics: readonly MetricName[];
  impactFactor: number;
  /** Share of the impact still applied, from 1 (fresh) down to 0 (recovered). */
  remaining: number;
}

const METRIC_CEILING = 100;

/**
 * Synthetic fault effects. Nothing on the host is touched: an injected kind
 * scales the readings of its affected metrics by its impact factor, and
 * recovery steps shrink that scaling back towards 1.
 */
export class MetricsPerturbation {
  private overlays: Map<FaultKind, Overlay> = new Map();

  apply(kind: FaultKind, metrics: readonly MetricName[], impactFactor: number): void {
    this.overlays.set(kind, { metrics, impactFactor, remaining: 1 });
  }

  relax(kind: FaultKind, remaining: number): void {
    const overlay = this.overlays.get(kind);
    if (!overlay) return;

    overlay.remaining = Math.min(1, Math.max(0, remaining));
    if (overlay.remaining === 0) {
      this.overlays.delete(kind);
    }
  }

  remaining(kind: FaultKind): number {
    return this.overlays.get(kind)?.remaining ?? 0;
  }

  clear(kind: FaultKind): void {
    this.overlays.delete(kind);
  }

  factorFor(metric: MetricName): number {
    let factor = 1;
    for (const overlay of this.overlays.values()) {
      if (overlay.metrics.includes(metric)) {
        factor *= 1 + (overlay.impactFactor - 1) * overlay.remaining;
      }
    }
    return factor;
  }

  applyTo(snapshot: SystemSnapshot): SystemSnapshot {
    const perturbed: SystemSnapshot = { ...snapshot };

    for (const metric of METRIC_NAMES) {
      const value = perturbed[metric];
      if (value !== undefined) {
        perturbed[metric] = Math.min(METRIC_CEILING, value * this.factorFor(metric));
      }
    }

    return perturbed;
  }
}

export class PerturbedMetricsProvider implements MetricsProvider {
  constructor(
    private readonly base: MetricsProvider,
    private readonly perturbation: MetricsPerturbation
  ) {}

  async snapshot(): Promise<SystemSnapshot> {
    const reading = await this.base.snapshot();
    return this.perturbation.applyTo(reading);
  }
}
