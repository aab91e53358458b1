import type { FaultCatalog } from '../faults/catalog.js';
import type { FaultKind, InjectionResult, InjectOptions, RejectionCode } from '../faults/types.js';
import type { Metrics } from '../metrics/metrics.js';
import type { InvariantMonitor } from '../invariants/checker.js';
import { logger as rootLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';

export type Injector = (
  kind: FaultKind,
  durationSeconds: number,
  options: InjectOptions
) => Promise<InjectionResult>;

export interface CascadeReport {
  primary: FaultKind;
  depth: number;
  budgetExhausted: boolean;
  accepted: FaultKind[];
  rejected: Array<{ kind: FaultKind; code: RejectionCode }>;
}

export interface CascadeEngineOptions {
  catalog: FaultCatalog;
  inject: Injector;
  random: () => number;
  maxDepth: number;
  metrics: Metrics;
  invariants: InvariantMonitor;
  logger?: Logger;
}

/**
 * Secondary injections triggered by a primary one. Each cascade re-enters
 * the injector, so it goes through the same catalog and cooldown checks and
 * may be rejected; rejections stay here and never reach the primary caller.
 */
export class CascadeEngine {
  private readonly logger: Logger;

  constructor(private readonly options: CascadeEngineOptions) {
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Chance that `primary` drags `target` along: the target's own cascade
   * probability, except that a primary configured at 1 forces every target.
   */
  propagationProbability(primary: FaultKind, target: FaultKind): number {
    const { catalog } = this.options;
    if (catalog.get(primary).cascadeProbability >= 1) return 1;
    return catalog.get(target).cascadeProbability;
  }

  cascadeDuration(kind: FaultKind): number {
    return Math.ceil(this.options.catalog.get(kind).maxDurationSeconds / 2);
  }

  async trigger(primary: FaultKind, depth: number): Promise<CascadeReport> {
    const { catalog, inject, random, maxDepth, metrics, invariants } = this.options;
    const log = this.logger.child({ kind: primary, cascadeDepth: depth });

    const report: CascadeReport = {
      primary,
      depth,
      budgetExhausted: false,
      accepted: [],
      rejected: [],
    };

    if (depth >= maxDepth) {
      report.budgetExhausted = true;
      metrics.recordCascadeBudgetExhausted();
      log.warn('cascade_budget_exhausted', 'Cascade depth budget exhausted, not propagating', {
        depth,
        maxDepth,
      });
      return report;
    }

    metrics.recordCascadeTriggered();

    for (const target of catalog.kinds()) {
      if (target === primary) continue;
      if (random() >= this.propagationProbability(primary, target)) continue;

      invariants.check({
        kind: target,
        cascadeDepth: depth + 1,
        maxCascadeDepth: maxDepth,
      }, ['CASCADE_DEPTH_WITHIN_BUDGET']);

      const result = await inject(target, this.cascadeDuration(target), {
        depth: depth + 1,
        source: primary,
      });

      metrics.recordCascadeInjection(result.accepted);

      if (result.accepted) {
        report.accepted.push(target);
        log.warn('cascade_triggered', 'Cascade effect triggered', {
          target,
          faultId: result.fault.id,
          durationSeconds: result.fault.durationSeconds,
        });
      } else {
        report.rejected.push({ kind: target, code: result.error.code });
        log.info('cascade_rejected', 'Cascade injection rejected, dropping', {
          code: 'CASCADE_REJECTED',
          target,
          reason: result.error.code,
        });
      }
    }

    return report;
  }
}
