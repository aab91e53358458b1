import type { RecoveryOutcome, RejectionCode } from '../faults/types.js';
import type { InMemorySemaphore } from '../concurrency/semaphore.js';
import type { RecoveryHistoryStats } from '../recovery/history.js';
import type { ViolationSummary } from '../invariants/violations.js';

export interface MetricsSnapshot {
  processStartTime: string;
  uptimeSeconds: number;
  injections: {
    accepted: number;
    rejectedUnknownKind: number;
    rejectedCooldown: number;
    rejectedShuttingDown: number;
    superseded: number;
  };
  cascades: {
    triggered: number;
    injectionsAccepted: number;
    injectionsRejected: number;
    budgetExhausted: number;
  };
  recoveries: {
    completed: number;
    succeeded: number;
    partial: number;
    cancelled: number;
    successRate: number;
    remediationStepFailures: number;
  };
  collection: {
    metricsUnavailable: number;
  };
  concurrency: {
    recoveryTasksInFlight: number;
    lock: {
      inFlight: number;
      peak: number;
      waiting: number;
    };
  };
  history: RecoveryHistoryStats;
  invariants: ViolationSummary;
}

export interface MetricsSources {
  lock?: InMemorySemaphore;
  recoveryTasksInFlight?: number;
  history?: RecoveryHistoryStats;
  invariants?: ViolationSummary;
}

export class Metrics {
  private startTime: Date = new Date();

  private counters = {
    injectionsAccepted: 0,
    injectionsRejectedUnknownKind: 0,
    injectionsRejectedCooldown: 0,
    injectionsRejectedShuttingDown: 0,
    injectionsSuperseded: 0,
    cascadesTriggered: 0,
    cascadeInjectionsAccepted: 0,
    cascadeInjectionsRejected: 0,
    cascadeBudgetExhausted: 0,
    recoveriesCompleted: 0,
    recoveriesSucceeded: 0,
    recoveriesPartial: 0,
    recoveriesCancelled: 0,
    remediationStepFailures: 0,
    metricsUnavailable: 0,
  };

  recordInjectionAccepted(): void {
    this.counters.injectionsAccepted++;
  }

  recordInjectionRejected(code: RejectionCode): void {
    switch (code) {
      case 'UNKNOWN_KIND':
        this.counters.injectionsRejectedUnknownKind++;
        break;
      case 'IN_COOLDOWN':
        this.counters.injectionsRejectedCooldown++;
        break;
      case 'SHUTTING_DOWN':
        this.counters.injectionsRejectedShuttingDown++;
        break;
    }
  }

  recordSuperseded(): void {
    this.counters.injectionsSuperseded++;
  }

  recordCascadeTriggered(): void {
    this.counters.cascadesTriggered++;
  }

  recordCascadeInjection(accepted: boolean): void {
    if (accepted) {
      this.counters.cascadeInjectionsAccepted++;
    } else {
      this.counters.cascadeInjectionsRejected++;
    }
  }

  recordCascadeBudgetExhausted(): void {
    this.counters.cascadeBudgetExhausted++;
  }

  recordRecovery(outcome: RecoveryOutcome): void {
    this.counters.recoveriesCompleted++;
    if (outcome.cancelled) {
      this.counters.recoveriesCancelled++;
    } else if (outcome.success) {
      this.counters.recoveriesSucceeded++;
    } else {
      this.counters.recoveriesPartial++;
    }
  }

  recordRemediationStepFailure(): void {
    this.counters.remediationStepFailures++;
  }

  recordMetricsUnavailable(): void {
    this.counters.metricsUnavailable++;
  }

  snapshot(sources: MetricsSources = {}): MetricsSnapshot {
    const uptimeMs = Date.now() - this.startTime.getTime();

    const successRate = this.counters.recoveriesCompleted > 0
      ? this.counters.recoveriesSucceeded / this.counters.recoveriesCompleted
      : 0;

    return {
      processStartTime: this.startTime.toISOString(),
      uptimeSeconds: Math.floor(uptimeMs / 1000),
      injections: {
        accepted: this.counters.injectionsAccepted,
        rejectedUnknownKind: this.counters.injectionsRejectedUnknownKind,
        rejectedCooldown: this.counters.injectionsRejectedCooldown,
        rejectedShuttingDown: this.counters.injectionsRejectedShuttingDown,
        superseded: this.counters.injectionsSuperseded,
      },
      cascades: {
        triggered: this.counters.cascadesTriggered,
        injectionsAccepted: this.counters.cascadeInjectionsAccepted,
        injectionsRejected: this.counters.cascadeInjectionsRejected,
        budgetExhausted: this.counters.cascadeBudgetExhausted,
      },
      recoveries: {
        completed: this.counters.recoveriesCompleted,
        succeeded: this.counters.recoveriesSucceeded,
        partial: this.counters.recoveriesPartial,
        cancelled: this.counters.recoveriesCancelled,
        successRate: parseFloat(successRate.toFixed(4)),
        remediationStepFailures: this.counters.remediationStepFailures,
      },
      collection: {
        metricsUnavailable: this.counters.metricsUnavailable,
      },
      concurrency: {
        recoveryTasksInFlight: sources.recoveryTasksInFlight ?? 0,
        lock: {
          inFlight: sources.lock?.getInFlight() ?? 0,
          peak: sources.lock?.getPeak() ?? 0,
          waiting: sources.lock?.getWaiting() ?? 0,
        },
      },
      history: sources.history ?? { count: 0, maxSize: 0, evicted: 0 },
      invariants: sources.invariants ?? { total: 0, warn: 0, error: 0, fatal: 0 },
    };
  }
}
