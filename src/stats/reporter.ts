import type { FaultKind } from '../faults/types.js';
import type { FaultRegistry } from '../faults/registry.js';
import type { FaultState } from '../recovery/state/states.js';
import type { SuccessRate, SuccessRateTracker } from './success-rate.js';
import type { Clock } from '../orchestrator/clock.js';

export interface CurrentFaultEntry {
  active: boolean;
  state: FaultState;
  durationSeconds: number;
  elapsedSeconds: number;
  recoveryAttempted: boolean;
}

export interface FaultStatistics {
  activeCount: number;
  historySize: number;
  successRates: Partial<Record<FaultKind, SuccessRate>>;
  currentFaults: Partial<Record<FaultKind, CurrentFaultEntry>>;
}

/** Pure reads over the registry and tracker. */
export class StatisticsReporter {
  constructor(
    private readonly registry: FaultRegistry,
    private readonly tracker: SuccessRateTracker,
    private readonly clock: Clock
  ) {}

  activeFaults(): Partial<Record<FaultKind, boolean>> {
    const result: Partial<Record<FaultKind, boolean>> = {};
    for (const fault of this.registry.list()) {
      result[fault.kind] = fault.active;
    }
    return result;
  }

  statistics(): FaultStatistics {
    const now = this.clock.now();
    const currentFaults: Partial<Record<FaultKind, CurrentFaultEntry>> = {};

    for (const fault of this.registry.list()) {
      const end = fault.active ? now : fault.resolvedAt ?? now;
      currentFaults[fault.kind] = {
        active: fault.active,
        state: fault.state,
        durationSeconds: fault.durationSeconds,
        elapsedSeconds: parseFloat((Math.max(0, end - fault.startedAt) / 1000).toFixed(3)),
        recoveryAttempted: fault.recoveryAttempted,
      };
    }

    return {
      activeCount: this.registry.activeCount(),
      historySize: this.registry.historyStats().count,
      successRates: this.tracker.snapshot(),
      currentFaults,
    };
  }

  recoveryStatus(): string[] {
    return this.registry
      .list()
      .filter(fault => fault.active)
      .map(fault => fault.recoveryAttempted
        ? `Recovering from ${fault.kind}`
        : `Monitoring ${fault.kind}`);
  }
}
