import type { ActiveFault, FaultKind, RecoveryOutcome } from './types.js';
import type { FaultState } from '../recovery/state/states.js';
import { RecoveryHistory } from '../recovery/history.js';
import type { RecoveryHistoryStats } from '../recovery/history.js';
import type { InvariantMonitor } from '../invariants/checker.js';

/**
 * Current fault per kind plus the bounded history of resolved recoveries.
 * The registry does no locking itself: the orchestrator calls its mutators
 * from inside its critical sections.
 */
export class FaultRegistry {
  private faults: Map<FaultKind, ActiveFault> = new Map();
  private readonly history: RecoveryHistory;

  constructor(
    private readonly historyLimit: number,
    private readonly invariants?: InvariantMonitor
  ) {
    this.history = new RecoveryHistory(historyLimit);
  }

  /**
   * Stores the fault as the current entry for its kind. A still-active
   * predecessor is deactivated and returned so its recovery can be stopped.
   */
  insert(fault: ActiveFault, maxDurationSeconds: number): ActiveFault | undefined {
    const previous = this.faults.get(fault.kind);
    let superseded: ActiveFault | undefined;

    if (previous?.active) {
      previous.active = false;
      superseded = previous;
    }

    // Re-insert so iteration order follows injection order.
    this.faults.delete(fault.kind);
    this.faults.set(fault.kind, fault);

    this.invariants?.check({
      kind: fault.kind,
      activeFaultsOfKind: this.list().filter(f => f.kind === fault.kind && f.active).length,
      effectiveDurationSeconds: fault.durationSeconds,
      maxDurationSeconds,
    }, ['SINGLE_ACTIVE_FAULT_PER_KIND', 'EFFECTIVE_DURATION_WITHIN_MAX']);

    return superseded;
  }

  get(kind: FaultKind): ActiveFault | undefined {
    return this.faults.get(kind);
  }

  isCurrent(fault: ActiveFault): boolean {
    return this.faults.get(fault.kind) === fault;
  }

  list(): ActiveFault[] {
    return [...this.faults.values()];
  }

  activeCount(): number {
    return this.list().filter(f => f.active).length;
  }

  /** Out-of-band cancel: flips the active flag; the recovery task notices at its next step. */
  deactivate(kind: FaultKind): ActiveFault | undefined {
    const fault = this.faults.get(kind);
    if (!fault || !fault.active) return undefined;

    fault.active = false;
    return fault;
  }

  resolve(fault: ActiveFault, outcome: RecoveryOutcome, state: FaultState, resolvedAt: number): void {
    fault.active = false;
    fault.state = state;
    fault.outcome = outcome;
    fault.resolvedAt = resolvedAt;

    this.history.append(outcome);

    this.invariants?.check({
      historySize: this.history.size(),
      historyLimit: this.historyLimit,
    }, ['HISTORY_WITHIN_LIMIT']);
  }

  getHistory(limit?: number): RecoveryOutcome[] {
    return this.history.getRecent(limit);
  }

  historyStats(): RecoveryHistoryStats {
    return this.history.getStats();
  }
}
