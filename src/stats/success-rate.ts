import type { FaultKind } from '../faults/types.js';
import type { InvariantMonitor } from '../invariants/checker.js';

export interface SuccessRate {
  attempts: number;
  successes: number;
  rate: number;
}

interface Counter {
  attempts: number;
  successes: number;
}

export class SuccessRateTracker {
  private counters: Map<FaultKind, Counter> = new Map();

  constructor(private readonly invariants?: InvariantMonitor) {}

  record(kind: FaultKind, success: boolean): void {
    let counter = this.counters.get(kind);
    if (!counter) {
      counter = { attempts: 0, successes: 0 };
      this.counters.set(kind, counter);
    }

    counter.attempts++;
    if (success) {
      counter.successes++;
    }

    this.invariants?.check({
      kind,
      attempts: counter.attempts,
      successes: counter.successes,
    }, ['SUCCESSES_WITHIN_ATTEMPTS']);
  }

  rate(kind: FaultKind): number {
    const counter = this.counters.get(kind);
    if (!counter || counter.attempts === 0) return 0;
    return counter.successes / counter.attempts;
  }

  get(kind: FaultKind): SuccessRate {
    const counter = this.counters.get(kind);
    return {
      attempts: counter?.attempts ?? 0,
      successes: counter?.successes ?? 0,
      rate: this.rate(kind),
    };
  }

  snapshot(): Partial<Record<FaultKind, SuccessRate>> {
    const result: Partial<Record<FaultKind, SuccessRate>> = {};
    for (const kind of this.counters.keys()) {
      result[kind] = this.get(kind);
    }
    return result;
  }
}
