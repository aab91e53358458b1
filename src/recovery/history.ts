import type { RecoveryOutcome } from '../faults/types.js';

export interface RecoveryHistoryStats {
  count: number;
  maxSize: number;
  evicted: number;
}

/** Bounded, in-memory record of resolved recoveries. Oldest entries are evicted first. */
export class RecoveryHistory {
  private outcomes: RecoveryOutcome[] = [];
  private evicted = 0;

  constructor(private readonly maxSize: number) {
    if (maxSize <= 0) {
      throw new Error('Recovery history maxSize must be > 0');
    }
  }

  append(outcome: RecoveryOutcome): void {
    this.outcomes.push(outcome);

    if (this.outcomes.length > this.maxSize) {
      this.outcomes.shift();
      this.evicted++;
    }
  }

  getRecent(limit: number = 50): RecoveryOutcome[] {
    const actualLimit = Math.max(0, Math.min(limit, this.outcomes.length));
    if (actualLimit === 0) return [];
    return this.outcomes.slice(-actualLimit).reverse();
  }

  size(): number {
    return this.outcomes.length;
  }

  getStats(): RecoveryHistoryStats {
    return {
      count: this.outcomes.length,
      maxSize: this.maxSize,
      evicted: this.evicted,
    };
  }
}
