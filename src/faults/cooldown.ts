import type { FaultCatalog } from './catalog.js';
import type { FaultKind } from './types.js';

/**
 * Tracks the last trigger time per kind. Callers hold the orchestrator lock
 * across check() and record() so two near-simultaneous injections of one
 * kind cannot both pass.
 */
export class CooldownGate {
  private lastTriggerAt: Map<FaultKind, number> = new Map();

  constructor(private readonly catalog: FaultCatalog) {}

  check(kind: FaultKind, now: number): boolean {
    const last = this.lastTriggerAt.get(kind);
    if (last === undefined) return true;

    return now - last >= this.catalog.get(kind).cooldownSeconds * 1000;
  }

  record(kind: FaultKind, now: number): void {
    this.lastTriggerAt.set(kind, now);
  }

  remainingSeconds(kind: FaultKind, now: number): number {
    const last = this.lastTriggerAt.get(kind);
    if (last === undefined) return 0;

    const remainingMs = this.catalog.get(kind).cooldownSeconds * 1000 - (now - last);
    return Math.max(0, Math.ceil(remainingMs / 1000));
  }
}
