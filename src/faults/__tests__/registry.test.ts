import { describe, it, expect } from 'vitest';
import { FaultRegistry } from '../registry.js';
import type { ActiveFault, FaultKind, RecoveryOutcome } from '../types.js';
import { InvariantMonitor } from '../../invariants/checker.js';

function fault(id: string, kind: FaultKind, overrides: Partial<ActiveFault> = {}): ActiveFault {
  return {
    id,
    kind,
    active: true,
    state: 'INJECTED',
    startedAt: 1000,
    durationSeconds: 30,
    recoveryAttempted: false,
    systemStateBefore: {},
    cascadeDepth: 0,
    ...overrides,
  };
}

function outcomeFor(f: ActiveFault): RecoveryOutcome {
  return {
    faultId: f.id,
    kind: f.kind,
    startedAt: f.startedAt,
    stepsCompleted: 3,
    stepsAttempted: 3,
    improvements: [0.1, 0.2, 0.3],
    durationMs: 20,
    success: true,
    cancelled: false,
  };
}

describe('FaultRegistry', () => {
  it('stores one current fault per kind', () => {
    const registry = new FaultRegistry(10);
    registry.insert(fault('a', 'CPU_OVERLOAD'), 60);
    registry.insert(fault('b', 'DISK_FILL'), 30);

    expect(registry.get('CPU_OVERLOAD')?.id).toBe('a');
    expect(registry.activeCount()).toBe(2);
    expect(registry.list().map(f => f.kind)).toEqual(['CPU_OVERLOAD', 'DISK_FILL']);
  });

  it('supersedes a still-active predecessor of the same kind', () => {
    const invariants = new InvariantMonitor();
    const registry = new FaultRegistry(10, invariants);
    const first = fault('a', 'CPU_OVERLOAD');
    registry.insert(first, 60);

    const superseded = registry.insert(fault('b', 'CPU_OVERLOAD'), 60);

    expect(superseded).toBe(first);
    expect(first.active).toBe(false);
    expect(registry.isCurrent(first)).toBe(false);
    expect(registry.activeCount()).toBe(1);
    expect(invariants.getSummary().total).toBe(0);
  });

  it('returns nothing to supersede when the predecessor already resolved', () => {
    const registry = new FaultRegistry(10);
    registry.insert(fault('a', 'MEMORY_LEAK', { active: false }), 45);

    expect(registry.insert(fault('b', 'MEMORY_LEAK'), 45)).toBeUndefined();
  });

  it('moves a re-injected kind to the end of the iteration order', () => {
    const registry = new FaultRegistry(10);
    registry.insert(fault('a', 'CPU_OVERLOAD'), 60);
    registry.insert(fault('b', 'DISK_FILL'), 30);
    registry.insert(fault('c', 'CPU_OVERLOAD'), 60);

    expect(registry.list().map(f => f.id)).toEqual(['b', 'c']);
  });

  it('deactivates only an active fault', () => {
    const registry = new FaultRegistry(10);
    registry.insert(fault('a', 'IO_STRESS'), 40);

    expect(registry.deactivate('IO_STRESS')?.id).toBe('a');
    expect(registry.deactivate('IO_STRESS')).toBeUndefined();
    expect(registry.deactivate('DISK_FILL')).toBeUndefined();
  });

  it('records the outcome and appends it to the bounded history', () => {
    const registry = new FaultRegistry(2);
    const faults = ['a', 'b', 'c'].map(id => fault(id, 'DISK_FILL'));

    for (const f of faults) {
      registry.insert(f, 30);
      registry.resolve(f, outcomeFor(f), 'RESOLVED', 5000);
    }

    const last = faults[2];
    expect(last?.state).toBe('RESOLVED');
    expect(last?.resolvedAt).toBe(5000);
    expect(last?.active).toBe(false);
    expect(registry.getHistory().map(o => o.faultId)).toEqual(['c', 'b']);
    expect(registry.historyStats()).toEqual({ count: 2, maxSize: 2, evicted: 1 });
  });

  it('flags an effective duration above the kind maximum', () => {
    const invariants = new InvariantMonitor();
    const registry = new FaultRegistry(10, invariants);

    registry.insert(fault('a', 'DISK_FILL', { durationSeconds: 90 }), 30);

    expect(invariants.getRecent().map(v => v.invariantId)).toEqual(['EFFECTIVE_DURATION_WITHIN_MAX']);
  });
});
