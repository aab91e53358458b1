import { describe, it, expect } from 'vitest';
import { SuccessRateTracker } from '../success-rate.js';
import { StatisticsReporter } from '../reporter.js';
import { FaultRegistry } from '../../faults/registry.js';
import type { ActiveFault, FaultKind } from '../../faults/types.js';
import { ManualClock } from '../../testing/fixtures.js';

function fault(id: string, kind: FaultKind, startedAt: number): ActiveFault {
  return {
    id,
    kind,
    active: true,
    state: 'INJECTED',
    startedAt,
    durationSeconds: 30,
    recoveryAttempted: false,
    systemStateBefore: {},
    cascadeDepth: 0,
  };
}

describe('SuccessRateTracker', () => {
  it('reports 0 for a kind with no attempts', () => {
    const tracker = new SuccessRateTracker();

    expect(tracker.rate('CPU_OVERLOAD')).toBe(0);
    expect(tracker.get('CPU_OVERLOAD')).toEqual({ attempts: 0, successes: 0, rate: 0 });
    expect(tracker.snapshot()).toEqual({});
  });

  it('counts attempts and successes per kind', () => {
    const tracker = new SuccessRateTracker();
    tracker.record('MEMORY_LEAK', true);
    tracker.record('MEMORY_LEAK', false);
    tracker.record('MEMORY_LEAK', true);
    tracker.record('DISK_FILL', false);

    expect(tracker.get('MEMORY_LEAK')).toEqual({ attempts: 3, successes: 2, rate: 2 / 3 });
    expect(tracker.snapshot()).toEqual({
      MEMORY_LEAK: { attempts: 3, successes: 2, rate: 2 / 3 },
      DISK_FILL: { attempts: 1, successes: 0, rate: 0 },
    });
  });
});

describe('StatisticsReporter', () => {
  it('summarises current faults, history and success rates', () => {
    const clock = new ManualClock(10_000);
    const registry = new FaultRegistry(10);
    const tracker = new SuccessRateTracker();
    const reporter = new StatisticsReporter(registry, tracker, clock);

    const cpu = fault('a', 'CPU_OVERLOAD', 10_000);
    const disk = fault('b', 'DISK_FILL', 10_000);
    registry.insert(cpu, 60);
    registry.insert(disk, 30);
    cpu.recoveryAttempted = true;
    cpu.state = 'RECOVERING';

    clock.advance(1_500);
    registry.resolve(disk, {
      faultId: 'b',
      kind: 'DISK_FILL',
      startedAt: 10_000,
      stepsCompleted: 3,
      stepsAttempted: 3,
      improvements: [0, 0, 0],
      durationMs: 1_500,
      success: true,
      cancelled: false,
    }, 'RESOLVED', clock.now());
    tracker.record('DISK_FILL', true);
    clock.advance(2_000);

    expect(reporter.activeFaults()).toEqual({ CPU_OVERLOAD: true, DISK_FILL: false });
    expect(reporter.statistics()).toEqual({
      activeCount: 1,
      historySize: 1,
      successRates: { DISK_FILL: { attempts: 1, successes: 1, rate: 1 } },
      currentFaults: {
        CPU_OVERLOAD: {
          active: true,
          state: 'RECOVERING',
          durationSeconds: 30,
          elapsedSeconds: 3.5,
          recoveryAttempted: true,
        },
        DISK_FILL: {
          active: false,
          state: 'RESOLVED',
          durationSeconds: 30,
          elapsedSeconds: 1.5,
          recoveryAttempted: false,
        },
      },
    });
  });

  it('lists one status line per active fault', () => {
    const registry = new FaultRegistry(10);
    const reporter = new StatisticsReporter(registry, new SuccessRateTracker(), new ManualClock());
    const cpu = fault('a', 'CPU_OVERLOAD', 0);
    registry.insert(cpu, 60);
    registry.insert(fault('b', 'MEMORY_LEAK', 0), 45);
    registry.insert(fault('c', 'IO_STRESS', 0), 40);
    registry.deactivate('IO_STRESS');
    cpu.recoveryAttempted = true;

    expect(reporter.recoveryStatus()).toEqual(['Recovering from CPU_OVERLOAD', 'Monitoring MEMORY_LEAK']);
  });
});
