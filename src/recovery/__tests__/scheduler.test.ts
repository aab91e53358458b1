import { describe, it, expect, vi } from 'vitest';
import { RecoveryScheduler } from '../scheduler.js';
import type { RecoveryDependencies } from '../scheduler.js';
import { FaultCatalog } from '../../faults/catalog.js';
import { FaultRegistry } from '../../faults/registry.js';
import type { FaultBehavior } from '../../faults/behaviors.js';
import type { ActiveFault, FaultKind } from '../../faults/types.js';
import { SuccessRateTracker } from '../../stats/success-rate.js';
import { Metrics } from '../../metrics/metrics.js';
import { InvariantMonitor } from '../../invariants/checker.js';
import { createLock } from '../../concurrency/semaphore.js';
import { ManualClock, StubMetricsProvider } from '../../testing/fixtures.js';

class ScriptedBehavior implements FaultBehavior {
  readonly kind = 'DISK_FILL';
  readonly remediation = 'scripted';
  calls: number[] = [];
  resets = 0;

  constructor(private readonly script: Array<'ok' | 'fail' | 'throw'>) {}

  simulate(): void {}

  async recover(step: number): Promise<boolean> {
    this.calls.push(step);
    const action = this.script[step] ?? 'ok';
    if (action === 'throw') throw new Error(`step ${step} exploded`);
    return action === 'ok';
  }

  reset(): void {
    this.resets++;
  }
}

function setup(behavior: ScriptedBehavior, stepDelayMs = 0) {
  const invariants = new InvariantMonitor();
  const deps: RecoveryDependencies = {
    catalog: new FaultCatalog(),
    behaviors: new Map<FaultKind, FaultBehavior>([['DISK_FILL', behavior]]),
    metricsProvider: new StubMetricsProvider({ disk_usage: 60 }),
    registry: new FaultRegistry(10, invariants),
    tracker: new SuccessRateTracker(invariants),
    lock: createLock(invariants),
    metrics: new Metrics(),
    invariants,
    clock: new ManualClock(),
  };
  return { deps, scheduler: new RecoveryScheduler(deps, stepDelayMs) };
}

function injectInto(deps: RecoveryDependencies): ActiveFault {
  const fault: ActiveFault = {
    id: 'disk-1',
    kind: 'DISK_FILL',
    active: true,
    state: 'INJECTED',
    startedAt: deps.clock.now(),
    durationSeconds: 30,
    recoveryAttempted: false,
    systemStateBefore: { disk_usage: 80 },
    cascadeDepth: 0,
  };
  deps.registry.insert(fault, 30);
  return fault;
}

describe('RecoveryScheduler', () => {
  it('runs every step and resolves the fault', async () => {
    const behavior = new ScriptedBehavior(['ok', 'ok', 'ok']);
    const { deps, scheduler } = setup(behavior);
    const fault = injectInto(deps);

    const outcome = await scheduler.spawn(fault).done;

    expect(behavior.calls).toEqual([0, 1, 2]);
    expect(outcome).toMatchObject({
      faultId: 'disk-1',
      stepsCompleted: 3,
      stepsAttempted: 3,
      success: true,
      cancelled: false,
    });
    expect(outcome?.improvements).toEqual([0.25, 0.25, 0.25]);
    expect(fault.state).toBe('RESOLVED');
    expect(fault.active).toBe(false);
    expect(fault.recoveryAttempted).toBe(true);
    expect(behavior.resets).toBe(1);
    expect(deps.tracker.get('DISK_FILL')).toEqual({ attempts: 1, successes: 1, rate: 1 });
    expect(deps.registry.getHistory()).toHaveLength(1);
    expect(scheduler.inFlight()).toBe(0);
  });

  it('waits the step delay between steps and finishes within the expected time', async () => {
    const stepDelayMs = 20;
    const behavior = new ScriptedBehavior(['ok', 'ok', 'ok']);
    const { deps, scheduler } = setup(behavior, stepDelayMs);
    const fault = injectInto(deps);

    const started = performance.now();
    const outcome = await scheduler.spawn(fault).done;
    const elapsed = performance.now() - started;

    expect(outcome).toMatchObject({ stepsCompleted: 3, success: true, cancelled: false });
    expect(fault.state).toBe('RESOLVED');
    // two pauses for three steps, none after the last; timers may fire a millisecond early
    expect(elapsed).toBeGreaterThanOrEqual(2 * stepDelayMs - 2);
    expect(elapsed).toBeLessThan(2000);
  });

  it('treats failed and throwing steps as failures without aborting', async () => {
    const behavior = new ScriptedBehavior(['fail', 'ok', 'throw']);
    const { deps, scheduler } = setup(behavior);
    const fault = injectInto(deps);

    const outcome = await scheduler.spawn(fault).done;

    expect(behavior.calls).toEqual([0, 1, 2]);
    expect(outcome?.stepsCompleted).toBe(1);
    expect(outcome?.stepsAttempted).toBe(3);
    expect(outcome?.success).toBe(false);
    expect(fault.state).toBe('PARTIALLY_RESOLVED');
    expect(deps.metrics.snapshot().recoveries.remediationStepFailures).toBe(2);
    expect(deps.tracker.get('DISK_FILL')).toEqual({ attempts: 1, successes: 0, rate: 0 });
  });

  it('stops at the next step boundary once cancelled', async () => {
    const behavior = new ScriptedBehavior(['ok', 'ok', 'ok']);
    const { deps, scheduler } = setup(behavior, 60_000);
    const fault = injectInto(deps);

    const handle = scheduler.spawn(fault);
    await vi.waitFor(() => expect(behavior.calls).toEqual([0]));
    handle.cancel();
    const outcome = await handle.done;

    expect(outcome).toMatchObject({ stepsCompleted: 1, stepsAttempted: 1, success: false, cancelled: true });
    expect(fault.state).toBe('CANCELLED');
    expect(deps.tracker.get('DISK_FILL')).toEqual({ attempts: 1, successes: 0, rate: 0 });
    expect(deps.metrics.snapshot().recoveries.cancelled).toBe(1);
  });

  it('shutdown cancels every task and waits for them', async () => {
    const behavior = new ScriptedBehavior(['ok', 'ok', 'ok']);
    const { deps, scheduler } = setup(behavior, 60_000);
    scheduler.spawn(injectInto(deps));

    await scheduler.shutdown();

    expect(scheduler.inFlight()).toBe(0);
    expect(deps.registry.getHistory()[0]?.cancelled).toBe(true);
  });

  it('cancel reports whether a task was running', async () => {
    const behavior = new ScriptedBehavior(['ok', 'ok', 'ok']);
    const { deps, scheduler } = setup(behavior, 60_000);
    const handle = scheduler.spawn(injectInto(deps));

    expect(scheduler.cancel('unknown')).toBe(false);
    expect(scheduler.cancel(handle.faultId)).toBe(true);
    await scheduler.drain();
  });
});
