import { setTimeout as delay } from 'timers/promises';
import type { ActiveFault, FaultKind, RecoveryOutcome } from '../faults/types.js';
import { RemediationFailedError } from '../faults/types.js';
import type { FaultCatalog } from '../faults/catalog.js';
import type { FaultBehavior } from '../faults/behaviors.js';
import type { FaultRegistry } from '../faults/registry.js';
import type { InMemorySemaphore } from '../concurrency/semaphore.js';
import type { SuccessRateTracker } from '../stats/success-rate.js';
import type { Metrics } from '../metrics/metrics.js';
import type { InvariantMonitor } from '../invariants/checker.js';
import type { MetricsProvider } from '../system/types.js';
import type { Clock } from '../orchestrator/clock.js';
import { safeSnapshot } from '../system/provider.js';
import { calculateImprovement } from './improvement.js';
import { FaultStateMachine } from './state/machine.js';
import type { FaultState } from './state/states.js';
import { logger as rootLogger, describeError } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';

export interface RecoveryHandle {
  faultId: string;
  kind: FaultKind;
  done: Promise<RecoveryOutcome | undefined>;
  cancel(): void;
}

export interface RecoveryDependencies {
  catalog: FaultCatalog;
  behaviors: ReadonlyMap<FaultKind, FaultBehavior>;
  metricsProvider: MetricsProvider;
  registry: FaultRegistry;
  tracker: SuccessRateTracker;
  lock: InMemorySemaphore;
  metrics: Metrics;
  invariants: InvariantMonitor;
  clock: Clock;
  logger?: Logger;
}

async function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return;

  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) return;
    throw error;
  }
}

/**
 * Runs one supervised recovery task per injected fault. Steps execute
 * outside the orchestrator lock; only the final bookkeeping takes it.
 */
export class RecoveryScheduler {
  private handles: Map<string, RecoveryHandle> = new Map();
  private readonly logger: Logger;

  constructor(
    private readonly deps: RecoveryDependencies,
    private readonly stepDelayMs: number
  ) {
    this.logger = deps.logger ?? rootLogger;
  }

  spawn(fault: ActiveFault): RecoveryHandle {
    const controller = new AbortController();
    const taskLogger = this.logger.child({ faultId: fault.id, kind: fault.kind, cascadeDepth: fault.cascadeDepth });

    const done = this.run(fault, controller.signal, taskLogger)
      .catch((error: unknown) => {
        taskLogger.error('recovery_task_error', 'Recovery task failed unexpectedly', {
          error: describeError(error),
        });
        return undefined;
      })
      .finally(() => {
        this.handles.delete(fault.id);
      });

    const handle: RecoveryHandle = {
      faultId: fault.id,
      kind: fault.kind,
      done,
      cancel: () => {
        fault.active = false;
        controller.abort();
      },
    };

    this.handles.set(fault.id, handle);
    return handle;
  }

  cancel(faultId: string): boolean {
    const handle = this.handles.get(faultId);
    if (!handle) return false;

    handle.cancel();
    return true;
  }

  inFlight(): number {
    return this.handles.size;
  }

  /** Waits until no recovery task is running, including ones spawned meanwhile. */
  async drain(): Promise<void> {
    while (this.handles.size > 0) {
      await Promise.all([...this.handles.values()].map(h => h.done));
    }
  }

  async shutdown(): Promise<void> {
    for (const handle of this.handles.values()) {
      handle.cancel();
    }
    await this.drain();
  }

  private async run(fault: ActiveFault, signal: AbortSignal, log: Logger): Promise<RecoveryOutcome> {
    const { catalog, behaviors, clock } = this.deps;
    const config = catalog.get(fault.kind);
    const behavior = behaviors.get(fault.kind);
    if (!behavior) {
      throw new Error(`No behavior registered for ${fault.kind}`);
    }

    const machine = new FaultStateMachine(fault.id, fault.state, log);
    const startedAt = clock.now();
    const improvements: number[] = [];
    let stepsCompleted = 0;
    let stepsAttempted = 0;
    let cancelled = false;

    log.info('recovery_start', 'Starting recovery', {
      steps: config.recoverySteps,
      stepDelayMs: this.stepDelayMs,
      remediation: behavior.remediation,
    });

    for (let step = 0; step < config.recoverySteps; step++) {
      if (!fault.active) {
        cancelled = true;
        break;
      }

      if (step === 0) {
        fault.recoveryAttempted = true;
        machine.transition('RECOVERING');
        fault.state = machine.getCurrentState();
      }

      stepsAttempted++;
      if (await this.runStep(behavior, step, log)) {
        stepsCompleted++;
      }

      const current = await safeSnapshot(this.deps.metricsProvider, () => this.deps.metrics.recordMetricsUnavailable());
      improvements[step] = calculateImprovement(config.metricsAffected, fault.systemStateBefore, current);

      if (step < config.recoverySteps - 1) {
        await pause(this.stepDelayMs, signal);
      }
    }

    const success = stepsCompleted === config.recoverySteps;
    const outcome: RecoveryOutcome = {
      faultId: fault.id,
      kind: fault.kind,
      startedAt,
      stepsCompleted,
      stepsAttempted,
      improvements,
      durationMs: clock.now() - startedAt,
      success,
      cancelled,
    };

    this.deps.invariants.check({
      kind: fault.kind,
      stepsCompleted,
      configuredSteps: config.recoverySteps,
    }, ['STEPS_WITHIN_CONFIGURED']);

    const finalState: FaultState = cancelled ? 'CANCELLED' : success ? 'RESOLVED' : 'PARTIALLY_RESOLVED';
    machine.transition(finalState, cancelled ? 'Fault deactivated before recovery finished' : undefined);

    await this.deps.lock.runExclusive(() => {
      if (this.deps.registry.isCurrent(fault)) {
        behavior.reset();
      }
      this.deps.registry.resolve(fault, outcome, finalState, clock.now());
      this.deps.tracker.record(fault.kind, success);
      this.deps.metrics.recordRecovery(outcome);
    });

    log.info('recovery_complete', 'Completed recovery', {
      success,
      cancelled,
      stepsCompleted,
      stepsAttempted,
      durationMs: outcome.durationMs,
      finalState,
    });

    return outcome;
  }

  private async runStep(behavior: FaultBehavior, step: number, log: Logger): Promise<boolean> {
    try {
      const succeeded = await behavior.recover(step);
      if (!succeeded) {
        this.deps.metrics.recordRemediationStepFailure();
        log.warn('remediation_step_failed', 'Remediation step reported failure', {
          code: 'REMEDIATION_FAILED',
          step,
        });
      }
      return succeeded;
    } catch (error) {
      this.deps.metrics.recordRemediationStepFailure();
      const phase = error instanceof RemediationFailedError ? 'remediation_step_failed' : 'remediation_step_error';
      log.warn(phase, 'Remediation step failed, continuing recovery', {
        code: 'REMEDIATION_FAILED',
        step,
        error: describeError(error),
      });
      return false;
    }
  }
}
