import type { FaultCatalog } from './catalog.js';
import type { RemediationFailureController } from './controller.js';
import type { FaultKind } from './types.js';
import type { MetricsPerturbation } from '../system/perturbation.js';

/**
 * What a fault kind can do: perturb the metrics when injected, and run one
 * remediation step of its recovery sequence. recover() resolves to whether
 * the step succeeded; a thrown error counts as a failed step.
 */
export interface FaultBehavior {
  readonly kind: FaultKind;
  readonly remediation: string;
  simulate(): void;
  recover(step: number): Promise<boolean>;
  /** Drops whatever synthetic effect is left once recovery ends. */
  reset(): void;
}

export interface BehaviorDependencies {
  catalog: FaultCatalog;
  perturbation: MetricsPerturbation;
  chaos: RemediationFailureController;
}

abstract class SyntheticFaultBehavior implements FaultBehavior {
  abstract readonly remediation: string;

  constructor(
    readonly kind: FaultKind,
    protected readonly deps: BehaviorDependencies
  ) {}

  protected get steps(): number {
    return this.deps.catalog.get(this.kind).recoverySteps;
  }

  simulate(): void {
    const config = this.deps.catalog.get(this.kind);
    this.deps.perturbation.apply(this.kind, config.metricsAffected, config.impactFactor);
  }

  async recover(step: number): Promise<boolean> {
    this.deps.chaos.maybeFailRemediation(this.kind, step);
    this.deps.perturbation.relax(this.kind, this.remainingAfter(step));
    return true;
  }

  reset(): void {
    this.deps.perturbation.clear(this.kind);
  }

  /** Share of the impact left once `step` has run. */
  protected abstract remainingAfter(step: number): number;
}

class CpuThrottleBehavior extends SyntheticFaultBehavior {
  readonly remediation = 'throttle runaway workload';

  protected remainingAfter(step: number): number {
    return 1 - (step + 1) / this.steps;
  }
}

class MemoryReclaimBehavior extends SyntheticFaultBehavior {
  readonly remediation = 'reclaim leaked heap';

  async recover(step: number): Promise<boolean> {
    // Only exposed when node runs with --expose-gc.
    const gc: unknown = Reflect.get(globalThis, 'gc');
    if (typeof gc === 'function') gc();
    return super.recover(step);
  }

  protected remainingAfter(step: number): number {
    if (step >= this.steps - 1) return 0;
    return Math.pow(0.5, step + 1);
  }
}

class DiskPurgeBehavior extends SyntheticFaultBehavior {
  readonly remediation = 'rotate and purge temporary files';

  // Files are only released by the final purge.
  protected remainingAfter(step: number): number {
    return step >= this.steps - 1 ? 0 : 1;
  }
}

class IoDrainBehavior extends SyntheticFaultBehavior {
  readonly remediation = 'drain pending I/O queues';

  protected remainingAfter(step: number): number {
    return 1 - (step + 1) / this.steps;
  }
}

function assertNever(kind: never): never {
  throw new Error(`Unhandled fault kind: ${String(kind)}`);
}

export function createFaultBehavior(kind: FaultKind, deps: BehaviorDependencies): FaultBehavior {
  switch (kind) {
    case 'CPU_OVERLOAD':
      return new CpuThrottleBehavior(kind, deps);
    case 'MEMORY_LEAK':
      return new MemoryReclaimBehavior(kind, deps);
    case 'DISK_FILL':
      return new DiskPurgeBehavior(kind, deps);
    case 'IO_STRESS':
      return new IoDrainBehavior(kind, deps);
    default:
      return assertNever(kind);
  }
}

export function createFaultBehaviors(deps: BehaviorDependencies): ReadonlyMap<FaultKind, FaultBehavior> {
  return new Map(deps.catalog.kinds().map(kind => [kind, createFaultBehavior(kind, deps)]));
}
