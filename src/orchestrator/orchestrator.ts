import { FaultCatalog } from '../faults/catalog.js';
import { CooldownGate } from '../faults/cooldown.js';
import { FaultRegistry } from '../faults/registry.js';
import { RemediationFailureController } from '../faults/controller.js';
import { createFaultBehaviors } from '../faults/behaviors.js';
import type { FaultBehavior } from '../faults/behaviors.js';
import { FaultRejectedError } from '../faults/types.js';
import type {
  ActiveFault,
  FaultKind,
  InjectionResult,
  InjectOptions,
  RecoveryOutcome,
} from '../faults/types.js';
import { RecoveryScheduler } from '../recovery/scheduler.js';
import { CascadeEngine } from '../cascade/engine.js';
import { SuccessRateTracker } from '../stats/success-rate.js';
import { StatisticsReporter } from '../stats/reporter.js';
import type { FaultStatistics } from '../stats/reporter.js';
import { Metrics } from '../metrics/metrics.js';
import type { MetricsSnapshot } from '../metrics/metrics.js';
import { InvariantMonitor } from '../invariants/checker.js';
import { createLock } from '../concurrency/semaphore.js';
import type { InMemorySemaphore } from '../concurrency/semaphore.js';
import { getDefaultLimits } from '../concurrency/limits.js';
import type { OrchestratorLimits } from '../concurrency/limits.js';
import { MetricsPerturbation, PerturbedMetricsProvider } from '../system/perturbation.js';
import { SystemInformationProvider, safeSnapshot } from '../system/provider.js';
import type { MetricsProvider, SystemSnapshot } from '../system/types.js';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';
import { logger as rootLogger, generateFaultId } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';

export interface FaultOrchestratorOptions {
  catalog?: FaultCatalog;
  /** Raw host readings; the orchestrator layers its synthetic perturbation on top. */
  metricsProvider?: MetricsProvider;
  chaos?: RemediationFailureController;
  /** Replaces the built-in behavior of individual kinds. */
  behaviors?: Partial<Record<FaultKind, FaultBehavior>>;
  clock?: Clock;
  random?: () => number;
  limits?: Partial<OrchestratorLimits>;
  idGenerator?: () => string;
  logger?: Logger;
}

type Admission =
  | { admitted: false; retryAfterSeconds: number }
  | { admitted: true; fault: ActiveFault; superseded?: ActiveFault };

export function resolveDuration(requested: number | undefined, maxDurationSeconds: number): number {
  if (requested === undefined || !Number.isFinite(requested) || requested <= 0) {
    return maxDurationSeconds;
  }
  return Math.min(requested, maxDurationSeconds);
}

/**
 * Owns every piece of fault state for one process: catalog, cooldowns,
 * registry, recovery tasks, cascade policy and statistics. All mutations
 * that span an await go through a single coarse lock.
 */
export class FaultOrchestrator {
  readonly catalog: FaultCatalog;
  readonly limits: OrchestratorLimits;
  readonly chaos: RemediationFailureController;

  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly idGenerator: () => string;
  private readonly logger: Logger;
  private readonly invariants: InvariantMonitor;
  private readonly lock: InMemorySemaphore;
  private readonly metrics: Metrics;
  private readonly cooldown: CooldownGate;
  private readonly registry: FaultRegistry;
  private readonly tracker: SuccessRateTracker;
  private readonly reporter: StatisticsReporter;
  private readonly perturbation: MetricsPerturbation;
  private readonly metricsProvider: MetricsProvider;
  private readonly behaviors: ReadonlyMap<FaultKind, FaultBehavior>;
  private readonly scheduler: RecoveryScheduler;
  private readonly cascade: CascadeEngine;
  private shuttingDown = false;

  constructor(options: FaultOrchestratorOptions = {}) {
    this.catalog = options.catalog ?? new FaultCatalog();
    this.limits = { ...getDefaultLimits(), ...options.limits };
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.idGenerator = options.idGenerator ?? generateFaultId;
    this.logger = options.logger ?? rootLogger;

    this.invariants = new InvariantMonitor();
    this.lock = createLock(this.invariants);
    this.metrics = new Metrics();
    this.cooldown = new CooldownGate(this.catalog);
    this.registry = new FaultRegistry(this.limits.recoveryHistoryLimit, this.invariants);
    this.tracker = new SuccessRateTracker(this.invariants);
    this.reporter = new StatisticsReporter(this.registry, this.tracker, this.clock);
    this.perturbation = new MetricsPerturbation();
    this.metricsProvider = new PerturbedMetricsProvider(
      options.metricsProvider ?? new SystemInformationProvider(),
      this.perturbation
    );

    this.chaos = options.chaos ?? new RemediationFailureController(this.random);
    const defaults = createFaultBehaviors({
      catalog: this.catalog,
      perturbation: this.perturbation,
      chaos: this.chaos,
    });
    const behaviors = new Map(defaults);
    for (const kind of this.catalog.kinds()) {
      const override = options.behaviors?.[kind];
      if (override) behaviors.set(kind, override);
    }
    this.behaviors = behaviors;

    this.scheduler = new RecoveryScheduler({
      catalog: this.catalog,
      behaviors: this.behaviors,
      metricsProvider: this.metricsProvider,
      registry: this.registry,
      tracker: this.tracker,
      lock: this.lock,
      metrics: this.metrics,
      invariants: this.invariants,
      clock: this.clock,
      logger: this.logger,
    }, this.limits.recoveryStepDelayMs);

    this.cascade = new CascadeEngine({
      catalog: this.catalog,
      inject: (kind, durationSeconds, injectOptions) => this.inject(kind, durationSeconds, injectOptions),
      random: this.random,
      maxDepth: this.limits.cascadeMaxDepth,
      metrics: this.metrics,
      invariants: this.invariants,
      logger: this.logger,
    });
  }

  async injectFault(kind: string, durationSeconds?: number): Promise<boolean> {
    const result = await this.tryInjectFault(kind, durationSeconds);
    return result.accepted;
  }

  tryInjectFault(kind: string, durationSeconds?: number): Promise<InjectionResult> {
    return this.inject(kind, durationSeconds, { depth: 0 });
  }

  /** Out-of-band cancel of the current fault of `kind`. */
  cancelFault(kind: string): boolean {
    if (!this.catalog.has(kind)) return false;

    const fault = this.registry.deactivate(kind);
    if (!fault) return false;

    this.scheduler.cancel(fault.id);
    this.logger.child({ faultId: fault.id, kind }).info('fault_cancelled', 'Fault deactivated by caller');
    return true;
  }

  getActiveFaults(): Partial<Record<FaultKind, boolean>> {
    return this.reporter.activeFaults();
  }

  getFaultStatistics(): FaultStatistics {
    return this.reporter.statistics();
  }

  getRecoveryStatus(): string[] {
    return this.reporter.recoveryStatus();
  }

  getRecoveryHistory(limit?: number): RecoveryOutcome[] {
    return this.registry.getHistory(limit);
  }

  getFault(kind: FaultKind): ActiveFault | undefined {
    return this.registry.get(kind);
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot({
      lock: this.lock,
      recoveryTasksInFlight: this.scheduler.inFlight(),
      history: this.registry.historyStats(),
      invariants: this.invariants.getSummary(),
    });
  }

  /** Current host reading with the synthetic fault effects applied. */
  readSystemState(): Promise<SystemSnapshot> {
    return safeSnapshot(this.metricsProvider, () => this.metrics.recordMetricsUnavailable());
  }

  drain(): Promise<void> {
    return this.scheduler.drain();
  }

  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.logger.info('shutdown', 'Cancelling in-flight recoveries', {
      inFlight: this.scheduler.inFlight(),
    });
    await this.scheduler.shutdown();
  }

  private async inject(kind: string, requestedDuration: number | undefined, options: InjectOptions): Promise<InjectionResult> {
    const depth = options.depth ?? 0;

    if (!this.catalog.has(kind)) {
      this.metrics.recordInjectionRejected('UNKNOWN_KIND');
      this.logger.error('fault_rejected', `Unknown fault kind: ${kind}`, { code: 'UNKNOWN_KIND', kind });
      return { accepted: false, error: new FaultRejectedError('UNKNOWN_KIND', kind, `Unknown fault kind: ${kind}`) };
    }

    const faultKind: FaultKind = kind;

    if (this.shuttingDown) {
      this.metrics.recordInjectionRejected('SHUTTING_DOWN');
      this.logger.warn('fault_rejected', 'Orchestrator is shutting down', { code: 'SHUTTING_DOWN', kind: faultKind });
      return { accepted: false, error: new FaultRejectedError('SHUTTING_DOWN', faultKind, 'Orchestrator is shutting down') };
    }

    const config = this.catalog.get(faultKind);
    const behavior = this.behaviors.get(faultKind);
    if (!behavior) {
      throw new Error(`No behavior registered for ${faultKind}`);
    }

    const admission = await this.lock.runExclusive<Admission>(async () => {
      const now = this.clock.now();

      if (!this.cooldown.check(faultKind, now)) {
        return { admitted: false, retryAfterSeconds: this.cooldown.remainingSeconds(faultKind, now) };
      }

      behavior.simulate();
      const systemStateBefore = await safeSnapshot(this.metricsProvider, () => this.metrics.recordMetricsUnavailable());

      const fault: ActiveFault = {
        id: this.idGenerator(),
        kind: faultKind,
        active: true,
        state: 'INJECTED',
        startedAt: now,
        durationSeconds: resolveDuration(requestedDuration, config.maxDurationSeconds),
        recoveryAttempted: false,
        systemStateBefore,
        cascadeDepth: depth,
        cascadeSource: options.source,
      };

      const superseded = this.registry.insert(fault, config.maxDurationSeconds);
      this.cooldown.record(faultKind, now);

      return { admitted: true, fault, superseded };
    });

    if (!admission.admitted) {
      this.metrics.recordInjectionRejected('IN_COOLDOWN');
      this.logger.info('fault_rejected', `Fault ${faultKind} is in cooldown`, {
        code: 'IN_COOLDOWN',
        kind: faultKind,
        retryAfterSeconds: admission.retryAfterSeconds,
        cascadeDepth: depth,
      });
      return {
        accepted: false,
        error: new FaultRejectedError('IN_COOLDOWN', faultKind, `Fault ${faultKind} is in cooldown`, admission.retryAfterSeconds),
      };
    }

    const { fault, superseded } = admission;
    const log = this.logger.child({ faultId: fault.id, kind: faultKind, cascadeDepth: depth });

    if (superseded) {
      this.metrics.recordSuperseded();
      this.scheduler.cancel(superseded.id);
      log.warn('fault_superseded', 'Previous fault of the same kind still recovering, cancelling it', {
        supersededFaultId: superseded.id,
      });
    }

    this.metrics.recordInjectionAccepted();
    log.info('fault_injected', 'Injecting fault', {
      durationSeconds: fault.durationSeconds,
      requestedDurationSeconds: requestedDuration,
      impactFactor: config.impactFactor,
      source: options.source,
    });

    this.scheduler.spawn(fault);

    if (this.random() < config.cascadeProbability) {
      await this.cascade.trigger(faultKind, depth);
    }

    return { accepted: true, fault };
  }
}
