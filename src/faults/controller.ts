import { FAULT_KINDS, RemediationFailedError } from './types.js';
import type { FaultKind } from './types.js';
import { logger } from '../observability/logger.js';

export type RemediationTrigger = 'always' | 'never' | number;

export interface RemediationFailureConfig {
  enabled: boolean;
  triggers: Partial<Record<FaultKind, RemediationTrigger>>;
}

export function parseTrigger(value: string | undefined): RemediationTrigger {
  if (!value) return 'never';
  if (value === 'always') return 'always';
  if (value === 'never') return 'never';

  const prob = parseFloat(value);
  if (isNaN(prob) || prob < 0 || prob > 1) return 'never';
  return prob;
}

/**
 * Chaos switchboard for the remediation actions themselves: when enabled,
 * a step for a configured kind reports failure always, never, or with the
 * given probability.
 */
export class RemediationFailureController {
  private config: RemediationFailureConfig = {
    enabled: false,
    triggers: {},
  };

  constructor(private readonly random: () => number = Math.random) {}

  initialize(env: NodeJS.ProcessEnv = process.env): void {
    const enabled = env.FAULTS_ENABLED === 'true';

    if (!enabled) {
      this.config = { enabled: false, triggers: {} };
      return;
    }

    const triggers: Partial<Record<FaultKind, RemediationTrigger>> = {};
    for (const kind of FAULT_KINDS) {
      triggers[kind] = parseTrigger(env[`FAULT_REMEDIATION_${kind}`]);
    }

    this.config = { enabled: true, triggers };
  }

  configure(config: RemediationFailureConfig): void {
    this.config = { enabled: config.enabled, triggers: { ...config.triggers } };
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  shouldFail(kind: FaultKind): boolean {
    if (!this.config.enabled) return false;

    const trigger = this.config.triggers[kind];
    if (!trigger || trigger === 'never') return false;
    if (trigger === 'always') return true;

    return this.random() < trigger;
  }

  /** Throws when chaos is configured to fail this step. */
  maybeFailRemediation(kind: FaultKind, step: number): void {
    if (this.shouldFail(kind)) {
      logger.warn('remediation_fault_injected', 'Injecting controlled remediation failure', {
        kind,
        step,
        mode: 'chaos_safety',
      });
      throw new RemediationFailedError(kind, step, `Injected remediation failure: ${kind} step ${step}`);
    }
  }

  getConfig(): Readonly<RemediationFailureConfig> {
    return this.config;
  }
}
