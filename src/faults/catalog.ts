import { FAULT_KINDS } from './types.js';
import type { FaultConfig, FaultKind } from './types.js';

export const DEFAULT_FAULT_CONFIGS: Readonly<Record<FaultKind, FaultConfig>> = {
  CPU_OVERLOAD: {
    impactFactor: 1.5,
    recoverySteps: 5,
    metricsAffected: ['cpu_usage'],
    cooldownSeconds: 300,
    maxDurationSeconds: 60,
    cascadeProbability: 0.3,
  },
  MEMORY_LEAK: {
    impactFactor: 1.3,
    recoverySteps: 4,
    metricsAffected: ['memory_usage'],
    cooldownSeconds: 400,
    maxDurationSeconds: 45,
    cascadeProbability: 0.25,
  },
  DISK_FILL: {
    impactFactor: 1.2,
    recoverySteps: 3,
    metricsAffected: ['disk_usage'],
    cooldownSeconds: 500,
    maxDurationSeconds: 30,
    cascadeProbability: 0.2,
  },
  IO_STRESS: {
    impactFactor: 1.4,
    recoverySteps: 4,
    metricsAffected: ['disk_usage', 'cpu_usage'],
    cooldownSeconds: 350,
    maxDurationSeconds: 40,
    cascadeProbability: 0.35,
  },
};

export type FaultConfigOverrides = Partial<Record<FaultKind, Partial<FaultConfig>>>;

export class FaultCatalogError extends Error {
  constructor(
    public readonly kind: FaultKind,
    message: string
  ) {
    super(`Invalid configuration for ${kind}: ${message}`);
    this.name = 'FaultCatalogError';
  }
}

function validateConfig(kind: FaultKind, config: FaultConfig): void {
  if (!Number.isInteger(config.recoverySteps) || config.recoverySteps < 1) {
    throw new FaultCatalogError(kind, 'recoverySteps must be an integer >= 1');
  }
  if (config.cascadeProbability < 0 || config.cascadeProbability > 1) {
    throw new FaultCatalogError(kind, 'cascadeProbability must be within [0, 1]');
  }
  if (config.cooldownSeconds < 0) {
    throw new FaultCatalogError(kind, 'cooldownSeconds must be >= 0');
  }
  if (config.maxDurationSeconds <= 0) {
    throw new FaultCatalogError(kind, 'maxDurationSeconds must be > 0');
  }
  if (config.impactFactor < 1) {
    throw new FaultCatalogError(kind, 'impactFactor must be >= 1');
  }
}

/**
 * Immutable per-kind configuration table. Built once, frozen, and shared
 * by every component that needs a kind's limits.
 */
export class FaultCatalog {
  private readonly configs: ReadonlyMap<FaultKind, FaultConfig>;

  constructor(overrides: FaultConfigOverrides = {}) {
    const configs = new Map<FaultKind, FaultConfig>();

    for (const kind of FAULT_KINDS) {
      const merged: FaultConfig = { ...DEFAULT_FAULT_CONFIGS[kind], ...overrides[kind] };
      validateConfig(kind, merged);
      configs.set(kind, Object.freeze({
        ...merged,
        metricsAffected: Object.freeze([...merged.metricsAffected]),
      }));
    }

    this.configs = configs;
  }

  has(kind: string): kind is FaultKind {
    return this.kinds().some(known => known === kind);
  }

  get(kind: FaultKind): FaultConfig {
    const config = this.configs.get(kind);
    if (!config) {
      throw new Error(`No configuration registered for ${kind}`);
    }
    return config;
  }

  kinds(): FaultKind[] {
    return [...this.configs.keys()];
  }
}
