import { FAULT_KINDS } from '../faults/types.js';
import type { FaultConfig } from '../faults/types.js';
import { FaultCatalog, FaultCatalogError } from '../faults/catalog.js';
import type { FaultConfigOverrides } from '../faults/catalog.js';
import { getDefaultLimits } from '../concurrency/limits.js';
import type { OrchestratorLimits } from '../concurrency/limits.js';
import { isLogLevel, logger } from '../observability/logger.js';
import type { LogLevel } from '../observability/logger.js';

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  limits: OrchestratorLimits;
  catalogOverrides: FaultConfigOverrides;
}

type NumericOverrideKey = Exclude<keyof FaultConfig, 'metricsAffected'>;

const CATALOG_ENV_SUFFIXES: Array<[string, NumericOverrideKey]> = [
  ['COOLDOWN_SECONDS', 'cooldownSeconds'],
  ['MAX_DURATION_SECONDS', 'maxDurationSeconds'],
  ['CASCADE_PROBABILITY', 'cascadeProbability'],
  ['RECOVERY_STEPS', 'recoverySteps'],
  ['IMPACT_FACTOR', 'impactFactor'],
];

function parseNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  isValid: (value: number) => boolean
): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || !isValid(value)) {
    logger.warn('config_invalid', `Ignoring invalid value for ${name}`, { value: raw, fallback });
    return fallback;
  }
  return value;
}

function parseOptionalNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn('config_invalid', `Ignoring non-numeric value for ${name}`, { value: raw });
    return undefined;
  }
  return value;
}

export function loadCatalogOverrides(env: NodeJS.ProcessEnv): FaultConfigOverrides {
  const overrides: FaultConfigOverrides = {};

  for (const kind of FAULT_KINDS) {
    const override: Partial<Record<NumericOverrideKey, number>> = {};

    for (const [suffix, key] of CATALOG_ENV_SUFFIXES) {
      const value = parseOptionalNumber(env, `FAULT_${kind}_${suffix}`);
      if (value !== undefined) {
        override[key] = value;
      }
    }

    if (Object.keys(override).length === 0) continue;

    try {
      new FaultCatalog({ [kind]: override });
      overrides[kind] = override;
    } catch (error) {
      if (!(error instanceof FaultCatalogError)) throw error;
      logger.warn('config_invalid', 'Ignoring catalog override, keeping defaults', {
        kind,
        override,
        error: error.message,
      });
    }
  }

  return overrides;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaults = getDefaultLimits();
  const isNonNegativeInteger = (v: number) => Number.isInteger(v) && v >= 0;

  return {
    port: parseNumber(env, 'PORT', 3000, v => Number.isInteger(v) && v >= 0 && v < 65536),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info',
    limits: {
      recoveryStepDelayMs: parseNumber(env, 'RECOVERY_STEP_DELAY_MS', defaults.recoveryStepDelayMs, isNonNegativeInteger),
      recoveryHistoryLimit: parseNumber(env, 'RECOVERY_HISTORY_LIMIT', defaults.recoveryHistoryLimit, v => Number.isInteger(v) && v > 0),
      cascadeMaxDepth: parseNumber(env, 'CASCADE_MAX_DEPTH', defaults.cascadeMaxDepth, isNonNegativeInteger),
    },
    catalogOverrides: loadCatalogOverrides(env),
  };
}
