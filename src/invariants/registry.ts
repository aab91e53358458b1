import type { InvariantDefinition, InvariantContext, InvariantID } from './types.js';

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  LOCK_PERMITS_NON_NEGATIVE: {
    id: 'LOCK_PERMITS_NON_NEGATIVE',
    description: 'Lock available permits must never be negative',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphorePermits === undefined) return true;
      return ctx.semaphorePermits >= 0;
    },
  },

  LOCK_IN_FLIGHT_MATCHES_ACQUIRED: {
    id: 'LOCK_IN_FLIGHT_MATCHES_ACQUIRED',
    description: 'In-flight holders must equal (max - available) permits',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.semaphoreInFlight === undefined ||
          ctx.semaphorePermits === undefined ||
          ctx.semaphoreMaxPermits === undefined) {
        return true;
      }
      return ctx.semaphoreInFlight === ctx.semaphoreMaxPermits - ctx.semaphorePermits;
    },
  },

  SINGLE_ACTIVE_FAULT_PER_KIND: {
    id: 'SINGLE_ACTIVE_FAULT_PER_KIND',
    description: 'At most one active fault may exist per kind',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.activeFaultsOfKind === undefined) return true;
      return ctx.activeFaultsOfKind <= 1;
    },
  },

  EFFECTIVE_DURATION_WITHIN_MAX: {
    id: 'EFFECTIVE_DURATION_WITHIN_MAX',
    description: 'Effective fault duration must not exceed the kind maximum',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.effectiveDurationSeconds === undefined || ctx.maxDurationSeconds === undefined) {
        return true;
      }
      return ctx.effectiveDurationSeconds > 0 && ctx.effectiveDurationSeconds <= ctx.maxDurationSeconds;
    },
  },

  SUCCESSES_WITHIN_ATTEMPTS: {
    id: 'SUCCESSES_WITHIN_ATTEMPTS',
    description: 'Recovery successes can never exceed recovery attempts',
    severity: 'fatal',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.attempts === undefined || ctx.successes === undefined) return true;
      return ctx.successes >= 0 && ctx.successes <= ctx.attempts;
    },
  },

  STEPS_WITHIN_CONFIGURED: {
    id: 'STEPS_WITHIN_CONFIGURED',
    description: 'Completed recovery steps cannot exceed the configured step count',
    severity: 'error',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.stepsCompleted === undefined || ctx.configuredSteps === undefined) return true;
      return ctx.stepsCompleted >= 0 && ctx.stepsCompleted <= ctx.configuredSteps;
    },
  },

  CASCADE_DEPTH_WITHIN_BUDGET: {
    id: 'CASCADE_DEPTH_WITHIN_BUDGET',
    description: 'Cascaded injections must stay within the cascade depth budget',
    severity: 'warn',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.cascadeDepth === undefined || ctx.maxCascadeDepth === undefined) return true;
      return ctx.cascadeDepth <= ctx.maxCascadeDepth;
    },
  },

  HISTORY_WITHIN_LIMIT: {
    id: 'HISTORY_WITHIN_LIMIT',
    description: 'Recovery history must respect its size bound',
    severity: 'warn',
    evaluate: (ctx: InvariantContext) => {
      if (ctx.historySize === undefined || ctx.historyLimit === undefined) return true;
      return ctx.historySize <= ctx.historyLimit;
    },
  },
};

export function getAllInvariants(): InvariantDefinition[] {
  return Object.values(INVARIANTS);
}

export function getInvariantsByIds(ids: InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
