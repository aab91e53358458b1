export const ORCHESTRATOR_LIMITS = {
  RECOVERY_STEP_DELAY_MS: 2000,
  RECOVERY_HISTORY_LIMIT: 100,
  CASCADE_MAX_DEPTH: 2,
} as const;

export interface OrchestratorLimits {
  recoveryStepDelayMs: number;
  recoveryHistoryLimit: number;
  cascadeMaxDepth: number;
}

export function getDefaultLimits(): OrchestratorLimits {
  return {
    recoveryStepDelayMs: ORCHESTRATOR_LIMITS.RECOVERY_STEP_DELAY_MS,
    recoveryHistoryLimit: ORCHESTRATOR_LIMITS.RECOVERY_HISTORY_LIMIT,
    cascadeMaxDepth: ORCHESTRATOR_LIMITS.CASCADE_MAX_DEPTH,
  };
}
