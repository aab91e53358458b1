export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'LOCK_PERMITS_NON_NEGATIVE'
  | 'LOCK_IN_FLIGHT_MATCHES_ACQUIRED'
  | 'SINGLE_ACTIVE_FAULT_PER_KIND'
  | 'EFFECTIVE_DURATION_WITHIN_MAX'
  | 'SUCCESSES_WITHIN_ATTEMPTS'
  | 'STEPS_WITHIN_CONFIGURED'
  | 'CASCADE_DEPTH_WITHIN_BUDGET'
  | 'HISTORY_WITHIN_LIMIT';

export interface InvariantContext {
  // Lock context
  semaphorePermits?: number;
  semaphoreInFlight?: number;
  semaphoreMaxPermits?: number;

  // Registry context
  kind?: string;
  activeFaultsOfKind?: number;
  effectiveDurationSeconds?: number;
  maxDurationSeconds?: number;
  historySize?: number;
  historyLimit?: number;

  // Recovery context
  stepsCompleted?: number;
  configuredSteps?: number;
  attempts?: number;
  successes?: number;

  // Cascade context
  cascadeDepth?: number;
  maxCascadeDepth?: number;
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (context: InvariantContext) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  context: InvariantContext;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
