import type { MetricName, SystemSnapshot } from '../system/types.js';
import type { FaultState } from '../recovery/state/states.js';

export type FaultKind =
  | 'CPU_OVERLOAD'
  | 'MEMORY_LEAK'
  | 'DISK_FILL'
  | 'IO_STRESS';

export const FAULT_KINDS: readonly FaultKind[] = [
  'CPU_OVERLOAD',
  'MEMORY_LEAK',
  'DISK_FILL',
  'IO_STRESS',
];

export interface FaultConfig {
  readonly impactFactor: number;
  readonly recoverySteps: number;
  readonly metricsAffected: readonly MetricName[];
  readonly cooldownSeconds: number;
  readonly maxDurationSeconds: number;
  readonly cascadeProbability: number;
}

export interface RecoveryOutcome {
  faultId: string;
  kind: FaultKind;
  startedAt: number;
  stepsCompleted: number;
  stepsAttempted: number;
  /** Mean improvement ratio per executed step, indexed by step. */
  improvements: number[];
  durationMs: number;
  success: boolean;
  cancelled: boolean;
}

export interface ActiveFault {
  id: string;
  kind: FaultKind;
  active: boolean;
  state: FaultState;
  startedAt: number;
  durationSeconds: number;
  recoveryAttempted: boolean;
  systemStateBefore: SystemSnapshot;
  cascadeDepth: number;
  cascadeSource?: FaultKind;
  resolvedAt?: number;
  outcome?: RecoveryOutcome;
}

export type FaultErrorCode =
  | 'UNKNOWN_KIND'
  | 'IN_COOLDOWN'
  | 'METRICS_UNAVAILABLE'
  | 'REMEDIATION_FAILED'
  | 'CASCADE_REJECTED'
  | 'SHUTTING_DOWN';

export type RejectionCode = Extract<FaultErrorCode, 'UNKNOWN_KIND' | 'IN_COOLDOWN' | 'SHUTTING_DOWN'>;

export class FaultRejectedError extends Error {
  constructor(
    public readonly code: RejectionCode,
    public readonly kind: string,
    message: string,
    public readonly retryAfterSeconds?: number
  ) {
    super(message);
    this.name = 'FaultRejectedError';
  }
}

export class RemediationFailedError extends Error {
  readonly code: FaultErrorCode = 'REMEDIATION_FAILED';

  constructor(
    public readonly kind: FaultKind,
    public readonly step: number,
    message: string
  ) {
    super(message);
    this.name = 'RemediationFailedError';
  }
}

export type InjectionResult =
  | { accepted: true; fault: ActiveFault }
  | { accepted: false; error: FaultRejectedError };

export interface InjectOptions {
  /** 0 for a caller-issued injection, incremented per cascade hop. */
  depth?: number;
  source?: FaultKind;
}
