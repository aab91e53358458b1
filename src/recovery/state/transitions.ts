import { canTransition, isTerminalState } from './states.js';
import type { FaultState } from './states.js';

export interface StateTransition {
  from: FaultState;
  to: FaultState;
  timestamp: string;
  reason?: string;
}

export type TransitionResult =
  | { allowed: true }
  | { allowed: false; reason: string };

export function validateTransition(
  from: FaultState,
  to: FaultState
): TransitionResult {
  if (isTerminalState(from)) {
    return {
      allowed: false,
      reason: `Cannot transition from terminal state ${from}`,
    };
  }

  if (!canTransition(from, to)) {
    return {
      allowed: false,
      reason: `Invalid transition from ${from} to ${to}`,
    };
  }

  return { allowed: true };
}

export function createTransition(
  from: FaultState,
  to: FaultState,
  reason?: string
): StateTransition {
  return {
    from,
    to,
    timestamp: new Date().toISOString(),
    reason,
  };
}
