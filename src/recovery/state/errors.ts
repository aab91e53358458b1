import type { FaultState } from './states.js';

export class IllegalStateTransitionError extends Error {
  constructor(
    public readonly from: FaultState,
    public readonly to: FaultState,
    public readonly reason: string
  ) {
    super(`Illegal fault state transition: ${from} → ${to}: ${reason}`);
    this.name = 'IllegalStateTransitionError';
  }
}

export class TerminalStateViolationError extends Error {
  constructor(
    public readonly state: FaultState,
    public readonly attemptedTransition: FaultState
  ) {
    super(`Cannot transition from terminal state ${state} to ${attemptedTransition}`);
    this.name = 'TerminalStateViolationError';
  }
}
