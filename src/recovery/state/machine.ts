import { isTerminalState } from './states.js';
import type { FaultState } from './states.js';
import { validateTransition, createTransition } from './transitions.js';
import type { StateTransition } from './transitions.js';
import { IllegalStateTransitionError, TerminalStateViolationError } from './errors.js';
import { logger as rootLogger } from '../../observability/logger.js';
import type { Logger } from '../../observability/logger.js';

export class FaultStateMachine {
  private currentState: FaultState;
  private transitions: StateTransition[] = [];
  private readonly logger: Logger;

  constructor(faultId: string, initialState: FaultState = 'INJECTED', logger: Logger = rootLogger) {
    this.currentState = initialState;
    this.logger = logger.child({ faultId });
  }

  getCurrentState(): FaultState {
    return this.currentState;
  }

  getTransitionHistory(): StateTransition[] {
    return [...this.transitions];
  }

  canTransitionTo(targetState: FaultState): boolean {
    return validateTransition(this.currentState, targetState).allowed;
  }

  transition(targetState: FaultState, reason?: string): void {
    const validationResult = validateTransition(this.currentState, targetState);

    if (!validationResult.allowed) {
      const error = isTerminalState(this.currentState)
        ? new TerminalStateViolationError(this.currentState, targetState)
        : new IllegalStateTransitionError(this.currentState, targetState, validationResult.reason);

      this.logger.error('illegal_state_transition', 'Illegal fault state transition attempted', {
        from: this.currentState,
        to: targetState,
        reason: validationResult.reason,
        transitionHistory: this.getStateHistorySummary(),
      });

      throw error;
    }

    const transition = createTransition(this.currentState, targetState, reason);
    this.transitions.push(transition);

    const previousState = this.currentState;
    this.currentState = targetState;

    this.logger.info('state_transition', 'Fault state changed', {
      from: previousState,
      to: targetState,
      reason,
      isTerminal: isTerminalState(targetState),
    });
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  getStateHistorySummary(): string[] {
    return this.transitions.map(t => `${t.from}→${t.to}`);
  }
}
