export type FaultState =
  | 'INJECTED'
  | 'RECOVERING'

  // Terminal states
  | 'RESOLVED'
  | 'PARTIALLY_RESOLVED'
  | 'CANCELLED';

export interface StateMetadata {
  state: FaultState;
  isTerminal: boolean;
  canTransitionTo: FaultState[];
  description: string;
}

const STATE_DEFINITIONS: Record<FaultState, Omit<StateMetadata, 'state'>> = {
  INJECTED: {
    isTerminal: false,
    canTransitionTo: ['RECOVERING', 'CANCELLED'],
    description: 'Fault injected, recovery task scheduled',
  },

  RECOVERING: {
    isTerminal: false,
    canTransitionTo: ['RESOLVED', 'PARTIALLY_RESOLVED', 'CANCELLED'],
    description: 'Recovery steps in progress',
  },

  RESOLVED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Every recovery step reported success',
  },

  PARTIALLY_RESOLVED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Recovery finished with at least one failed step',
  },

  CANCELLED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Recovery stopped early after the fault was deactivated',
  },
};

export function getStateMetadata(state: FaultState): StateMetadata {
  return {
    state,
    ...STATE_DEFINITIONS[state],
  };
}

export function isTerminalState(state: FaultState): boolean {
  return STATE_DEFINITIONS[state].isTerminal;
}

export function canTransition(from: FaultState, to: FaultState): boolean {
  return STATE_DEFINITIONS[from].canTransitionTo.includes(to);
}
