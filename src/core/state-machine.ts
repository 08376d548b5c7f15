/**
 * Phase State Machine
 *
 * Models the run as a cursor over the ordered phase list plus a status.
 * All cursor movement happens here; the orchestrator only emits events.
 */

import { IMPLEMENT_PHASE_ID, PhaseSpec, findPhaseIndex } from '../types/workflow-config';

/**
 * Status of the machine
 */
export type MachineStatus = 'RUNNING' | 'COMPLETE' | 'FAILED';

/**
 * Events that trigger state transitions
 */
export type MachineEvent =
  | { type: 'PHASE_COMPLETED' }
  | { type: 'GATES_FAILED'; failures: readonly string[] }
  | { type: 'FAILED'; error: Error };

/**
 * State carried across transitions
 * `cursor` always satisfies 0 <= cursor <= phases.length; it equals
 * phases.length only once the machine is COMPLETE.
 */
export interface MachineState {
  cursor: number;
  status: MachineStatus;
  lastError?: Error;
}

/**
 * Result of a state transition
 */
export interface TransitionResult {
  state: MachineState;
  /** Whether the event was accepted */
  valid: boolean;
  /** Human-readable description of what happened */
  description: string;
}

/**
 * Valid status changes
 * Key: current status, Value: statuses reachable from it
 */
const VALID_TRANSITIONS: Record<MachineStatus, MachineStatus[]> = {
  RUNNING: ['RUNNING', 'COMPLETE', 'FAILED'],
  COMPLETE: [],
  FAILED: [],
};

/**
 * Create the initial state, positioned on the first phase
 */
export function createMachineState(): MachineState {
  return { cursor: 0, status: 'RUNNING' };
}

/**
 * Check if a status change is valid
 */
export function isValidTransition(from: MachineStatus, to: MachineStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Check if the machine has stopped
 */
export function isTerminalStatus(status: MachineStatus): boolean {
  return status === 'COMPLETE' || status === 'FAILED';
}

/**
 * The phase under the cursor, if the machine is still running
 */
export function currentPhase(phases: readonly PhaseSpec[], state: MachineState): PhaseSpec | undefined {
  if (state.status !== 'RUNNING') {
    return undefined;
  }
  return phases[state.cursor];
}

/**
 * Process an event and return the resulting state
 * Events that do not apply to the current state are rejected and leave it
 * unchanged.
 */
export function transition(
  phases: readonly PhaseSpec[],
  state: MachineState,
  event: MachineEvent
): TransitionResult {
  const reject = (reason: string): TransitionResult => ({
    state,
    valid: false,
    description: `Invalid transition from ${state.status} via ${event.type}: ${reason}`,
  });

  if (isTerminalStatus(state.status)) {
    return reject('machine has stopped');
  }

  let next: MachineState;
  let description: string;

  switch (event.type) {
    case 'PHASE_COMPLETED': {
      const cursor = state.cursor + 1;
      if (cursor >= phases.length) {
        next = { cursor: phases.length, status: 'COMPLETE' };
        description = 'All phases complete';
      } else {
        next = { cursor, status: 'RUNNING' };
        description = `Advanced to phase '${phases[cursor].id}'`;
      }
      break;
    }

    case 'GATES_FAILED': {
      const target = findPhaseIndex(phases, IMPLEMENT_PHASE_ID);
      if (target < 0) {
        return reject(`no '${IMPLEMENT_PHASE_ID}' phase to loop back to`);
      }
      next = { cursor: target, status: 'RUNNING' };
      description = `Gates failed (${event.failures.join('; ')}), looping back to '${IMPLEMENT_PHASE_ID}'`;
      break;
    }

    case 'FAILED':
      next = { ...state, status: 'FAILED', lastError: event.error };
      description = `Error: ${event.error.message}`;
      break;
  }

  if (!isValidTransition(state.status, next.status)) {
    return reject(`${state.status} cannot become ${next.status}`);
  }

  return { state: next, valid: true, description };
}
