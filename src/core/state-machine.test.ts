/**
 * Tests for State Machine
 */

import { describe, it, expect } from 'vitest';
import {
  MachineState,
  createMachineState,
  currentPhase,
  isTerminalStatus,
  isValidTransition,
  transition,
} from './state-machine';
import { PhaseSpec } from '../types/workflow-config';

const PHASES: PhaseSpec[] = [
  { id: 'plan', schemaPath: '/s/plan.json' },
  { id: 'implement', schemaPath: '/s/implement.json' },
  { id: 'verify', schemaPath: '/s/verify.json' },
];

describe('State Machine', () => {
  describe('createMachineState', () => {
    it('should start on the first phase', () => {
      const state = createMachineState();
      expect(state).toEqual({ cursor: 0, status: 'RUNNING' });
      expect(currentPhase(PHASES, state)?.id).toBe('plan');
    });
  });

  describe('isValidTransition', () => {
    it('should allow RUNNING to move anywhere', () => {
      expect(isValidTransition('RUNNING', 'RUNNING')).toBe(true);
      expect(isValidTransition('RUNNING', 'COMPLETE')).toBe(true);
      expect(isValidTransition('RUNNING', 'FAILED')).toBe(true);
    });

    it('should not allow leaving a terminal status', () => {
      expect(isValidTransition('COMPLETE', 'RUNNING')).toBe(false);
      expect(isValidTransition('FAILED', 'RUNNING')).toBe(false);
    });
  });

  describe('isTerminalStatus', () => {
    it('should identify terminal statuses', () => {
      expect(isTerminalStatus('COMPLETE')).toBe(true);
      expect(isTerminalStatus('FAILED')).toBe(true);
      expect(isTerminalStatus('RUNNING')).toBe(false);
    });
  });

  describe('transition', () => {
    describe('PHASE_COMPLETED', () => {
      it('should advance to the next phase', () => {
        const result = transition(PHASES, createMachineState(), { type: 'PHASE_COMPLETED' });
        expect(result.valid).toBe(true);
        expect(result.state).toEqual({ cursor: 1, status: 'RUNNING' });
        expect(result.description).toBe("Advanced to phase 'implement'");
      });

      it('should complete after the last phase', () => {
        const result = transition(PHASES, { cursor: 2, status: 'RUNNING' }, { type: 'PHASE_COMPLETED' });
        expect(result.state).toEqual({ cursor: 3, status: 'COMPLETE' });
        expect(result.description).toBe('All phases complete');
        expect(currentPhase(PHASES, result.state)).toBeUndefined();
      });
    });

    describe('GATES_FAILED', () => {
      it('should move the cursor back to implement', () => {
        const result = transition(
          PHASES,
          { cursor: 2, status: 'RUNNING' },
          { type: 'GATES_FAILED', failures: ['test failed (exit 1)', 'lint failed (exit 2)'] }
        );
        expect(result.valid).toBe(true);
        expect(result.state).toEqual({ cursor: 1, status: 'RUNNING' });
        expect(result.description).toBe(
          "Gates failed (test failed (exit 1); lint failed (exit 2)), looping back to 'implement'"
        );
      });

      it('should be rejected without an implement phase', () => {
        const phases = [PHASES[0], PHASES[2]];
        const state: MachineState = { cursor: 1, status: 'RUNNING' };
        const result = transition(phases, state, { type: 'GATES_FAILED', failures: [] });
        expect(result.valid).toBe(false);
        expect(result.state).toBe(state);
        expect(result.description).toBe(
          "Invalid transition from RUNNING via GATES_FAILED: no 'implement' phase to loop back to"
        );
      });
    });

    describe('FAILED', () => {
      it('should keep the cursor and record the error', () => {
        const error = new Error('worker crashed');
        const result = transition(PHASES, { cursor: 1, status: 'RUNNING' }, { type: 'FAILED', error });
        expect(result.state).toEqual({ cursor: 1, status: 'FAILED', lastError: error });
        expect(result.description).toBe('Error: worker crashed');
      });
    });

    it('should reject every event once stopped', () => {
      const state: MachineState = { cursor: 3, status: 'COMPLETE' };
      const result = transition(PHASES, state, { type: 'PHASE_COMPLETED' });
      expect(result.valid).toBe(false);
      expect(result.state).toBe(state);
      expect(result.description).toBe('Invalid transition from COMPLETE via PHASE_COMPLETED: machine has stopped');
    });
  });
});
