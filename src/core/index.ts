/**
 * Core module - orchestration logic and state machine
 * Nothing in here spawns processes directly or writes to the terminal;
 * those go through the injected runner, logger and spinner.
 */

// State machine
export type { MachineStatus, MachineEvent, MachineState, TransitionResult } from './state-machine';
export {
  createMachineState,
  isValidTransition,
  isTerminalStatus,
  currentPhase,
  transition,
} from './state-machine';

// Iteration policies
export type { RunContext, PhaseEntry, IterationProgress } from './iteration-policy';
export {
  createRunContext,
  getPhaseIterations,
  enterPhase,
  checkRepairBudget,
  getPhaseProgress,
  getTotalProgress,
  getRemainingIterations,
} from './iteration-policy';

// Write policy
export { enforceWritePolicy, relativeToRepo, toPosixPath } from './write-policy';

// Gates
export type { GateRunRequest, GateRunnerDependencies } from './gate-runner';
export { GateRunner, createGateRunner, buildVerifyControl, formatGateFailure } from './gate-runner';

// Orchestrator
export type { OrchestratorDependencies, RunOutcome } from './orchestrator';
export { Orchestrator, createOrchestrator } from './orchestrator';
