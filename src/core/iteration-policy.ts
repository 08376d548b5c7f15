/**
 * Iteration Policies
 *
 * Owns the run's entry counters and the two hard ceilings. Every phase entry
 * goes through `enterPhase`; nothing else mutates the counters.
 */

import { IterationLimitExceeded } from '../types/errors';
import { Result, ok, err } from '../types/result';
import { IterationLimits } from '../types/workflow-config';

/**
 * Mutable state of a single run
 */
export interface RunContext {
  /** Directory all artifacts of this run are written under */
  readonly runDirectory: string;
  /** Task description for the run */
  readonly task: string;
  /** Phase entries across the whole run */
  totalIterations: number;
  /** Entries per phase id */
  phaseIterations: Record<string, number>;
}

/**
 * A phase entry that stayed within the limits
 */
export interface PhaseEntry {
  phaseId: string;
  /** Entry count of the phase, 1-indexed */
  iteration: number;
  /** Entry count of the run, 1-indexed */
  total: number;
}

/**
 * Create a fresh context with zeroed counters
 */
export function createRunContext(runDirectory: string, task: string): RunContext {
  return {
    runDirectory,
    task,
    totalIterations: 0,
    phaseIterations: {},
  };
}

/**
 * Number of times a phase has been entered so far
 */
export function getPhaseIterations(context: RunContext, phaseId: string): number {
  return context.phaseIterations[phaseId] ?? 0;
}

/**
 * Record an entry into `phaseId`
 * The entry is checked against both ceilings before anything is counted, so a
 * refused entry leaves the counters (and the run summary) untouched.
 */
export function enterPhase(
  context: RunContext,
  phaseId: string,
  limits: IterationLimits
): Result<PhaseEntry, IterationLimitExceeded> {
  const total = context.totalIterations + 1;
  const iteration = getPhaseIterations(context, phaseId) + 1;

  if (total > limits.maxTotalIterations) {
    return err(
      new IterationLimitExceeded(
        `Reached maximum total iterations (${limits.maxTotalIterations})`,
        'total',
        limits.maxTotalIterations,
        { phaseId }
      )
    );
  }

  if (iteration > limits.maxPhaseIterations) {
    return err(
      new IterationLimitExceeded(
        `Reached maximum phase iterations (${limits.maxPhaseIterations}) for phase '${phaseId}'`,
        'phase',
        limits.maxPhaseIterations,
        { phaseId }
      )
    );
  }

  context.totalIterations = total;
  context.phaseIterations[phaseId] = iteration;
  return ok({ phaseId, iteration, total });
}

/**
 * Decide whether a failed verification may loop back for a repair
 * Once verify has used its whole budget, another implement entry could never
 * be verified, so the run stops here instead.
 */
export function checkRepairBudget(
  context: RunContext,
  verifyPhaseId: string,
  limits: IterationLimits
): Result<void, IterationLimitExceeded> {
  const attempts = getPhaseIterations(context, verifyPhaseId);
  if (attempts >= limits.maxPhaseIterations) {
    return err(
      new IterationLimitExceeded(
        `Reached maximum phase iterations (${limits.maxPhaseIterations}) for phase '${verifyPhaseId}': gates still failing after ${attempts} attempts`,
        'phase',
        limits.maxPhaseIterations,
        { phaseId: verifyPhaseId, iteration: attempts }
      )
    );
  }
  return ok(undefined);
}

/**
 * Iteration progress for display
 */
export interface IterationProgress {
  current: number;
  max: number;
  /** Formatted display string (e.g., "3/10") */
  display: string;
}

/**
 * Progress of a phase against the per-phase ceiling
 */
export function getPhaseProgress(
  context: RunContext,
  phaseId: string,
  limits: IterationLimits
): IterationProgress {
  const current = getPhaseIterations(context, phaseId);
  return { current, max: limits.maxPhaseIterations, display: `${current}/${limits.maxPhaseIterations}` };
}

/**
 * Progress of the run against the total ceiling
 */
export function getTotalProgress(context: RunContext, limits: IterationLimits): IterationProgress {
  const current = context.totalIterations;
  return { current, max: limits.maxTotalIterations, display: `${current}/${limits.maxTotalIterations}` };
}

/**
 * Calculate remaining entries before a ceiling is hit
 */
export function getRemainingIterations(current: number, max: number): number {
  return Math.max(0, max - current);
}
