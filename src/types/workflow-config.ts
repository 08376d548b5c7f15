/**
 * WorkflowConfig type
 * Centralized configuration object passed through the system.
 * Loaded once at run start and never mutated afterwards.
 */

/**
 * One step of the workflow
 */
export interface PhaseSpec {
  /** Unique phase id; its position in `phases` is its sequence position */
  readonly id: string;
  /** Absolute path of the JSON Schema the phase's control object must match */
  readonly schemaPath: string;
}

/**
 * Hard ceilings for a run
 */
export interface IterationLimits {
  /** Maximum number of phase entries across the whole run */
  readonly maxTotalIterations: number;
  /** Maximum number of entries into any single phase */
  readonly maxPhaseIterations: number;
}

/**
 * Which changed files a phase may leave behind
 * Forbidden prefixes win over allowed ones; an empty allow-list means only
 * the forbidden prefixes are checked.
 */
export interface WritePolicy {
  readonly allowFileWrites: boolean;
  readonly allowedPrefixes: readonly string[];
  readonly forbiddenPrefixes: readonly string[];
}

/**
 * Gate checks run by the verify phase
 */
export interface GateConfig {
  /** Shell command per check name */
  readonly commands: Readonly<Record<string, string>>;
  /** Checks to run, in order */
  readonly requiredChecks: readonly string[];
  /** Also check the planned and implemented files after the gates */
  readonly goalChecks: boolean;
}

/**
 * How the worker CLI is invoked
 */
export interface WorkerConfig {
  readonly command: string;
  readonly args: readonly string[];
  readonly timeoutMs: number;
}

/**
 * Logging and verbosity configuration
 */
export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  jsonOutput: boolean;
}

/**
 * Path configuration
 */
export interface PathConfig {
  /** Repository the worker edits and the gates run in */
  readonly repoRoot: string;
  /** The workflow file the run was loaded from */
  readonly workflowPath: string;
  /** Directory holding `system.md` and `phase_<id>.md` */
  readonly promptsDir: string;
  /** Parent of the per-run directories */
  readonly runsDir: string;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'workflow' | 'default';

/** Phase whose control object is rebuilt from gate results */
export const VERIFY_PHASE_ID = 'verify';
/** Phase the run loops back to when gates fail */
export const IMPLEMENT_PHASE_ID = 'implement';

/**
 * The complete configuration for a run
 */
export interface WorkflowConfig {
  /** Task description handed to every phase */
  readonly task: string;
  /** Phases in execution order */
  readonly phases: readonly PhaseSpec[];
  readonly limits: IterationLimits;
  readonly writePolicy: WritePolicy;
  readonly gates: GateConfig;
  readonly worker: WorkerConfig;
  readonly verbosity: VerbosityConfig;
  readonly paths: PathConfig;
  /** Where each overridable value came from */
  readonly sources?: Readonly<Record<string, ConfigSource>>;
}

/**
 * Default values used when neither the CLI nor the workflow file set them
 */
export const DEFAULT_LIMITS: IterationLimits = {
  maxTotalIterations: 25,
  maxPhaseIterations: 6,
};

export const DEFAULT_WRITE_POLICY: WritePolicy = {
  allowFileWrites: true,
  allowedPrefixes: [],
  forbiddenPrefixes: [],
};

export const DEFAULT_WORKER: WorkerConfig = {
  command: 'claude',
  args: ['-p'],
  timeoutMs: 600_000,
};

export const DEFAULT_WORKFLOW_PATH = 'agent/workflow.json';

/**
 * Look up a phase's position in the sequence
 * Returns -1 when the workflow has no such phase.
 */
export function findPhaseIndex(phases: readonly PhaseSpec[], id: string): number {
  return phases.findIndex((phase) => phase.id === id);
}
