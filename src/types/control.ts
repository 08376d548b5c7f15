/**
 * Control object types
 * The JSON value a worker produces for a phase, and the authoritative shape
 * the verify phase is rebuilt into from real gate results.
 */

/**
 * Any JSON value
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A control object: always a JSON object at the top level
 */
export type ControlObject = { [key: string]: JsonValue };

/**
 * Outcome of one gate command
 */
export interface GateCheckResult {
  /** Check name from `requiredChecks` */
  name: string;
  /** Command line that was executed */
  command: string;
  /** Process exit code */
  exitCode: number;
  /** Log file, relative to the run directory */
  outputRef: string;
}

/**
 * Aggregate outcome of a gate run
 */
export interface GateReport {
  checks: GateCheckResult[];
  /** Logical AND of every check exiting 0 */
  allPassed: boolean;
  /** One entry per failed check */
  failures: string[];
}

/**
 * What a goal check looked at
 */
export type GoalCheckCategory = 'artifact_existence' | 'stub_detection';

/**
 * One goal check on one file
 */
export interface GoalCheck {
  category: GoalCheckCategory;
  /** Path as named by the plan or implement output */
  file: string;
  passed: boolean;
  detail: string;
}

/**
 * Outcome of checking the planned and implemented files against the tree
 */
export interface GoalCheckReport {
  allPassed: boolean;
  checks: GoalCheck[];
  summary: string;
}

/**
 * Verify evidence entry
 */
export interface VerifyEvidence {
  [key: string]: JsonValue;
  kind: 'command_output' | 'file';
  ref: string;
  note: string;
}

/**
 * Authoritative verify control object, as persisted and schema-checked
 */
export interface VerifyControl {
  [key: string]: JsonValue;
  phase: 'verify';
  checks: Array<{ name: string; command: string; exit_code: number; output_ref: string }>;
  all_passed: boolean;
  failures: string[];
  evidence: VerifyEvidence[];
  narration: string;
}

/**
 * Check whether a parsed JSON value is a control object
 */
export function isControlObject(value: unknown): value is ControlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the narration text of a control object, if it carries a non-blank one
 */
export function getNarration(control: ControlObject): string | undefined {
  const narration = control.narration;
  if (typeof narration === 'string' && narration.trim().length > 0) {
    return narration.trim();
  }
  return undefined;
}
