/**
 * Run error taxonomy
 * Every fatal condition of a run is one of these. Gate failures are not
 * errors: the state machine turns them into a loop back to `implement`.
 */

/**
 * Stable codes for fatal run conditions
 */
export type RunErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'WORKER_ERROR'
  | 'EXTRACTION_ERROR'
  | 'SCHEMA_VALIDATION_ERROR'
  | 'WRITE_POLICY_VIOLATION'
  | 'ITERATION_LIMIT_EXCEEDED'
  | 'ARTIFACT_ERROR';

/**
 * Where in a run an error was raised, when known
 */
export interface RunErrorLocation {
  /** Phase being executed */
  phaseId?: string;
  /** Entry count of that phase (1-indexed) */
  iteration?: number;
  /** Artifact that holds the evidence for the failure */
  artifactPath?: string;
}

/**
 * Base class for all fatal run errors
 */
export abstract class RunError extends Error {
  abstract readonly code: RunErrorCode;
  location: RunErrorLocation;

  constructor(message: string, location: RunErrorLocation = {}, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.location = location;
  }

  /**
   * Fill in location fields the raising component could not know
   * Fields already set are kept.
   */
  locate(location: RunErrorLocation): this {
    this.location = { ...location, ...this.location };
    return this;
  }
}

/**
 * Missing schema, prompt, gate command or malformed workflow file
 */
export class ConfigurationError extends RunError {
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * Why a worker invocation failed
 */
export type WorkerFailureReason = 'timeout' | 'exit' | 'spawn';

/**
 * The worker timed out, exited non-zero, or could not be started
 */
export class WorkerError extends RunError {
  readonly code = 'WORKER_ERROR';
  readonly reason: WorkerFailureReason;
  readonly exitCode?: number;

  constructor(
    message: string,
    reason: WorkerFailureReason,
    location: RunErrorLocation = {},
    exitCode?: number,
    cause?: unknown
  ) {
    super(message, location, cause);
    this.reason = reason;
    this.exitCode = exitCode;
  }
}

/**
 * No JSON object could be recovered from worker output
 */
export class ExtractionError extends RunError {
  readonly code = 'EXTRACTION_ERROR';
}

/**
 * A single schema violation
 */
export interface SchemaViolation {
  /** Dot-joined instance path, or `<root>` */
  path: string;
  /** JSON Schema keyword that failed */
  keyword: string;
  /** Validator message */
  message: string;
}

/** Maximum number of violations spelled out in an error message */
export const MAX_REPORTED_VIOLATIONS = 20;

/**
 * A control object did not conform to its phase schema
 */
export class SchemaValidationError extends RunError {
  readonly code = 'SCHEMA_VALIDATION_ERROR';
  readonly violations: SchemaViolation[];

  constructor(violations: SchemaViolation[], location: RunErrorLocation = {}) {
    const lines = ['JSON failed schema validation:'];
    for (const violation of violations.slice(0, MAX_REPORTED_VIOLATIONS)) {
      lines.push(` - ${violation.path}: ${violation.message}`);
    }
    super(lines.join('\n'), location);
    this.violations = violations;
  }
}

/**
 * A changed file lies under a forbidden prefix or outside the allow-list
 */
export class WritePolicyViolation extends RunError {
  readonly code = 'WRITE_POLICY_VIOLATION';
  readonly path: string;

  constructor(message: string, path: string, location: RunErrorLocation = {}) {
    super(message, location);
    this.path = path;
  }
}

/**
 * Which ceiling was hit
 */
export type IterationLimitKind = 'total' | 'phase';

/**
 * The total or per-phase iteration ceiling was exceeded
 */
export class IterationLimitExceeded extends RunError {
  readonly code = 'ITERATION_LIMIT_EXCEEDED';
  readonly kind: IterationLimitKind;
  readonly limit: number;

  constructor(message: string, kind: IterationLimitKind, limit: number, location: RunErrorLocation = {}) {
    super(message, location);
    this.kind = kind;
    this.limit = limit;
  }
}

/**
 * An artifact of the run could not be written
 */
export class ArtifactError extends RunError {
  readonly code = 'ARTIFACT_ERROR';
}

/**
 * Check whether an unknown thrown value is a RunError
 */
export function isRunError(value: unknown): value is RunError {
  return value instanceof RunError;
}
