/**
 * Standardized exit codes
 * The command layer is the only place these reach `process.exit`.
 */

import { RunError, RunErrorCode } from './errors';

/**
 * Standard exit codes for the CLI
 */
export const ExitCode = {
  /** Run reached the end of the phase sequence */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage */
  USAGE_ERROR: 2,
  /** Worker output could not be extracted or failed its schema */
  VALIDATION_ERROR: 3,
  /** Total or per-phase iteration ceiling exceeded */
  LIMIT_EXCEEDED: 4,
  /** Worker timed out, exited non-zero or could not start */
  WORKER_ERROR: 5,
  /** Workflow file, schema, prompt or gate command problem */
  CONFIGURATION_ERROR: 6,
  /** A changed file broke the write policy */
  WRITE_POLICY_VIOLATION: 7,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const EXIT_CODE_BY_ERROR: Record<RunErrorCode, ExitCode> = {
  CONFIGURATION_ERROR: ExitCode.CONFIGURATION_ERROR,
  WORKER_ERROR: ExitCode.WORKER_ERROR,
  EXTRACTION_ERROR: ExitCode.VALIDATION_ERROR,
  SCHEMA_VALIDATION_ERROR: ExitCode.VALIDATION_ERROR,
  WRITE_POLICY_VIOLATION: ExitCode.WRITE_POLICY_VIOLATION,
  ITERATION_LIMIT_EXCEEDED: ExitCode.LIMIT_EXCEEDED,
  ARTIFACT_ERROR: ExitCode.UNEXPECTED_ERROR,
};

/**
 * Map a fatal run error to the process exit code
 */
export function exitCodeForError(error: RunError): ExitCode {
  return EXIT_CODE_BY_ERROR[error.code];
}

/**
 * Get a human-readable description of an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage';
    case ExitCode.VALIDATION_ERROR:
      return 'Worker output failed extraction or schema validation';
    case ExitCode.LIMIT_EXCEEDED:
      return 'Iteration limit exceeded';
    case ExitCode.WORKER_ERROR:
      return 'Worker invocation failed';
    case ExitCode.CONFIGURATION_ERROR:
      return 'Workflow configuration error';
    case ExitCode.WRITE_POLICY_VIOLATION:
      return 'Write policy violation';
  }
}
