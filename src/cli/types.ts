/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Task description handed to every phase */
  task: string;

  /** Workflow definition file (null = default location) */
  workflowPath: string | null;

  /** Repository root the worker edits (null = current directory) */
  repo: string | null;

  /** Worker command */
  worker: string | null;

  /** Worker arguments, already split */
  workerArgs: string[] | null;

  /** Worker timeout in seconds */
  timeoutSeconds: number | null;

  /** Ceiling on phase entries across the run */
  maxTotalIterations: number | null;

  /** Ceiling on entries into any one phase */
  maxPhaseIterations: number | null;

  /** Enable verbose output with more progress details */
  verbose: boolean;

  /** Enable debug mode with full diagnostics */
  debug: boolean;

  /** Emit log events as JSON lines */
  jsonOutput: boolean;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  task: '',
  workflowPath: null,
  repo: null,
  worker: null,
  workerArgs: null,
  timeoutSeconds: null,
  maxTotalIterations: null,
  maxPhaseIterations: null,
  verbose: false,
  debug: false,
  jsonOutput: false,
  help: false,
  version: false,
};

/** Result of parsing arguments */
export type ParseResult = { success: true; args: ParsedArgs } | { success: false; error: string };
