/**
 * Run command
 * Parses the command line, loads the workflow and drives the orchestrator.
 * Every outcome becomes an exit code here; nothing below this layer exits.
 */

import { parseArgs } from '../cli/arg-parser';
import { getUsageText } from '../cli/help';
import { ParsedArgs } from '../cli/types';
import { CliFlags, formatEffectiveConfigForDisplay, loadWorkflowConfig } from '../config';
import { createOrchestrator } from '../core/orchestrator';
import { Workspace } from '../io/git-workspace';
import { ConsoleLogger } from '../logging/console-logger';
import { Clock } from '../types/clock';
import { RunError } from '../types/errors';
import { ExitCode, exitCodeForError } from '../types/exit-codes';
import { FileSystem } from '../types/file-system';
import { Logger, LogLevel } from '../types/logger';
import { ProcessRunner } from '../types/process-runner';
import { SpinnerService } from '../ui/spinner-service';
import { VERSION } from '../version';

/**
 * What the command needs from its environment
 */
export interface RunCommandDependencies {
  cwd: string;
  fileSystem: FileSystem;
  processRunner: ProcessRunner;
  clock: Clock;
  spinner: SpinnerService;
  /** Built from the flags when not given */
  logger?: Logger;
  workspace?: Workspace;
  /** Usage text and version go here */
  stdout: (text: string) => void;
  /** Diagnostics go here */
  stderr: (text: string) => void;
}

/**
 * Minimum log level for the verbosity flags
 */
export function logLevelForArgs(args: Pick<ParsedArgs, 'verbose' | 'debug'>): LogLevel {
  return args.debug ? 'debug' : 'info';
}

/**
 * Convert parsed arguments to config flags
 */
export function toCliFlags(args: ParsedArgs): CliFlags {
  return {
    task: args.task,
    workflowPath: args.workflowPath ?? undefined,
    repo: args.repo ?? undefined,
    worker: args.worker ?? undefined,
    workerArgs: args.workerArgs ?? undefined,
    timeoutSeconds: args.timeoutSeconds ?? undefined,
    maxTotalIterations: args.maxTotalIterations ?? undefined,
    maxPhaseIterations: args.maxPhaseIterations ?? undefined,
    verbose: args.verbose,
    debug: args.debug,
    jsonOutput: args.jsonOutput,
  };
}

/**
 * The single diagnostic line printed for a fatal error
 */
export function formatFatalError(error: RunError, runDirectory?: string): string {
  const message = error.message
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(' ');
  const where = runDirectory ? ` (run artifacts: ${runDirectory})` : '';
  return `[phasegate] ERROR: ${message}${where}`;
}

/**
 * Execute the command and resolve to the process exit code
 * `argv` is the full process argv, node and script path included.
 */
export async function runCommand(argv: string[], deps: RunCommandDependencies): Promise<ExitCode> {
  const parsed = parseArgs(argv);
  if (!parsed.success) {
    deps.stderr(parsed.error);
    deps.stderr(getUsageText());
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;
  if (args.help) {
    deps.stdout(getUsageText());
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    deps.stdout(VERSION);
    return ExitCode.SUCCESS;
  }

  const logger =
    deps.logger ??
    new ConsoleLogger({
      minLevel: logLevelForArgs(args),
      jsonOutput: args.jsonOutput,
      includeTimestamp: args.verbose || args.debug,
    });

  const config = await loadWorkflowConfig(deps.fileSystem, toCliFlags(args), deps.cwd);
  if (!config.ok) {
    deps.stderr(formatFatalError(config.error));
    return exitCodeForError(config.error);
  }

  if (args.verbose || args.debug) {
    logger.info(formatEffectiveConfigForDisplay(config.value));
  }

  const orchestrator = createOrchestrator(config.value, {
    logger,
    fileSystem: deps.fileSystem,
    processRunner: deps.processRunner,
    clock: deps.clock,
    spinner: deps.spinner,
    workspace: deps.workspace,
  });

  const outcome = await orchestrator.run();
  deps.spinner.stopAll();

  if (!outcome.ok) {
    deps.stderr(formatFatalError(outcome.error, orchestrator.getRunDirectory()));
    return exitCodeForError(outcome.error);
  }

  deps.stdout(`DONE. Run artifacts in: ${outcome.value.runDirectory}`);
  return ExitCode.SUCCESS;
}
