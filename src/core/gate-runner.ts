/**
 * Gate Runner
 *
 * Runs the verify phase's check commands itself, one after another, and
 * turns their exit codes into the authoritative verify control object.
 * Checks have no individual timeout: a hanging command blocks the run.
 */

import { GateCheckResult, GateReport, GoalCheckReport, VerifyControl, VerifyEvidence } from '../types/control';
import { ArtifactError, ConfigurationError } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { ProcessRunner } from '../types/process-runner';
import { Result, ok, err } from '../types/result';
import { formatGoalFailure } from './goal-check';

/**
 * Input for one gate run
 */
export interface GateRunRequest {
  /** Checks to run, in order */
  requiredChecks: readonly string[];
  /** Shell command per check name */
  commands: Readonly<Record<string, string>>;
  /** Working directory for every command */
  repoRoot: string;
  /** Where `<check>.log` files are written */
  logDirectory: string;
  /** Base for the `outputRef` of each check */
  runDirectory: string;
}

/**
 * Dependencies for GateRunner
 */
export interface GateRunnerDependencies {
  processRunner: ProcessRunner;
  fileSystem: FileSystem;
  logger: Logger;
}

/**
 * Failure line recorded for a check
 */
export function formatGateFailure(name: string, exitCode: number): string {
  return `${name} failed (exit ${exitCode})`;
}

/**
 * Executes gate commands and records their outcome
 */
export class GateRunner {
  private readonly deps: GateRunnerDependencies;

  constructor(deps: GateRunnerDependencies) {
    this.deps = deps;
  }

  async run(request: GateRunRequest): Promise<Result<GateReport, ConfigurationError | ArtifactError>> {
    const { processRunner, fileSystem, logger } = this.deps;
    const checks: GateCheckResult[] = [];
    const failures: string[] = [];

    for (const name of request.requiredChecks) {
      const command = request.commands[name];
      if (command === undefined || command.trim() === '') {
        return err(new ConfigurationError(`Missing command for gate '${name}' in commands`));
      }

      logger.event('gate_started', `Running gate: ${name}`, { gate: name, command });
      const logPath = fileSystem.join(request.logDirectory, `${name}.log`);

      let exitCode: number;
      let output: string;
      try {
        const result = await processRunner.spawn(command, {
          args: [],
          cwd: request.repoRoot,
          shell: true,
        });
        exitCode = result.exitCode;
        output = result.output;
      } catch (error) {
        return err(new ConfigurationError(`Gate '${name}' could not be started: ${command}`, {}, error));
      }

      const written = await fileSystem.writeFile(logPath, output, { createParents: true });
      if (!written.ok) {
        return err(new ArtifactError(`Failed to write ${logPath}: ${written.error.message}`, { artifactPath: logPath }));
      }

      const outputRef = fileSystem.relative(request.runDirectory, logPath).replace(/\\/g, '/');
      checks.push({ name, command, exitCode, outputRef });

      if (exitCode !== 0) {
        failures.push(formatGateFailure(name, exitCode));
        logger.event('gate_failed', `Gate FAILED: ${name} (exit ${exitCode})`, { gate: name, exitCode, outputRef });
      } else {
        logger.event('gate_passed', `Gate PASSED: ${name}`, { gate: name, outputRef });
      }
    }

    return ok({ checks, allPassed: failures.length === 0, failures });
  }
}

/**
 * Build the verify control object from real gate results
 * Whatever the worker claimed about the checks is discarded; only its
 * narration is kept. Failed goal checks, when given, fail the verdict too.
 */
export function buildVerifyControl(report: GateReport, narration: string, goals?: GoalCheckReport): VerifyControl {
  const failedGoals = goals ? goals.checks.filter((check) => !check.passed) : [];
  return {
    phase: 'verify',
    checks: report.checks.map((check) => ({
      name: check.name,
      command: check.command,
      exit_code: check.exitCode,
      output_ref: check.outputRef,
    })),
    all_passed: report.allPassed && failedGoals.length === 0,
    failures: [...report.failures, ...failedGoals.map(formatGoalFailure)],
    evidence: [
      ...report.checks.map((check): VerifyEvidence => ({
        kind: 'command_output',
        ref: check.outputRef,
        note: 'Gate output',
      })),
      ...failedGoals.map((check): VerifyEvidence => ({ kind: 'file', ref: check.file, note: check.detail })),
    ],
    narration,
  };
}

/**
 * Create a gate runner
 */
export function createGateRunner(deps: GateRunnerDependencies): GateRunner {
  return new GateRunner(deps);
}
