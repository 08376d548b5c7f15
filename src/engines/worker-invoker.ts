/**
 * Worker Invoker
 *
 * Runs the worker CLI once per phase entry: the prompt goes in on stdin,
 * the output is persisted whatever happens, and a JSON control object is
 * recovered from stdout.
 */

import { ControlObject } from '../types/control';
import { ArtifactError, ExtractionError, WorkerError } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { ProcessRunner, SpawnResult } from '../types/process-runner';
import { Result, ok, err } from '../types/result';
import { WorkerConfig } from '../types/workflow-config';
import { extractJson } from '../schemas/json-extractor';
import { SpinnerService } from '../ui/spinner-service';

/**
 * One worker call
 */
export interface WorkerRequest {
  prompt: string;
  /** Where the captured output is persisted */
  outputPath: string;
  /** Working directory (the repository root) */
  cwd: string;
  /** Label shown while the worker runs */
  label?: string;
}

/**
 * A successful worker call
 */
export interface WorkerInvocation {
  control: ControlObject;
  exitCode: number;
  durationMs: number;
  outputPath: string;
}

/**
 * Dependencies for WorkerInvoker
 */
export interface WorkerInvokerDependencies {
  processRunner: ProcessRunner;
  fileSystem: FileSystem;
  logger: Logger;
  spinner: SpinnerService;
}

export type WorkerInvokeError = WorkerError | ExtractionError | ArtifactError;

/**
 * Text persisted for a worker call
 * Trimmed stdout, then stderr on its own line when there is any.
 */
export function formatWorkerOutput(result: Pick<SpawnResult, 'stdout' | 'stderr'>): string {
  const stdout = result.stdout.trim();
  return result.stderr ? `${stdout}\n${result.stderr}` : stdout;
}

/**
 * Invokes the configured worker command
 */
export class WorkerInvoker {
  private readonly config: WorkerConfig;
  private readonly deps: WorkerInvokerDependencies;

  constructor(config: WorkerConfig, deps: WorkerInvokerDependencies) {
    this.config = config;
    this.deps = deps;
  }

  async invoke(request: WorkerRequest): Promise<Result<WorkerInvocation, WorkerInvokeError>> {
    const { processRunner, logger, spinner } = this.deps;
    const { command, args, timeoutMs } = this.config;
    const label = request.label ?? 'Worker';

    logger.event('worker_invocation_started', `Invoking worker: ${[command, ...args].join(' ')}`, {
      timeoutMs,
    });
    const progress = spinner.start(`${label}: waiting for ${command}...`);

    let result: SpawnResult;
    try {
      result = await processRunner.spawn(command, {
        args: [...args],
        cwd: request.cwd,
        input: request.prompt,
        timeoutMs,
      });
    } catch (error) {
      progress.fail(`${label}: could not start ${command}`);
      const reason = error instanceof Error ? error.message : String(error);
      logger.event('worker_invocation_failed', `Worker could not be started: ${reason}`);
      return err(new WorkerError(`Failed to start worker '${command}': ${reason}`, 'spawn', {}, undefined, error));
    }

    const persisted = await this.persist(request.outputPath, formatWorkerOutput(result));
    if (!persisted.ok) {
      progress.fail(`${label}: output could not be saved`);
      return persisted;
    }

    const location = { artifactPath: request.outputPath };

    if (result.timedOut) {
      progress.fail(`${label}: timed out`);
      logger.event('worker_invocation_failed', `Worker timed out after ${timeoutMs}ms`, { durationMs: result.durationMs });
      return err(
        new WorkerError(`Worker timed out after ${Math.round(timeoutMs / 1000)}s. See ${request.outputPath}`, 'timeout', location)
      );
    }

    if (result.exitCode !== 0) {
      progress.fail(`${label}: exited with code ${result.exitCode}`);
      logger.event('worker_invocation_failed', `Worker exited with code ${result.exitCode}`, {
        exitCode: result.exitCode,
        durationMs: result.durationMs,
      });
      return err(
        new WorkerError(
          `Worker returned non-zero exit code ${result.exitCode}. See ${request.outputPath}`,
          'exit',
          location,
          result.exitCode
        )
      );
    }

    progress.succeed(`${label}: done`);
    logger.event('worker_invocation_completed', `Worker finished in ${result.durationMs}ms`, {
      durationMs: result.durationMs,
    });

    const extracted = extractJson(result.stdout.trim());
    if (!extracted.ok) {
      return err(
        new ExtractionError(`Worker output error: ${extracted.error.message}. See ${request.outputPath}`, location)
      );
    }

    return ok({
      control: extracted.value,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      outputPath: request.outputPath,
    });
  }

  private async persist(path: string, content: string): Promise<Result<void, ArtifactError>> {
    const written = await this.deps.fileSystem.writeFile(path, content, { createParents: true });
    if (!written.ok) {
      return err(new ArtifactError(`Failed to write ${path}: ${written.error.message}`, { artifactPath: path }));
    }
    this.deps.logger.event('artifact_written', `Wrote ${path}`, { path });
    return ok(undefined);
  }
}

/**
 * Create a worker invoker
 */
export function createWorkerInvoker(config: WorkerConfig, deps: WorkerInvokerDependencies): WorkerInvoker {
  return new WorkerInvoker(config, deps);
}
