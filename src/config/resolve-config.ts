/**
 * Configuration Resolution
 * Single-pass resolution with explicit precedence:
 * CLI flags > workflow file > defaults
 */

import { resolve, dirname } from 'path';
import { ConfigurationError } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Result, ok, err } from '../types/result';
import {
  ConfigSource,
  DEFAULT_LIMITS,
  DEFAULT_WORKER,
  DEFAULT_WORKFLOW_PATH,
  DEFAULT_WRITE_POLICY,
  WorkflowConfig,
} from '../types/workflow-config';
import { WorkflowFile, parseWorkflowFile } from '../schemas/workflow-config.schema';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  task: string;
  workflowPath?: string;
  repo?: string;
  worker?: string;
  workerArgs?: string[];
  timeoutSeconds?: number;
  maxTotalIterations?: number;
  maxPhaseIterations?: number;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
}

/**
 * Where the workflow file lives for a set of flags
 */
export function resolveWorkflowPath(cliFlags: Pick<CliFlags, 'workflowPath'>, cwd: string): string {
  return resolve(cwd, cliFlags.workflowPath ?? DEFAULT_WORKFLOW_PATH);
}

/**
 * Read and validate a workflow file
 */
export async function loadWorkflowFile(
  fileSystem: FileSystem,
  workflowPath: string
): Promise<Result<WorkflowFile, ConfigurationError>> {
  const read = await fileSystem.readFile(workflowPath);
  if (!read.ok) {
    return err(new ConfigurationError(`Workflow not found: ${workflowPath}`, {}, read.error));
  }

  const parsed = parseWorkflowFile(read.value);
  if (!parsed.success || !parsed.data) {
    const details = (parsed.errors ?? []).map((line) => ` - ${line}`).join('\n');
    return err(new ConfigurationError(`Invalid workflow ${workflowPath}:\n${details}`));
  }
  return ok(parsed.data);
}

/**
 * Resolve configuration from all sources with explicit precedence
 * Relative paths in the workflow file are taken from the file's directory.
 */
export function resolveConfig(
  cliFlags: CliFlags,
  workflow: WorkflowFile,
  workflowPath: string,
  cwd: string
): WorkflowConfig {
  const workflowDir = dirname(workflowPath);

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  function resolveValue<T>(key: string, cli: T | undefined, file: T | undefined, defaultVal: T): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (file !== undefined) {
      sources[key] = 'workflow';
      return file;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const timeoutSeconds = resolveValue(
    'worker.timeoutMs',
    cliFlags.timeoutSeconds,
    workflow.worker.timeoutSeconds,
    DEFAULT_WORKER.timeoutMs / 1000
  );

  return {
    task: cliFlags.task,
    phases: workflow.phases.map((phase) => ({
      id: phase.id,
      schemaPath: resolve(workflowDir, phase.schema),
    })),
    limits: {
      maxTotalIterations: resolveValue(
        'limits.maxTotalIterations',
        cliFlags.maxTotalIterations,
        workflow.limits.maxTotalIterations,
        DEFAULT_LIMITS.maxTotalIterations
      ),
      maxPhaseIterations: resolveValue(
        'limits.maxPhaseIterations',
        cliFlags.maxPhaseIterations,
        workflow.limits.maxPhaseIterations,
        DEFAULT_LIMITS.maxPhaseIterations
      ),
    },
    writePolicy: {
      allowFileWrites: resolveValue(
        'writePolicy.allowFileWrites',
        undefined,
        workflow.policies.allowFileWrites,
        DEFAULT_WRITE_POLICY.allowFileWrites
      ),
      allowedPrefixes: workflow.policies.allowedWritePaths,
      forbiddenPrefixes: workflow.policies.forbidWritePaths,
    },
    gates: {
      commands: workflow.commands,
      requiredChecks: workflow.gates.requiredChecks,
      goalChecks: workflow.gates.goalChecks,
    },
    worker: {
      command: resolveValue('worker.command', cliFlags.worker, workflow.worker.command, DEFAULT_WORKER.command),
      args: resolveValue('worker.args', cliFlags.workerArgs, workflow.worker.args, [...DEFAULT_WORKER.args]),
      timeoutMs: timeoutSeconds * 1000,
    },
    verbosity: {
      verbose: cliFlags.verbose ?? false,
      debug: cliFlags.debug ?? false,
      jsonOutput: cliFlags.jsonOutput ?? false,
    },
    paths: {
      repoRoot: resolve(cwd, cliFlags.repo ?? '.'),
      workflowPath,
      promptsDir: resolve(workflowDir, workflow.prompts),
      runsDir: resolve(workflowDir, 'runs'),
    },
    sources,
  };
}

/**
 * Load the workflow file named by the flags and resolve the run configuration
 */
export async function loadWorkflowConfig(
  fileSystem: FileSystem,
  cliFlags: CliFlags,
  cwd: string
): Promise<Result<WorkflowConfig, ConfigurationError>> {
  const workflowPath = resolveWorkflowPath(cliFlags, cwd);
  const workflow = await loadWorkflowFile(fileSystem, workflowPath);
  if (!workflow.ok) {
    return workflow;
  }
  return ok(resolveConfig(cliFlags, workflow.value, workflowPath, cwd));
}
