/**
 * Run artifact layout
 *
 * Everything a run leaves behind lives under one directory:
 *
 *   task.txt, workflow.json, effective-config.json
 *   final.diff, run-summary.json, run-summary.md
 *   <phase>/iter_<n>/worker_output.txt
 *   <phase>/iter_<n>/control.json
 *   <phase>/iter_<n>/narration.md
 *   verify/iter_<n>/gate_outputs/<check>.log
 *   verify/iter_<n>/goal_checks.json
 */

import { ArtifactError } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Result, ok, err } from '../types/result';

export const TASK_FILE = 'task.txt';
export const WORKFLOW_COPY_FILE = 'workflow.json';
export const FINAL_DIFF_FILE = 'final.diff';
export const RUN_SUMMARY_FILE = 'run-summary.json';
export const RUN_SUMMARY_MARKDOWN_FILE = 'run-summary.md';
export const EFFECTIVE_CONFIG_FILE = 'effective-config.json';
export const WORKER_OUTPUT_FILE = 'worker_output.txt';
export const CONTROL_FILE = 'control.json';
export const NARRATION_FILE = 'narration.md';
export const GATE_OUTPUTS_DIR = 'gate_outputs';
export const GOAL_CHECKS_FILE = 'goal_checks.json';

/**
 * Writes and locates the artifacts of a single run
 */
export class RunArtifacts {
  readonly runDirectory: string;
  private readonly fileSystem: FileSystem;

  constructor(fileSystem: FileSystem, runDirectory: string) {
    this.fileSystem = fileSystem;
    this.runDirectory = fileSystem.resolve(runDirectory);
  }

  /**
   * Create `<runsDir>/<runId>` and return its artifact writer
   */
  static async create(
    fileSystem: FileSystem,
    runsDir: string,
    runId: string
  ): Promise<Result<RunArtifacts, ArtifactError>> {
    const runDirectory = fileSystem.resolve(runsDir, runId);
    const created = await fileSystem.mkdir(runDirectory, true);
    if (!created.ok) {
      return err(new ArtifactError(`Cannot create run directory: ${created.error.message}`, { artifactPath: runDirectory }));
    }
    return ok(new RunArtifacts(fileSystem, runDirectory));
  }

  /**
   * Directory of one phase entry
   */
  phaseDirectory(phaseId: string, iteration: number): string {
    return this.fileSystem.join(this.runDirectory, phaseId, `iter_${iteration}`);
  }

  workerOutputPath(phaseId: string, iteration: number): string {
    return this.fileSystem.join(this.phaseDirectory(phaseId, iteration), WORKER_OUTPUT_FILE);
  }

  controlPath(phaseId: string, iteration: number): string {
    return this.fileSystem.join(this.phaseDirectory(phaseId, iteration), CONTROL_FILE);
  }

  gateOutputsDirectory(phaseId: string, iteration: number): string {
    return this.fileSystem.join(this.phaseDirectory(phaseId, iteration), GATE_OUTPUTS_DIR);
  }

  /**
   * Path relative to the run directory, with forward slashes
   */
  relativePath(path: string): string {
    return this.fileSystem.relative(this.runDirectory, path).replace(/\\/g, '/');
  }

  /**
   * Write a text artifact, creating parent directories
   */
  async writeText(path: string, content: string): Promise<Result<string, ArtifactError>> {
    const target = this.fileSystem.resolve(this.runDirectory, path);
    const written = await this.fileSystem.writeFile(target, content, { createParents: true });
    if (!written.ok) {
      return err(new ArtifactError(`Failed to write ${target}: ${written.error.message}`, { artifactPath: target }));
    }
    return ok(target);
  }

  writeTask(task: string): Promise<Result<string, ArtifactError>> {
    return this.writeText(TASK_FILE, task);
  }

  /**
   * Keep a copy of the workflow file the run was started with
   */
  async copyWorkflow(workflowPath: string): Promise<Result<string, ArtifactError>> {
    const target = this.fileSystem.join(this.runDirectory, WORKFLOW_COPY_FILE);
    const copied = await this.fileSystem.copy(workflowPath, target);
    if (!copied.ok) {
      return err(new ArtifactError(`Failed to copy workflow: ${copied.error.message}`, { artifactPath: target }));
    }
    return ok(target);
  }

  writeControl(phaseId: string, iteration: number, control: unknown): Promise<Result<string, ArtifactError>> {
    return this.writeText(this.controlPath(phaseId, iteration), JSON.stringify(control, null, 2));
  }

  writeNarration(phaseId: string, iteration: number, narration: string): Promise<Result<string, ArtifactError>> {
    return this.writeText(
      this.fileSystem.join(this.phaseDirectory(phaseId, iteration), NARRATION_FILE),
      `${narration.trim()}\n`
    );
  }

  writeGoalChecks(phaseId: string, iteration: number, report: unknown): Promise<Result<string, ArtifactError>> {
    return this.writeText(
      this.fileSystem.join(this.phaseDirectory(phaseId, iteration), GOAL_CHECKS_FILE),
      `${JSON.stringify(report, null, 2)}\n`
    );
  }

  writeFinalDiff(diff: string): Promise<Result<string, ArtifactError>> {
    return this.writeText(FINAL_DIFF_FILE, diff);
  }

  writeEffectiveConfig(artifact: unknown): Promise<Result<string, ArtifactError>> {
    return this.writeText(EFFECTIVE_CONFIG_FILE, `${JSON.stringify(artifact, null, 2)}\n`);
  }

  /**
   * Write the summary as JSON and as markdown
   */
  async writeRunSummary(summary: unknown, markdown: string): Promise<Result<string, ArtifactError>> {
    const json = await this.writeText(RUN_SUMMARY_FILE, `${JSON.stringify(summary, null, 2)}\n`);
    if (!json.ok) {
      return json;
    }
    const md = await this.writeText(RUN_SUMMARY_MARKDOWN_FILE, markdown);
    if (!md.ok) {
      return md;
    }
    return json;
  }
}
