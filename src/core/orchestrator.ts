/**
 * Orchestrator
 *
 * Drives one run through the workflow: for every phase entry it assembles a
 * prompt, invokes the worker, checks the returned control object against the
 * phase schema and persists it; the verify phase additionally runs the gates
 * (and, when enabled, the goal checks) and loops back to implement while
 * they fail.
 * Uses dependency injection for all external interactions.
 */

import { buildEffectiveConfigArtifact } from '../config/effective-config';
import { WorkerInvoker } from '../engines/worker-invoker';
import { Workspace, createGitWorkspace } from '../io/git-workspace';
import { RunArtifacts } from '../io/run-artifacts';
import { RunSummary, RunSummaryBuilder, formatRunSummaryMarkdown } from '../logging/run-summary';
import { CompiledSchema, SchemaValidator } from '../schemas/schema-validator';
import { PromptAssembler } from '../templates/phase-prompt';
import { Clock, formatRunId } from '../types/clock';
import { ControlObject, GoalCheckReport, getNarration } from '../types/control';
import { ConfigurationError, RunError } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { ProcessRunner } from '../types/process-runner';
import { Result, ok, err } from '../types/result';
import { PhaseSpec, VERIFY_PHASE_ID, WorkflowConfig } from '../types/workflow-config';
import { SpinnerService } from '../ui/spinner-service';
import { GateRunner, buildVerifyControl } from './gate-runner';
import { collectGoalFiles, formatGoalFailure, runGoalChecks } from './goal-check';
import {
  RunContext,
  checkRepairBudget,
  createRunContext,
  enterPhase,
  getTotalProgress,
} from './iteration-policy';
import { MachineEvent, MachineState, createMachineState, currentPhase, transition } from './state-machine';
import { enforceWritePolicy } from './write-policy';

/**
 * Dependencies required by the Orchestrator
 */
export interface OrchestratorDependencies {
  logger: Logger;
  /** File system for artifact I/O */
  fileSystem: FileSystem;
  /** Runs the worker, the gates and git */
  processRunner: ProcessRunner;
  clock: Clock;
  spinner: SpinnerService;
  /** Source of changed files and the diff; git in the repository root by default */
  workspace?: Workspace;
}

/**
 * A run that reached the end of the phase list
 */
export interface RunOutcome {
  runId: string;
  runDirectory: string;
  summary: RunSummary;
  finalDiffPath: string;
}

/**
 * What one phase entry produced
 */
interface PhaseStepResult {
  /** Verdict of gates and goal checks, for verify entries */
  verification?: { allPassed: boolean; failures: string[] };
}

/**
 * Runs a workflow to completion or to its first fatal error
 */
export class Orchestrator {
  private readonly config: WorkflowConfig;
  private readonly deps: OrchestratorDependencies;
  private readonly workspace: Workspace;
  private readonly schemas: SchemaValidator;
  private readonly prompts: PromptAssembler;
  private state: MachineState = createMachineState();
  /** Latest control object per phase id, for the goal checks */
  private controls: Record<string, ControlObject> = {};
  private runDirectory: string | undefined;

  constructor(config: WorkflowConfig, deps: OrchestratorDependencies) {
    this.config = config;
    this.deps = deps;
    this.workspace = deps.workspace ?? createGitWorkspace(config.paths.repoRoot, deps.processRunner);
    this.schemas = new SchemaValidator(deps.fileSystem);
    this.prompts = new PromptAssembler(config.paths.promptsDir, deps.fileSystem, this.workspace);
  }

  getState(): MachineState {
    return { ...this.state };
  }

  /**
   * Directory of the current run, once it has been created
   */
  getRunDirectory(): string | undefined {
    return this.runDirectory;
  }

  /**
   * Execute the run
   * The summary artifacts are written whatever the outcome; the returned
   * error is the one that stopped the run.
   */
  async run(): Promise<Result<RunOutcome, RunError>> {
    const { logger, fileSystem, clock } = this.deps;
    const runId = formatRunId(clock.now());
    this.state = createMachineState();
    this.controls = {};

    const created = await RunArtifacts.create(fileSystem, this.config.paths.runsDir, runId);
    if (!created.ok) {
      logger.event('run_failed', created.error.message, { code: created.error.code });
      return created;
    }
    const artifacts = created.value;
    this.runDirectory = artifacts.runDirectory;

    logger.setContext({ runId });
    logger.event('run_started', `Run directory: ${artifacts.runDirectory}`, {
      phases: this.config.phases.map((phase) => phase.id),
      repoRoot: this.config.paths.repoRoot,
    });

    const context = createRunContext(artifacts.runDirectory, this.config.task);
    const summary = new RunSummaryBuilder(runId, this.config.task, this.config.limits, clock);

    const executed = await this.execute(runId, artifacts, context, summary);

    if (!executed.ok) {
      const error = executed.error;
      this.apply({ type: 'FAILED', error });
      const built = summary.build(context.totalIterations, context.phaseIterations, {
        code: error.code,
        message: error.message,
        phase: error.location.phaseId,
      });
      const written = await artifacts.writeRunSummary(built, formatRunSummaryMarkdown(built));
      if (!written.ok) {
        logger.warn(written.error.message);
      }
      logger.event('run_failed', error.message.split('\n')[0], { code: error.code, ...error.location });
      return err(error);
    }

    const built = summary.build(context.totalIterations, context.phaseIterations);
    const written = await artifacts.writeRunSummary(built, formatRunSummaryMarkdown(built));
    if (!written.ok) {
      return err(written.error);
    }

    logger.event('run_completed', `Run complete after ${context.totalIterations} phase entries`, {
      totalIterations: context.totalIterations,
      repairLoops: built.repairLoops,
    });

    return ok({
      runId,
      runDirectory: artifacts.runDirectory,
      summary: built,
      finalDiffPath: executed.value,
    });
  }

  /**
   * Write the start artifacts and walk the phases
   * Resolves to the path of `final.diff`.
   */
  private async execute(
    runId: string,
    artifacts: RunArtifacts,
    context: RunContext,
    summary: RunSummaryBuilder
  ): Promise<Result<string, RunError>> {
    const { clock } = this.deps;
    const task = await artifacts.writeTask(this.config.task);
    if (!task.ok) return task;
    const workflow = await artifacts.copyWorkflow(this.config.paths.workflowPath);
    if (!workflow.ok) return workflow;
    const effective = await artifacts.writeEffectiveConfig(
      buildEffectiveConfigArtifact(this.config, runId, clock.iso())
    );
    if (!effective.ok) return effective;

    let phase = currentPhase(this.config.phases, this.state);
    while (this.state.status === 'RUNNING' && phase) {
      const step = await this.runPhase(phase, artifacts, context, summary);
      if (!step.ok) {
        return step;
      }

      const verification = step.value.verification;
      if (verification && !verification.allPassed) {
        const budget = checkRepairBudget(context, VERIFY_PHASE_ID, this.config.limits);
        if (!budget.ok) {
          this.deps.logger.event('limit_exceeded', budget.error.message, {
            kind: budget.error.kind,
            limit: budget.error.limit,
          });
          return budget;
        }
        this.deps.logger.event('repair_loop', 'Verification failed, looping back to implement phase', {
          failures: verification.failures,
        });
        summary.recordRepairLoop();
        const moved = this.apply({ type: 'GATES_FAILED', failures: verification.failures });
        if (!moved.ok) return moved;
      } else {
        const moved = this.apply({ type: 'PHASE_COMPLETED' });
        if (!moved.ok) return moved;
      }

      phase = currentPhase(this.config.phases, this.state);
    }

    return artifacts.writeFinalDiff(await this.workspace.diff());
  }

  /**
   * One entry into one phase
   */
  private async runPhase(
    phase: PhaseSpec,
    artifacts: RunArtifacts,
    context: RunContext,
    summary: RunSummaryBuilder
  ): Promise<Result<PhaseStepResult, RunError>> {
    const entry = enterPhase(context, phase.id, this.config.limits);
    if (!entry.ok) {
      this.deps.logger.event('limit_exceeded', entry.error.message, {
        kind: entry.error.kind,
        limit: entry.error.limit,
      });
      return entry;
    }

    const { iteration } = entry.value;
    const where = { phaseId: phase.id, iteration };
    const logger = this.deps.logger.child({ phase: phase.id, iteration });
    logger.event('phase_started', `Phase: ${phase.id} (iteration ${iteration})`, {
      total: getTotalProgress(context, this.config.limits).display,
    });
    summary.recordPhaseEntry(phase.id, iteration);

    const schema = await this.schemas.load(phase.schemaPath);
    if (!schema.ok) return err(schema.error.locate(where));

    const prompt = await this.prompts.assemble({
      phaseId: phase.id,
      task: this.config.task,
      schemaPath: phase.schemaPath,
    });
    if (!prompt.ok) return err(prompt.error.locate(where));

    const worker = new WorkerInvoker(this.config.worker, {
      processRunner: this.deps.processRunner,
      fileSystem: this.deps.fileSystem,
      logger,
      spinner: this.deps.spinner,
    });
    const invocation = await worker.invoke({
      prompt: prompt.value,
      outputPath: artifacts.workerOutputPath(phase.id, iteration),
      cwd: this.config.paths.repoRoot,
      label: `${phase.id} (iteration ${iteration})`,
    });
    if (!invocation.ok) return err(invocation.error.locate(where));
    summary.recordWorker(invocation.value.exitCode, invocation.value.durationMs);

    const control = invocation.value.control;
    const checked = this.checkControl(logger, schema.value, control);
    if (!checked.ok) {
      return err(checked.error.locate({ ...where, artifactPath: invocation.value.outputPath }));
    }

    const persisted = await this.persistControl(artifacts, phase.id, iteration, control);
    if (!persisted.ok) return err(persisted.error.locate(where));
    this.controls[phase.id] = control;

    if (this.config.writePolicy.allowFileWrites) {
      const changed = await this.workspace.changedFiles();
      if (!changed.ok) return err(changed.error.locate(where));
      const allowed = enforceWritePolicy(this.config.paths.repoRoot, changed.value, this.config.writePolicy);
      if (!allowed.ok) return err(allowed.error.locate(where));
      logger.event('write_policy_checked', `Write policy satisfied (${changed.value.length} changed files)`);
    }

    if (phase.id !== VERIFY_PHASE_ID) {
      logger.event('phase_completed', `Phase complete: ${phase.id}`);
      return ok({});
    }

    const gateRunner = new GateRunner({
      processRunner: this.deps.processRunner,
      fileSystem: this.deps.fileSystem,
      logger,
    });
    const report = await gateRunner.run({
      requiredChecks: this.config.gates.requiredChecks,
      commands: this.config.gates.commands,
      repoRoot: this.config.paths.repoRoot,
      logDirectory: artifacts.gateOutputsDirectory(phase.id, iteration),
      runDirectory: artifacts.runDirectory,
    });
    if (!report.ok) return err(report.error.locate(where));

    let goals: GoalCheckReport | undefined;
    if (this.config.gates.goalChecks) {
      goals = await runGoalChecks(
        this.deps.fileSystem,
        this.config.paths.repoRoot,
        collectGoalFiles(this.controls)
      );
      const saved = await artifacts.writeGoalChecks(phase.id, iteration, goals);
      if (!saved.ok) return err(saved.error.locate(where));
      logger.event('goal_checks_completed', goals.summary, { allPassed: goals.allPassed });
      for (const check of goals.checks.filter((entry) => !entry.passed)) {
        logger.event('goal_check_failed', `Goal check FAILED: ${formatGoalFailure(check)}`, { file: check.file });
      }
    }

    const verifyControl = buildVerifyControl(report.value, getNarration(control) ?? '', goals);
    const rechecked = this.checkControl(logger, schema.value, verifyControl);
    if (!rechecked.ok) {
      return err(rechecked.error.locate({ ...where, artifactPath: artifacts.controlPath(phase.id, iteration) }));
    }
    const rewritten = await artifacts.writeControl(phase.id, iteration, verifyControl);
    if (!rewritten.ok) return err(rewritten.error.locate(where));
    summary.recordGates(verifyControl.all_passed, verifyControl.failures);

    if (verifyControl.all_passed) {
      logger.event('phase_completed', `Phase complete: ${phase.id}`);
    }
    return ok({ verification: { allPassed: verifyControl.all_passed, failures: verifyControl.failures } });
  }

  private checkControl(
    logger: Logger,
    schema: CompiledSchema,
    control: ControlObject
  ): Result<void, RunError> {
    const checked = this.schemas.check(schema, control);
    if (!checked.ok) {
      logger.event('control_validation_failed', 'Control object failed schema validation', {
        violations: checked.error.violations.length,
      });
      return checked;
    }
    logger.event('control_validated', 'Control object matches schema');
    return ok(undefined);
  }

  /**
   * Write `control.json`, and `narration.md` when there is narration
   */
  private async persistControl(
    artifacts: RunArtifacts,
    phaseId: string,
    iteration: number,
    control: ControlObject
  ): Promise<Result<void, RunError>> {
    const written = await artifacts.writeControl(phaseId, iteration, control);
    if (!written.ok) return written;
    this.deps.logger.event('artifact_written', `Wrote ${artifacts.relativePath(written.value)}`);

    const narration = getNarration(control);
    if (narration !== undefined) {
      const narrated = await artifacts.writeNarration(phaseId, iteration, narration);
      if (!narrated.ok) return narrated;
    }
    return ok(undefined);
  }

  /**
   * Feed an event to the state machine
   */
  private apply(event: MachineEvent): Result<MachineState, ConfigurationError> {
    const result = transition(this.config.phases, this.state, event);
    if (!result.valid) {
      this.deps.logger.warn(`Invalid transition: ${result.description}`);
      return err(new ConfigurationError(result.description));
    }
    this.state = result.state;
    this.deps.logger.debug(result.description, { cursor: result.state.cursor, status: result.state.status });
    return ok(result.state);
  }
}

/**
 * Create an orchestrator
 */
export function createOrchestrator(config: WorkflowConfig, deps: OrchestratorDependencies): Orchestrator {
  return new Orchestrator(config, deps);
}
