/**
 * Tests for the Orchestrator
 * Runs whole workflows against an in-memory file system and a scripted worker
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Orchestrator, createOrchestrator } from './orchestrator';
import { MemoryFileSystem } from '../io/memory-file-system';
import { MockProcessRunner } from '../engines/mock-process-runner';
import { BufferLogger } from '../logging/buffer-logger';
import { MockClock, formatRunId } from '../types/clock';
import { WorkflowConfig } from '../types/workflow-config';
import { createQuietSpinnerService } from '../ui/spinner-service';
import {
  IMPLEMENT_CONTROL,
  PLAN_CONTROL,
  VERIFY_CONTROL,
  createScriptedWorker,
} from '../../tests/fixtures/scripted-worker';

const AGENT_DIR = '/work/agent';
const RUNS_DIR = `${AGENT_DIR}/runs`;

const PLAN_SCHEMA = {
  type: 'object',
  required: ['phase', 'steps'],
  properties: { phase: { const: 'plan' }, steps: { type: 'array', minItems: 1 } },
};

const IMPLEMENT_SCHEMA = {
  type: 'object',
  required: ['phase', 'changes'],
  properties: { phase: { const: 'implement' } },
};

const VERIFY_SCHEMA = {
  type: 'object',
  required: ['phase', 'checks', 'all_passed', 'failures'],
  properties: {
    phase: { const: 'verify' },
    checks: { type: 'array' },
    all_passed: { type: 'boolean' },
    failures: { type: 'array', items: { type: 'string' } },
  },
};

function createConfig(overrides: Partial<WorkflowConfig> = {}): WorkflowConfig {
  return {
    task: 'Add a greeting helper',
    phases: [
      { id: 'plan', schemaPath: `${AGENT_DIR}/schemas/plan.json` },
      { id: 'implement', schemaPath: `${AGENT_DIR}/schemas/implement.json` },
      { id: 'verify', schemaPath: `${AGENT_DIR}/schemas/verify.json` },
    ],
    limits: { maxTotalIterations: 10, maxPhaseIterations: 3 },
    writePolicy: { allowFileWrites: true, allowedPrefixes: [], forbiddenPrefixes: ['.git/'] },
    gates: { commands: { test: 'npm test' }, requiredChecks: ['test'], goalChecks: false },
    worker: { command: 'worker', args: ['--print'], timeoutMs: 5000 },
    verbosity: { verbose: false, debug: false, jsonOutput: false },
    paths: {
      repoRoot: '/work',
      workflowPath: `${AGENT_DIR}/workflow.json`,
      promptsDir: `${AGENT_DIR}/prompts`,
      runsDir: RUNS_DIR,
    },
    ...overrides,
  };
}

async function seedWorkflow(fs: MemoryFileSystem): Promise<void> {
  await fs.writeFile(`${AGENT_DIR}/workflow.json`, '{"phases":[]}', { createParents: true });
  await fs.writeFile(`${AGENT_DIR}/prompts/system.md`, 'You are a worker.', { createParents: true });
  for (const phase of ['plan', 'implement', 'verify']) {
    await fs.writeFile(`${AGENT_DIR}/prompts/phase_${phase}.md`, `PHASE: ${phase}`);
  }
  await fs.writeFile(`${AGENT_DIR}/schemas/plan.json`, JSON.stringify(PLAN_SCHEMA), { createParents: true });
  await fs.writeFile(`${AGENT_DIR}/schemas/implement.json`, JSON.stringify(IMPLEMENT_SCHEMA));
  await fs.writeFile(`${AGENT_DIR}/schemas/verify.json`, JSON.stringify(VERIFY_SCHEMA));
}

describe('Orchestrator', () => {
  let fs: MemoryFileSystem;
  let runner: MockProcessRunner;
  let logger: BufferLogger;
  let clock: MockClock;
  let runDir: string;

  function build(config: WorkflowConfig = createConfig()): Orchestrator {
    return createOrchestrator(config, {
      logger,
      fileSystem: fs,
      processRunner: runner,
      clock,
      spinner: createQuietSpinnerService(),
    });
  }

  async function readJson(path: string): Promise<unknown> {
    const read = await fs.readFile(path);
    if (!read.ok) {
      throw new Error(`missing ${path}`);
    }
    return JSON.parse(read.value);
  }

  beforeEach(async () => {
    fs = new MemoryFileSystem('/');
    runner = new MockProcessRunner();
    logger = new BufferLogger({ minLevel: 'debug' });
    clock = new MockClock();
    runDir = `${RUNS_DIR}/${formatRunId(clock.now())}`;
    await seedWorkflow(fs);

    const worker = createScriptedWorker({
      plan: [PLAN_CONTROL],
      implement: [IMPLEMENT_CONTROL],
      verify: [VERIFY_CONTROL],
    });
    runner.setCommandConfig('worker', worker.handler);
  });

  describe('when the gates pass', () => {
    it('should enter each phase once and complete', async () => {
      const orchestrator = build();
      const result = await orchestrator.run();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.runDirectory).toBe(runDir);
      expect(result.value.summary.success).toBe(true);
      expect(result.value.summary.totalIterations).toBe(3);
      expect(result.value.summary.phaseIterations).toEqual({ plan: 1, implement: 1, verify: 1 });
      expect(result.value.summary.repairLoops).toBe(0);
      expect(orchestrator.getState()).toEqual({ cursor: 3, status: 'COMPLETE' });
    });

    it('should write the full artifact layout', async () => {
      await build().run();

      expect(fs.listFilesUnder(runDir)).toEqual([
        'effective-config.json',
        'final.diff',
        'implement/iter_1/control.json',
        'implement/iter_1/narration.md',
        'implement/iter_1/worker_output.txt',
        'plan/iter_1/control.json',
        'plan/iter_1/narration.md',
        'plan/iter_1/worker_output.txt',
        'run-summary.json',
        'run-summary.md',
        'task.txt',
        'verify/iter_1/control.json',
        'verify/iter_1/gate_outputs/test.log',
        'verify/iter_1/narration.md',
        'verify/iter_1/worker_output.txt',
        'workflow.json',
      ]);
    });

    it('should replace the worker verify claims with the real gate results', async () => {
      runner.setCommandConfig('npm test', { exitCode: 0, stdout: '12 passing\n' });

      await build().run();

      expect(await readJson(`${runDir}/verify/iter_1/control.json`)).toEqual({
        phase: 'verify',
        checks: [
          { name: 'test', command: 'npm test', exit_code: 0, output_ref: 'verify/iter_1/gate_outputs/test.log' },
        ],
        all_passed: true,
        failures: [],
        evidence: [{ kind: 'command_output', ref: 'verify/iter_1/gate_outputs/test.log', note: 'Gate output' }],
        narration: 'Diff matches the task.',
      });
      const log = await fs.readFile(`${runDir}/verify/iter_1/gate_outputs/test.log`);
      expect(log.ok && log.value).toBe('12 passing\n');
    });

    it('should persist task, narration and final diff', async () => {
      runner.setCommandConfig('git diff', { stdout: 'diff --git a/src/greet.ts b/src/greet.ts\n' });

      await build().run();

      const task = await fs.readFile(`${runDir}/task.txt`);
      expect(task.ok && task.value).toBe('Add a greeting helper');
      const narration = await fs.readFile(`${runDir}/plan/iter_1/narration.md`);
      expect(narration.ok && narration.value).toBe('Planned two steps.\n');
      const diff = await fs.readFile(`${runDir}/final.diff`);
      expect(diff.ok && diff.value).toBe('diff --git a/src/greet.ts b/src/greet.ts\n');
    });

    it('should hand the assembled prompt to the worker on stdin', async () => {
      await build().run();

      const [first] = runner.getCallsMatching(/^worker --print$/);
      expect(first.options.cwd).toBe('/work');
      expect(first.options.timeoutMs).toBe(5000);
      expect(first.options.input).toContain('PHASE: plan\n\nTASK:\nAdd a greeting helper');
      expect(first.options.input).toContain('CURRENT_GIT_DIFF:\n<none>');
    });
  });

  describe('repair loop', () => {
    it('should loop back to implement until the gates pass', async () => {
      runner.setCommandSequence('npm test', [{ exitCode: 1, stdout: 'fail' }, { exitCode: 0 }]);

      const result = await build().run();

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.summary.repairLoops).toBe(1);
      expect(result.value.summary.entries.map((entry) => `${entry.phase}${entry.iteration}`)).toEqual([
        'plan1',
        'implement1',
        'verify1',
        'implement2',
        'verify2',
      ]);
      expect(logger.getEventsByType('repair_loop')[0].message).toBe(
        'Verification failed, looping back to implement phase'
      );
      expect(logger.getEventsByType('gate_failed')[0].message).toBe('Gate FAILED: test (exit 1)');
    });

    it('should abort on verify once its budget is spent', async () => {
      runner.setCommandConfig('npm test', { exitCode: 2 });
      const config = createConfig({ limits: { maxTotalIterations: 10, maxPhaseIterations: 2 } });

      const result = await build(config).run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ITERATION_LIMIT_EXCEEDED');
      expect(result.error.message).toBe(
        "Reached maximum phase iterations (2) for phase 'verify': gates still failing after 2 attempts"
      );
      expect(result.error.location).toEqual({ phaseId: 'verify', iteration: 2 });
      expect(runner.getCallsMatching(/^worker/)).toHaveLength(5);

      const summary = await readJson(`${runDir}/run-summary.json`);
      expect(summary).toMatchObject({
        success: false,
        totalIterations: 5,
        phaseIterations: { plan: 1, implement: 2, verify: 2 },
        repairLoops: 1,
        error: { code: 'ITERATION_LIMIT_EXCEEDED', phase: 'verify' },
      });
    });

    it('should stop when the total ceiling is reached', async () => {
      const config = createConfig({ limits: { maxTotalIterations: 2, maxPhaseIterations: 3 } });

      const result = await build(config).run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Reached maximum total iterations (2)');
      expect(result.error.location).toEqual({ phaseId: 'verify' });
      expect(runner.getCallsMatching(/^worker/)).toHaveLength(2);
      expect(logger.hasEventType('limit_exceeded')).toBe(true);

      const summary = await readJson(`${runDir}/run-summary.json`);
      expect(summary).toMatchObject({
        totalIterations: 2,
        phaseIterations: { plan: 1, implement: 1 },
        error: { code: 'ITERATION_LIMIT_EXCEEDED', phase: 'verify' },
      });
      expect(await fs.exists(`${runDir}/verify`)).toBe(false);
    });

    it('should not trust a verify reply that claims success over a failing gate', async () => {
      runner.setCommandSequence('npm test', [{ exitCode: 1, stdout: '1 failing' }, { exitCode: 0 }]);

      const result = await build().run();

      expect(result.ok).toBe(true);
      expect(runner.getCallsMatching(/^worker/)).toHaveLength(5);
      expect(logger.getEventsByType('repair_loop')).toHaveLength(1);
      expect(await readJson(`${runDir}/verify/iter_1/control.json`)).toMatchObject({
        all_passed: false,
        failures: ['test failed (exit 1)'],
      });
      expect(await readJson(`${runDir}/verify/iter_2/control.json`)).toMatchObject({
        all_passed: true,
        failures: [],
      });
    });
  });

  describe('goal checks', () => {
    const GREET_SOURCE = "export function greet(name: string): string {\n  return `Hello, ${name}`;\n}\n";
    const GREET_STUB = "export function greet(name: string): string {\n  throw new Error('not implemented');\n}\n";

    function goalConfig(maxPhaseIterations = 3): WorkflowConfig {
      return createConfig({
        limits: { maxTotalIterations: 10, maxPhaseIterations },
        gates: { commands: { test: 'npm test' }, requiredChecks: ['test'], goalChecks: true },
      });
    }

    it('should pass when every reported file has substance', async () => {
      await fs.writeFile('/work/src/greet.ts', GREET_SOURCE, { createParents: true });

      const result = await build(goalConfig()).run();

      expect(result.ok).toBe(true);
      expect(await readJson(`${runDir}/verify/iter_1/goal_checks.json`)).toEqual({
        allPassed: true,
        checks: [
          { category: 'artifact_existence', file: 'src/greet.ts', passed: true, detail: 'exists' },
          { category: 'stub_detection', file: 'src/greet.ts', passed: true, detail: 'no stubs detected' },
        ],
        summary: 'Goal checks: 2 passed, 0 failed across 1 files',
      });
      expect(logger.getEventsByType('goal_checks_completed')[0].message).toBe(
        'Goal checks: 2 passed, 0 failed across 1 files'
      );
    });

    it('should loop back to implement when a reported file is a stub', async () => {
      await fs.writeFile('/work/src/greet.ts', GREET_STUB, { createParents: true });

      const result = await build(goalConfig(2)).run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('ITERATION_LIMIT_EXCEEDED');
      expect(logger.getEventsByType('repair_loop')).toHaveLength(1);
      expect(logger.getEventsByType('goal_check_failed')[0].message).toBe(
        "Goal check FAILED: stub_detection src/greet.ts: found 1 stub(s): L2: throw new Error('not implemented');"
      );
      expect(await readJson(`${runDir}/verify/iter_1/control.json`)).toMatchObject({
        all_passed: false,
        failures: ["stub_detection src/greet.ts: found 1 stub(s): L2: throw new Error('not implemented');"],
      });
    });

    it('should fail verification when a reported file is missing', async () => {
      const result = await build(goalConfig(1)).run();

      expect(result.ok).toBe(false);
      const control = await readJson(`${runDir}/verify/iter_1/control.json`);
      expect(control).toMatchObject({
        checks: [{ name: 'test', exit_code: 0 }],
        all_passed: false,
        failures: ['artifact_existence src/greet.ts: file does not exist on disk'],
      });
      expect(control).toHaveProperty('evidence.1', {
        kind: 'file',
        ref: 'src/greet.ts',
        note: 'file does not exist on disk',
      });
    });
  });

  describe('repeated runs', () => {
    it('should run every phase again on a second call', async () => {
      const orchestrator = build();
      const first = await orchestrator.run();
      clock.advance(60_000);
      const second = await orchestrator.run();

      expect(first.ok && second.ok).toBe(true);
      if (!second.ok) return;
      expect(second.value.runDirectory).toBe(`${RUNS_DIR}/${formatRunId(clock.now())}`);
      expect(second.value.summary.phaseIterations).toEqual({ plan: 1, implement: 1, verify: 1 });
      expect(runner.getCallsMatching(/^worker/)).toHaveLength(6);
      expect(orchestrator.getState()).toEqual({ cursor: 3, status: 'COMPLETE' });
    });
  });

  describe('fatal errors', () => {
    it('should reject a control object that breaks the phase schema', async () => {
      runner.setCommandConfig(
        'worker',
        createScriptedWorker({ plan: [{ phase: 'plan', steps: [] }] }).handler
      );

      const result = await build().run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('SCHEMA_VALIDATION_ERROR');
      expect(result.error.message).toBe('JSON failed schema validation:\n - steps: must NOT have fewer than 1 items');
      expect(result.error.location).toEqual({
        phaseId: 'plan',
        iteration: 1,
        artifactPath: `${runDir}/plan/iter_1/worker_output.txt`,
      });
      expect(await fs.exists(`${runDir}/plan/iter_1/control.json`)).toBe(false);
      expect(await readJson(`${runDir}/run-summary.json`)).toMatchObject({
        success: false,
        error: { code: 'SCHEMA_VALIDATION_ERROR', phase: 'plan' },
      });
    });

    it('should fail on a change under a forbidden path', async () => {
      runner.setCommandConfig('git diff --name-only', { stdout: 'src/greet.ts\n.git/config\n' });

      const result = await build().run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('WRITE_POLICY_VIOLATION');
      expect(result.error.message).toBe('Write policy violation: attempted change in forbidden path: .git/config');
      expect(result.error.location).toEqual({ phaseId: 'plan', iteration: 1 });
    });

    it('should skip the change check when file writes are off', async () => {
      runner.setCommandConfig('git diff --name-only', { stdout: '.git/config\n' });
      const config = createConfig({
        writePolicy: { allowFileWrites: false, allowedPrefixes: [], forbiddenPrefixes: ['.git/'] },
      });

      const result = await build(config).run();

      expect(result.ok).toBe(true);
      expect(runner.getCallsMatching(/--name-only/)).toHaveLength(0);
    });

    it('should report a worker that exits non-zero', async () => {
      runner.setCommandConfig('worker', { exitCode: 3, stderr: 'quota' });

      const result = await build().run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('WORKER_ERROR');
      expect(result.error.message).toBe(
        `Worker returned non-zero exit code 3. See ${runDir}/plan/iter_1/worker_output.txt`
      );
      expect(result.error.location.phaseId).toBe('plan');
    });

    it('should report a missing phase prompt', async () => {
      const config = createConfig({
        phases: [{ id: 'review', schemaPath: `${AGENT_DIR}/schemas/plan.json` }],
      });

      const result = await build(config).run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('CONFIGURATION_ERROR');
      expect(result.error.message).toBe(`Prompt not found: ${AGENT_DIR}/prompts/phase_review.md`);
      expect(runner.getCallsMatching(/^worker/)).toHaveLength(0);
    });

    it('should report a gate without a command', async () => {
      const config = createConfig({ gates: { commands: {}, requiredChecks: ['lint'], goalChecks: false } });

      const result = await build(config).run();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Missing command for gate 'lint' in commands");
      expect(result.error.location).toEqual({ phaseId: 'verify', iteration: 1 });
    });

    it('should record the failure in the machine state and the log', async () => {
      runner.setCommandConfig('worker', { exitCode: 1 });
      const orchestrator = build();

      await orchestrator.run();

      expect(orchestrator.getState().status).toBe('FAILED');
      expect(orchestrator.getRunDirectory()).toBe(runDir);
      expect(logger.getLastEvent()?.eventType).toBe('run_failed');
    });
  });
});
