/**
 * Tests for configuration resolution
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadWorkflowConfig, loadWorkflowFile, resolveConfig, resolveWorkflowPath } from './resolve-config';
import { buildEffectiveConfigArtifact, formatEffectiveConfigForDisplay } from './effective-config';
import { MemoryFileSystem } from '../io/memory-file-system';
import { WorkflowFile } from '../schemas/workflow-config.schema';

const WORKFLOW_PATH = '/repo/agent/workflow.json';

function createWorkflow(overrides: Partial<WorkflowFile> = {}): WorkflowFile {
  return {
    phases: [
      { id: 'plan', schema: 'schemas/plan.schema.json' },
      { id: 'implement', schema: '/abs/implement.schema.json' },
    ],
    limits: {},
    policies: { allowedWritePaths: [], forbidWritePaths: ['.git/'] },
    commands: { test: 'npm test' },
    gates: { requiredChecks: ['test'], goalChecks: true },
    worker: {},
    prompts: 'prompts',
    ...overrides,
  };
}

describe('resolveWorkflowPath', () => {
  it('should default to agent/workflow.json under the working directory', () => {
    expect(resolveWorkflowPath({}, '/repo')).toBe('/repo/agent/workflow.json');
  });

  it('should resolve a relative --workflow against the working directory', () => {
    expect(resolveWorkflowPath({ workflowPath: 'flows/fast.json' }, '/repo')).toBe('/repo/flows/fast.json');
  });
});

describe('resolveConfig', () => {
  it('should use defaults when neither flags nor file set a value', () => {
    const config = resolveConfig({ task: 'Fix bug' }, createWorkflow(), WORKFLOW_PATH, '/repo');

    expect(config.limits).toEqual({ maxTotalIterations: 25, maxPhaseIterations: 6 });
    expect(config.worker).toEqual({ command: 'claude', args: ['-p'], timeoutMs: 600_000 });
    expect(config.writePolicy).toEqual({ allowFileWrites: true, allowedPrefixes: [], forbiddenPrefixes: ['.git/'] });
    expect(config.sources).toEqual({
      'worker.timeoutMs': 'default',
      'limits.maxTotalIterations': 'default',
      'limits.maxPhaseIterations': 'default',
      'writePolicy.allowFileWrites': 'default',
      'worker.command': 'default',
      'worker.args': 'default',
    });
  });

  it('should resolve paths relative to the workflow file', () => {
    const config = resolveConfig({ task: 'Fix bug' }, createWorkflow(), WORKFLOW_PATH, '/repo');

    expect(config.phases).toEqual([
      { id: 'plan', schemaPath: '/repo/agent/schemas/plan.schema.json' },
      { id: 'implement', schemaPath: '/abs/implement.schema.json' },
    ]);
    expect(config.gates).toEqual({ commands: { test: 'npm test' }, requiredChecks: ['test'], goalChecks: true });
    expect(config.paths).toEqual({
      repoRoot: '/repo',
      workflowPath: WORKFLOW_PATH,
      promptsDir: '/repo/agent/prompts',
      runsDir: '/repo/agent/runs',
    });
  });

  it('should prefer workflow values over defaults', () => {
    const workflow = createWorkflow({
      limits: { maxTotalIterations: 9 },
      policies: { allowFileWrites: false, allowedWritePaths: ['src/'], forbidWritePaths: [] },
      worker: { command: 'agent', timeoutSeconds: 30 },
    });

    const config = resolveConfig({ task: 'Fix bug' }, workflow, WORKFLOW_PATH, '/repo');

    expect(config.limits).toEqual({ maxTotalIterations: 9, maxPhaseIterations: 6 });
    expect(config.writePolicy.allowFileWrites).toBe(false);
    expect(config.writePolicy.allowedPrefixes).toEqual(['src/']);
    expect(config.worker).toEqual({ command: 'agent', args: ['-p'], timeoutMs: 30_000 });
    expect(config.sources?.['limits.maxTotalIterations']).toBe('workflow');
    expect(config.sources?.['worker.timeoutMs']).toBe('workflow');
  });

  it('should prefer CLI flags over workflow values', () => {
    const workflow = createWorkflow({ limits: { maxPhaseIterations: 4 }, worker: { command: 'agent' } });

    const config = resolveConfig(
      {
        task: 'Fix bug',
        repo: '../other',
        worker: 'codex',
        workerArgs: ['exec', '--json'],
        timeoutSeconds: 45,
        maxPhaseIterations: 2,
        verbose: true,
      },
      workflow,
      WORKFLOW_PATH,
      '/repo'
    );

    expect(config.limits.maxPhaseIterations).toBe(2);
    expect(config.worker).toEqual({ command: 'codex', args: ['exec', '--json'], timeoutMs: 45_000 });
    expect(config.paths.repoRoot).toBe('/other');
    expect(config.verbosity).toEqual({ verbose: true, debug: false, jsonOutput: false });
    expect(config.sources?.['limits.maxPhaseIterations']).toBe('cli');
    expect(config.sources?.['worker.command']).toBe('cli');
  });
});

describe('loadWorkflowFile', () => {
  let fs: MemoryFileSystem;

  beforeEach(() => {
    fs = new MemoryFileSystem('/');
  });

  it('should report a missing workflow', async () => {
    const result = await loadWorkflowFile(fs, WORKFLOW_PATH);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(`Workflow not found: ${WORKFLOW_PATH}`);
  });

  it('should list validation errors', async () => {
    await fs.writeFile(WORKFLOW_PATH, JSON.stringify({ phases: [] }), { createParents: true });

    const result = await loadWorkflowFile(fs, WORKFLOW_PATH);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CONFIGURATION_ERROR');
    expect(result.error.message).toBe(`Invalid workflow ${WORKFLOW_PATH}:\n - phases: No phases defined in workflow`);
  });
});

describe('loadWorkflowConfig', () => {
  it('should load the default workflow under the working directory', async () => {
    const fs = new MemoryFileSystem('/');
    await fs.writeFile(WORKFLOW_PATH, JSON.stringify({ phases: [{ id: 'plan', schema: 'plan.json' }] }), {
      createParents: true,
    });

    const result = await loadWorkflowConfig(fs, { task: 'Fix bug' }, '/repo');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.task).toBe('Fix bug');
    expect(result.value.phases).toEqual([{ id: 'plan', schemaPath: '/repo/agent/plan.json' }]);
  });
});

describe('effective config', () => {
  const config = resolveConfig(
    { task: 'Fix bug', maxTotalIterations: 8 },
    createWorkflow({ commands: { deploy: 'deploy --token=abcdefgh12345678' } }),
    WORKFLOW_PATH,
    '/repo'
  );

  it('should redact secrets in gate commands', () => {
    const artifact = buildEffectiveConfigArtifact(config, '20250101-000000', '2025-01-01T00:00:00.000Z');

    expect(artifact.runId).toBe('20250101-000000');
    expect(artifact.artifactType).toBe('effective-config');
    expect(artifact.config.gates.commands.deploy).toBe('deploy --toke[REDACTED]');
    expect(config.gates.commands.deploy).toBe('deploy --token=abcdefgh12345678');
  });

  it('should show the source of overridable values', () => {
    const lines = formatEffectiveConfigForDisplay(config).split('\n');

    expect(lines[0]).toBe('Effective configuration');
    expect(lines).toContain('  Max total iterations: 8 [cli]');
    expect(lines).toContain('  Max phase iterations: 6 [default]');
    expect(lines).toContain('  Phases:               plan -> implement');
    expect(lines).toContain('  Gates:                test');
    expect(lines).toContain('  Goal checks:          on');
  });
});
