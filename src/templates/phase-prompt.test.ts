/**
 * Tests for phase prompt assembly
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PromptAssembler, RETURN_JSON_INSTRUCTIONS, phasePromptFile } from './phase-prompt';
import { MemoryFileSystem } from '../io/memory-file-system';
import { Workspace } from '../io/git-workspace';
import { ok } from '../types/result';

function fixedWorkspace(diff: string): Workspace {
  return {
    changedFiles: async () => ok([]),
    diff: async () => diff,
  };
}

describe('PromptAssembler', () => {
  let fs: MemoryFileSystem;

  beforeEach(async () => {
    fs = new MemoryFileSystem('/');
    await fs.writeFile('/agent/prompts/system.md', 'You are careful.', { createParents: true });
    await fs.writeFile('/agent/prompts/phase_plan.md', 'PHASE: plan', { createParents: true });
    await fs.writeFile('/agent/schemas/plan.schema.json', '{"type":"object"}', { createParents: true });
  });

  it('should name phase prompt files after the phase', () => {
    expect(phasePromptFile('verify')).toBe('phase_verify.md');
  });

  it('should join the sections with blank lines', async () => {
    const assembler = new PromptAssembler('/agent/prompts', fs, fixedWorkspace('+added line\n'));

    const prompt = await assembler.assemble({
      phaseId: 'plan',
      task: 'Add a flag',
      schemaPath: '/agent/schemas/plan.schema.json',
    });

    expect(prompt).toEqual({
      ok: true,
      value: [
        'You are careful.',
        'PHASE: plan',
        'TASK:\nAdd a flag',
        'CURRENT_GIT_DIFF:\n+added line\n',
        'REQUIRED JSON SCHEMA:\n{"type":"object"}',
        `INSTRUCTIONS:\n${RETURN_JSON_INSTRUCTIONS}`,
      ].join('\n\n'),
    });
  });

  it('should show a blank diff as <none>', async () => {
    const assembler = new PromptAssembler('/agent/prompts', fs, fixedWorkspace('  \n'));

    const prompt = await assembler.assemble({ phaseId: 'plan', task: 't', schemaPath: '/agent/schemas/plan.schema.json' });

    expect(prompt.ok && prompt.value.includes('CURRENT_GIT_DIFF:\n<none>\n\n')).toBe(true);
  });

  it('should show an unreadable schema as an empty object', async () => {
    const assembler = new PromptAssembler('/agent/prompts', fs, fixedWorkspace(''));

    const prompt = await assembler.assemble({ phaseId: 'plan', task: 't', schemaPath: '/missing.json' });

    expect(prompt.ok && prompt.value.includes('REQUIRED JSON SCHEMA:\n{}\n\n')).toBe(true);
  });

  it('should not expand placeholders found in the task or diff', async () => {
    const assembler = new PromptAssembler('/agent/prompts', fs, fixedWorkspace('{{task}}'));

    const prompt = await assembler.assemble({ phaseId: 'plan', task: '{{schema}}', schemaPath: '/missing.json' });

    expect(prompt.ok && prompt.value.includes('TASK:\n{{schema}}\n\nCURRENT_GIT_DIFF:\n{{task}}')).toBe(true);
  });

  it('should fail when the phase prompt is missing', async () => {
    const assembler = new PromptAssembler('/agent/prompts', fs, fixedWorkspace(''));

    const prompt = await assembler.assemble({ phaseId: 'verify', task: 't', schemaPath: '/missing.json' });

    expect(prompt.ok).toBe(false);
    if (prompt.ok) return;
    expect(prompt.error.code).toBe('CONFIGURATION_ERROR');
    expect(prompt.error.message).toBe('Prompt not found: /agent/prompts/phase_verify.md');
  });

  it('should fail when the system prompt is missing', async () => {
    const assembler = new PromptAssembler('/elsewhere', fs, fixedWorkspace(''));

    const prompt = await assembler.assemble({ phaseId: 'plan', task: 't', schemaPath: '/missing.json' });

    expect(prompt.ok).toBe(false);
    if (prompt.ok) return;
    expect(prompt.error.message).toBe('Prompt not found: /elsewhere/system.md');
  });
});
