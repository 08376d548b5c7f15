/**
 * Phase prompt assembly
 * Combines the shared system prompt, the phase prompt, the task, the current
 * diff and the phase's schema into the text handed to the worker.
 */

import { ConfigurationError } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Result, ok, err } from '../types/result';
import { Workspace } from '../io/git-workspace';
import { PromptTemplate, interpolateTemplate } from './prompt-template';

export const SYSTEM_PROMPT_FILE = 'system.md';

export const RETURN_JSON_INSTRUCTIONS =
  'Return ONLY a valid JSON object matching the schema above. No markdown, no explanation, just the JSON.';

/**
 * Layout of every phase prompt; sections are separated by a blank line
 */
export const PHASE_PROMPT_TEMPLATE: PromptTemplate = {
  description: 'Prompt sent to the worker on each phase entry',
  template: [
    '{{system}}',
    '{{phase}}',
    'TASK:\n{{task}}',
    'CURRENT_GIT_DIFF:\n{{diff}}',
    'REQUIRED JSON SCHEMA:\n{{schema}}',
    'INSTRUCTIONS:\n{{instructions}}',
  ].join('\n\n'),
  requiredVariables: ['system', 'phase', 'task', 'diff', 'schema', 'instructions'],
};

/**
 * File name of a phase's prompt
 */
export function phasePromptFile(phaseId: string): string {
  return `phase_${phaseId}.md`;
}

/**
 * What a prompt is assembled for
 */
export interface PhasePromptRequest {
  phaseId: string;
  task: string;
  schemaPath: string;
}

/**
 * Reads prompt files and fills in the phase prompt layout
 */
export class PromptAssembler {
  private readonly promptsDir: string;
  private readonly fileSystem: FileSystem;
  private readonly workspace: Workspace;

  constructor(promptsDir: string, fileSystem: FileSystem, workspace: Workspace) {
    this.promptsDir = promptsDir;
    this.fileSystem = fileSystem;
    this.workspace = workspace;
  }

  async assemble(request: PhasePromptRequest): Promise<Result<string, ConfigurationError>> {
    const system = await this.readPrompt(SYSTEM_PROMPT_FILE);
    if (!system.ok) {
      return system;
    }

    const phase = await this.readPrompt(phasePromptFile(request.phaseId));
    if (!phase.ok) {
      return phase;
    }

    // The schema is validated separately; here it is only shown to the worker
    const schema = await this.fileSystem.readFile(request.schemaPath);
    const diff = await this.workspace.diff();

    return ok(
      interpolateTemplate(PHASE_PROMPT_TEMPLATE, {
        system: system.value,
        phase: phase.value,
        task: request.task,
        diff: diff.trim() ? diff : '<none>',
        schema: schema.ok ? schema.value : '{}',
        instructions: RETURN_JSON_INSTRUCTIONS,
      })
    );
  }

  private async readPrompt(fileName: string): Promise<Result<string, ConfigurationError>> {
    const path = this.fileSystem.join(this.promptsDir, fileName);
    const read = await this.fileSystem.readFile(path);
    if (!read.ok) {
      return err(new ConfigurationError(`Prompt not found: ${path}`, {}, read.error));
    }
    return read;
  }
}
