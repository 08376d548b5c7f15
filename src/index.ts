#!/usr/bin/env node

import { runCommand } from './commands/run';
import { createRealProcessRunner } from './engines/real-process-runner';
import { createRealFileSystem } from './io/real-file-system';
import { SystemClock } from './types/clock';
import { ExitCode } from './types/exit-codes';
import { createSpinnerService } from './ui/spinner-service';

// Library surface
export { runCommand } from './commands/run';
export type { RunCommandDependencies } from './commands/run';
export { Orchestrator, createOrchestrator } from './core/orchestrator';
export type { OrchestratorDependencies, RunOutcome } from './core/orchestrator';
export { loadWorkflowConfig, resolveConfig } from './config';
export type { WorkflowConfig } from './types/workflow-config';
export { ExitCode, exitCodeForError } from './types/exit-codes';
export { VERSION } from './version';

/** Exit code after an interrupt */
const INTERRUPTED_EXIT_CODE = 130;

// Main CLI entry point
async function main(): Promise<void> {
  const processRunner = createRealProcessRunner();
  const spinner = createSpinnerService();

  process.on('SIGINT', () => {
    spinner.stopAll();
    processRunner.killAll?.('SIGTERM');
    process.exit(INTERRUPTED_EXIT_CODE);
  });

  const code = await runCommand(process.argv, {
    cwd: process.cwd(),
    fileSystem: createRealFileSystem(),
    processRunner,
    clock: new SystemClock(),
    spinner,
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
  process.exit(code);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('[phasegate] ERROR:', error instanceof Error ? error.message : String(error));
    process.exit(ExitCode.UNEXPECTED_ERROR);
  });
}
