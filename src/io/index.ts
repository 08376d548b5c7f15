/**
 * IO module - filesystem abstraction, run artifacts and the git workspace
 */

export { RealFileSystem, createRealFileSystem } from './real-file-system';
export { MemoryFileSystem, createMemoryFileSystem } from './memory-file-system';

// Run artifacts
export {
  RunArtifacts,
  TASK_FILE,
  WORKFLOW_COPY_FILE,
  EFFECTIVE_CONFIG_FILE,
  FINAL_DIFF_FILE,
  RUN_SUMMARY_FILE,
  RUN_SUMMARY_MARKDOWN_FILE,
  WORKER_OUTPUT_FILE,
  CONTROL_FILE,
  NARRATION_FILE,
  GATE_OUTPUTS_DIR,
  GOAL_CHECKS_FILE,
} from './run-artifacts';

// Workspace
export { GitWorkspace, createGitWorkspace } from './git-workspace';
export type { Workspace } from './git-workspace';
