/**
 * Git workspace queries
 * The worker edits the repository; these report what it changed.
 */

import { resolve } from 'path';
import { ConfigurationError } from '../types/errors';
import { ProcessRunner } from '../types/process-runner';
import { Result, ok, err } from '../types/result';

/**
 * Read-only view of the repository's working tree
 */
export interface Workspace {
  /** Absolute paths of files with unstaged changes, untracked files included */
  changedFiles(): Promise<Result<string[], ConfigurationError>>;
  /** Current working-tree diff, or '' when none can be produced */
  diff(): Promise<string>;
}

/**
 * Workspace backed by the `git` CLI
 */
export class GitWorkspace implements Workspace {
  private readonly repoRoot: string;
  private readonly processRunner: ProcessRunner;

  constructor(repoRoot: string, processRunner: ProcessRunner) {
    this.repoRoot = resolve(repoRoot);
    this.processRunner = processRunner;
  }

  async changedFiles(): Promise<Result<string[], ConfigurationError>> {
    const modified = await this.listPaths(['diff', '--name-only'], 'git diff failed (is this a git repo?)');
    if (!modified.ok) return modified;
    const untracked = await this.listPaths(
      ['ls-files', '--others', '--exclude-standard'],
      'git ls-files failed (is this a git repo?)'
    );
    if (!untracked.ok) return untracked;
    return ok([...new Set([...modified.value, ...untracked.value])]);
  }

  /**
   * Run a git command that prints one repo-relative path per line
   */
  private async listPaths(args: string[], failure: string): Promise<Result<string[], ConfigurationError>> {
    try {
      const result = await this.processRunner.spawn('git', { args, cwd: this.repoRoot });
      if (result.exitCode !== 0) {
        return err(new ConfigurationError(failure));
      }
      return ok(
        result.stdout
          .split(/\r?\n/)
          .map((line) => line.trim())
          .filter((line) => line.length > 0)
          .map((line) => resolve(this.repoRoot, line))
      );
    } catch (error) {
      return err(new ConfigurationError(failure, {}, error));
    }
  }

  async diff(): Promise<string> {
    try {
      const result = await this.processRunner.spawn('git', { args: ['diff'], cwd: this.repoRoot });
      return result.exitCode === 0 ? result.stdout : '';
    } catch {
      return '';
    }
  }
}

/**
 * Create a git-backed workspace for a repository
 */
export function createGitWorkspace(repoRoot: string, processRunner: ProcessRunner): Workspace {
  return new GitWorkspace(repoRoot, processRunner);
}
