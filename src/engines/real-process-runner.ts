/**
 * Real ProcessRunner implementation
 * Uses child_process.spawn for subprocess execution
 */

import { spawn, ChildProcess, StdioOptions } from 'child_process';
import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/** Exit code reported for a process killed by its timeout */
export const TIMEOUT_EXIT_CODE = 124;

/** Exit code reported for a process killed by a signal from outside */
const INTERRUPTED_EXIT_CODE = 130;

/** Delay between SIGTERM and SIGKILL once a timeout fires */
export const DEFAULT_KILL_GRACE_MS = 5000;

// Children lead their own process group so a kill reaches what they spawned
const USE_PROCESS_GROUPS = process.platform !== 'win32';

export interface RealProcessRunnerOptions {
  /** Delay between SIGTERM and SIGKILL once a timeout fires */
  killGraceMs?: number;
}

/**
 * Signal a child and everything in its process group
 */
function killTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (USE_PROCESS_GROUPS && child.pid !== undefined) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch {
      // Group already gone; fall back to the child itself
      child.kill(signal);
      return;
    }
  }
  child.kill(signal);
}

/**
 * Real implementation of ProcessRunner using child_process
 */
export class RealProcessRunner implements ProcessRunner {
  private runningProcesses: Map<number, ChildProcess> = new Map();
  private processIdCounter = 0;
  private readonly killGraceMs: number;

  constructor(options: RealProcessRunnerOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      // Merge environment
      const env = options.env ? { ...process.env, ...options.env } : process.env;
      const stdio: StdioOptions = [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'];
      const detached = USE_PROCESS_GROUPS;

      // Argument vectors are passed through untouched unless a shell line was asked for
      const child: ChildProcess = options.shell
        ? spawn(command, { cwd: options.cwd, env, stdio, shell: true, detached })
        : spawn(command, options.args, { cwd: options.cwd, env, stdio, shell: false, detached });

      const processId = ++this.processIdCounter;
      this.runningProcesses.set(processId, child);

      let stdout = '';
      let stderr = '';
      let output = '';
      let timedOut = false;
      let settled = false;
      let forceKillTimer: NodeJS.Timeout | undefined;

      const timer =
        options.timeoutMs && options.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              killTree(child, 'SIGTERM');
              forceKillTimer = setTimeout(() => killTree(child, 'SIGKILL'), this.killGraceMs);
            }, options.timeoutMs)
          : undefined;

      const finish = (): void => {
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        if (forceKillTimer) {
          clearTimeout(forceKillTimer);
        }
        this.runningProcesses.delete(processId);
      };

      const settle = (code: number | null, sig: NodeJS.Signals | null): void => {
        if (settled) {
          return;
        }
        finish();

        const interrupted = sig !== null && !timedOut;
        let exitCode = code ?? 1;
        if (timedOut) {
          exitCode = TIMEOUT_EXIT_CODE;
        } else if (code === null && interrupted) {
          exitCode = INTERRUPTED_EXIT_CODE;
        }
        resolve({
          exitCode,
          durationMs: Date.now() - startTime,
          stdout,
          stderr,
          output,
          timedOut,
          interrupted,
          signal: sig ?? undefined,
        });
      };

      child.stdout?.on('data', (data: Buffer) => {
        const str = data.toString();
        stdout += str;
        output += str;
        options.onStdout?.(str);
      });

      child.stderr?.on('data', (data: Buffer) => {
        const str = data.toString();
        stderr += str;
        output += str;
        options.onStderr?.(str);
      });

      if (child.stdin && options.input !== undefined) {
        // A process may exit without reading its input; that is not a spawn failure
        child.stdin.on('error', (error: NodeJS.ErrnoException) => {
          if (error.code !== 'EPIPE' && !settled) {
            finish();
            reject(error);
          }
        });
        child.stdin.end(options.input);
      }

      // After a timeout, a descendant outside the group may still hold the pipes open
      child.on('exit', (code, sig) => {
        if (!timedOut) {
          return;
        }
        child.stdout?.destroy();
        child.stderr?.destroy();
        settle(code, sig);
      });

      child.on('close', (code, sig) => settle(code, sig));

      // Handle spawn errors
      child.on('error', (error) => {
        if (settled) {
          return;
        }
        finish();
        reject(error);
      });
    });
  }

  killAll(signal: NodeJS.Signals = 'SIGTERM'): void {
    for (const [, child] of this.runningProcesses) {
      killTree(child, signal);
    }
    this.runningProcesses.clear();
  }
}

/**
 * Create a real process runner instance
 */
export function createRealProcessRunner(options?: RealProcessRunnerOptions): ProcessRunner {
  return new RealProcessRunner(options);
}
