/**
 * ProcessRunner interface
 * Abstracts subprocess execution for the worker, the gates and git
 */

/**
 * Options for spawning a subprocess
 */
export interface SpawnOptions {
  /** Arguments to pass to the command (ignored when `shell` is set) */
  args: string[];
  /** Working directory for the subprocess */
  cwd: string;
  /** Environment variables (merged with process.env) */
  env?: Record<string, string>;
  /** Text written to stdin, after which stdin is closed */
  input?: string;
  /** Timeout in milliseconds (0 or absent = no timeout) */
  timeoutMs?: number;
  /** Run `command` as a shell command line */
  shell?: boolean;
  /** Callback for stdout data (for streaming/display) */
  onStdout?: (data: string) => void;
  /** Callback for stderr data (for streaming/display) */
  onStderr?: (data: string) => void;
}

/**
 * Result from spawning a subprocess
 */
export interface SpawnResult {
  /** Exit code from the subprocess */
  exitCode: number;
  /** Duration of execution in milliseconds */
  durationMs: number;
  /** Everything written to stdout */
  stdout: string;
  /** Everything written to stderr */
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  output: string;
  /** Whether the process was killed due to timeout */
  timedOut: boolean;
  /** Whether the process was terminated by a signal */
  interrupted: boolean;
  /** Signal that terminated the process, if any */
  signal?: string;
}

/**
 * Interface for running subprocesses
 * Implementations can be real (child_process) or scripted (for testing)
 */
export interface ProcessRunner {
  /**
   * Spawn a subprocess and wait for it to complete
   * Rejects only when the process cannot be started at all.
   */
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Kill every process this runner still tracks
   */
  killAll?(signal?: NodeJS.Signals): void;
}
