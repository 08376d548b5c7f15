/**
 * Mock ProcessRunner implementation
 * For testing - returns predefined results without spawning real processes
 */

import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Configuration for mock process behavior
 */
export interface MockProcessConfig {
  /** Exit code to return (default: 0) */
  exitCode?: number;
  /** Duration to simulate in milliseconds (default: 100) */
  durationMs?: number;
  stdout?: string;
  stderr?: string;
  /** Whether to simulate timeout */
  timedOut?: boolean;
  /** Whether to simulate interruption */
  interrupted?: boolean;
  /** Signal that caused interruption */
  signal?: string;
  /** Delay before returning (simulates actual process time) */
  simulatedDelayMs?: number;
  /** Error to throw (simulates spawn failure) */
  throwError?: Error;
}

/**
 * Computes a response from the call itself
 */
export type MockProcessHandler = (command: string, options: SpawnOptions) => MockProcessConfig;

type MockResponse = MockProcessConfig | MockProcessHandler | MockProcessConfig[];

/**
 * A recorded spawn call
 */
export interface MockProcessCall {
  command: string;
  /** Command and arguments joined with spaces */
  commandLine: string;
  options: SpawnOptions;
}

/**
 * Full command line of a call, as used for matching
 */
export function formatCommandLine(command: string, options: SpawnOptions): string {
  return options.shell || options.args.length === 0 ? command : [command, ...options.args].join(' ');
}

/**
 * Mock implementation of ProcessRunner for testing
 *
 * Responses are looked up by full command line, then by command, then by
 * pattern. A list of responses is consumed in order and its last entry
 * repeats.
 */
export class MockProcessRunner implements ProcessRunner {
  private defaultConfig: MockProcessConfig;
  private commandConfigs: Map<string, MockResponse> = new Map();
  private patternConfigs: Array<{ pattern: RegExp; response: MockResponse }> = [];
  private callHistory: MockProcessCall[] = [];

  constructor(defaultConfig: MockProcessConfig = {}) {
    this.defaultConfig = {
      exitCode: 0,
      durationMs: 100,
      stdout: '',
      stderr: '',
      timedOut: false,
      interrupted: false,
      simulatedDelayMs: 0,
      ...defaultConfig,
    };
  }

  /**
   * Configure behavior for a command or full command line
   */
  setCommandConfig(command: string, response: MockProcessConfig | MockProcessHandler): void {
    this.commandConfigs.set(command, response);
  }

  /**
   * Configure successive responses for a command or full command line
   */
  setCommandSequence(command: string, responses: MockProcessConfig[]): void {
    this.commandConfigs.set(command, [...responses]);
  }

  /**
   * Configure behavior for command lines matching a pattern
   */
  setPatternConfig(pattern: RegExp, response: MockProcessConfig | MockProcessHandler): void {
    this.patternConfigs.push({ pattern, response });
  }

  /**
   * Get the call history for verification in tests
   */
  getCallHistory(): MockProcessCall[] {
    return [...this.callHistory];
  }

  /**
   * Calls whose command line matches
   */
  getCallsMatching(pattern: RegExp): MockProcessCall[] {
    return this.callHistory.filter((call) => pattern.test(call.commandLine));
  }

  /**
   * Clear the call history
   */
  clearCallHistory(): void {
    this.callHistory = [];
  }

  /**
   * Reset all configurations to defaults
   */
  reset(): void {
    this.commandConfigs.clear();
    this.patternConfigs = [];
    this.callHistory = [];
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const commandLine = formatCommandLine(command, options);
    this.callHistory.push({ command, commandLine, options });

    const response =
      this.commandConfigs.get(commandLine) ??
      this.commandConfigs.get(command) ??
      this.patternConfigs.find((entry) => entry.pattern.test(commandLine))?.response;

    const config = { ...this.defaultConfig, ...this.resolveResponse(response, command, options) };

    if (config.throwError) {
      throw config.throwError;
    }

    if (config.simulatedDelayMs && config.simulatedDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, config.simulatedDelayMs));
    }

    const stdout = config.stdout ?? '';
    const stderr = config.stderr ?? '';
    if (stdout) options.onStdout?.(stdout);
    if (stderr) options.onStderr?.(stderr);

    return {
      exitCode: config.exitCode ?? 0,
      durationMs: config.durationMs ?? 100,
      stdout,
      stderr,
      output: stdout + stderr,
      timedOut: config.timedOut ?? false,
      interrupted: config.interrupted ?? false,
      signal: config.signal,
    };
  }

  killAll(): void {
    // No-op for mock
  }

  private resolveResponse(
    response: MockResponse | undefined,
    command: string,
    options: SpawnOptions
  ): MockProcessConfig {
    if (response === undefined) {
      return {};
    }
    if (typeof response === 'function') {
      return response(command, options);
    }
    if (Array.isArray(response)) {
      // Consume in order; the last response repeats
      return response.length > 1 ? (response.shift() ?? {}) : (response[0] ?? {});
    }
    return response;
  }
}

/**
 * Create a mock process runner with optional default config
 */
export function createMockProcessRunner(config?: MockProcessConfig): MockProcessRunner {
  return new MockProcessRunner(config);
}
