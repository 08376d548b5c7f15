/**
 * Spinner Service
 * Progress display for long worker calls, aware of TTY and quiet mode
 */

import ora, { Ora } from 'ora';

/**
 * Spinner instance interface
 */
export interface Spinner {
  start(): void;
  /** Stop with success */
  succeed(text?: string): void;
  /** Stop with failure */
  fail(text?: string): void;
  /** Stop the spinner without status */
  stop(): void;
  readonly isSpinning: boolean;
}

/**
 * Spinner service configuration
 */
export interface SpinnerServiceConfig {
  /** Whether TTY output is available */
  isTTY: boolean;
  /** Whether to suppress all output */
  quiet: boolean;
  /** Output stream for the spinner */
  stream: NodeJS.WritableStream;
}

/**
 * A no-op spinner for quiet mode and tests
 */
export class NullSpinner implements Spinner {
  private spinning = false;

  start(): void {
    this.spinning = true;
  }
  succeed(): void {
    this.spinning = false;
  }
  fail(): void {
    this.spinning = false;
  }
  stop(): void {
    this.spinning = false;
  }
  get isSpinning(): boolean {
    return this.spinning;
  }
}

/**
 * Plain progress lines for non-TTY output (CI logs, pipes)
 */
export class TextSpinner implements Spinner {
  private spinning = false;
  private readonly text: string;
  private readonly stream: NodeJS.WritableStream;

  constructor(text: string, stream: NodeJS.WritableStream) {
    this.text = text;
    this.stream = stream;
  }

  start(): void {
    this.spinning = true;
    this.stream.write(`> ${this.text}\n`);
  }

  succeed(text?: string): void {
    this.spinning = false;
    this.stream.write(`✅ ${text ?? this.text}\n`);
  }

  fail(text?: string): void {
    this.spinning = false;
    this.stream.write(`❌ ${text ?? this.text}\n`);
  }

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }
}

/**
 * A wrapper around ora spinner
 */
class OraSpinner implements Spinner {
  private readonly oraInstance: Ora;

  constructor(text: string, stream: NodeJS.WritableStream) {
    this.oraInstance = ora({ text, color: 'cyan', stream });
  }

  start(): void {
    this.oraInstance.start();
  }

  succeed(text?: string): void {
    this.oraInstance.succeed(text);
  }

  fail(text?: string): void {
    this.oraInstance.fail(text);
  }

  stop(): void {
    this.oraInstance.stop();
  }

  get isSpinning(): boolean {
    return this.oraInstance.isSpinning;
  }
}

/**
 * Hands out one spinner at a time
 */
export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private activeSpinner: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    this.config = {
      isTTY: config.isTTY ?? process.stderr.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream: config.stream ?? process.stderr,
    };
  }

  /**
   * Create and start a spinner, stopping any previous one
   */
  start(text: string): Spinner {
    this.stopAll();

    let spinner: Spinner;
    if (this.config.quiet) {
      spinner = new NullSpinner();
    } else if (this.config.isTTY) {
      spinner = new OraSpinner(text, this.config.stream);
    } else {
      spinner = new TextSpinner(text, this.config.stream);
    }

    this.activeSpinner = spinner;
    spinner.start();
    return spinner;
  }

  /**
   * Stop any active spinner
   */
  stopAll(): void {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }
    this.activeSpinner = null;
  }

  getActive(): Spinner | null {
    return this.activeSpinner;
  }
}

/**
 * Create a spinner service
 */
export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}

/**
 * Spinner service that never writes anything
 */
export function createQuietSpinnerService(): SpinnerService {
  return new SpinnerService({ quiet: true });
}
