/**
 * Spinner Service
 * Progress spinner for slow scans, shown only on an interactive terminal
 */

import ora from 'ora';

/**
 * Spinner instance interface
 */
export interface Spinner {
  /** Start the spinner */
  start(): void;
  /** Stop with success */
  succeed(text?: string): void;
  /** Stop with failure */
  fail(text?: string): void;
  /** Stop the spinner without status */
  stop(): void;
  /** Whether the spinner is spinning */
  readonly isSpinning: boolean;
}

/**
 * Spinner service configuration
 */
export interface SpinnerServiceConfig {
  /** Whether the stream is an interactive terminal */
  isTTY: boolean;
  /** Whether to suppress all output */
  quiet: boolean;
  /** Output stream for the spinner (stderr keeps stdout clean for listings) */
  stream: NodeJS.WriteStream;
}

/**
 * A no-op spinner for non-TTY or quiet mode
 */
class NullSpinner implements Spinner {
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
 * A wrapper around ora spinner
 */
class OraSpinner implements Spinner {
  private readonly oraInstance: ora.Ora;

  constructor(text: string, stream: NodeJS.WriteStream) {
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

export class SpinnerService {
  private readonly config: SpinnerServiceConfig;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    const stream = config.stream ?? process.stderr;
    this.config = {
      isTTY: config.isTTY ?? stream.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream,
    };
  }

  /**
   * Create and start a spinner; a silent one when quiet or not on a TTY
   */
  start(text: string): Spinner {
    const spinner =
      this.config.quiet || !this.config.isTTY
        ? new NullSpinner()
        : new OraSpinner(text, this.config.stream);
    spinner.start();
    return spinner;
  }

  getConfig(): Readonly<SpinnerServiceConfig> {
    return { ...this.config };
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
