/**
 * Logger
 * Writes line-oriented output to the console (styled) and, once a transcript
 * file is bound, appends a plain copy of every line to it.
 *
 * A Logger is not safe to share between concurrent units of work. Use fork()
 * to derive a Logger for another context; the fork starts without a
 * transcript and must bind its own file.
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import { Result, ok } from '../types/result';
import { ToolsetError } from '../types/errors';
import { Named } from '../types/named';
import {
  Displayable,
  LoggerOptions,
  OutputStream,
  ScopeStatus,
  Styles,
} from '../types/logger';
import { TranscriptFile, toPlainText } from './transcript-file';

export class Logger {
  /** Suppress console output; the transcript is still written */
  quiet: boolean;
  /** Chalk instance this logger paints with */
  readonly styles: Styles;

  private prefix?: string;
  private logDir?: string;
  private transcript?: TranscriptFile;
  private readonly stdout: OutputStream;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix;
    this.logDir = options.logDir;
    this.quiet = options.quiet ?? false;
    this.stdout = options.stdout ?? process.stdout;
    this.styles = options.styles ?? chalk;
  }

  getPrefix(): string | undefined {
    return this.prefix;
  }

  getLogDir(): string | undefined {
    return this.logDir;
  }

  /**
   * Path of the bound transcript, if any
   */
  getLogFile(): string | undefined {
    return this.transcript?.path;
  }

  /**
   * Scope this logger to a test: the test name becomes the prefix and, when a
   * log directory is set, `<logDir>/<test>` (created if needed) becomes the new
   * log directory.
   *
   * Example: with logDir `results/20200619191252` and test `gemini`, logDir
   * becomes `results/20200619191252/gemini`.
   *
   * The prefix is updated even when the directory cannot be created; the log
   * directory is then left as it was.
   */
  setTest(test: string | Named): ScopeStatus {
    const testName = typeof test === 'string' ? test : test.getName();
    const status = this.scopeLogDir(testName);
    this.prefix = testName;
    return status;
  }

  /**
   * Bind the transcript to `<logDir>/<fileName>`, creating an empty file when
   * absent. No-op without a log directory.
   */
  setLogFile(fileName: string): ScopeStatus {
    if (this.logDir === undefined) {
      return { applied: false, reason: 'NO_LOG_DIR' };
    }

    const path = join(this.logDir, fileName);
    const bound = TranscriptFile.bind(path);
    if (!bound.ok) {
      return { applied: false, reason: bound.error.reason, path, cause: bound.error.cause };
    }

    this.transcript = bound.value;
    return { applied: true, path };
  }

  /**
   * Log every non-blank line of `text` to the transcript (plain) and to the
   * console (styled, prefixed) unless quiet.
   */
  log(text: Displayable): Result<void, ToolsetError> {
    for (const line of String(text).split(/\r?\n/)) {
      if (toPlainText(line).trim() === '') {
        continue;
      }

      if (this.transcript) {
        const written = this.transcript.append(line);
        if (!written.ok) {
          return written;
        }
      }

      if (!this.quiet) {
        this.stdout.write(this.formatConsoleLine(line));
      }
    }
    return ok(undefined);
  }

  /**
   * Same as log, painted red on the console
   */
  error(text: Displayable): Result<void, ToolsetError> {
    return this.log(this.styles.red(String(text)));
  }

  /**
   * Independent copy for another unit of work. Prefix, log directory, quiet
   * flag and sinks are copied; the transcript is not.
   */
  fork(): Logger {
    return new Logger({
      prefix: this.prefix,
      logDir: this.logDir,
      quiet: this.quiet,
      stdout: this.stdout,
      styles: this.styles,
    });
  }

  private scopeLogDir(testName: string): ScopeStatus {
    if (this.logDir === undefined) {
      return { applied: false, reason: 'NO_LOG_DIR' };
    }

    const testDir = join(this.logDir, testName);
    try {
      mkdirSync(testDir, { recursive: true });
    } catch (error) {
      return {
        applied: false,
        reason: 'CREATE_FAILED',
        path: testDir,
        cause: error instanceof Error ? error : new Error(String(error)),
      };
    }

    this.logDir = testDir;
    return { applied: true, path: testDir };
  }

  private formatConsoleLine(line: string): string {
    const label = this.prefix !== undefined ? `${this.styles.white.bold(this.prefix)}: ` : '';
    return `${label}${line.trimEnd()}\n`;
  }
}

/**
 * Console-only logger; can later be scoped and bound
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/**
 * Console logger with a fixed prefix
 */
export function createPrefixedLogger(prefix: string, options?: Omit<LoggerOptions, 'prefix'>): Logger {
  return new Logger({ ...options, prefix });
}

/**
 * Logger rooted at a log directory (typically a results directory)
 */
export function createDirLogger(logDir: string, options?: Omit<LoggerOptions, 'logDir'>): Logger {
  return new Logger({ ...options, logDir });
}
