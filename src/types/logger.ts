/**
 * Logger types
 * Shared shapes for the console + transcript logger
 */

import type chalk from 'chalk';

/**
 * Minimal writable sink (process.stdout, process.stderr or a test capture)
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Chalk instance used to paint console output
 */
export type Styles = chalk.Chalk;

/**
 * Anything that renders to text
 */
export interface Displayable {
  toString(): string;
}

/**
 * Why a rescope or file binding did not take effect
 * - NO_LOG_DIR: the logger has no log directory
 * - CREATE_FAILED: the directory or file could not be created
 * - NOT_A_FILE: the target path exists but is not a regular file
 */
export type ScopeSkipReason = 'NO_LOG_DIR' | 'CREATE_FAILED' | 'NOT_A_FILE';

/**
 * Outcome of setTest / setLogFile
 */
export type ScopeStatus =
  | { applied: true; path: string }
  | { applied: false; reason: ScopeSkipReason; path?: string; cause?: Error };

/**
 * Options for configuring a Logger
 */
export interface LoggerOptions {
  /** Label printed (bold) before every console line */
  prefix?: string;
  /** Root directory for transcript files */
  logDir?: string;
  /** Suppress console output; the transcript is still written */
  quiet?: boolean;
  /** Console sink (default: process.stdout) */
  stdout?: OutputStream;
  /** Chalk instance (default: the shared chalk, color level auto-detected) */
  styles?: Styles;
}
