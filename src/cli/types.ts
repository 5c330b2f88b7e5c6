/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

/** Command selected on the command line */
export type CliCommand =
  | { kind: 'none' }
  | { kind: 'list-frameworks' }
  | { kind: 'list-tests' }
  | { kind: 'list-tag'; tag: string }
  | { kind: 'list-tests-for'; framework: string }
  | { kind: 'report'; verificationsFile: string };

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** What to do */
  command: CliCommand;

  /** Test name to scope the report's log directory and prefix to */
  testName: string | null;

  /** Root for timestamped results directories */
  resultsDir: string | null;

  /** Suppress console output (transcripts are still written) */
  quiet: boolean;

  /** Sort framework groups by name in the verification summary */
  sortFrameworks: boolean;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  command: { kind: 'none' },
  testName: null,
  resultsDir: null,
  quiet: false,
  sortFrameworks: false,
  help: false,
  version: false,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
