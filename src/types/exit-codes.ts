/**
 * Standardized exit codes for the tfb CLI
 */

import { ToolsetError } from './errors';

export const ExitCode = {
  /** Successful execution */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage */
  USAGE_ERROR: 2,
  /** Framework benchmarks root could not be resolved */
  INVALID_TFB_DIR: 3,
  /** Reading or writing a file failed */
  IO_ERROR: 4,
  /** A config or verification file was malformed */
  INVALID_INPUT: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Get a human-readable description of an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid CLI usage';
    case ExitCode.INVALID_TFB_DIR:
      return 'Framework benchmarks directory not found';
    case ExitCode.IO_ERROR:
      return 'File read or write failed';
    case ExitCode.INVALID_INPUT:
      return 'Malformed config or verification file';
    default:
      return 'Unknown exit code';
  }
}

/**
 * Map a toolset error to the exit code the CLI reports for it
 */
export function exitCodeForError(error: ToolsetError): ExitCode {
  switch (error.code) {
    case 'INVALID_TFB_DIR':
      return ExitCode.INVALID_TFB_DIR;
    case 'IO_ERROR':
      return ExitCode.IO_ERROR;
    case 'INVALID_INPUT':
      return ExitCode.INVALID_INPUT;
  }
}
