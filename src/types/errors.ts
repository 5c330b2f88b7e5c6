/**
 * Toolset error taxonomy
 * Errors are plain values carried by Result, in the same shape wherever they
 * come from.
 */

/**
 * Error codes surfaced to callers
 * - INVALID_TFB_DIR: the framework benchmarks root has no `frameworks` directory
 * - IO_ERROR: a read or write against an already-resolved path failed
 * - INVALID_INPUT: a config or verification file could not be parsed
 */
export type ToolsetErrorCode = 'INVALID_TFB_DIR' | 'IO_ERROR' | 'INVALID_INPUT';

export interface ToolsetError {
  code: ToolsetErrorCode;
  message: string;
  /** Path the failing operation was working on */
  path?: string;
  cause?: Error;
}

/**
 * Create a ToolsetError, filling in a default message for the code
 */
export function createToolsetError(
  code: ToolsetErrorCode,
  path?: string,
  message?: string,
  cause?: Error
): ToolsetError {
  const defaultMessages: Record<ToolsetErrorCode, string> = {
    INVALID_TFB_DIR: `Invalid framework benchmarks directory: ${path ?? '(unresolved)'} has no frameworks directory`,
    IO_ERROR: `IO error: ${path ?? '(unknown path)'}`,
    INVALID_INPUT: `Invalid input: ${path ?? '(unknown path)'}`,
  };

  return {
    code,
    path,
    message: message ?? defaultMessages[code],
    cause,
  };
}

/**
 * Wrap a thrown fs error as an IO_ERROR
 */
export function toIoError(path: string, error: unknown): ToolsetError {
  const cause = error instanceof Error ? error : new Error(String(error));
  return createToolsetError('IO_ERROR', path, `IO error on ${path}: ${cause.message}`, cause);
}

/**
 * Format an error for a single console line
 */
export function formatToolsetError(error: ToolsetError): string {
  return `Error: ${error.message}`;
}
