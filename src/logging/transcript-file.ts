/**
 * Transcript file
 * The plain-text copy of everything a Logger prints. Color and style escape
 * sequences are stripped before each line is appended.
 *
 * A TranscriptFile can only be obtained through TranscriptFile.bind, and a
 * Logger never hands its transcript to a fork: each transcript has exactly one
 * owning Logger.
 */

import { closeSync, constants, existsSync, openSync, statSync, writeFileSync, writeSync } from 'fs';
import stripAnsi from 'strip-ansi';
import { Result, ok, err } from '../types/result';
import { ToolsetError, toIoError } from '../types/errors';
import { ScopeSkipReason } from '../types/logger';

/**
 * Why a transcript could not be bound
 */
export interface BindFailure {
  reason: Exclude<ScopeSkipReason, 'NO_LOG_DIR'>;
  cause?: Error;
}

/**
 * Remove ANSI color and style sequences from a line
 */
export function toPlainText(line: string): string {
  return stripAnsi(line);
}

export class TranscriptFile {
  private constructor(readonly path: string) {}

  /**
   * Bind to the file at `path`, creating it empty when absent.
   * An existing file is reused as is and never truncated.
   */
  static bind(path: string): Result<TranscriptFile, BindFailure> {
    if (existsSync(path)) {
      try {
        if (!statSync(path).isFile()) {
          return err({ reason: 'NOT_A_FILE' });
        }
      } catch (error) {
        return err({ reason: 'CREATE_FAILED', cause: asError(error) });
      }
      return ok(new TranscriptFile(path));
    }

    try {
      writeFileSync(path, '', { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      return err({ reason: 'CREATE_FAILED', cause: asError(error) });
    }
    return ok(new TranscriptFile(path));
  }

  /**
   * Append one line, styles stripped and trailing whitespace trimmed.
   * The file must still exist; it is opened for append without create.
   */
  append(line: string): Result<void, ToolsetError> {
    const plain = toPlainText(line).trimEnd();
    let fd: number | undefined;
    try {
      fd = openSync(this.path, constants.O_WRONLY | constants.O_APPEND);
      writeSync(fd, `${plain}\n`, null, 'utf-8');
      return ok(undefined);
    } catch (error) {
      return err(toIoError(this.path, error));
    } finally {
      if (fd !== undefined) {
        closeSync(fd);
      }
    }
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
