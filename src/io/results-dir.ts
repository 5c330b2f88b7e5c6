/**
 * Results directory creation
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import { Clock, SystemClock } from '../types/clock';
import { Result, ok, err } from '../types/result';
import { ToolsetError, toIoError } from '../types/errors';

/**
 * UTC timestamp in YYYYMMDDHHMMSS form
 */
export function formatResultsTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/**
 * Create `<root>/<timestamp>/` for this run and return its path
 */
export function createResultsDir(
  clock: Clock = new SystemClock(),
  root: string = 'results'
): Result<string, ToolsetError> {
  const resultsDir = join(root, formatResultsTimestamp(clock.now()));
  try {
    mkdirSync(resultsDir, { recursive: true });
  } catch (error) {
    return err(toIoError(resultsDir, error));
  }
  return ok(resultsDir);
}
