/**
 * Framework benchmarks root resolution
 */

import { join } from 'path';
import { Environment, createSystemEnvironment } from '../types/environment';
import { Result, ok, err } from '../types/result';
import { ToolsetError, createToolsetError } from '../types/errors';

/** Environment variable naming the framework benchmarks root */
export const TFB_HOME_VAR = 'TFB_HOME';

/**
 * Pick the candidate root: TFB_HOME when set, else `~/.tfb` when it exists,
 * else the current working directory.
 */
export function resolveTfbCandidate(environment: Environment): string {
  const tfbHome = environment.getVar(TFB_HOME_VAR);
  if (tfbHome !== undefined) {
    return tfbHome;
  }

  const homeDir = environment.homeDir();
  if (homeDir !== undefined) {
    const dotTfb = join(homeDir, '.tfb');
    if (environment.exists(dotTfb)) {
      return dotTfb;
    }
  }

  return environment.cwd();
}

/**
 * Get the framework benchmarks root for the running context.
 * Fails with INVALID_TFB_DIR when the root has no `frameworks` directory.
 */
export function getTfbDir(
  environment: Environment = createSystemEnvironment()
): Result<string, ToolsetError> {
  const tfbDir = resolveTfbCandidate(environment);
  if (!environment.isDirectory(join(tfbDir, 'frameworks'))) {
    return err(createToolsetError('INVALID_TFB_DIR', tfbDir));
  }
  return ok(tfbDir);
}
