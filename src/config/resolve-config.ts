/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > environment variables > defaults
 */

import { resolve } from 'path';
import { Clock, SystemClock } from '../types/clock';
import { Environment, createSystemEnvironment } from '../types/environment';
import {
  ConfigKey,
  ConfigSource,
  DEFAULT_CONFIG,
  EffectiveConfig,
  FrameworkOrder,
  isFrameworkOrder,
} from '../types/effective-config';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  resultsDir?: string;
  quiet?: boolean;
  frameworkOrder?: FrameworkOrder;
  summaryFileName?: string;
}

/**
 * Environment variables read during resolution
 */
export const CONFIG_ENV_VARS = {
  resultsRoot: 'TFB_RESULTS_DIR',
  quiet: 'TFB_QUIET',
  frameworkOrder: 'TFB_FRAMEWORK_ORDER',
} as const;

/**
 * Parse a boolean environment value; unrecognized values are ignored
 */
export function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) {
    return false;
  }
  return undefined;
}

function parseEnvFrameworkOrder(value: string | undefined): FrameworkOrder | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return isFrameworkOrder(normalized) ? normalized : undefined;
}

function parseEnvPath(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value;
}

/**
 * Resolve configuration from all sources with explicit precedence
 * CLI flags > environment variables > defaults
 */
export function resolveConfig(
  cliFlags: CliFlags,
  environment: Environment = createSystemEnvironment(),
  clock: Clock = new SystemClock()
): EffectiveConfig {
  const sources: Partial<Record<ConfigKey, ConfigSource>> = {};

  // Helper to resolve a value with precedence
  function resolveValue<T>(key: ConfigKey, cli: T | undefined, env: T | undefined, defaultVal: T): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (env !== undefined) {
      sources[key] = 'env';
      return env;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const cwd = environment.cwd();

  return {
    schemaVersion: '1.0.0',
    paths: {
      resultsRoot: resolve(
        cwd,
        resolveValue(
          'resultsRoot',
          cliFlags.resultsDir,
          parseEnvPath(environment.getVar(CONFIG_ENV_VARS.resultsRoot)),
          DEFAULT_CONFIG.paths.resultsRoot
        )
      ),
      workingDirectory: cwd,
    },
    output: {
      quiet: resolveValue(
        'quiet',
        cliFlags.quiet,
        parseEnvBoolean(environment.getVar(CONFIG_ENV_VARS.quiet)),
        DEFAULT_CONFIG.output.quiet
      ),
      summaryFileName: resolveValue(
        'summaryFileName',
        cliFlags.summaryFileName,
        undefined,
        DEFAULT_CONFIG.output.summaryFileName
      ),
      frameworkOrder: resolveValue(
        'frameworkOrder',
        cliFlags.frameworkOrder,
        parseEnvFrameworkOrder(environment.getVar(CONFIG_ENV_VARS.frameworkOrder)),
        DEFAULT_CONFIG.output.frameworkOrder
      ),
    },
    resolvedAt: clock.iso(),
    sources,
  };
}
