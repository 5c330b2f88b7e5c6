/**
 * EffectiveConfig type
 * Centralized configuration object passed through the CLI
 */

/**
 * Order in which framework groups appear in the verification summary
 * - first-seen: order of each framework's first outcome
 * - name: sorted by framework name
 */
export type FrameworkOrder = 'first-seen' | 'name';

/**
 * Path configuration
 */
export interface PathConfig {
  /** Root under which timestamped results directories are created */
  resultsRoot: string;
  /** Working directory the CLI was started in */
  workingDirectory: string;
}

/**
 * Output configuration
 */
export interface OutputConfig {
  /** Suppress console output (transcripts are still written) */
  quiet: boolean;
  /** File name of the verification summary transcript */
  summaryFileName: string;
  /** Framework group ordering in the summary */
  frameworkOrder: FrameworkOrder;
}

/**
 * Where a configuration value came from
 */
export type ConfigSource = 'cli' | 'env' | 'default';

export interface EffectiveConfig {
  /** Version of the config schema */
  schemaVersion: '1.0.0';

  paths: PathConfig;

  output: OutputConfig;

  /** Timestamp when config was resolved (ISO 8601) */
  resolvedAt: string;

  /** Source of each resolved value (for debugging) */
  sources: Partial<Record<ConfigKey, ConfigSource>>;
}

export type ConfigKey = 'resultsRoot' | 'quiet' | 'summaryFileName' | 'frameworkOrder';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Pick<EffectiveConfig, 'schemaVersion' | 'output'> & {
  paths: Pick<PathConfig, 'resultsRoot'>;
} = {
  schemaVersion: '1.0.0',
  paths: {
    resultsRoot: 'results',
  },
  output: {
    quiet: false,
    summaryFileName: 'benchmark.txt',
    frameworkOrder: 'first-seen',
  },
};

export function isFrameworkOrder(value: string): value is FrameworkOrder {
  return value === 'first-seen' || value === 'name';
}
