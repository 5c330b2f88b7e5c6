/**
 * Metadata provider interface
 * Lists the frameworks and tests known to a framework benchmarks checkout.
 */

import { Named } from './named';
import { Result } from './result';
import { ToolsetError } from './errors';

/**
 * A framework: a group of tests sharing an implementation stack
 */
export interface FrameworkInfo extends Named {
  readonly name: string;
  readonly language: string;
  /** Directory holding the framework's benchmark_config.json */
  readonly directory: string;
}

/**
 * A single test implementation within a framework
 */
export interface TestInfo extends Named {
  readonly name: string;
  readonly frameworkName: string;
  readonly language: string;
  readonly tags: readonly string[];
  /** Test types this implementation declares a URL for (json, plaintext, ...) */
  readonly testTypes: readonly string[];
}

export interface MetadataProvider {
  /**
   * Load (or reload) the metadata; list calls load on first use otherwise
   */
  scan(): Result<void, ToolsetError>;
  listAllFrameworks(): Result<FrameworkInfo[], ToolsetError>;
  listAllTests(): Result<TestInfo[], ToolsetError>;
  listTestsByTag(tag: string): Result<TestInfo[], ToolsetError>;
  listTestsForFramework(frameworkName: string): Result<TestInfo[], ToolsetError>;
}
