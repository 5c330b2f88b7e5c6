/**
 * Framework and test entities discovered from benchmark_config.json files
 */

import { FrameworkInfo, TestInfo } from '../types/metadata';
import { BenchmarkTestConfig, TEST_TYPE_URL_KEYS } from '../schemas/benchmark-config.schema';

export class Framework implements FrameworkInfo {
  constructor(
    readonly name: string,
    readonly language: string,
    readonly directory: string
  ) {}

  getName(): string {
    return this.name;
  }
}

export class BenchmarkTest implements TestInfo {
  readonly name: string;
  readonly tags: readonly string[];
  readonly testTypes: readonly string[];

  constructor(
    readonly frameworkName: string,
    readonly language: string,
    key: string,
    config: BenchmarkTestConfig
  ) {
    this.name = getTestName(frameworkName, key);
    this.tags = [...config.tags];
    this.testTypes = Object.entries(TEST_TYPE_URL_KEYS)
      .filter(([, urlKey]) => config[urlKey] !== undefined)
      .map(([testType]) => testType);
  }

  getName(): string {
    return this.name;
  }

  hasTag(tag: string): boolean {
    return this.tags.includes(tag);
  }
}

/**
 * `default` is the framework's main test and takes the framework's name;
 * any other key is appended: `<framework>-<key>`.
 */
export function getTestName(frameworkName: string, key: string): string {
  return key === 'default' ? frameworkName : `${frameworkName}-${key}`;
}
