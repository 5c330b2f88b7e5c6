/**
 * File-system metadata provider
 * Walks `<tfb>/frameworks/<Language>/<Framework>/benchmark_config.json`.
 * The walk runs once per provider (or per scan() call) and is cached.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { MetadataProvider } from '../types/metadata';
import { Result, ok, err } from '../types/result';
import { ToolsetError, createToolsetError, toIoError } from '../types/errors';
import { BENCHMARK_CONFIG_FILE, BenchmarkConfig } from '../schemas/benchmark-config.schema';
import { parseBenchmarkConfig } from '../schemas/validators';
import { BenchmarkTest, Framework } from './entities';

/**
 * A parsed config together with where it was found
 */
interface DiscoveredConfig {
  language: string;
  directory: string;
  config: BenchmarkConfig;
}

/**
 * Sorted names of the subdirectories of `dir`
 */
function listDirectories(dir: string): Result<string[], ToolsetError> {
  try {
    return ok(
      readdirSync(dir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort()
    );
  } catch (error) {
    return err(toIoError(dir, error));
  }
}

function readConfig(configPath: string): Result<BenchmarkConfig, ToolsetError> {
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (error) {
    return err(toIoError(configPath, error));
  }

  const parsed = parseBenchmarkConfig(content);
  if (!parsed.success) {
    return err(
      createToolsetError(
        'INVALID_INPUT',
        configPath,
        `Invalid ${BENCHMARK_CONFIG_FILE} at ${configPath}: ${parsed.errors.join('; ')}`
      )
    );
  }
  return ok(parsed.data);
}

export class FilesystemMetadata implements MetadataProvider {
  private readonly frameworksDir: string;
  private cache: DiscoveredConfig[] | null = null;

  constructor(tfbDir: string) {
    this.frameworksDir = join(tfbDir, 'frameworks');
  }

  scan(): Result<void, ToolsetError> {
    const discovered = this.walk();
    if (!discovered.ok) {
      return discovered;
    }
    this.cache = discovered.value;
    return ok(undefined);
  }

  listAllFrameworks(): Result<Framework[], ToolsetError> {
    const discovered = this.discover();
    if (!discovered.ok) {
      return discovered;
    }
    return ok(
      discovered.value.map(
        ({ language, directory, config }) => new Framework(config.framework, language, directory)
      )
    );
  }

  listAllTests(): Result<BenchmarkTest[], ToolsetError> {
    const discovered = this.discover();
    if (!discovered.ok) {
      return discovered;
    }

    const tests: BenchmarkTest[] = [];
    for (const { language, config } of discovered.value) {
      for (const entry of config.tests) {
        for (const [key, testConfig] of Object.entries(entry)) {
          tests.push(new BenchmarkTest(config.framework, language, key, testConfig));
        }
      }
    }
    return ok(tests);
  }

  listTestsByTag(tag: string): Result<BenchmarkTest[], ToolsetError> {
    return this.filterTests((test) => test.hasTag(tag));
  }

  listTestsForFramework(frameworkName: string): Result<BenchmarkTest[], ToolsetError> {
    return this.filterTests((test) => test.frameworkName === frameworkName);
  }

  private filterTests(
    predicate: (test: BenchmarkTest) => boolean
  ): Result<BenchmarkTest[], ToolsetError> {
    const tests = this.listAllTests();
    if (!tests.ok) {
      return tests;
    }
    return ok(tests.value.filter(predicate));
  }

  private discover(): Result<DiscoveredConfig[], ToolsetError> {
    if (this.cache !== null) {
      return ok(this.cache);
    }
    const discovered = this.walk();
    if (discovered.ok) {
      this.cache = discovered.value;
    }
    return discovered;
  }

  /**
   * Every framework directory holding a config, by language then directory name
   */
  private walk(): Result<DiscoveredConfig[], ToolsetError> {
    const languages = listDirectories(this.frameworksDir);
    if (!languages.ok) {
      return languages;
    }

    const discovered: DiscoveredConfig[] = [];
    for (const language of languages.value) {
      const languageDir = join(this.frameworksDir, language);
      const frameworkDirs = listDirectories(languageDir);
      if (!frameworkDirs.ok) {
        return frameworkDirs;
      }

      for (const frameworkDir of frameworkDirs.value) {
        const directory = join(languageDir, frameworkDir);
        const configPath = join(directory, BENCHMARK_CONFIG_FILE);
        if (!existsSync(configPath)) {
          continue;
        }

        const config = readConfig(configPath);
        if (!config.ok) {
          return config;
        }
        discovered.push({ language, directory, config: config.value });
      }
    }
    return ok(discovered);
  }
}

/**
 * Metadata provider over the given framework benchmarks root
 */
export function createFilesystemMetadata(tfbDir: string): MetadataProvider {
  return new FilesystemMetadata(tfbDir);
}
