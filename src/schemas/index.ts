/**
 * Export benchmark config schema
 */
export {
  TEST_TYPE_URL_KEYS,
  BENCHMARK_CONFIG_FILE,
  exampleBenchmarkConfig,
} from './benchmark-config.schema';
export type { BenchmarkConfig, BenchmarkTestConfig } from './benchmark-config.schema';

/**
 * Export validators
 */
export {
  validateBenchmarkConfig,
  parseBenchmarkConfig,
  validateVerifications,
  parseVerifications,
} from './validators';
export type { ValidationResult } from './validators';
