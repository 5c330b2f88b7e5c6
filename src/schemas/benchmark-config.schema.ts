/**
 * benchmark_config.json schema
 * Each framework directory declares its test implementations in one of these.
 */

/**
 * One test implementation entry under `tests[n].<key>`
 */
export interface BenchmarkTestConfig {
  approach?: string;
  classification?: string;
  database?: string;
  framework?: string;
  language?: string;
  flavor?: string;
  orm?: string;
  platform?: string;
  webserver?: string;
  os?: string;
  database_os?: string;
  display_name?: string;
  notes?: string;
  versus?: string;
  port?: number;
  /** Free-form labels, e.g. `broken` */
  tags: string[];
  json_url?: string;
  plaintext_url?: string;
  db_url?: string;
  query_url?: string;
  fortune_url?: string;
  update_url?: string;
  cached_query_url?: string;
}

export interface BenchmarkConfig {
  /** Framework name shared by every test in the file */
  framework: string;
  /** Test entries keyed by test name; `default` names the framework's main test */
  tests: Array<Record<string, BenchmarkTestConfig>>;
}

/**
 * Test type name for each URL key a test may declare
 */
export const TEST_TYPE_URL_KEYS = {
  json: 'json_url',
  plaintext: 'plaintext_url',
  db: 'db_url',
  query: 'query_url',
  fortune: 'fortune_url',
  update: 'update_url',
  'cached-query': 'cached_query_url',
} as const satisfies Record<string, keyof BenchmarkTestConfig>;

export const BENCHMARK_CONFIG_FILE = 'benchmark_config.json';

/**
 * Example config, used in docs and tests
 */
export const exampleBenchmarkConfig: BenchmarkConfig = {
  framework: 'gemini',
  tests: [
    {
      default: {
        json_url: '/json',
        plaintext_url: '/plaintext',
        port: 8080,
        approach: 'Realistic',
        language: 'Java',
        tags: [],
      },
      postgres: {
        db_url: '/db',
        query_url: '/query?queries=',
        port: 8080,
        approach: 'Realistic',
        database: 'Postgres',
        tags: ['broken'],
      },
    },
  ],
};
