/**
 * Tests for the CLI runner
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import chalk from 'chalk';
import { runCli, CliDependencies } from './run';
import { ExitCode } from '../types/exit-codes';
import { MockClock } from '../types/clock';
import { StaticEnvironment } from '../types/environment';
import { createSpinnerService } from '../ui/spinner-service';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';
import { createCaptureStream, CapturedStream } from '../../tests/utils/capture-stream';

const TIMESTAMP = '20200619191252';

const summary = [
  '='.repeat(79),
  'Verification Summary',
  '-'.repeat(79),
  '| gemini',
  '|       json         : PASS',
  '|       plaintext    : ERROR - timeout',
  '='.repeat(79),
];

describe('runCli', () => {
  let temp: TempDirContext;
  let stdout: CapturedStream;
  let stderr: CapturedStream;

  function deps(vars: Record<string, string> = {}): CliDependencies {
    return {
      environment: new StaticEnvironment({
        vars,
        cwd: temp.path,
        directories: [temp.path, join(temp.path, 'frameworks')],
      }),
      clock: new MockClock(new Date('2020-06-19T19:12:52.000Z')),
      stdout,
      stderr,
      styles: new chalk.Instance({ level: 0 }),
      spinners: createSpinnerService({ isTTY: false }),
    };
  }

  function run(args: string[], vars?: Record<string, string>): ExitCode {
    return runCli(['node', 'tfb', ...args], deps(vars));
  }

  beforeEach(() => {
    temp = createTempDirContext();
    stdout = createCaptureStream();
    stderr = createCaptureStream();
    temp.writeJson('frameworks/Java/gemini/benchmark_config.json', {
      framework: 'gemini',
      tests: [{ default: { json_url: '/json' }, postgres: { db_url: '/db', tags: ['broken'] } }],
    });
    temp.writeJson('frameworks/Go/fasthttp/benchmark_config.json', {
      framework: 'fasthttp',
      tests: [{ default: { plaintext_url: '/plaintext', tags: ['broken'] } }],
    });
    temp.writeJson('verifications.json', [
      { frameworkName: 'gemini', typeName: 'json' },
      { frameworkName: 'gemini', typeName: 'plaintext', errors: [{ shortMessage: 'timeout' }] },
    ]);
  });

  afterEach(() => {
    temp.cleanup();
  });

  describe('usage', () => {
    it('should print help', () => {
      expect(run(['--help'])).toBe(ExitCode.SUCCESS);
      expect(stdout.lines()[0]).toBe('Usage: tfb <command> [options]');
    });

    it('should print the version', () => {
      expect(run(['--version'])).toBe(ExitCode.SUCCESS);
      expect(stdout.text).toBe('0.1.0\n');
    });

    it('should require a command', () => {
      expect(run([])).toBe(ExitCode.USAGE_ERROR);
      expect(stderr.lines().slice(0, 3)).toEqual([
        'Error: No command given',
        '',
        'Usage: tfb <command> [options]',
      ]);
    });

    it('should report a parse error with usage', () => {
      expect(run(['--nope'])).toBe(ExitCode.USAGE_ERROR);
      expect(stderr.lines()[0]).toBe('Error: Unknown option: --nope');
      expect(stdout.text).toBe('');
    });
  });

  describe('listings', () => {
    it('should list frameworks', () => {
      expect(run(['--list-frameworks'])).toBe(ExitCode.SUCCESS);
      expect(stdout.text).toBe('fasthttp\ngemini\n');
      expect(stderr.text).toBe('');
    });

    it('should list tests', () => {
      expect(run(['--list-tests'])).toBe(ExitCode.SUCCESS);
      expect(stdout.lines()).toEqual(['fasthttp', 'gemini', 'gemini-postgres']);
    });

    it('should list tests by tag', () => {
      expect(run(['--list-tag', 'broken'])).toBe(ExitCode.SUCCESS);
      expect(stdout.lines()).toEqual(['fasthttp', 'gemini-postgres']);
    });

    it('should list tests for a framework', () => {
      expect(run(['--list-tests-for=gemini'])).toBe(ExitCode.SUCCESS);
      expect(stdout.lines()).toEqual(['gemini', 'gemini-postgres']);
    });

    it('should fail on a root without a frameworks directory', () => {
      expect(run(['--list-frameworks'], { TFB_HOME: '/nowhere' })).toBe(ExitCode.INVALID_TFB_DIR);
      expect(stderr.text).toBe(
        'Error: Invalid framework benchmarks directory: /nowhere has no frameworks directory\n'
      );
      expect(stdout.text).toBe('');
    });

    it('should fail on a malformed config', () => {
      temp.writeFile('frameworks/Java/broken/benchmark_config.json', '{');

      expect(run(['--list-tests'])).toBe(ExitCode.INVALID_INPUT);
      expect(stdout.text).toBe('');
    });
  });

  describe('report', () => {
    it('should print the summary and write it to the results directory', () => {
      expect(run(['--report', join(temp.path, 'verifications.json')])).toBe(ExitCode.SUCCESS);

      expect(stdout.lines()).toEqual(summary);
      expect(temp.readFile(join('results', TIMESTAMP, 'benchmark.txt'))).toBe(`${summary.join('\n')}\n`);
      expect(stderr.text).toBe('');
    });

    it('should scope the report to a test', () => {
      expect(run(['--report', join(temp.path, 'verifications.json'), '--test', 'gemini'])).toBe(
        ExitCode.SUCCESS
      );

      expect(stdout.lines()[0]).toBe(`gemini: ${'='.repeat(79)}`);
      expect(temp.readFile(join('results', TIMESTAMP, 'gemini', 'benchmark.txt'))).toBe(
        `${summary.join('\n')}\n`
      );
    });

    it('should write only the transcript when quiet', () => {
      expect(run(['-q', '--report', join(temp.path, 'verifications.json')])).toBe(ExitCode.SUCCESS);

      expect(stdout.text).toBe('');
      expect(temp.exists(join('results', TIMESTAMP, 'benchmark.txt'))).toBe(true);
    });

    it('should read quiet and the results root from the environment', () => {
      const code = run(['--report', join(temp.path, 'verifications.json')], {
        TFB_QUIET: 'yes',
        TFB_RESULTS_DIR: 'from-env',
      });

      expect(code).toBe(ExitCode.SUCCESS);
      expect(stdout.text).toBe('');
      expect(temp.exists(join('from-env', TIMESTAMP, 'benchmark.txt'))).toBe(true);
    });

    it('should resolve --results-dir against the working directory', () => {
      run(['--report', join(temp.path, 'verifications.json'), '--results-dir', 'out']);

      expect(temp.list('out')).toEqual([TIMESTAMP]);
    });

    it('should sort frameworks on request', () => {
      temp.writeJson('verifications.json', [
        { frameworkName: 'servlet', typeName: 'json' },
        { frameworkName: 'gemini', typeName: 'json' },
      ]);

      run(['--report', join(temp.path, 'verifications.json'), '--sort-frameworks']);

      expect(stdout.lines().filter((line) => /^\| \S/.test(line))).toEqual(['| gemini', '| servlet']);
    });

    it('should warn when the transcript cannot be bound', () => {
      const blocked = temp.mkdir(join('results', TIMESTAMP, 'benchmark.txt'));

      expect(run(['--report', join(temp.path, 'verifications.json')])).toBe(ExitCode.SUCCESS);

      expect(stdout.lines()).toEqual(summary);
      expect(stderr.text).toBe(`Warning: summary transcript not written (NOT_A_FILE: ${blocked})\n`);
    });

    it('should fail on a missing verifications file', () => {
      expect(run(['--report', join(temp.path, 'missing.json')])).toBe(ExitCode.IO_ERROR);
      expect(temp.exists('results')).toBe(false);
    });

    it('should fail on malformed verifications', () => {
      const path = temp.writeJson('verifications.json', [{ typeName: 'json' }]);

      expect(run(['--report', path])).toBe(ExitCode.INVALID_INPUT);
      expect(stderr.text).toBe(`Error: Invalid verifications in ${path}: 0.frameworkName: Required\n`);
    });

    it('should fail when the results root is a file', () => {
      temp.writeFile('results', 'not a directory');

      expect(run(['--report', join(temp.path, 'verifications.json')])).toBe(ExitCode.IO_ERROR);
      expect(stdout.text).toBe('');
    });
  });
});
