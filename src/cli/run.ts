/**
 * CLI Runner
 *
 * Executes a parsed command and maps its outcome to an exit code
 */

import chalk from 'chalk';
import { parseArgs } from './arg-parser';
import { getUsageText } from './help';
import { VERSION } from './version';
import { CliCommand, ParsedArgs } from './types';
import { resolveConfig } from '../config/resolve-config';
import { Clock, SystemClock } from '../types/clock';
import { Environment, createSystemEnvironment } from '../types/environment';
import { ExitCode, exitCodeForError } from '../types/exit-codes';
import { ToolsetError, formatToolsetError } from '../types/errors';
import { OutputStream, ScopeStatus, Styles } from '../types/logger';
import { MetadataProvider } from '../types/metadata';
import { EffectiveConfig } from '../types/effective-config';
import { Result, ok, andThen } from '../types/result';
import { getTfbDir } from '../io/tfb-dir';
import { createResultsDir } from '../io/results-dir';
import { readVerifications } from '../io/read-verifications';
import {
  printAllFrameworks,
  printAllTests,
  printAllTestsForFramework,
  printAllTestsWithTag,
} from '../io/print-names';
import { createFilesystemMetadata } from '../metadata/filesystem-metadata';
import { createDirLogger } from '../logging/logger';
import { reportVerifications } from '../logging/verification-report';
import { SpinnerService, createSpinnerService } from '../ui/spinner-service';

/**
 * Injectable collaborators; defaults are the real process and filesystem
 */
export interface CliDependencies {
  environment?: Environment;
  clock?: Clock;
  stdout?: OutputStream;
  stderr?: OutputStream;
  styles?: Styles;
  spinners?: SpinnerService;
  createMetadata?: (tfbDir: string) => MetadataProvider;
}

interface CommandContext {
  config: EffectiveConfig;
  environment: Environment;
  clock: Clock;
  stdout: OutputStream;
  stderr: OutputStream;
  styles: Styles;
  spinners: SpinnerService;
  createMetadata: (tfbDir: string) => MetadataProvider;
}

type ListCommand = Extract<
  CliCommand,
  { kind: 'list-frameworks' | 'list-tests' | 'list-tag' | 'list-tests-for' }
>;

/**
 * Resolve the root, scan its metadata, then print the requested names
 */
function runListing(command: ListCommand, context: CommandContext): Result<void, ToolsetError> {
  return andThen(getTfbDir(context.environment), (tfbDir): Result<void, ToolsetError> => {
    const metadata = context.createMetadata(tfbDir);

    const spinner = context.spinners.start('Scanning framework configurations');
    const scanned = metadata.scan();
    if (!scanned.ok) {
      spinner.fail('Could not read framework configurations');
      return scanned;
    }
    spinner.stop();

    switch (command.kind) {
      case 'list-frameworks':
        return printAllFrameworks(metadata, context.stdout);
      case 'list-tests':
        return printAllTests(metadata, context.stdout);
      case 'list-tag':
        return printAllTestsWithTag(metadata, command.tag, context.stdout);
      case 'list-tests-for':
        return printAllTestsForFramework(metadata, command.framework, context.stdout);
    }
  });
}

/**
 * Render the verification summary into a fresh results directory
 */
function runReport(
  verificationsFile: string,
  testName: string | null,
  context: CommandContext
): Result<ScopeStatus, ToolsetError> {
  return andThen(readVerifications(verificationsFile), (verifications) =>
    andThen(createResultsDir(context.clock, context.config.paths.resultsRoot), (resultsDir) => {
      const logger = createDirLogger(resultsDir, {
        quiet: context.config.output.quiet,
        stdout: context.stdout,
        styles: context.styles,
      });
      if (testName !== null) {
        logger.setTest(testName);
      }
      return reportVerifications(verifications, logger, {
        fileName: context.config.output.summaryFileName,
        frameworkOrder: context.config.output.frameworkOrder,
      });
    })
  );
}

function runCommand(args: ParsedArgs, context: CommandContext): Result<void, ToolsetError> {
  const { command } = args;
  switch (command.kind) {
    case 'none':
      return ok(undefined);
    case 'report':
      return andThen(runReport(command.verificationsFile, args.testName, context), (binding) => {
        if (!binding.applied && binding.reason !== 'NO_LOG_DIR') {
          const where = binding.path !== undefined ? `: ${binding.path}` : '';
          context.stderr.write(
            `${context.styles.yellow(`Warning: summary transcript not written (${binding.reason}${where})`)}\n`
          );
        }
        return ok(undefined);
      });
    default:
      return runListing(command, context);
  }
}

/**
 * Run the CLI with the given argv (including node and script path)
 */
export function runCli(argv: string[], deps: CliDependencies = {}): ExitCode {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const styles = deps.styles ?? chalk;

  const parsed = parseArgs(argv);
  if (!parsed.success || !parsed.args) {
    stderr.write(`${parsed.error ?? 'Error: Invalid arguments'}\n\n${getUsageText()}\n`);
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;
  if (args.help) {
    stdout.write(`${getUsageText()}\n`);
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    stdout.write(`${VERSION}\n`);
    return ExitCode.SUCCESS;
  }
  if (args.command.kind === 'none') {
    stderr.write(`Error: No command given\n\n${getUsageText()}\n`);
    return ExitCode.USAGE_ERROR;
  }

  const environment = deps.environment ?? createSystemEnvironment();
  const clock = deps.clock ?? new SystemClock();
  const config = resolveConfig(
    {
      resultsDir: args.resultsDir ?? undefined,
      quiet: args.quiet ? true : undefined,
      frameworkOrder: args.sortFrameworks ? 'name' : undefined,
    },
    environment,
    clock
  );

  const context: CommandContext = {
    config,
    environment,
    clock,
    stdout,
    stderr,
    styles,
    spinners: deps.spinners ?? createSpinnerService({ quiet: config.output.quiet }),
    createMetadata: deps.createMetadata ?? createFilesystemMetadata,
  };

  try {
    const outcome = runCommand(args, context);
    if (!outcome.ok) {
      stderr.write(`${styles.red(formatToolsetError(outcome.error))}\n`);
      return exitCodeForError(outcome.error);
    }
    return ExitCode.SUCCESS;
  } catch (error) {
    stderr.write(
      `${styles.red(`Error: ${error instanceof Error ? error.message : String(error)}`)}\n`
    );
    return ExitCode.UNEXPECTED_ERROR;
  }
}
