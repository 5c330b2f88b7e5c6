/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { CliCommand, ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';

type ArgValue = { value: string; skip: number } | { error: string };

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): ArgValue {
  const arg = args[index];

  // Check for --arg=value format
  const equalsIndex = arg.indexOf('=');
  if (equalsIndex !== -1) {
    const value = arg.slice(equalsIndex + 1);
    if (!value) {
      return { error: `${argName}= requires a value` };
    }
    return { value, skip: 0 };
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (!nextArg || nextArg.startsWith('--')) {
    return { error: `${argName} requires a value` };
  }
  return { value: nextArg, skip: 1 };
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };

  // Only one command may be given
  const setCommand = (command: CliCommand, flag: string): string | null => {
    if (result.command.kind !== 'none') {
      return `Error: ${flag} cannot be combined with another command`;
    }
    result.command = command;
    return null;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0]; // Get the base argument name

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--list-frameworks': {
        const conflict = setCommand({ kind: 'list-frameworks' }, argBase);
        if (conflict) return { success: false, error: conflict };
        break;
      }

      case '--list-tests': {
        const conflict = setCommand({ kind: 'list-tests' }, argBase);
        if (conflict) return { success: false, error: conflict };
        break;
      }

      case '--list-tag': {
        const parsed = getArgValue(args, i, '--list-tag');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        const conflict = setCommand({ kind: 'list-tag', tag: parsed.value }, argBase);
        if (conflict) return { success: false, error: conflict };
        i += parsed.skip;
        break;
      }

      case '--list-tests-for': {
        const parsed = getArgValue(args, i, '--list-tests-for');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        const conflict = setCommand({ kind: 'list-tests-for', framework: parsed.value }, argBase);
        if (conflict) return { success: false, error: conflict };
        i += parsed.skip;
        break;
      }

      case '--report': {
        const parsed = getArgValue(args, i, '--report');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        const conflict = setCommand({ kind: 'report', verificationsFile: parsed.value }, argBase);
        if (conflict) return { success: false, error: conflict };
        i += parsed.skip;
        break;
      }

      case '--test': {
        const parsed = getArgValue(args, i, '--test');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        result.testName = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--results-dir': {
        const parsed = getArgValue(args, i, '--results-dir');
        if ('error' in parsed) return { success: false, error: `Error: ${parsed.error}` };
        result.resultsDir = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--quiet':
      case '-q': {
        result.quiet = true;
        break;
      }

      case '--sort-frameworks': {
        result.sortFrameworks = true;
        break;
      }

      default: {
        if (arg.startsWith('-')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        return { success: false, error: `Error: Unexpected argument: ${arg}` };
      }
    }
  }

  if (result.testName !== null && result.command.kind !== 'report') {
    return { success: false, error: 'Error: --test can only be used with --report' };
  }

  return { success: true, args: result };
}
