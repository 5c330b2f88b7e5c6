/**
 * CLI Module
 *
 * Exports for argument parsing and the command runner
 */

export { parseArgs } from './arg-parser';
export { getUsageText } from './help';
export { runCli } from './run';
export type { CliDependencies } from './run';
export type { CliCommand, ParsedArgs, ParseResult } from './types';
export { DEFAULT_ARGS } from './types';
export { VERSION } from './version';
