/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

import { ExitCode, getExitCodeDescription } from '../types/exit-codes';

/** Get the usage text */
export function getUsageText(): string {
  const exitCodes = Object.values(ExitCode)
    .map((code) => `  ${code}  ${getExitCodeDescription(code)}`)
    .join('\n');

  return `Usage: tfb <command> [options]

Commands:
  --list-frameworks                   List every framework
  --list-tests                        List every test implementation
  --list-tag <tag>                    List the tests carrying a tag
  --list-tests-for <framework>        List the tests of a framework
  --report <verifications.json>       Print the verification summary and append it to benchmark.txt

Options:
  --test <name>                       Scope the report to a test's results subdirectory
  --results-dir <dir>                 Root for timestamped results directories (default: results)
  --sort-frameworks                   Sort framework groups in the summary by name
  -q, --quiet                         No console output; transcripts are still written
  -h, --help                          Show this help message
  -v, --version                       Show version number

Environment:
  TFB_HOME                            Framework benchmarks root (default: ~/.tfb, then the working directory)
  TFB_RESULTS_DIR                     Same as --results-dir
  TFB_QUIET                           Same as --quiet (1/true/yes/on)
  TFB_FRAMEWORK_ORDER                 first-seen or name

Exit codes:
${exitCodes}

Examples:
  tfb --list-frameworks
  tfb --list-tag broken
  tfb --list-tests-for gemini
  tfb --report verifications.json --sort-frameworks`;
}
