/**
 * Verification summary
 * Groups verification outcomes by framework and renders the column-aligned
 * summary block through a Logger, so it reaches both the console and the
 * run's transcript.
 */

import { Result, ok, isErr } from '../types/result';
import { ToolsetError } from '../types/errors';
import { ScopeStatus, Styles } from '../types/logger';
import { FrameworkOrder } from '../types/effective-config';
import { Verification, getVerificationStatus } from '../types/verification';
import { Logger } from './logger';

/** Transcript file the summary is appended to */
export const SUMMARY_FILE_NAME = 'benchmark.txt';

const RULE_WIDTH = 79;
const BAR_WIDTH = 8;
const TYPE_WIDTH = 13;
const STATUS_WIDTH = 5;

export interface ReportOptions {
  /** Transcript file name inside the logger's directory */
  fileName?: string;
  frameworkOrder?: FrameworkOrder;
}

/**
 * Group outcomes by framework. Within a group, outcomes keep the order they
 * were supplied in.
 */
export function groupByFramework(
  verifications: readonly Verification[],
  order: FrameworkOrder = 'first-seen'
): Map<string, Verification[]> {
  const groups = new Map<string, Verification[]>();
  for (const verification of verifications) {
    const group = groups.get(verification.frameworkName);
    if (group) {
      group.push(verification);
    } else {
      groups.set(verification.frameworkName, [verification]);
    }
  }

  if (order === 'name') {
    const sorted = [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return new Map(sorted);
  }
  return groups;
}

/**
 * One summary line for an outcome. Only the first error (or warning) is shown;
 * the full detail lives in the test's own transcript.
 */
export function formatVerificationLine(verification: Verification, styles: Styles): string {
  const lead = `${styles.cyan('|'.padEnd(BAR_WIDTH))}${styles.cyan(verification.typeName.padEnd(TYPE_WIDTH))}: `;

  switch (getVerificationStatus(verification)) {
    case 'ERROR':
      return `${lead}${styles.red('ERROR'.padEnd(STATUS_WIDTH))} - ${verification.errors[0].shortMessage}`;
    case 'WARN':
      return `${lead}${styles.yellow('WARN'.padEnd(STATUS_WIDTH))} - ${verification.warnings[0].shortMessage}`;
    case 'PASS':
      return `${lead}${styles.green('PASS')}`;
  }
}

/**
 * Render the whole summary block, one entry per line
 */
export function formatSummaryLines(groups: Map<string, Verification[]>, styles: Styles): string[] {
  const border = styles.cyan('='.repeat(RULE_WIDTH));
  const lines = [border, styles.cyan('Verification Summary'), styles.cyan('-'.repeat(RULE_WIDTH))];

  for (const [frameworkName, verifications] of groups) {
    lines.push(`${styles.cyan('|')} ${styles.cyan(frameworkName)}`);
    for (const verification of verifications) {
      lines.push(formatVerificationLine(verification, styles));
    }
  }

  lines.push(border);
  return lines;
}

/**
 * Produce user-consumable output for the given verifications.
 *
 * The summary is written through a fork of `logger` bound to `benchmark.txt`
 * in the logger's directory; without a directory it goes to the console only.
 * Returns how the transcript binding went. Stops at the first write failure.
 */
export function reportVerifications(
  verifications: readonly Verification[],
  logger: Logger,
  options: ReportOptions = {}
): Result<ScopeStatus, ToolsetError> {
  const summaryLogger = logger.fork();
  const binding = summaryLogger.setLogFile(options.fileName ?? SUMMARY_FILE_NAME);

  const groups = groupByFramework(verifications, options.frameworkOrder);
  for (const line of formatSummaryLines(groups, summaryLogger.styles)) {
    const written = summaryLogger.log(line);
    if (isErr(written)) {
      return written;
    }
  }

  return ok(binding);
}
