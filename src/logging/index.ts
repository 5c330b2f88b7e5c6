/**
 * Logging module - console + transcript logger and the verification summary
 */

export { Logger, createLogger, createPrefixedLogger, createDirLogger } from './logger';
export { TranscriptFile, toPlainText } from './transcript-file';
export type { BindFailure } from './transcript-file';

export {
  SUMMARY_FILE_NAME,
  groupByFramework,
  formatVerificationLine,
  formatSummaryLines,
  reportVerifications,
} from './verification-report';
export type { ReportOptions } from './verification-report';
