/**
 * Verification outcome types
 * Produced by the verification engine, consumed read-only by the reporter.
 */

/**
 * One error or warning raised while verifying a test type
 */
export interface VerificationMessage {
  /** Full human-readable description */
  message: string;
  /** One-line summary shown in the verification report */
  shortMessage: string;
}

/**
 * Result of verifying one test type of one framework
 */
export interface Verification {
  /** Grouping key in the report */
  frameworkName: string;
  /** Test type verified (json, plaintext, db, ...) */
  typeName: string;
  errors: VerificationMessage[];
  warnings: VerificationMessage[];
}

export type VerificationStatus = 'ERROR' | 'WARN' | 'PASS';

/**
 * Status of an outcome: errors win over warnings, PASS only when both are empty
 */
export function getVerificationStatus(verification: Verification): VerificationStatus {
  if (verification.errors.length > 0) {
    return 'ERROR';
  }
  if (verification.warnings.length > 0) {
    return 'WARN';
  }
  return 'PASS';
}
