/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export { ok, err, isOk, isErr, andThen } from './result';
export type { Result, Ok, Err } from './result';

// Errors and exit codes
export { createToolsetError, toIoError, formatToolsetError } from './errors';
export type { ToolsetError, ToolsetErrorCode } from './errors';
export { ExitCode, getExitCodeDescription, exitCodeForError } from './exit-codes';

// Clock interface
export { SystemClock, MockClock } from './clock';
export type { Clock } from './clock';

// Environment interface
export { SystemEnvironment, StaticEnvironment, createSystemEnvironment } from './environment';
export type { Environment, StaticEnvironmentOptions } from './environment';

// Logger shapes
export type {
  OutputStream,
  Styles,
  Displayable,
  ScopeSkipReason,
  ScopeStatus,
  LoggerOptions,
} from './logger';

// Metadata and verification
export type { Named } from './named';
export type { FrameworkInfo, TestInfo, MetadataProvider } from './metadata';
export { getVerificationStatus } from './verification';
export type { Verification, VerificationMessage, VerificationStatus } from './verification';

// Effective config types
export { DEFAULT_CONFIG, isFrameworkOrder } from './effective-config';
export type {
  EffectiveConfig,
  FrameworkOrder,
  PathConfig,
  OutputConfig,
  ConfigSource,
  ConfigKey,
} from './effective-config';
