/**
 * Name listing
 * Prints frameworks or tests, one name per line, to standard out.
 */

import { Named } from '../types/named';
import { MetadataProvider } from '../types/metadata';
import { OutputStream } from '../types/logger';
import { Result, ok } from '../types/result';
import { ToolsetError } from '../types/errors';

/**
 * Print each entry's name on its own line, or pass the error through
 */
export function printAll<T extends Named>(
  result: Result<T[], ToolsetError>,
  out: OutputStream = process.stdout
): Result<void, ToolsetError> {
  if (!result.ok) {
    return result;
  }
  for (const entry of result.value) {
    out.write(`${entry.getName()}\n`);
  }
  return ok(undefined);
}

/**
 * Print the name of every framework
 */
export function printAllFrameworks(
  metadata: MetadataProvider,
  out?: OutputStream
): Result<void, ToolsetError> {
  return printAll(metadata.listAllFrameworks(), out);
}

/**
 * Print the name of every test implementation
 */
export function printAllTests(
  metadata: MetadataProvider,
  out?: OutputStream
): Result<void, ToolsetError> {
  return printAll(metadata.listAllTests(), out);
}

/**
 * Print the tests carrying the given tag
 */
export function printAllTestsWithTag(
  metadata: MetadataProvider,
  tag: string,
  out?: OutputStream
): Result<void, ToolsetError> {
  return printAll(metadata.listTestsByTag(tag), out);
}

/**
 * Print the tests belonging to the given framework
 */
export function printAllTestsForFramework(
  metadata: MetadataProvider,
  frameworkName: string,
  out?: OutputStream
): Result<void, ToolsetError> {
  return printAll(metadata.listTestsForFramework(frameworkName), out);
}
