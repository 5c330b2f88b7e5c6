import { readFileSync } from 'fs';
import { Verification } from '../types/verification';
import { Result, ok, err } from '../types/result';
import { ToolsetError, createToolsetError, toIoError } from '../types/errors';
import { parseVerifications } from '../schemas/validators';

/**
 * Read verification outcomes from a JSON file
 * @param filePath - JSON array of outcomes (frameworkName, typeName, errors, warnings)
 */
export function readVerifications(filePath: string): Result<Verification[], ToolsetError> {
  let fileContent: string;
  try {
    fileContent = readFileSync(filePath, 'utf-8');
  } catch (error) {
    return err(toIoError(filePath, error));
  }

  const parsed = parseVerifications(fileContent);
  if (!parsed.success) {
    return err(
      createToolsetError(
        'INVALID_INPUT',
        filePath,
        `Invalid verifications in ${filePath}: ${parsed.errors.join('; ')}`
      )
    );
  }
  return ok(parsed.data);
}
