/**
 * Tests for readVerifications
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { readVerifications } from './read-verifications';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

describe('readVerifications', () => {
  let temp: TempDirContext;

  beforeEach(() => {
    temp = createTempDirContext();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('should read a list of outcomes', () => {
    const path = temp.writeJson('verifications.json', [
      { frameworkName: 'gemini', typeName: 'json', errors: [], warnings: [] },
      {
        frameworkName: 'gemini',
        typeName: 'plaintext',
        errors: [{ shortMessage: 'timeout', message: 'Request timed out after 15s' }],
      },
    ]);

    const result = readVerifications(path);

    expect(result).toEqual({
      ok: true,
      value: [
        { frameworkName: 'gemini', typeName: 'json', errors: [], warnings: [] },
        {
          frameworkName: 'gemini',
          typeName: 'plaintext',
          errors: [{ shortMessage: 'timeout', message: 'Request timed out after 15s' }],
          warnings: [],
        },
      ],
    });
  });

  it('should default a missing message to the short message', () => {
    const path = temp.writeJson('verifications.json', [
      { frameworkName: 'gemini', typeName: 'db', warnings: [{ shortMessage: 'slow' }] },
    ]);

    const result = readVerifications(path);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value[0].warnings).toEqual([{ shortMessage: 'slow', message: 'slow' }]);
    }
  });

  it('should return IO_ERROR for a missing file', () => {
    const path = join(temp.path, 'missing.json');

    const result = readVerifications(path);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('IO_ERROR');
      expect(result.error.path).toBe(path);
    }
  });

  it('should return INVALID_INPUT for malformed JSON', () => {
    const path = temp.writeFile('verifications.json', '[{');

    const result = readVerifications(path);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_INPUT');
      expect(result.error.message.startsWith(`Invalid verifications in ${path}: Invalid JSON: `)).toBe(true);
    }
  });

  it('should name the offending field', () => {
    const path = temp.writeJson('verifications.json', [{ frameworkName: 'gemini' }]);

    const result = readVerifications(path);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(`Invalid verifications in ${path}: 0.typeName: Required`);
    }
  });
});
