/**
 * Tests for results directory creation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { createResultsDir, formatResultsTimestamp } from './results-dir';
import { MockClock } from '../types/clock';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

describe('formatResultsTimestamp', () => {
  it('should format as UTC YYYYMMDDHHMMSS', () => {
    expect(formatResultsTimestamp(new Date('2020-06-19T19:12:52.345Z'))).toBe('20200619191252');
  });

  it('should zero-pad every field', () => {
    expect(formatResultsTimestamp(new Date('2021-01-02T03:04:05.000Z'))).toBe('20210102030405');
  });
});

describe('createResultsDir', () => {
  let temp: TempDirContext;
  const clock = new MockClock(new Date('2020-06-19T19:12:52.000Z'));

  beforeEach(() => {
    temp = createTempDirContext();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it('should create the timestamped directory under the root', () => {
    const result = createResultsDir(clock, join(temp.path, 'results'));

    expect(result).toEqual({ ok: true, value: join(temp.path, 'results', '20200619191252') });
    expect(temp.exists(join('results', '20200619191252'))).toBe(true);
  });

  it('should succeed when the directory already exists', () => {
    temp.mkdir(join('results', '20200619191252'));

    expect(createResultsDir(clock, join(temp.path, 'results')).ok).toBe(true);
  });

  it('should create one directory per distinct second', () => {
    const ticking = new MockClock(new Date('2020-06-19T19:12:52.000Z'));
    const root = join(temp.path, 'results');

    createResultsDir(ticking, root);
    ticking.advance(1000);
    createResultsDir(ticking, root);

    expect(temp.list('results')).toEqual(['20200619191252', '20200619191253']);
  });

  it('should return IO_ERROR when the root is a file', () => {
    const root = temp.writeFile('results', 'not a directory');

    const result = createResultsDir(clock, root);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('IO_ERROR');
      expect(result.error.path).toBe(join(root, '20200619191252'));
    }
  });
});
