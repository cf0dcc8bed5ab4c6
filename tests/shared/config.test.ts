import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  DEFAULT_PART_COUNT,
  isStructuredLoggingEnabled,
  parseBooleanFlag,
  parsePositiveInteger,
  resolveKoshaPaths,
  resolvePartCount,
} from '@shared/config';

describe('config', () => {
  it('parses boolean flags with a default for unknown values', () => {
    expect(parseBooleanFlag('YES', false)).toBe(true);
    expect(parseBooleanFlag(' off ', true)).toBe(false);
    expect(parseBooleanFlag('', true)).toBe(true);
    expect(parseBooleanFlag(undefined, false)).toBe(false);
    expect(parseBooleanFlag('maybe', true)).toBe(true);
  });

  it('parses positive integers and falls back otherwise', () => {
    expect(parsePositiveInteger('12', 1)).toBe(12);
    expect(parsePositiveInteger('0', 5)).toBe(5);
    expect(parsePositiveInteger('-3', 5)).toBe(5);
    expect(parsePositiveInteger('2.5', 5)).toBe(5);
    expect(parsePositiveInteger(undefined, 5)).toBe(5);
  });

  it('resolves folders against the working directory', () => {
    const cwd = path.resolve('/project');
    expect(resolveKoshaPaths({ KOSHA_GENERATED_DIR: 'build/out', KOSHA_REVIEW_DIR: '  ' }, cwd)).toEqual({
      dataDir: path.join(cwd, 'Data'),
      generatedDir: path.join(cwd, 'build', 'out'),
      reviewDir: path.join(cwd, 'output'),
    });
  });

  it('reads the part count and structured logging switch', () => {
    expect(resolvePartCount({})).toBe(DEFAULT_PART_COUNT);
    expect(resolvePartCount({ KOSHA_PART_COUNT: '4' })).toBe(4);
    expect(isStructuredLoggingEnabled({ KOSHA_STRUCTURED_LOGS: 'true' })).toBe(true);
    expect(isStructuredLoggingEnabled({})).toBe(false);
  });
});
