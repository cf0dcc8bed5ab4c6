import { describe, expect, it } from 'vitest';

import {
  compareSortKeys,
  formatTextNumber,
  parseTextNumber,
  textNumberSortKey,
} from '../../../scripts/dictionary/coordinates';

describe('parseTextNumber', () => {
  it('parses three dotted integers', () => {
    expect(parseTextNumber('1.1.13')).toEqual({ valid: true, khanda: 1, varga: 1, item: 13 });
    expect(parseTextNumber(' 3.4.0 ')).toEqual({ valid: true, khanda: 3, varga: 4, item: 0 });
    expect(parseTextNumber('007.10.200')).toEqual({ valid: true, khanda: 7, varga: 10, item: 200 });
  });

  it('formats a parsed coordinate back to its dotted form', () => {
    const coordinate = parseTextNumber('2.9.41');
    expect(coordinate.valid).toBe(true);
    if (coordinate.valid) {
      expect(formatTextNumber(coordinate)).toBe('2.9.41');
    }
  });

  it.each(['1.a.3', '1.2', '1.2.3.4', '', '1..3', '-1.2.3', '1.2.+3', '1.2.3a', '1. 2.3', '١.٢.٣'])(
    'rejects %j and keeps the original string',
    (raw) => {
      expect(parseTextNumber(raw)).toEqual({ valid: false, raw });
    },
  );
});

describe('textNumberSortKey', () => {
  it('treats non-numeric parts as zero', () => {
    expect(textNumberSortKey('1.a.3')).toEqual([1, 0, 3]);
    expect(textNumberSortKey('2.10.1')).toEqual([2, 10, 1]);
    expect(textNumberSortKey(undefined)).toEqual([0, 0, 0]);
  });

  it('orders numerically and puts shorter prefixes first', () => {
    expect(compareSortKeys([1, 2, 10], [1, 2, 9])).toBeGreaterThan(0);
    expect(compareSortKeys([1, 2], [1, 2, 0])).toBeLessThan(0);
    expect(compareSortKeys([3, 1, 1], [3, 1, 1])).toBe(0);
  });
});
