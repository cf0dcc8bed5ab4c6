import type { TextCoordinate, ValidTextCoordinate } from '@shared/types';

const PART_PATTERN = /^\d+$/;

/**
 * Parses a dotted `khanda.varga.item` text number. Anything other than exactly
 * three unsigned base-10 integers comes back as `{ valid: false }` with the
 * original string; this never throws.
 */
export function parseTextNumber(raw: string): TextCoordinate {
  if (typeof raw !== 'string') {
    return { valid: false, raw: String(raw) };
  }

  const parts = raw.trim().split('.');
  if (parts.length !== 3 || !parts.every((part) => PART_PATTERN.test(part))) {
    return { valid: false, raw };
  }

  const [khanda, varga, item] = parts.map((part) => Number.parseInt(part, 10));
  return { valid: true, khanda, varga, item };
}

export function formatTextNumber(coordinate: ValidTextCoordinate): string {
  return `${coordinate.khanda}.${coordinate.varga}.${coordinate.item}`;
}

/**
 * Sort key for text numbers of any shape: each dotted part counts as its
 * integer value, or 0 when it is not one.
 */
export function textNumberSortKey(raw: unknown): number[] {
  if (typeof raw !== 'string') {
    return [0, 0, 0];
  }
  return raw.split('.').map((part) => {
    const trimmed = part.trim();
    return PART_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
  });
}

export function compareSortKeys(left: readonly number[], right: readonly number[]): number {
  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const a = left[index];
    const b = right[index];
    if (a === undefined) return -1;
    if (b === undefined) return 1;
    if (a !== b) return a - b;
  }
  return 0;
}
