import { createHash } from 'node:crypto';

export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries
    .map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`)
    .join(',')}}`;
}

export function sha1(payload: string): string {
  return createHash('sha1').update(payload).digest('hex');
}

/**
 * Cuts `values` into `parts` contiguous slices whose sizes differ by at most
 * one; the first `length % parts` slices take the extra item. Empty slices are
 * dropped.
 */
export function partitionBalanced<T>(values: readonly T[], parts: number): T[][] {
  if (!Number.isInteger(parts) || parts <= 0) {
    throw new RangeError(`Part count must be a positive integer, received ${parts}`);
  }

  const base = Math.floor(values.length / parts);
  const extra = values.length % parts;
  const result: T[][] = [];
  let offset = 0;
  for (let index = 0; index < parts; index += 1) {
    const size = base + (index < extra ? 1 : 0);
    if (size === 0) {
      continue;
    }
    result.push(values.slice(offset, offset + size));
    offset += size;
  }

  return result;
}
