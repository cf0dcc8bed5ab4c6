export function toNfc(value: string): string {
  return value.normalize('NFC');
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ');
}

export function normaliseText(value: string | null | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = collapseWhitespace(value).trim();
  if (!trimmed) {
    return null;
  }
  return toNfc(trimmed);
}

/**
 * Shloka keys in the canonical files sometimes carry a trailing danda pair and
 * sometimes not, so comparisons drop it.
 */
export function normaliseShloka(value: string | null | undefined): string {
  const text = normaliseText(value);
  if (!text) {
    return '';
  }
  return text.replace(/\s*॥\s*$/u, '').trim();
}

export function textEquals(left: string | null | undefined, right: string | null | undefined): boolean {
  return (normaliseText(left) ?? '') === (normaliseText(right) ?? '');
}
