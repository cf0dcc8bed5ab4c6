import type { DictionaryEntry } from '@shared/types';

// Characters that would change the meaning of an unquoted key.
const UNSAFE_PLAIN_START = /^[\s\-?:,[\]{}#&*!|>'"%@`]/;
const UNSAFE_PLAIN_CONTENT = /(:\s)|(\s#)|:$|[\r\n\t]/;
const RESERVED_PLAIN = /^(~|null|true|false|yes|no|on|off|[-+]?(\d[\d_]*)?\.?\d*([eE][-+]?\d+)?)$/i;

export function renderYamlKey(value: string): string {
  if (!value || UNSAFE_PLAIN_START.test(value) || UNSAFE_PLAIN_CONTENT.test(value) || RESERVED_PLAIN.test(value) || value.trim() !== value) {
    return JSON.stringify(value);
  }
  return value;
}

export function blockKeyFor(entry: Pick<DictionaryEntry, 'artha' | 'headword'>): string {
  const artha = entry.artha.trim();
  return artha || entry.headword.trim();
}

/**
 * Renders one entry as
 *
 * ```yaml
 * artha:
 *   - synonym1:
 *   - synonym2:
 * ```
 */
export function renderEntryBlock(entry: Pick<DictionaryEntry, 'artha' | 'headword' | 'synonyms'>): string {
  const lines = [`${renderYamlKey(blockKeyFor(entry))}:`];
  for (const synonym of entry.synonyms) {
    lines.push(`  - ${renderYamlKey(synonym.trim())}:`);
  }
  return `${lines.join('\n')}\n`;
}

/** Joins blocks for appending after `existing` file content, one blank line apart. */
export function appendBlocks(existing: string, blocks: readonly string[]): string {
  if (blocks.length === 0) {
    return existing;
  }
  const joined = blocks.join('\n');
  if (!existing) {
    return joined;
  }
  const separator = existing.endsWith('\n') ? '\n' : '\n\n';
  return `${existing}${separator}${joined}`;
}
