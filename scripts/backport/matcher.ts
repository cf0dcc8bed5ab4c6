import { normaliseShloka, normaliseText, textEquals } from '@shared/text-normalizer';
import type { CanonicalLocation, ReadonlyVerbEntry, ReviewRecord } from '@shared/types';

import { NOT_FOUND, loadCanonicalDocument } from '../canonical/document';
import type { CanonicalDocument } from '../canonical/document';
import { loadCanonicalLayout } from '../canonical/layout';
import type { CanonicalLayout } from '../canonical/layout';

export type MatchResult =
  | { kind: 'matched'; entry: ReadonlyVerbEntry }
  | { kind: 'not_found' }
  | { kind: 'ambiguous'; candidates: ReadonlyVerbEntry[] };

export type RecordIdentity = Pick<ReviewRecord, 'key' | 'form' | 'artha' | 'shlokaText'>;

/** Values a reviewer has not replaced yet: blank, "Not Found", or still a list. */
export function isPendingValue(value: string): boolean {
  const trimmed = value.trim();
  return !trimmed || trimmed === NOT_FOUND || trimmed.includes(',');
}

export function findCandidates(entries: readonly ReadonlyVerbEntry[], record: RecordIdentity): ReadonlyVerbEntry[] {
  const shloka = normaliseShloka(record.shlokaText);
  const artha = normaliseText(record.artha);
  return entries.filter(
    (entry) =>
      textEquals(entry.form, record.form) &&
      normaliseShloka(entry.shlokaText) === shloka &&
      (artha === null || textEquals(entry.artha, artha)),
  );
}

/**
 * Finds the canonical entry a review record refers to. The entry key settles
 * a tie between candidates; without it, several candidates stay ambiguous.
 */
export function matchRecord(entries: readonly ReadonlyVerbEntry[], record: RecordIdentity): MatchResult {
  const candidates = findCandidates(entries, record);
  const keyed = candidates.filter((entry) => entry.key === record.key);
  if (keyed.length === 1) {
    return { kind: 'matched', entry: keyed[0] };
  }
  if (candidates.length === 0) {
    return { kind: 'not_found' };
  }
  if (candidates.length === 1) {
    return { kind: 'matched', entry: candidates[0] };
  }
  return { kind: 'ambiguous', candidates };
}

/** Canonical files addressed by review records, each loaded once per run. */
export class CanonicalIndex {
  private readonly cache = new Map<string, CanonicalDocument>();

  constructor(readonly layout: CanonicalLayout) {}

  static async load(root: string): Promise<CanonicalIndex> {
    return new CanonicalIndex(await loadCanonicalLayout(root));
  }

  locate(record: Pick<ReviewRecord, 'kanda' | 'varga' | 'adhikaar'>): CanonicalLocation | null {
    return this.layout.resolve({ kanda: record.kanda, varga: record.varga, adhikaar: record.adhikaar || null });
  }

  async document(location: CanonicalLocation): Promise<CanonicalDocument> {
    const cached = this.cache.get(location.filePath);
    if (cached) {
      return cached;
    }
    const document = await loadCanonicalDocument(location);
    this.cache.set(location.filePath, document);
    return document;
  }

  documents(): CanonicalDocument[] {
    return Array.from(this.cache.values());
  }
}
