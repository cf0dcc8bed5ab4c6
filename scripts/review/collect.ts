import path from 'node:path';

import { Pair, YAMLMap } from 'yaml';

import type { DataIssue, ReadonlyVerbEntry, ReviewCategory } from '@shared/types';

import { NOT_FOUND, loadCanonicalDocument } from '../canonical/document';
import { loadCanonicalLayout } from '../canonical/layout';
import { plain, quoted } from '../lib/yaml';
import { CATEGORY_DESCRIPTIONS, REVIEW_CATEGORIES, fieldForCategory } from './categories';
import { ENTRY_COUNT_LABEL, createReviewDocument, writeReviewFile } from './files';

export interface CollectReport {
  canonicalFiles: number;
  entries: number;
  categories: Record<ReviewCategory, number>;
  files: string[];
  issues: DataIssue[];
}

export function categoryOf(entry: Pick<ReadonlyVerbEntry, 'dhatuId' | 'gati'>): ReviewCategory | null {
  const suffix = entry.gati ? 'with_gati' : 'without_gati';
  if (entry.dhatuId === null) {
    return `not_found_dhatu_ids_${suffix}`;
  }
  if (entry.dhatuId.includes(',')) {
    return `multiple_dhatu_ids_${suffix}`;
  }
  return null;
}

export function reviewEntryNode(entry: ReadonlyVerbEntry, category: ReviewCategory): YAMLMap {
  const node = new YAMLMap();
  const field = (key: string, value: string): void => {
    node.items.push(new Pair(plain(key), quoted(value)));
  };
  field('form', entry.form);
  field(fieldForCategory(category), entry.dhatuId ?? NOT_FOUND);
  field('gati', entry.gati ?? '');
  field('kanda', entry.kanda);
  field('varga', entry.varga);
  field('adhikaar', entry.adhikaar ?? '');
  field('artha', entry.artha);
  field('shloka_num', String(entry.shlokaNum));
  field('shloka_text', entry.shlokaText);
  return node;
}

export function categoryHeader(category: ReviewCategory, count: number): string[] {
  return [...CATEGORY_DESCRIPTIONS[category], '', `${ENTRY_COUNT_LABEL} ${count}`];
}

/**
 * Walks the canonical tree and writes one `<category>.yaml` list per review
 * category, keyed by entry key, in walk order.
 */
export async function collectReviewSets(canonicalRoot: string, outputRoot: string): Promise<CollectReport> {
  const layout = await loadCanonicalLayout(canonicalRoot);
  const issues: DataIssue[] = layout.warnings.map((message) => ({
    kind: 'unexpected_value',
    file: canonicalRoot,
    message,
  }));

  const buckets = new Map<ReviewCategory, Pair[]>(REVIEW_CATEGORIES.map((category) => [category, []]));
  const seen = new Set<string>();
  const locations = layout.locations();
  let entries = 0;

  for (const location of locations) {
    const document = await loadCanonicalDocument(location);
    issues.push(...document.issues);
    for (const entry of document.entries) {
      entries += 1;
      const category = categoryOf(entry);
      if (!category) {
        continue;
      }
      if (seen.has(entry.key)) {
        issues.push({
          kind: 'unexpected_value',
          file: location.filePath,
          key: entry.key,
          message: `duplicate entry "${entry.form}" under "${entry.artha}" in shloka ${entry.shlokaNum}`,
        });
        continue;
      }
      seen.add(entry.key);
      buckets.get(category)?.push(new Pair(plain(entry.key), reviewEntryNode(entry, category)));
    }
  }

  const counts: Record<ReviewCategory, number> = {
    multiple_dhatu_ids_without_gati: 0,
    multiple_dhatu_ids_with_gati: 0,
    not_found_dhatu_ids_without_gati: 0,
    not_found_dhatu_ids_with_gati: 0,
  };
  const files: string[] = [];
  for (const category of REVIEW_CATEGORIES) {
    const pairs = buckets.get(category) ?? [];
    counts[category] = pairs.length;
    const filePath = path.join(outputRoot, `${category}.yaml`);
    await writeReviewFile(filePath, categoryHeader(category, pairs.length), createReviewDocument(pairs));
    files.push(filePath);
  }

  return { canonicalFiles: locations.length, entries, categories: counts, files, issues } satisfies CollectReport;
}
