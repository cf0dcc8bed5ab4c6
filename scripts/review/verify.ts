import { isMap } from 'yaml';

import type { DataIssue } from '@shared/types';

import { CanonicalIndex, isPendingValue, matchRecord } from '../backport/matcher';
import { stableStringify } from '../lib/utils';
import {
  entryKeyOf,
  findPartFiles,
  readEntryCount,
  readReviewFile,
  readReviewRecords,
  resolveReviewInputs,
} from './files';
import type { ReviewFile } from './files';

const REVIEW_FIELDS = new Set(['resolved', 'comment']);

export interface SplitVerification {
  valid: boolean;
  sourceCount: number;
  splitCount: number;
  parts: number;
  missing: string[];
  extra: string[];
  mismatched: string[];
  duplicated: string[];
}

export interface IntegrityReport {
  records: number;
  resolvable: number;
  inSync: number;
  notFound: number;
  ambiguous: number;
  headerMismatches: number;
  issues: DataIssue[];
}

/** Entry contents keyed by entry key, review fields left out. */
function contentByKey(file: ReviewFile): Array<[string, string]> {
  return file.entries.items.map((pair) => {
    const data: unknown = isMap(pair.value) ? pair.value.toJS(file.doc) : null;
    const content: Record<string, unknown> = {};
    if (data && typeof data === 'object') {
      for (const [field, value] of Object.entries(data)) {
        if (!REVIEW_FIELDS.has(field)) {
          content[field] = value;
        }
      }
    }
    return [entryKeyOf(pair), stableStringify(content)];
  });
}

/** Checks that the part files under `splitFolder` hold exactly the entries of `sourceFile`. */
export async function verifySplit(sourceFile: string, splitFolder: string): Promise<SplitVerification> {
  const source = await readReviewFile(sourceFile);
  const partFiles = await findPartFiles(splitFolder);
  const parts = await Promise.all(partFiles.map((filePath) => readReviewFile(filePath)));

  const expected = new Map(contentByKey(source));
  const actual = new Map<string, string>();
  const duplicated: string[] = [];
  let splitCount = 0;

  for (const part of parts) {
    for (const [key, content] of contentByKey(part)) {
      splitCount += 1;
      if (actual.has(key)) {
        duplicated.push(key);
        continue;
      }
      actual.set(key, content);
    }
  }

  const missing = Array.from(expected.keys()).filter((key) => !actual.has(key));
  const extra = Array.from(actual.keys()).filter((key) => !expected.has(key));
  const mismatched = Array.from(expected.entries())
    .filter(([key, content]) => actual.has(key) && actual.get(key) !== content)
    .map(([key]) => key);

  return {
    valid:
      missing.length === 0 &&
      extra.length === 0 &&
      mismatched.length === 0 &&
      duplicated.length === 0 &&
      splitCount === source.entries.items.length,
    sourceCount: source.entries.items.length,
    splitCount,
    parts: parts.length,
    missing,
    extra,
    mismatched,
    duplicated,
  } satisfies SplitVerification;
}

/**
 * Read-only check of every review record under `splitRoot` against the
 * canonical tree: does it still address exactly one entry, and does the
 * canonical value already carry the reviewed one.
 */
export async function verifyIntegrity(canonicalRoot: string, splitRoot: string): Promise<IntegrityReport> {
  const inputs = await resolveReviewInputs(splitRoot);
  const files = await Promise.all(inputs.map((filePath) => readReviewFile(filePath)));
  const index = await CanonicalIndex.load(canonicalRoot);

  const report: IntegrityReport = {
    records: 0,
    resolvable: 0,
    inSync: 0,
    notFound: 0,
    ambiguous: 0,
    headerMismatches: 0,
    issues: [],
  };

  for (const file of files) {
    const records = readReviewRecords(file);
    const declared = readEntryCount(file.header);
    if (declared !== null && declared !== records.length) {
      report.headerMismatches += 1;
      report.issues.push({
        kind: 'header_count_mismatch',
        file: file.filePath,
        message: `header says ${declared} entries, file holds ${records.length}`,
      });
    }

    for (const record of records) {
      report.records += 1;
      const location = index.locate(record);
      if (!location) {
        report.notFound += 1;
        report.issues.push({
          kind: 'file_not_found',
          file: file.filePath,
          key: record.key,
          message: `no canonical file for ${record.kanda} / ${record.varga}${record.adhikaar ? ` / ${record.adhikaar}` : ''}`,
        });
        continue;
      }

      const document = await index.document(location);
      const match = matchRecord(document.entries, record);
      if (match.kind === 'not_found') {
        report.notFound += 1;
        report.issues.push({
          kind: 'no_match',
          file: location.filePath,
          key: record.key,
          message: `"${record.form}" under "${record.artha}" not found`,
        });
        continue;
      }
      if (match.kind === 'ambiguous') {
        report.ambiguous += 1;
        report.issues.push({
          kind: 'ambiguous_match',
          file: location.filePath,
          key: record.key,
          message: `"${record.form}" matches ${match.candidates.length} entries`,
        });
        continue;
      }

      report.resolvable += 1;
      if (!isPendingValue(record.value) && match.entry.dhatuId === record.value.trim()) {
        report.inSync += 1;
      }
    }
  }

  return report;
}
