import type { DataIssue, ReviewRecord } from '@shared/types';

import { readReviewFile, readReviewRecords, resolveReviewInputs } from '../review/files';
import { CanonicalIndex, isPendingValue, matchRecord } from './matcher';

export interface BackportReport {
  processed: number;
  matched: number;
  updated: number;
  unchanged: number;
  skippedUnresolved: number;
  skippedPending: number;
  notFound: number;
  ambiguous: number;
  filesModified: string[];
  issues: DataIssue[];
}

interface SourcedRecord {
  file: string;
  record: ReviewRecord;
}

async function loadRecords(sourceFolderOrFile: string): Promise<SourcedRecord[]> {
  const inputs = await resolveReviewInputs(sourceFolderOrFile);
  const files = await Promise.all(inputs.map((filePath) => readReviewFile(filePath)));
  return files.flatMap((file) => readReviewRecords(file).map((record) => ({ file: file.filePath, record })));
}

/**
 * Writes reviewed dhatu values back into the canonical tree. Every review file
 * is read and validated before any canonical file changes; each modified
 * canonical file is written once, after all records are applied.
 */
export async function backport(sourceFolderOrFile: string, canonicalRoot: string): Promise<BackportReport> {
  const records = await loadRecords(sourceFolderOrFile);
  const index = await CanonicalIndex.load(canonicalRoot);

  const report: BackportReport = {
    processed: 0,
    matched: 0,
    updated: 0,
    unchanged: 0,
    skippedUnresolved: 0,
    skippedPending: 0,
    notFound: 0,
    ambiguous: 0,
    filesModified: [],
    issues: [],
  };

  for (const { file, record } of records) {
    report.processed += 1;
    if (!record.resolved) {
      report.skippedUnresolved += 1;
      continue;
    }
    if (isPendingValue(record.value)) {
      report.skippedPending += 1;
      continue;
    }

    const location = index.locate(record);
    if (!location) {
      report.notFound += 1;
      report.issues.push({
        kind: 'file_not_found',
        file,
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
        message: `"${record.form}" matches ${match.candidates.length} entries (shlokas ${match.candidates
          .map((entry) => entry.shlokaNum)
          .join(', ')})`,
      });
      continue;
    }

    report.matched += 1;
    if (document.assignDhatuId(match.entry, record.value.trim())) {
      report.updated += 1;
    } else {
      report.unchanged += 1;
    }
  }

  for (const document of index.documents()) {
    if (document.isModified) {
      await document.save();
      report.filesModified.push(document.filePath);
    }
  }

  return report;
}
