import { isMap } from 'yaml';

import { scalarString } from '../lib/yaml';
import {
  entryKeyOf,
  findField,
  findPartFiles,
  parseResolved,
  readEntryCount,
  readReviewFile,
  setEntryCount,
  writeReviewFile,
} from './files';

export interface RemoveResolvedFileResult {
  filePath: string;
  before: number;
  after: number;
  removed: number;
  removedKeys: string[];
  /** Entries were dropped or the header count was wrong. */
  rewritten: boolean;
}

export interface RemoveResolvedReport {
  dryRun: boolean;
  files: RemoveResolvedFileResult[];
  before: number;
  after: number;
  removed: number;
  filesChanged: number;
}

function isResolved(value: unknown): boolean {
  if (!isMap(value)) {
    return false;
  }
  const field = findField(value, 'resolved');
  return field ? parseResolved(scalarString(field.value)) === true : false;
}

/**
 * Drops entries marked `resolved: true` from every part file below `folder`
 * and refreshes each header's entry count. Files with nothing to drop and a
 * correct count are left untouched; a dry run writes nothing.
 */
export async function removeResolved(folder: string, dryRun = false): Promise<RemoveResolvedReport> {
  const partFiles = await findPartFiles(folder);
  const files = await Promise.all(partFiles.map((filePath) => readReviewFile(filePath)));

  const results: RemoveResolvedFileResult[] = [];
  for (const file of files) {
    const before = file.entries.items.length;
    const removedKeys = file.entries.items.filter((pair) => isResolved(pair.value)).map(entryKeyOf);
    file.entries.items = file.entries.items.filter((pair) => !isResolved(pair.value));
    const after = file.entries.items.length;

    const declared = readEntryCount(file.header);
    const stale = removedKeys.length > 0 || (declared !== null && declared !== after);
    if (stale && !dryRun) {
      await writeReviewFile(file.filePath, setEntryCount(file.header, after), file.doc);
    }
    results.push({ filePath: file.filePath, before, after, removed: removedKeys.length, removedKeys, rewritten: stale });
  }

  return {
    dryRun,
    files: results,
    before: results.reduce((sum, result) => sum + result.before, 0),
    after: results.reduce((sum, result) => sum + result.after, 0),
    removed: results.reduce((sum, result) => sum + result.removed, 0),
    filesChanged: results.filter((result) => result.rewritten).length,
  } satisfies RemoveResolvedReport;
}
