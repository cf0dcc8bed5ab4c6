import { isMap } from 'yaml';

import { plain, quoted } from '../lib/yaml';
import { findPartFiles, readReviewFile, setField, writeReviewFile } from './files';

export interface AddReviewFieldsReport {
  files: number;
  entries: number;
  fieldsAdded: number;
}

/** Adds missing `resolved` / `comment` fields to every part entry below `folder`. */
export async function addReviewFields(folder: string): Promise<AddReviewFieldsReport> {
  const partFiles = await findPartFiles(folder);
  const files = await Promise.all(partFiles.map((filePath) => readReviewFile(filePath)));

  let entries = 0;
  let fieldsAdded = 0;
  for (const file of files) {
    for (const pair of file.entries.items) {
      if (!isMap(pair.value)) {
        continue;
      }
      entries += 1;
      if (setField(pair.value, 'resolved', plain('false'), false)) {
        fieldsAdded += 1;
      }
      if (setField(pair.value, 'comment', quoted(''), false)) {
        fieldsAdded += 1;
      }
    }
    await writeReviewFile(file.filePath, file.header, file.doc);
  }

  return { files: files.length, entries, fieldsAdded } satisfies AddReviewFieldsReport;
}
