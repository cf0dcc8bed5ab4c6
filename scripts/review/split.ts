import { promises as fs } from 'node:fs';
import path from 'node:path';

import { isMap } from 'yaml';

import { IoFailureError, describeError } from '@shared/errors';

import { partitionBalanced } from '../lib/utils';
import { plain, quoted } from '../lib/yaml';
import { CATEGORY_DESCRIPTIONS, categoryFromPath } from './categories';
import { ENTRY_COUNT_LABEL, PART_FILE_PATTERN, createReviewDocument, readReviewFile, setField, writeReviewFile } from './files';

const PART_LINE = /^This is part \d+ of \d+/;

export interface SplitPart {
  filePath: string;
  entries: number;
}

export interface SplitReport {
  total: number;
  parts: SplitPart[];
  staleRemoved: string[];
}

export function partFileName(index: number): string {
  return `part_${String(index).padStart(2, '0')}.yaml`;
}

export function partHeader(description: readonly string[], count: number, index: number, partCount: number): string[] {
  return [...description, '', `${ENTRY_COUNT_LABEL} ${count}`, `This is part ${index} of ${partCount} - Assigned for proofreading`];
}

function describeSource(sourceFile: string, header: readonly string[]): string[] {
  const category = categoryFromPath(sourceFile);
  if (category) {
    return [...CATEGORY_DESCRIPTIONS[category]];
  }
  const lines = header.filter((line) => !line.includes(ENTRY_COUNT_LABEL) && !PART_LINE.test(line));
  while (lines.length > 0 && !lines[lines.length - 1].trim()) {
    lines.pop();
  }
  return lines;
}

async function removeStaleParts(destFolder: string, keep: ReadonlySet<string>): Promise<string[]> {
  const names = await fs.readdir(destFolder);
  const removed: string[] = [];
  for (const name of names.sort()) {
    if (!PART_FILE_PATTERN.test(name) || keep.has(name)) {
      continue;
    }
    const filePath = path.join(destFolder, name);
    await fs.unlink(filePath);
    removed.push(filePath);
  }
  return removed;
}

/**
 * Cuts a review list into `partCount` balanced, contiguous part files with
 * fresh `resolved: false` / `comment: ""` review state. Part files left from
 * an earlier, larger split are deleted.
 */
export async function split(sourceFile: string, destFolder: string, partCount: number): Promise<SplitReport> {
  const source = await readReviewFile(sourceFile);
  const pairs = source.entries.items;
  const chunks = partitionBalanced(pairs, partCount);
  const description = describeSource(sourceFile, source.header);

  for (const pair of pairs) {
    if (isMap(pair.value)) {
      setField(pair.value, 'resolved', plain('false'), true);
      setField(pair.value, 'comment', quoted(''), true);
    }
  }

  const parts: SplitPart[] = [];
  const written = new Set<string>();
  for (const [offset, chunk] of chunks.entries()) {
    const name = partFileName(offset + 1);
    const filePath = path.join(destFolder, name);
    await writeReviewFile(
      filePath,
      partHeader(description, chunk.length, offset + 1, chunks.length),
      createReviewDocument(chunk),
    );
    written.add(name);
    parts.push({ filePath, entries: chunk.length });
  }

  let staleRemoved: string[];
  try {
    await fs.mkdir(destFolder, { recursive: true });
    staleRemoved = await removeStaleParts(destFolder, written);
  } catch (error) {
    throw new IoFailureError(`Unable to clean ${destFolder}: ${describeError(error)}`, destFolder, { cause: error });
  }

  return { total: pairs.length, parts, staleRemoved } satisfies SplitReport;
}
