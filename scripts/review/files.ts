import type { Dirent } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { Document, Pair, YAMLMap, isMap } from 'yaml';
import type { Scalar } from 'yaml';
import { z } from 'zod';

import { parseBooleanFlag } from '@shared/config';
import { DocumentFormatError, IoFailureError, describeError, isErrnoException } from '@shared/errors';
import type { ReviewRecord } from '@shared/types';

import { STRING_SCHEMA, YAML_OUTPUT, parseStringDocument, plain, scalarString } from '../lib/yaml';

export const ENTRY_COUNT_LABEL = 'ENTRIES TO CORRECT:';
export const PART_FILE_PATTERN = /^part_\d+\.yaml$/;

export interface ReviewFile {
  filePath: string;
  /** Header comment lines without their `# ` prefix. */
  header: string[];
  doc: Document;
  entries: YAMLMap;
}

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const reviewRecordSchema = z
  .object({
    form: z.string().min(1),
    dhatu_id: z.string().nullish(),
    dhatu_ids: z.string().nullish(),
    gati: text,
    kanda: z.string().min(1),
    varga: z.string().min(1),
    adhikaar: text,
    artha: text,
    shloka_num: text,
    shloka_text: text,
    resolved: z.union([z.boolean(), z.string()]).nullish(),
    comment: text,
  })
  .passthrough()
  .refine((record) => record.dhatu_id !== undefined || record.dhatu_ids !== undefined, {
    message: 'dhatu_id or dhatu_ids is required',
  });

export function splitHeader(source: string): { header: string[]; body: string } {
  const lines = source.split(/\r?\n/);
  const header: string[] = [];
  let index = 0;
  for (; index < lines.length; index += 1) {
    const line = lines[index];
    if (line.startsWith('#')) {
      header.push(line.slice(1).replace(/^ /, ''));
      continue;
    }
    if (line.trim()) {
      break;
    }
  }
  return { header, body: lines.slice(index).join('\n') };
}

export function renderHeader(header: readonly string[]): string {
  if (header.length === 0) {
    return '';
  }
  return `${header.map((line) => (line ? `# ${line}` : '#')).join('\n')}\n\n`;
}

export function readEntryCount(header: readonly string[]): number | null {
  const line = header.find((candidate) => candidate.includes(ENTRY_COUNT_LABEL));
  if (!line) {
    return null;
  }
  const match = /ENTRIES TO CORRECT:\s*(\d+)/.exec(line);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function setEntryCount(header: readonly string[], count: number): string[] {
  return header.map((line) => (line.includes(ENTRY_COUNT_LABEL) ? `${ENTRY_COUNT_LABEL} ${count}` : line));
}

export function createReviewDocument(pairs: readonly Pair[] = []): Document {
  const doc = new Document(undefined, STRING_SCHEMA);
  const entries = new YAMLMap(doc.schema);
  entries.items.push(...pairs);
  doc.contents = entries;
  return doc;
}

export function parseReviewFile(filePath: string, source: string): ReviewFile {
  const { header, body } = splitHeader(source);
  const doc = parseStringDocument(body);
  if (doc.errors.length > 0) {
    throw new DocumentFormatError(
      filePath,
      doc.errors.map((error) => error.message),
    );
  }

  const contents = doc.contents;
  if (contents === null || (isMap(contents) && contents.items.length === 0)) {
    const entries = new YAMLMap(doc.schema);
    doc.contents = entries;
    return { filePath, header, doc, entries };
  }
  if (!isMap(contents)) {
    throw new DocumentFormatError(filePath, ['expected a mapping of review entries']);
  }

  const problems: string[] = [];
  for (const pair of contents.items) {
    const key = scalarString(pair.key);
    if (key === null) {
      problems.push('review entry with a non-string key');
    } else if (!isMap(pair.value)) {
      problems.push(`${key}: review entry must be a mapping`);
    } else {
      pair.value.flow = false;
    }
  }
  if (problems.length > 0) {
    throw new DocumentFormatError(filePath, problems);
  }

  contents.flow = false;
  return { filePath, header, doc, entries: contents };
}

export async function readReviewFile(filePath: string): Promise<ReviewFile> {
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new IoFailureError(`Unable to read ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
  return parseReviewFile(filePath, source);
}

export function renderReviewFile(header: readonly string[], doc: Document): string {
  return `${renderHeader(header)}${doc.toString(YAML_OUTPUT)}`;
}

export async function writeReviewFile(filePath: string, header: readonly string[], doc: Document): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, renderReviewFile(header, doc), 'utf8');
  } catch (error) {
    throw new IoFailureError(`Unable to write ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
}

export function entryKeyOf(pair: Pair): string {
  return scalarString(pair.key) ?? '';
}

export function findField(entry: YAMLMap, key: string): Pair | undefined {
  return entry.items.find((pair) => scalarString(pair.key) === key);
}

/** Sets `key` on a review entry; an existing value is kept unless `overwrite`. */
export function setField(entry: YAMLMap, key: string, value: Scalar, overwrite: boolean): boolean {
  const existing = findField(entry, key);
  if (existing) {
    if (!overwrite) {
      return false;
    }
    existing.value = value;
    return true;
  }
  entry.items.push(new Pair(plain(key), value));
  return true;
}

export function parseResolved(value: unknown): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return parseBooleanFlag(value, false);
  }
  return null;
}

/**
 * Reads one review entry. A record without a `resolved` field is treated as
 * reviewed: flat category lists carry no review state. A `resolved` that is
 * present but empty or unreadable counts as unresolved.
 */
export function toReviewRecord(key: string, data: unknown): { record: ReviewRecord } | { problems: string[] } {
  const parsed = reviewRecordSchema.safeParse(data);
  if (!parsed.success) {
    return {
      problems: parsed.error.issues.map((issue) => `${key}: ${issue.path.join('.') || 'entry'} ${issue.message}`),
    };
  }

  const value = parsed.data;
  const field = value.dhatu_ids !== undefined ? 'dhatu_ids' : 'dhatu_id';
  // Only a missing field means "no review state"; an empty one is not reviewed.
  const resolved = value.resolved === undefined ? true : parseResolved(value.resolved) ?? false;
  return {
    record: {
      key,
      form: value.form,
      field,
      value: (field === 'dhatu_ids' ? value.dhatu_ids : value.dhatu_id) ?? '',
      gati: value.gati,
      kanda: value.kanda,
      varga: value.varga,
      adhikaar: value.adhikaar,
      artha: value.artha,
      shlokaNum: value.shloka_num,
      shlokaText: value.shloka_text,
      resolved,
      comment: value.comment,
    },
  };
}

export function readReviewRecords(file: ReviewFile): ReviewRecord[] {
  const records: ReviewRecord[] = [];
  const problems: string[] = [];
  for (const pair of file.entries.items) {
    const key = entryKeyOf(pair);
    const data: unknown = isMap(pair.value) ? pair.value.toJS(file.doc) : pair.value;
    const result = toReviewRecord(key, data);
    if ('problems' in result) {
      problems.push(...result.problems);
    } else {
      records.push(result.record);
    }
  }
  if (problems.length > 0) {
    throw new DocumentFormatError(file.filePath, problems);
  }
  return records;
}

async function walkYamlFiles(dir: string, accept: (name: string) => boolean, found: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new IoFailureError(`Unable to list ${dir}: ${describeError(error)}`, dir, { cause: error });
  }
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkYamlFiles(entryPath, accept, found);
    } else if (entry.isFile() && accept(entry.name)) {
      found.push(entryPath);
    }
  }
}

function partNumber(filePath: string): number {
  const match = /^part_(\d+)\.yaml$/.exec(path.basename(filePath));
  return match ? Number.parseInt(match[1], 10) : 0;
}

/** Part files below `folder`, grouped by directory and in part-number order. */
export async function findPartFiles(folder: string): Promise<string[]> {
  const found: string[] = [];
  await walkYamlFiles(folder, (name) => PART_FILE_PATTERN.test(name), found);
  return found.sort((left, right) => {
    const leftDir = path.dirname(left);
    const rightDir = path.dirname(right);
    if (leftDir !== rightDir) {
      return leftDir < rightDir ? -1 : 1;
    }
    return partNumber(left) - partNumber(right);
  });
}

/**
 * Review inputs under a path: the file itself, the part files below a
 * folder, or the folder's own `.yaml` lists when it holds no parts.
 */
export async function resolveReviewInputs(target: string): Promise<string[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(target)).isDirectory();
  } catch (error) {
    const reason = isErrnoException(error) && error.code === 'ENOENT' ? 'path not found' : describeError(error);
    throw new IoFailureError(`Review input unavailable: ${reason}`, target, { cause: error });
  }
  if (!isDirectory) {
    return [target];
  }

  const parts = await findPartFiles(target);
  if (parts.length > 0) {
    return parts;
  }
  const names = await fs.readdir(target);
  return names
    .filter((name) => name.endsWith('.yaml'))
    .sort()
    .map((name) => path.join(target, name));
}
