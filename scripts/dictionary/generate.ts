import { promises as fs } from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import { DocumentFormatError, IoFailureError, describeError, isErrnoException } from '@shared/errors';
import type { DataIssue, DictionaryEntry } from '@shared/types';

import { parseTextNumber } from './coordinates';
import { appendBlocks, renderEntryBlock } from './render';

export const INVALID_DIR_NAME = 'invalid';
export const INVALID_JSON_FILE = 'invalid.text_numbers.json';
export const INVALID_YAML_FILE = 'invalid.text_numbers.yaml';

const recordSchema = z.object({
  artha: z.string().default(''),
  text_number: z.string(),
  synonyms: z.array(z.string().refine((value) => value.trim().length > 0, 'blank synonym')).default([]),
});

const objectEntrySchema = z
  .object({
    form: z.string().optional(),
    headword: z.string().optional(),
  })
  .passthrough();

const exportSchema = z
  .object({
    entries: z.array(z.unknown()),
  })
  .passthrough();

export interface GenerateReport {
  processed: number;
  written: number;
  quarantined: number;
  malformed: number;
  files: string[];
  issues: DataIssue[];
}

type ParsedItem =
  | { kind: 'entry'; entry: DictionaryEntry; raw: unknown }
  | { kind: 'malformed'; raw: unknown; reason: string };

function splitItem(item: unknown): { headword: string; data: unknown } | null {
  if (Array.isArray(item)) {
    if (item.length === 2 && typeof item[0] === 'string') {
      return { headword: item[0], data: item[1] };
    }
    return null;
  }

  const parsed = objectEntrySchema.safeParse(item);
  if (!parsed.success) {
    return null;
  }
  return { headword: parsed.data.form ?? parsed.data.headword ?? '', data: parsed.data };
}

export function parseExportItem(item: unknown): ParsedItem {
  const split = splitItem(item);
  if (!split) {
    return { kind: 'malformed', raw: item, reason: 'expected [headword, record] or an object with text_number' };
  }

  const record = recordSchema.safeParse(split.data);
  if (!record.success) {
    const reason = record.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`).join('; ');
    return { kind: 'malformed', raw: item, reason };
  }

  return {
    kind: 'entry',
    raw: item,
    entry: {
      headword: split.headword,
      artha: record.data.artha.trim(),
      textNumber: record.data.text_number,
      synonyms: record.data.synonyms.map((synonym) => synonym.trim()),
    },
  };
}

export async function readExportItems(inputPath: string): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await fs.readFile(inputPath, 'utf8');
  } catch (error) {
    throw new IoFailureError(`Unable to read dictionary export: ${describeError(error)}`, inputPath, { cause: error });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new DocumentFormatError(inputPath, [`Invalid JSON: ${describeError(error)}`], { cause: error });
  }

  const parsed = exportSchema.safeParse(payload);
  if (!parsed.success) {
    throw new DocumentFormatError(
      inputPath,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`),
    );
  }

  return parsed.data.entries;
}

async function readExisting(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return '';
    }
    throw new IoFailureError(`Unable to read ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
}

async function appendToFile(filePath: string, blocks: readonly string[]): Promise<void> {
  const existing = await readExisting(filePath);
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, appendBlocks(existing, blocks), 'utf8');
  } catch (error) {
    throw new IoFailureError(`Unable to write ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
}

async function appendJsonLines(filePath: string, items: readonly unknown[]): Promise<void> {
  if (items.length === 0) {
    return;
  }
  const lines = items.map((item) => `${JSON.stringify(item)}\n`).join('');
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, lines, 'utf8');
  } catch (error) {
    throw new IoFailureError(`Unable to write ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
}

export function bucketPath(outputRoot: string, khanda: number, varga: number): string {
  return path.join(outputRoot, String(khanda), `${varga}.yaml`);
}

/**
 * Appends every export entry to `<outputRoot>/<khanda>/<varga>.yaml` in input
 * order. Entries whose text number does not parse go to the quarantine pair
 * under `<outputRoot>/invalid/`; records of the wrong shape go to the
 * quarantine JSON only. The whole input is validated before the first write.
 */
export async function generate(inputPath: string, outputRoot: string): Promise<GenerateReport> {
  const items = await readExportItems(inputPath);

  const buckets = new Map<string, string[]>();
  const quarantineJson: unknown[] = [];
  const quarantineYaml: string[] = [];
  const issues: DataIssue[] = [];
  const invalidJsonPath = path.join(outputRoot, INVALID_DIR_NAME, INVALID_JSON_FILE);
  let written = 0;
  let quarantined = 0;
  let malformed = 0;

  for (const item of items) {
    const parsed = parseExportItem(item);
    if (parsed.kind === 'malformed') {
      quarantineJson.push(parsed.raw);
      malformed += 1;
      issues.push({ kind: 'malformed_record', file: invalidJsonPath, message: parsed.reason });
      continue;
    }

    const { entry } = parsed;
    const coordinate = parseTextNumber(entry.textNumber);
    if (!coordinate.valid) {
      quarantineJson.push(parsed.raw);
      quarantineYaml.push(renderEntryBlock(entry));
      quarantined += 1;
      issues.push({
        kind: 'malformed_coordinate',
        file: invalidJsonPath,
        message: `${entry.headword || entry.artha}: text_number "${coordinate.raw}" is not khanda.varga.item`,
      });
      continue;
    }

    const filePath = bucketPath(outputRoot, coordinate.khanda, coordinate.varga);
    const blocks = buckets.get(filePath) ?? [];
    blocks.push(renderEntryBlock(entry));
    buckets.set(filePath, blocks);
    written += 1;
  }

  for (const [filePath, blocks] of buckets) {
    await appendToFile(filePath, blocks);
  }
  await appendJsonLines(invalidJsonPath, quarantineJson);
  if (quarantineYaml.length > 0) {
    await appendToFile(path.join(outputRoot, INVALID_DIR_NAME, INVALID_YAML_FILE), quarantineYaml);
  }

  return {
    processed: items.length,
    written,
    quarantined,
    malformed,
    files: Array.from(buckets.keys()),
    issues,
  } satisfies GenerateReport;
}
