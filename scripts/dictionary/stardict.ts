import { promises as fs } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';

import { IoFailureError, describeError } from '@shared/errors';
import type { DictionaryExport, DictionaryRecord } from '@shared/types';

import { compareSortKeys, textNumberSortKey } from './coordinates';

const gunzipAsync = promisify(gunzip);

export interface StarDictFiles {
  ifo: string;
  idx: string;
  dict: string;
  syn: string | null;
}

export interface StarDictIndexEntry {
  word: string;
  offset: number;
  size: number;
}

export interface StarDictSynonym {
  word: string;
  /** Position of the main word in the `.idx` list. */
  index: number;
}

export interface StarDict {
  metadata: Record<string, string>;
  index: StarDictIndexEntry[];
  synonyms: StarDictSynonym[];
  articles: Buffer;
}

export function parseIfo(content: string): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    const separator = line.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    metadata[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }
  return metadata;
}

function readWord(buffer: Buffer, start: number): { word: string; next: number } | null {
  const end = buffer.indexOf(0, start);
  if (end === -1) {
    return null;
  }
  return { word: buffer.toString('utf8', start, end), next: end + 1 };
}

export function parseIdx(buffer: Buffer, offsetBits: 32 | 64 = 32): StarDictIndexEntry[] {
  const offsetBytes = offsetBits === 64 ? 8 : 4;
  const entries: StarDictIndexEntry[] = [];
  let cursor = 0;

  while (cursor < buffer.length) {
    const read = readWord(buffer, cursor);
    if (!read || read.next + offsetBytes + 4 > buffer.length) {
      break;
    }
    const offset =
      offsetBits === 64
        ? Number(buffer.readBigUInt64BE(read.next))
        : buffer.readUInt32BE(read.next);
    const size = buffer.readUInt32BE(read.next + offsetBytes);
    entries.push({ word: read.word, offset, size });
    cursor = read.next + offsetBytes + 4;
  }

  return entries;
}

export function parseSyn(buffer: Buffer): StarDictSynonym[] {
  const synonyms: StarDictSynonym[] = [];
  let cursor = 0;

  while (cursor < buffer.length) {
    const read = readWord(buffer, cursor);
    if (!read || read.next + 4 > buffer.length) {
      break;
    }
    const index = buffer.readUInt32BE(read.next);
    if (read.word) {
      synonyms.push({ word: read.word, index });
    }
    cursor = read.next + 4;
  }

  return synonyms;
}

export async function locateStarDictFiles(folder: string): Promise<StarDictFiles> {
  let names: string[];
  try {
    names = await fs.readdir(folder);
  } catch (error) {
    throw new IoFailureError(`Dictionary folder not readable: ${describeError(error)}`, folder, { cause: error });
  }

  const pick = (predicate: (name: string) => boolean): string | null => {
    const match = names.filter(predicate).sort()[0];
    return match ? path.join(folder, match) : null;
  };

  const ifo = pick((name) => name.endsWith('.ifo'));
  const idx = pick((name) => name.endsWith('.idx'));
  const dict = pick((name) => name.endsWith('.dict') || name.endsWith('.dict.dz'));
  const syn = pick((name) => name.endsWith('.syn'));

  if (!ifo || !idx || !dict) {
    throw new IoFailureError('Missing required .ifo, .idx, or .dict(.dz) file', folder);
  }

  return { ifo, idx, dict, syn };
}

async function readBuffer(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new IoFailureError(`Unable to read ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
}

export async function readStarDict(folder: string): Promise<StarDict> {
  const files = await locateStarDictFiles(folder);
  const metadata = parseIfo((await readBuffer(files.ifo)).toString('utf8'));
  const offsetBits = metadata.idxoffsetbits === '64' ? 64 : 32;
  const index = parseIdx(await readBuffer(files.idx), offsetBits);

  let articles = await readBuffer(files.dict);
  if (files.dict.endsWith('.dz')) {
    try {
      articles = await gunzipAsync(articles);
    } catch (error) {
      throw new IoFailureError(`Unable to decompress ${files.dict}: ${describeError(error)}`, files.dict, {
        cause: error,
      });
    }
  }

  const synonyms = files.syn ? parseSyn(await readBuffer(files.syn)) : [];
  return { metadata, index, synonyms, articles };
}

export function parseArticle(body: string): DictionaryRecord {
  const [artha = '', textNumber = '', synonymLine = ''] = body.split('\n').map((line) => line.replace(/\r$/, ''));
  return {
    artha,
    text_number: textNumber,
    synonyms: synonymLine.split(' ').filter((word) => word.length > 0),
  };
}

/**
 * Turns a StarDict into the export consumed by the generator. Synonym words
 * repeat their main word's artha and text number; entries are ordered by text
 * number, ties keeping dictionary order.
 */
export function buildDictionaryExport(dictionary: StarDict): DictionaryExport {
  const records = new Map<string, DictionaryRecord>();

  for (const entry of dictionary.index) {
    const body = dictionary.articles.toString('utf8', entry.offset, entry.offset + entry.size);
    records.set(entry.word, parseArticle(body));
  }

  for (const synonym of dictionary.synonyms) {
    const main = dictionary.index[synonym.index];
    const mainRecord = main ? records.get(main.word) : undefined;
    if (!main || !mainRecord || records.has(synonym.word)) {
      continue;
    }
    records.set(synonym.word, {
      artha: mainRecord.artha,
      text_number: mainRecord.text_number,
      synonyms: [main.word],
    });
  }

  const entries = Array.from(records.entries())
    .map((entry, position) => ({ entry, position, key: textNumberSortKey(entry[1].text_number) }))
    .sort((a, b) => compareSortKeys(a.key, b.key) || a.position - b.position)
    .map(({ entry }) => entry);

  return {
    dictionary_name: dictionary.metadata.bookname ?? 'Unknown Dictionary',
    version: dictionary.metadata.version ?? '',
    author: dictionary.metadata.author ?? '',
    entries,
  } satisfies DictionaryExport;
}

export async function writeDictionaryExport(folder: string, outputPath: string): Promise<DictionaryExport> {
  const payload = buildDictionaryExport(await readStarDict(folder));
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
  } catch (error) {
    throw new IoFailureError(`Unable to write ${outputPath}: ${describeError(error)}`, outputPath, { cause: error });
  }
  return payload;
}
