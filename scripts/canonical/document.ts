import { promises as fs } from 'node:fs';

import { Pair, Scalar, YAMLMap, YAMLSeq, isMap, isSeq } from 'yaml';
import type { Document } from 'yaml';

import { DocumentFormatError, IoFailureError, describeError } from '@shared/errors';
import type {
  CanonicalLayoutKind,
  CanonicalLocation,
  DataIssue,
  NodePath,
  ReadonlyVerbEntry,
  VerbEntry,
} from '@shared/types';

import { YAML_OUTPUT, isNullScalar, parseStringDocument, quoted, scalarString } from '../lib/yaml';
import { entryKey } from './keys';

export const NOT_FOUND = 'Not Found';

interface DhatuValue {
  dhatuId: string | null;
  gati: string | null;
}

interface EntryDraft {
  form: string;
  artha: string;
  shloka: string;
  shlokaNum: number;
  layout: CanonicalLayoutKind;
  path: NodePath;
  pair: Pair;
  value: DhatuValue;
}

/**
 * Reads `[dhatu]`, `[gati, dhatu]` or null. Anything else is not a dhatu
 * value and yields `null`.
 */
export function readDhatuValue(node: unknown): DhatuValue | null {
  if (isNullScalar(node)) {
    return { dhatuId: null, gati: null };
  }
  if (!isSeq(node)) {
    return null;
  }

  const items: string[] = [];
  for (const item of node.items) {
    const text = scalarString(item);
    if (text === null) {
      return null;
    }
    items.push(text);
  }

  const toDhatu = (value: string): string | null => (value.trim() === NOT_FOUND || !value.trim() ? null : value);
  if (items.length === 1) {
    return { dhatuId: toDhatu(items[0]), gati: null };
  }
  if (items.length === 2) {
    return { dhatuId: toDhatu(items[1]), gati: items[0].trim() ? items[0] : null };
  }
  return null;
}

function pairKey(pair: Pair): string | null {
  return scalarString(pair.key);
}

/**
 * One canonical verb file. Entries are exposed read-only; `assignDhatuId` is
 * the only way to change the underlying YAML, and it touches nothing but the
 * value node of the entry it is given.
 */
export class CanonicalDocument {
  readonly location: CanonicalLocation;
  readonly entries: ReadonlyVerbEntry[];
  readonly issues: DataIssue[];
  private readonly doc: Document;
  private readonly slots = new WeakMap<ReadonlyVerbEntry, Pair>();
  private modified = false;

  constructor(location: CanonicalLocation, source: string) {
    this.location = location;
    // A form listed under two shlokas repeats its root key in list-layout files.
    this.doc = parseStringDocument(source, { uniqueKeys: false });
    if (this.doc.errors.length > 0) {
      throw new DocumentFormatError(
        location.filePath,
        this.doc.errors.map((error) => error.message),
      );
    }

    const root = this.doc.contents;
    if (!isNullScalar(root) && !isMap(root)) {
      throw new DocumentFormatError(location.filePath, ['root must be a mapping of shloka text']);
    }

    this.issues = [];
    const drafts = isMap(root) ? this.walk(root) : [];
    this.entries = drafts.map((draft) => {
      const entry: VerbEntry = {
        key: entryKey({
          kanda: location.kanda.name,
          varga: location.varga.name,
          adhikaar: location.adhikaar?.name ?? null,
          shloka: draft.shloka,
          artha: draft.artha,
          form: draft.form,
        }),
        form: draft.form,
        dhatuId: draft.value.dhatuId,
        gati: draft.value.gati,
        kanda: location.kanda.name,
        varga: location.varga.name,
        adhikaar: location.adhikaar?.name ?? null,
        artha: draft.artha,
        shlokaNum: draft.shlokaNum,
        shlokaText: draft.shloka,
        layout: draft.layout,
        path: draft.path,
      };
      const frozen = Object.freeze(entry);
      this.slots.set(frozen, draft.pair);
      return frozen;
    });
  }

  get filePath(): string {
    return this.location.filePath;
  }

  get isModified(): boolean {
    return this.modified;
  }

  private issue(message: string): void {
    this.issues.push({ kind: 'unexpected_value', file: this.location.filePath, message });
  }

  private walk(root: YAMLMap): EntryDraft[] {
    const drafts: EntryDraft[] = [];
    let shlokaNum = 0;
    let listShloka: string | null = null;

    for (const shlokaPair of root.items) {
      const key = pairKey(shlokaPair);
      if (key === null) {
        this.issue('non-string key at document root');
        continue;
      }

      if (isMap(shlokaPair.value)) {
        shlokaNum += 1;
        listShloka = null;
        drafts.push(...this.readStandardShloka(key, shlokaNum, shlokaPair.value));
        continue;
      }

      if (isNullScalar(shlokaPair.value)) {
        shlokaNum += 1;
        listShloka = key;
        continue;
      }

      if (isSeq(shlokaPair.value) && listShloka !== null) {
        drafts.push(...this.readListForm(key, listShloka, shlokaNum, shlokaPair.value));
        continue;
      }

      this.issue(`unexpected value under "${key}"`);
    }

    return drafts;
  }

  private readStandardShloka(shloka: string, shlokaNum: number, arthas: YAMLMap): EntryDraft[] {
    const drafts: EntryDraft[] = [];
    for (const arthaPair of arthas.items) {
      const artha = pairKey(arthaPair);
      if (artha === null) {
        this.issue(`non-string artha in shloka ${shlokaNum}`);
        continue;
      }
      if (isNullScalar(arthaPair.value)) {
        continue;
      }
      if (!isMap(arthaPair.value)) {
        this.issue(`artha "${artha}" in shloka ${shlokaNum} is not a mapping of forms`);
        continue;
      }

      for (const formPair of arthaPair.value.items) {
        const form = pairKey(formPair);
        const value = readDhatuValue(formPair.value);
        if (form === null || value === null) {
          this.issue(`unreadable form under "${artha}" in shloka ${shlokaNum}`);
          continue;
        }
        drafts.push({
          form,
          artha,
          shloka,
          shlokaNum,
          layout: 'standard',
          path: [shloka, artha, form],
          pair: formPair,
          value,
        });
      }
    }
    return drafts;
  }

  private readListForm(form: string, shloka: string, shlokaNum: number, senses: YAMLSeq): EntryDraft[] {
    const drafts: EntryDraft[] = [];
    senses.items.forEach((sense, index) => {
      const arthaPair = isMap(sense) && sense.items.length === 1 ? sense.items[0] : undefined;
      const artha = arthaPair ? pairKey(arthaPair) : null;
      const value = arthaPair ? readDhatuValue(arthaPair.value) : null;
      if (!arthaPair || artha === null || value === null) {
        this.issue(`unreadable sense ${index + 1} of "${form}" in shloka ${shlokaNum}`);
        return;
      }
      drafts.push({
        form,
        artha,
        shloka,
        shlokaNum,
        layout: 'nanartha',
        path: [form, index, artha],
        pair: arthaPair,
        value,
      });
    });
    return drafts;
  }

  /**
   * Replaces the dhatu scalar of the entry's node and leaves the gati node as
   * it is; a null value becomes `[value]`. Returns false when the value was
   * already there.
   */
  assignDhatuId(entry: ReadonlyVerbEntry, value: string): boolean {
    const pair = this.slots.get(entry);
    if (!pair) {
      throw new Error(`Entry ${entry.key} does not belong to ${this.location.filePath}`);
    }

    const current = readDhatuValue(pair.value);
    if (current && current.dhatuId === value) {
      return false;
    }

    const node = pair.value;
    if (isSeq(node) && node.items.length > 0) {
      const last = node.items.length - 1;
      const previous = node.items[last];
      const next = quoted(value);
      if (previous instanceof Scalar && previous.type) {
        next.type = previous.type;
      }
      node.items[last] = next;
    } else {
      const seq = new YAMLSeq(this.doc.schema);
      if (entry.gati) {
        seq.items.push(quoted(entry.gati));
      }
      seq.items.push(quoted(value));
      pair.value = seq;
    }
    this.modified = true;
    return true;
  }

  serialise(): string {
    return this.doc.toString(YAML_OUTPUT);
  }

  async save(): Promise<void> {
    try {
      await fs.writeFile(this.location.filePath, this.serialise(), 'utf8');
    } catch (error) {
      throw new IoFailureError(`Unable to write ${this.location.filePath}: ${describeError(error)}`, this.location.filePath, {
        cause: error,
      });
    }
    this.modified = false;
  }
}

export async function loadCanonicalDocument(location: CanonicalLocation): Promise<CanonicalDocument> {
  let source: string;
  try {
    source = await fs.readFile(location.filePath, 'utf8');
  } catch (error) {
    throw new IoFailureError(`Unable to read ${location.filePath}: ${describeError(error)}`, location.filePath, {
      cause: error,
    });
  }
  return new CanonicalDocument(location, source);
}
