import fs from 'node:fs/promises';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { CanonicalIndex, findCandidates, isPendingValue, matchRecord } from '../../../scripts/backport/matcher';
import { CanonicalDocument } from '../../../scripts/canonical/document';
import {
  KANDA_ONE,
  KANDA_THREE,
  NANARTHA,
  NANARTHA_SHLOKA,
  NANARTHA_VARGA,
  SHLOKA_ONE,
  SHLOKA_TWO,
  STANDARD_VARGA,
  SVARGA,
  makeTempDir,
  writeCanonicalTree,
} from '../../helpers/kosha-fixtures';

const standard = new CanonicalDocument(
  { kanda: { id: 1, name: KANDA_ONE }, varga: { id: 1, name: SVARGA }, adhikaar: null, filePath: 'standard.yaml' },
  STANDARD_VARGA,
);
const nanartha = new CanonicalDocument(
  { kanda: { id: 3, name: KANDA_THREE }, varga: { id: 3, name: NANARTHA }, adhikaar: null, filePath: 'nanartha.yaml' },
  NANARTHA_VARGA,
);

describe('isPendingValue', () => {
  it('treats blank, "Not Found" and lists as not yet reviewed', () => {
    expect(isPendingValue('')).toBe(true);
    expect(isPendingValue('  Not Found ')).toBe(true);
    expect(isPendingValue('01.0001, 01.0002')).toBe(true);
    expect(isPendingValue(' 01.0001 ')).toBe(false);
  });
});

describe('matchRecord', () => {
  it('matches on form, artha and shloka text', () => {
    const result = matchRecord(standard.entries, {
      key: 'stale-key',
      form: 'गच्छति',
      artha: 'गतौ',
      shlokaText: SHLOKA_TWO,
    });
    expect(result).toEqual({ kind: 'matched', entry: standard.entries[3] });
  });

  it('ignores spacing and a missing danda in the shloka text', () => {
    const candidates = findCandidates(standard.entries, {
      key: '',
      form: ' भवति ',
      artha: 'सत्तायाम्',
      shlokaText: 'प्रथमः  श्लोकः',
    });
    expect(candidates).toEqual([standard.entries[0]]);
  });

  it('reports records with no candidate', () => {
    expect(matchRecord(standard.entries, { key: '', form: 'पठति', artha: 'गतौ', shlokaText: SHLOKA_ONE })).toEqual({
      kind: 'not_found',
    });
  });

  it('leaves several candidates ambiguous unless the key picks one', () => {
    const record = { key: 'unknown', form: 'भवति', artha: '', shlokaText: NANARTHA_SHLOKA };

    const ambiguous = matchRecord(nanartha.entries, record);
    expect(ambiguous.kind).toBe('ambiguous');
    expect(ambiguous.kind === 'ambiguous' ? ambiguous.candidates : []).toEqual(nanartha.entries);

    expect(matchRecord(nanartha.entries, { ...record, key: nanartha.entries[1].key })).toEqual({
      kind: 'matched',
      entry: nanartha.entries[1],
    });
  });
});

describe('CanonicalIndex', () => {
  let base: string;

  beforeEach(async () => {
    base = await makeTempDir('matcher-test-');
  });

  afterEach(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  it('locates files by name and loads each one once', async () => {
    const fixture = await writeCanonicalTree(base);
    const index = await CanonicalIndex.load(fixture.root);

    const location = index.locate({ kanda: KANDA_ONE, varga: SVARGA, adhikaar: '' });
    expect(location?.filePath).toBe(fixture.standardPath);
    expect(index.locate({ kanda: KANDA_ONE, varga: NANARTHA, adhikaar: '' })).toBeNull();

    if (!location) {
      throw new Error('expected a location');
    }
    const first = await index.document(location);
    const second = await index.document(location);
    expect(second).toBe(first);
    expect(index.documents()).toEqual([first]);
  });
});
