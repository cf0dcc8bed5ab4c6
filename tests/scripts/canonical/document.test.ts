import { describe, expect, it } from 'vitest';

import { DocumentFormatError } from '@shared/errors';
import type { CanonicalLocation } from '@shared/types';

import { CanonicalDocument, readDhatuValue } from '../../../scripts/canonical/document';
import { entryKey } from '../../../scripts/canonical/keys';
import { parseStringDocument } from '../../../scripts/lib/yaml';
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
} from '../../helpers/kosha-fixtures';

const STANDARD_LOCATION: CanonicalLocation = {
  kanda: { id: 1, name: KANDA_ONE },
  varga: { id: 1, name: SVARGA },
  adhikaar: null,
  filePath: '/data/1_प्रथमकाण्डः/1_स्वर्गवर्गः.yaml',
};

const NANARTHA_LOCATION: CanonicalLocation = {
  kanda: { id: 3, name: KANDA_THREE },
  varga: { id: 3, name: NANARTHA },
  adhikaar: null,
  filePath: '/data/3_तृतीयकाण्डः/3_नानार्थवर्गः.yaml',
};

describe('readDhatuValue', () => {
  const valueOf = (source: string): unknown => {
    const doc = parseStringDocument(`v: ${source}\n`);
    return doc.get('v', true);
  };

  it('reads the three shapes of a dhatu value', () => {
    expect(readDhatuValue(valueOf('null'))).toEqual({ dhatuId: null, gati: null });
    expect(readDhatuValue(valueOf('["01.0010"]'))).toEqual({ dhatuId: '01.0010', gati: null });
    expect(readDhatuValue(valueOf('[प्र, 01.0010]'))).toEqual({ dhatuId: '01.0010', gati: 'प्र' });
    expect(readDhatuValue(valueOf('["Not Found"]'))).toEqual({ dhatuId: null, gati: null });
  });

  it('rejects anything else', () => {
    expect(readDhatuValue(valueOf('"01.0010"'))).toBeNull();
    expect(readDhatuValue(valueOf('[a, b, c]'))).toBeNull();
    expect(readDhatuValue(valueOf('{a: b}'))).toBeNull();
  });
});

describe('CanonicalDocument', () => {
  it('lists standard entries with their shloka, artha and keys', () => {
    const document = new CanonicalDocument(STANDARD_LOCATION, STANDARD_VARGA);

    expect(document.issues).toEqual([]);
    expect(
      document.entries.map((entry) => [entry.shlokaNum, entry.artha, entry.form, entry.gati, entry.dhatuId]),
    ).toEqual([
      [1, 'सत्तायाम्', 'भवति', null, '01.0001'],
      [1, 'सत्तायाम्', 'प्रभवति', 'प्र', '01.0001'],
      [1, 'गतौ', 'गच्छति', null, null],
      [2, 'गतौ', 'गच्छति', null, '01.0982, 01.1000'],
      [2, 'गतौ', 'अनुगच्छति', 'अनु', null],
    ]);

    const [first] = document.entries;
    expect(first).toMatchObject({
      kanda: KANDA_ONE,
      varga: SVARGA,
      adhikaar: null,
      shlokaText: SHLOKA_ONE,
      layout: 'standard',
      path: [SHLOKA_ONE, 'सत्तायाम्', 'भवति'],
    });
    expect(first.key).toBe(
      entryKey({ kanda: KANDA_ONE, varga: SVARGA, adhikaar: null, shloka: SHLOKA_ONE, artha: 'सत्तायाम्', form: 'भवति' }),
    );
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('lists the senses of list-layout forms under their shloka', () => {
    const document = new CanonicalDocument(NANARTHA_LOCATION, NANARTHA_VARGA);

    expect(document.entries).toHaveLength(2);
    expect(document.entries[0]).toMatchObject({
      form: 'भवति',
      artha: 'सत्तायाम्',
      dhatuId: '01.0001',
      gati: null,
      shlokaNum: 1,
      shlokaText: NANARTHA_SHLOKA,
      layout: 'nanartha',
      path: ['भवति', 0, 'सत्तायाम्'],
    });
    expect(document.entries[1]).toMatchObject({
      artha: 'प्राप्तौ',
      gati: 'प्र',
      dhatuId: '01.0001, 01.0002',
      path: ['भवति', 1, 'प्राप्तौ'],
    });
  });

  it('serialises an untouched document back to the same text', () => {
    const document = new CanonicalDocument(STANDARD_LOCATION, STANDARD_VARGA);
    expect(document.serialise()).toBe(STANDARD_VARGA);
    expect(document.isModified).toBe(false);
  });

  it('replaces only the dhatu value of the assigned entry and keeps its gati', () => {
    const document = new CanonicalDocument(STANDARD_LOCATION, STANDARD_VARGA);
    const target = document.entries[1];

    expect(document.assignDhatuId(target, '01.0002')).toBe(true);
    expect(document.isModified).toBe(true);
    expect(document.serialise()).toBe(
      STANDARD_VARGA.replace(
        '"प्रभवति":\n    - "प्र"\n    - "01.0001"',
        '"प्रभवति":\n    - "प्र"\n    - "01.0002"',
      ),
    );
  });

  it('turns a null value into a single-item list', () => {
    const document = new CanonicalDocument(STANDARD_LOCATION, STANDARD_VARGA);

    document.assignDhatuId(document.entries[2], '01.0982');

    expect(document.serialise()).toBe(
      STANDARD_VARGA.replace('    "गच्छति": null\n', '    "गच्छति":\n    - "01.0982"\n'),
    );
  });

  it('leaves a plain gati scalar exactly as written', () => {
    const source = [
      `"${SHLOKA_ONE}":`,
      '  "सत्तायाम्":',
      '    प्रभवति:',
      '    - प्र',
      '    - "01.0001"',
      '',
    ].join('\n');
    const document = new CanonicalDocument(STANDARD_LOCATION, source);

    document.assignDhatuId(document.entries[0], '01.0002');

    expect(document.serialise()).toBe(source.replace('- "01.0001"', '- "01.0002"'));
  });

  it('keeps the quoting style of the replaced dhatu scalar', () => {
    const source = `"${SHLOKA_ONE}":\n  "गतौ":\n    "गच्छति":\n    - Not Found\n`;
    const document = new CanonicalDocument(STANDARD_LOCATION, source);

    document.assignDhatuId(document.entries[0], '01.0982');

    expect(document.serialise()).toBe(`"${SHLOKA_ONE}":\n  "गतौ":\n    "गच्छति":\n    - 01.0982\n`);
  });

  it('reports no change when the value is already there', () => {
    const document = new CanonicalDocument(STANDARD_LOCATION, STANDARD_VARGA);
    expect(document.assignDhatuId(document.entries[0], '01.0001')).toBe(false);
    expect(document.isModified).toBe(false);
  });

  it('updates list-layout senses in place', () => {
    const document = new CanonicalDocument(NANARTHA_LOCATION, NANARTHA_VARGA);

    document.assignDhatuId(document.entries[1], '01.0002');

    const reread = new CanonicalDocument(NANARTHA_LOCATION, document.serialise());
    expect(reread.entries.map((entry) => [entry.gati, entry.dhatuId])).toEqual([
      [null, '01.0001'],
      ['प्र', '01.0002'],
    ]);
  });

  it('reads a list-layout form that repeats under a later shloka', () => {
    const source = [
      `"${NANARTHA_SHLOKA}": null`,
      '"भवति":',
      '- "सत्तायाम्":',
      '  - "01.0001"',
      `"${SHLOKA_TWO}": null`,
      '"भवति":',
      '- "प्राप्तौ":',
      '  - "01.0002"',
      '',
    ].join('\n');
    const document = new CanonicalDocument(NANARTHA_LOCATION, source);

    expect(document.entries.map((entry) => [entry.form, entry.artha, entry.shlokaNum, entry.shlokaText])).toEqual([
      ['भवति', 'सत्तायाम्', 1, NANARTHA_SHLOKA],
      ['भवति', 'प्राप्तौ', 2, SHLOKA_TWO],
    ]);

    document.assignDhatuId(document.entries[1], '01.0003');
    expect(document.serialise()).toBe(source.replace('- "01.0002"', '- "01.0003"'));
  });

  it('refuses entries from another document', () => {
    const one = new CanonicalDocument(STANDARD_LOCATION, STANDARD_VARGA);
    const other = new CanonicalDocument(STANDARD_LOCATION, STANDARD_VARGA);
    expect(() => one.assignDhatuId(other.entries[0], '01.0002')).toThrow(/does not belong/);
  });

  it('reports values it cannot read and keeps the rest', () => {
    const source = [
      `"${SHLOKA_ONE}":`,
      '  "सत्तायाम्":',
      '    "भवति": "01.0001"',
      '    "अस्ति":',
      '    - "02.0001"',
      `"${SHLOKA_TWO}": "stray"`,
      '',
    ].join('\n');
    const document = new CanonicalDocument(STANDARD_LOCATION, source);

    expect(document.entries.map((entry) => entry.form)).toEqual(['अस्ति']);
    expect(document.issues.map((issue) => issue.kind)).toEqual(['unexpected_value', 'unexpected_value']);
  });

  it('rejects documents that are not a mapping', () => {
    expect(() => new CanonicalDocument(STANDARD_LOCATION, '- a\n- b\n')).toThrow(DocumentFormatError);
    expect(() => new CanonicalDocument(STANDARD_LOCATION, 'a: [\n')).toThrow(DocumentFormatError);
  });

  it('treats an empty file as having no entries', () => {
    expect(new CanonicalDocument(STANDARD_LOCATION, '').entries).toEqual([]);
  });
});
