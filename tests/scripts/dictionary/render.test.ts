import { describe, expect, it } from 'vitest';

import { appendBlocks, blockKeyFor, renderEntryBlock, renderYamlKey } from '../../../scripts/dictionary/render';

describe('dictionary rendering', () => {
  it('leaves ordinary keys plain and quotes the rest', () => {
    expect(renderYamlKey('सत्तायाम्')).toBe('सत्तायाम्');
    expect(renderYamlKey('yes')).toBe('"yes"');
    expect(renderYamlKey('12')).toBe('"12"');
    expect(renderYamlKey('a: b')).toBe('"a: b"');
    expect(renderYamlKey('- item')).toBe('"- item"');
    expect(renderYamlKey('')).toBe('""');
  });

  it('renders an entry as its gloss followed by synonym keys', () => {
    expect(
      renderEntryBlock({ artha: 'सत्तायाम्', headword: 'भवति', synonyms: ['अस्ति', ' वर्तते '] }),
    ).toBe('सत्तायाम्:\n  - अस्ति:\n  - वर्तते:\n');
  });

  it('falls back to the headword when the gloss is blank', () => {
    expect(blockKeyFor({ artha: '  ', headword: 'फलति' })).toBe('फलति');
    expect(renderEntryBlock({ artha: '', headword: 'फलति', synonyms: [] })).toBe('फलति:\n');
  });

  it('separates appended blocks from each other and from existing content', () => {
    expect(appendBlocks('', ['a:\n', 'b:\n'])).toBe('a:\n\nb:\n');
    expect(appendBlocks('x:\n', ['a:\n'])).toBe('x:\n\na:\n');
    expect(appendBlocks('x:', ['a:\n'])).toBe('x:\n\na:\n');
    expect(appendBlocks('x:\n', [])).toBe('x:\n');
  });
});
