import { Scalar, parseDocument } from 'yaml';
import type { Document, ParseOptions, DocumentOptions, SchemaOptions, ScalarTag, ToStringOptions } from 'yaml';

const NULL_PATTERN = /^(?:~|[Nn]ull|NULL)?$/;

// Failsafe keeps `01.0010` and `1.10` as strings; null is the one scalar that
// is still resolved, so `form: null` and a bare `form:` survive a rewrite.
const nullTag: ScalarTag = {
  tag: 'tag:yaml.org,2002:null',
  default: true,
  test: NULL_PATTERN,
  identify: (value) => value === null || value === undefined,
  resolve: () => new Scalar(null),
  createNode: () => new Scalar(null),
  stringify: ({ source }, ctx) =>
    typeof source === 'string' && NULL_PATTERN.test(source) ? source : ctx.options.nullStr,
};

export const STRING_SCHEMA: ParseOptions & DocumentOptions & SchemaOptions = {
  schema: 'failsafe',
  customTags: [nullTag],
};

/** Output settings matching the files the dataset has always been written with. */
export const YAML_OUTPUT: ToStringOptions = {
  indent: 2,
  indentSeq: false,
  lineWidth: 0,
  minContentWidth: 0,
};

export function parseStringDocument(source: string, options: ParseOptions & DocumentOptions = {}): Document {
  return parseDocument(source, { ...STRING_SCHEMA, ...options });
}

export function isNullScalar(node: unknown): boolean {
  return node === null || node === undefined || (node instanceof Scalar && node.value === null);
}

export function quoted(value: string): Scalar<string> {
  const scalar = new Scalar(value);
  scalar.type = Scalar.QUOTE_DOUBLE;
  return scalar;
}

export function scalarString(node: unknown): string | null {
  if (node instanceof Scalar && typeof node.value === 'string') {
    return node.value;
  }
  return null;
}

export function plain(value: string): Scalar<string> {
  const scalar = new Scalar(value);
  scalar.type = Scalar.PLAIN;
  return scalar;
}
