export type TextCoordinate =
  | { valid: true; khanda: number; varga: number; item: number }
  | { valid: false; raw: string };

export type ValidTextCoordinate = Extract<TextCoordinate, { valid: true }>;

export interface DictionaryEntry {
  headword: string;
  artha: string;
  textNumber: string;
  synonyms: string[];
}

export interface DictionaryExport {
  dictionary_name: string;
  version: string;
  author: string;
  entries: Array<[string, DictionaryRecord]>;
}

export interface DictionaryRecord {
  artha: string;
  text_number: string;
  synonyms: string[];
}

export interface NamedIndex {
  id: number;
  name: string;
}

/** Where a canonical verb file sits, by both its numeric ids and its names. */
export interface CanonicalLocation {
  kanda: NamedIndex;
  varga: NamedIndex;
  adhikaar: NamedIndex | null;
  filePath: string;
}

export type CanonicalLayoutKind = 'standard' | 'nanartha';

/** Key or sequence index steps from the document root to a dhatu value node. */
export type NodePath = ReadonlyArray<string | number>;

export interface VerbEntry {
  key: string;
  form: string;
  /** `null` is the "Not Found" sentinel. A comma separates several candidate ids. */
  dhatuId: string | null;
  gati: string | null;
  kanda: string;
  varga: string;
  adhikaar: string | null;
  artha: string;
  shlokaNum: number;
  shlokaText: string;
  layout: CanonicalLayoutKind;
  path: NodePath;
}

export type ReadonlyVerbEntry = Readonly<VerbEntry>;

export type DhatuField = 'dhatu_id' | 'dhatu_ids';

export type ReviewCategory =
  | 'multiple_dhatu_ids_without_gati'
  | 'multiple_dhatu_ids_with_gati'
  | 'not_found_dhatu_ids_without_gati'
  | 'not_found_dhatu_ids_with_gati';

export interface ReviewRecord {
  key: string;
  form: string;
  field: DhatuField;
  value: string;
  gati: string;
  kanda: string;
  varga: string;
  adhikaar: string;
  artha: string;
  shlokaNum: string;
  shlokaText: string;
  resolved: boolean;
  comment: string;
}

export type IssueKind =
  | 'malformed_coordinate'
  | 'malformed_record'
  | 'no_match'
  | 'ambiguous_match'
  | 'file_not_found'
  | 'unexpected_value'
  | 'header_count_mismatch';

export interface DataIssue {
  kind: IssueKind;
  file: string;
  message: string;
  key?: string;
}
