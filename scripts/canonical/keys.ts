import { normaliseShloka, normaliseText } from '@shared/text-normalizer';

import { sha1, stableStringify } from '../lib/utils';

export const ENTRY_KEY_LENGTH = 16;

export interface EntryIdentity {
  kanda: string;
  varga: string;
  adhikaar: string | null;
  shloka: string;
  artha: string;
  form: string;
}

/**
 * Surrogate key of a canonical verb entry. Built only from fields a backport
 * never writes, so it survives dhatu edits.
 */
export function entryKey(identity: EntryIdentity): string {
  const payload = {
    kanda: normaliseText(identity.kanda) ?? '',
    varga: normaliseText(identity.varga) ?? '',
    adhikaar: normaliseText(identity.adhikaar) ?? '',
    shloka: normaliseShloka(identity.shloka),
    artha: normaliseText(identity.artha) ?? '',
    form: normaliseText(identity.form) ?? '',
  };
  return sha1(stableStringify(payload)).slice(0, ENTRY_KEY_LENGTH);
}
