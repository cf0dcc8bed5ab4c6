import path from 'node:path';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'y', 'on', 'enabled']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'n', 'off', 'disabled']);

export const DEFAULT_PART_COUNT = 10;

export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === null) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }

  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return defaultValue;
}

export function parsePositiveInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return fallback;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return parsed > 0 ? parsed : fallback;
}

export interface KoshaPaths {
  /** Canonical verb data tree (`<id>_<kanda>/...`). */
  dataDir: string;
  /** Output root of the dictionary generator. */
  generatedDir: string;
  /** Root of exported review lists and their split parts. */
  reviewDir: string;
}

function resolveDir(value: string | undefined, fallback: string, cwd: string): string {
  const raw = value?.trim() || fallback;
  return path.resolve(cwd, raw);
}

export function resolveKoshaPaths(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): KoshaPaths {
  return {
    dataDir: resolveDir(env.KOSHA_DATA_DIR, 'Data', cwd),
    generatedDir: resolveDir(env.KOSHA_GENERATED_DIR, 'generated', cwd),
    reviewDir: resolveDir(env.KOSHA_REVIEW_DIR, 'output', cwd),
  } satisfies KoshaPaths;
}

export function resolvePartCount(env: NodeJS.ProcessEnv = process.env): number {
  return parsePositiveInteger(env.KOSHA_PART_COUNT, DEFAULT_PART_COUNT);
}

export function isStructuredLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return parseBooleanFlag(env.KOSHA_STRUCTURED_LOGS, false);
}
