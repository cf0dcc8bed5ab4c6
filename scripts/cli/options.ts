import path from 'node:path';

import { resolveKoshaPaths, resolvePartCount } from '@shared/config';

export const USAGE = `Usage: kosha <command> [arguments]

Commands:
  parse-dictionary <folder> [output.json]      Export a StarDict dictionary to JSON
  generate [input.json] [outputRoot]           Append dictionary entries to per-varga YAML files
  collect [dataDir] [reviewDir]                Write review lists from the canonical tree
  split <list.yaml> [destFolder] [--parts N]   Split a review list into part files
  add-review-fields [folder]                   Add missing resolved/comment fields to part files
  remove-resolved [folder] [--dry-run|-n]      Drop resolved entries from part files
  backport [reviewPath] [dataDir]              Write reviewed dhatu ids back to the canonical tree
  verify-split <list.yaml> [splitFolder]       Compare a review list with its part files
  verify-integrity [dataDir] [reviewPath]      Check review records against the canonical tree`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type Command =
  | { name: 'parse-dictionary'; folder: string; output: string }
  | { name: 'generate'; input: string; outputRoot: string }
  | { name: 'collect'; canonicalRoot: string; outputRoot: string }
  | { name: 'split'; sourceFile: string; destFolder: string; partCount: number }
  | { name: 'add-review-fields'; folder: string }
  | { name: 'remove-resolved'; folder: string; dryRun: boolean }
  | { name: 'backport'; source: string; canonicalRoot: string }
  | { name: 'verify-split'; sourceFile: string; splitFolder: string }
  | { name: 'verify-integrity'; canonicalRoot: string; splitRoot: string };

export type CommandName = Command['name'];

interface ParsedArgs {
  positionals: string[];
  dryRun: boolean;
  parts: string | null;
}

function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], dryRun: false, parts: null };
  let literal = false;

  for (let index = 0; index < argv.length; index += 1) {
    const raw = argv[index];
    if (literal) {
      parsed.positionals.push(raw);
      continue;
    }
    if (raw === '--') {
      literal = true;
      continue;
    }
    if (raw === '--dry-run' || raw === '-n') {
      parsed.dryRun = true;
      continue;
    }
    if (raw === '--parts' || raw === '-p') {
      const value = argv[index + 1];
      if (value === undefined) {
        throw new UsageError(`${raw} needs a value`);
      }
      parsed.parts = value;
      index += 1;
      continue;
    }
    if (raw.startsWith('--parts=')) {
      parsed.parts = raw.slice('--parts='.length);
      continue;
    }
    if (raw.startsWith('-') && raw !== '-') {
      throw new UsageError(`Unknown option ${raw}`);
    }
    parsed.positionals.push(raw);
  }

  return parsed;
}

function parsePartCount(value: string): number {
  const trimmed = value.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`--parts must be a positive integer, received "${value}"`);
  }
  return parsed;
}

function listBaseName(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * Turns `argv` (without the node and script paths) into a command. Paths
 * that are left out fall back to the KOSHA_* environment defaults.
 */
export function parseCommand(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Command {
  const [name, ...rest] = argv;
  if (!name) {
    throw new UsageError('Missing command');
  }

  const args = parseArgs(rest);
  const paths = resolveKoshaPaths(env, cwd);
  const at = (position: number): string | undefined => {
    const value = args.positionals[position];
    return value === undefined ? undefined : path.resolve(cwd, value);
  };
  const expect = (max: number): void => {
    if (args.positionals.length > max) {
      throw new UsageError(`${name} takes at most ${max} argument${max === 1 ? '' : 's'}`);
    }
  };
  const rejectFlags = (allowed: { dryRun?: boolean; parts?: boolean }): void => {
    if (args.dryRun && !allowed.dryRun) {
      throw new UsageError(`${name} does not accept --dry-run`);
    }
    if (args.parts !== null && !allowed.parts) {
      throw new UsageError(`${name} does not accept --parts`);
    }
  };
  const required = (position: number, label: string): string => {
    const value = at(position);
    if (!value) {
      throw new UsageError(`${name} needs ${label}`);
    }
    return value;
  };

  switch (name) {
    case 'parse-dictionary':
      expect(2);
      rejectFlags({});
      return {
        name: 'parse-dictionary',
        folder: required(0, 'a dictionary folder'),
        output: at(1) ?? path.join(paths.generatedDir, 'dictionary.json'),
      };
    case 'generate':
      expect(2);
      rejectFlags({});
      return {
        name: 'generate',
        input: at(0) ?? path.join(paths.generatedDir, 'dictionary.json'),
        outputRoot: at(1) ?? paths.generatedDir,
      };
    case 'collect':
      expect(2);
      rejectFlags({});
      return { name: 'collect', canonicalRoot: at(0) ?? paths.dataDir, outputRoot: at(1) ?? paths.reviewDir };
    case 'split': {
      expect(2);
      rejectFlags({ parts: true });
      const sourceFile = required(0, 'a review list');
      return {
        name: 'split',
        sourceFile,
        destFolder: at(1) ?? path.join(paths.reviewDir, listBaseName(sourceFile)),
        partCount: args.parts === null ? resolvePartCount(env) : parsePartCount(args.parts),
      };
    }
    case 'add-review-fields':
      expect(1);
      rejectFlags({});
      return { name: 'add-review-fields', folder: at(0) ?? paths.reviewDir };
    case 'remove-resolved':
      expect(1);
      rejectFlags({ dryRun: true });
      return { name: 'remove-resolved', folder: at(0) ?? paths.reviewDir, dryRun: args.dryRun };
    case 'backport':
      expect(2);
      rejectFlags({});
      return { name: 'backport', source: at(0) ?? paths.reviewDir, canonicalRoot: at(1) ?? paths.dataDir };
    case 'verify-split': {
      expect(2);
      rejectFlags({});
      const sourceFile = required(0, 'a review list');
      return {
        name: 'verify-split',
        sourceFile,
        splitFolder: at(1) ?? path.join(paths.reviewDir, listBaseName(sourceFile)),
      };
    }
    case 'verify-integrity':
      expect(2);
      rejectFlags({});
      return { name: 'verify-integrity', canonicalRoot: at(0) ?? paths.dataDir, splitRoot: at(1) ?? paths.reviewDir };
    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
}
