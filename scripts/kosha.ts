import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { isStructuredLoggingEnabled } from '@shared/config';
import { IoFailureError } from '@shared/errors';
import { log, logError, logStructured, logTally, warn } from '@shared/logger';
import type { DataIssue } from '@shared/types';

import { backport } from './backport/backport';
import { USAGE, UsageError, parseCommand } from './cli/options';
import type { Command } from './cli/options';
import { generate } from './dictionary/generate';
import { writeDictionaryExport } from './dictionary/stardict';
import { collectReviewSets } from './review/collect';
import { addReviewFields } from './review/fields';
import { removeResolved } from './review/remove-resolved';
import { split } from './review/split';
import { verifyIntegrity, verifySplit } from './review/verify';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function reportIssues(operation: string, issues: readonly DataIssue[]): void {
  for (const issue of issues) {
    warn(`${issue.kind}: ${issue.file}${issue.key ? ` [${issue.key}]` : ''}: ${issue.message}`);
  }
  if (issues.length > 0 && isStructuredLoggingEnabled()) {
    logStructured({ event: `${operation}.issues`, level: 'warn', data: { issues: [...issues] } });
  }
}

export async function runCommand(command: Command): Promise<void> {
  switch (command.name) {
    case 'parse-dictionary': {
      const payload = await writeDictionaryExport(command.folder, command.output);
      log(`Wrote ${command.output}`);
      logTally(command.name, { entries: payload.entries.length });
      return;
    }
    case 'generate': {
      const report = await generate(command.input, command.outputRoot);
      reportIssues(command.name, report.issues);
      logTally(command.name, {
        processed: report.processed,
        written: report.written,
        quarantined: report.quarantined,
        malformed: report.malformed,
        files: report.files.length,
      });
      return;
    }
    case 'collect': {
      const report = await collectReviewSets(command.canonicalRoot, command.outputRoot);
      reportIssues(command.name, report.issues);
      logTally(command.name, {
        canonicalFiles: report.canonicalFiles,
        entries: report.entries,
        ...report.categories,
      });
      return;
    }
    case 'split': {
      const report = await split(command.sourceFile, command.destFolder, command.partCount);
      for (const part of report.parts) {
        log(`  ${path.basename(part.filePath)}: ${part.entries} entries`);
      }
      for (const stale of report.staleRemoved) {
        log(`  removed stale ${path.basename(stale)}`);
      }
      logTally(command.name, { total: report.total, parts: report.parts.length, staleRemoved: report.staleRemoved.length });
      return;
    }
    case 'add-review-fields': {
      const report = await addReviewFields(command.folder);
      logTally(command.name, { ...report });
      return;
    }
    case 'remove-resolved': {
      const report = await removeResolved(command.folder, command.dryRun);
      for (const file of report.files.filter((result) => result.rewritten)) {
        const prefix = report.dryRun ? '[dry run] ' : '';
        log(`  ${prefix}${file.filePath}: ${file.before} -> ${file.after} (${file.removed} removed)`);
      }
      logTally(command.name, {
        before: report.before,
        after: report.after,
        removed: report.removed,
        filesChanged: report.filesChanged,
      });
      return;
    }
    case 'backport': {
      const report = await backport(command.source, command.canonicalRoot);
      reportIssues(command.name, report.issues);
      for (const filePath of report.filesModified) {
        log(`  updated ${filePath}`);
      }
      logTally(command.name, {
        processed: report.processed,
        matched: report.matched,
        updated: report.updated,
        unchanged: report.unchanged,
        skippedUnresolved: report.skippedUnresolved,
        skippedPending: report.skippedPending,
        notFound: report.notFound,
        ambiguous: report.ambiguous,
        filesModified: report.filesModified.length,
      });
      return;
    }
    case 'verify-split': {
      const report = await verifySplit(command.sourceFile, command.splitFolder);
      for (const [label, keys] of [
        ['missing', report.missing],
        ['extra', report.extra],
        ['mismatched', report.mismatched],
        ['duplicated', report.duplicated],
      ] as const) {
        for (const key of keys) {
          warn(`${label}: ${key}`);
        }
      }
      log(report.valid ? 'Split is complete' : 'Split does not match its source');
      logTally(command.name, {
        sourceCount: report.sourceCount,
        splitCount: report.splitCount,
        parts: report.parts,
        missing: report.missing.length,
        extra: report.extra.length,
        mismatched: report.mismatched.length,
        duplicated: report.duplicated.length,
      });
      return;
    }
    case 'verify-integrity': {
      const report = await verifyIntegrity(command.canonicalRoot, command.splitRoot);
      reportIssues(command.name, report.issues);
      logTally(command.name, {
        records: report.records,
        resolvable: report.resolvable,
        inSync: report.inSync,
        notFound: report.notFound,
        ambiguous: report.ambiguous,
        headerMismatches: report.headerMismatches,
      });
      return;
    }
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  try {
    await runCommand(command);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof IoFailureError) {
      logError(error);
      return EXIT_FAILURE;
    }
    throw error;
  }
}

if (process.argv[1] && fileURLToPath(import.meta.url) === path.resolve(process.argv[1])) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      logError(error);
      process.exit(EXIT_FAILURE);
    });
}
