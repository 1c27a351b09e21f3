#!/usr/bin/env node
/**
 * backup-verify: compare a directory tree against its backup.
 *
 *   backup-verify compare <source> <target> [--deep] [--json] [--all] [--save]
 *   backup-verify snapshots list
 *   backup-verify snapshots show <id> [--json]
 *   backup-verify snapshots update <id>
 *   backup-verify snapshots delete <id>
 */

import { Command } from 'commander';
import type { ComparisonSnapshot } from '../types/snapshot';
import { renderReport, renderSnapshotList } from './cliRender';
import { createComparisonService, type ComparisonService } from './comparisonService';

interface CompareCommandOptions {
  deep?: boolean;
  json?: boolean;
  all?: boolean;
  save?: boolean;
  ignore?: string[];
}

const print = (lines: string[]) => lines.forEach((line) => console.log(line));

const printJson = (value: unknown) => console.log(JSON.stringify(value, null, 2));

/** Aborts the returned signal on Ctrl-C for the duration of `task`. */
const withInterrupt = async <T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> => {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
};

const printSnapshot = (snapshot: ComparisonSnapshot, json = false) => {
  if (json) {
    printJson(snapshot);
    return;
  }
  print([`Snapshot ${snapshot.id} (saved ${snapshot.savedAt})`, ...renderReport(snapshot.report)]);
};

export function compareCommand(getService: () => ComparisonService): Command {
  return new Command('compare')
    .description('Compare a source directory with its backup')
    .argument('<source>', 'source directory')
    .argument('<target>', 'target (backup) directory')
    .option('-d, --deep', 'verify file contents with SHA-256 where metadata is ambiguous')
    .option('--json', 'print the comparison report as JSON')
    .option('-a, --all', 'list identical entries too')
    .option('-s, --save', 'save the report as a snapshot')
    .option('-i, --ignore <pattern...>', 'extra path patterns to skip')
    .action(async (source: string, target: string, options: CompareCommandOptions) => {
      const service = getService();
      const report = await withInterrupt((signal) =>
        service.runComparison({
          sourcePath: source,
          targetPath: target,
          deepScan: options.deep ?? false,
          extraIgnorePatterns: options.ignore ?? [],
          signal,
        }),
      );

      if (options.json) {
        printJson(report);
      } else {
        print(renderReport(report, { showAll: options.all ?? false }));
      }

      if (options.save) {
        const snapshot = await service.saveSnapshot(report);
        console.log(`Saved snapshot ${snapshot.id}`);
      }
    });
}

export function snapshotsCommand(getService: () => ComparisonService): Command {
  const cmd = new Command('snapshots').description('Manage saved comparisons');

  cmd
    .command('list')
    .description('List saved comparisons, newest first')
    .action(async () => {
      print(renderSnapshotList(await getService().listSnapshots()));
    });

  cmd
    .command('show')
    .argument('<id>', 'snapshot id')
    .option('--json', 'print the stored snapshot as JSON')
    .description('Print a saved comparison')
    .action(async (id: string, options: { json?: boolean }) => {
      printSnapshot(await getService().getSnapshot(id), options.json ?? false);
    });

  cmd
    .command('update')
    .argument('<id>', 'snapshot id')
    .description('Compare the saved roots again and overwrite the snapshot')
    .action(async (id: string) => {
      const snapshot = await withInterrupt((signal) => getService().refreshSnapshot(id, signal));
      printSnapshot(snapshot);
    });

  cmd
    .command('delete')
    .argument('<id>', 'snapshot id')
    .description('Delete a saved comparison')
    .action(async (id: string) => {
      await getService().deleteSnapshot(id);
      console.log(`Deleted snapshot ${id}`);
    });

  return cmd;
}

export function createCli(getService: () => ComparisonService = () => createComparisonService()): Command {
  const program = new Command();

  program
    .name('backup-verify')
    .description('Compare directory trees for backup validation')
    .version('0.1.0');

  program.addCommand(compareCommand(getService));
  program.addCommand(snapshotsCommand(getService));

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
