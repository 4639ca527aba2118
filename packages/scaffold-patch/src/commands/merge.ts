/**
 * scaffold-patch merge <source> <destination>
 * One-off directory merge, paths relative to the project root.
 */

import { Command } from 'commander';
import { TreeMerger } from '../engine/tree-merger.js';
import { mergeReport } from '../ui.js';
import { resolveInside } from '../utils/fs.js';
import { FileMergeJournal, getStatePath } from '../utils/state.js';
import { addCommonOptions, exitWithError, setup, type CommonOptions } from './context.js';

interface MergeCommandOptions extends CommonOptions {
  dryRun?: boolean;
}

export function registerMergeCommand(program: Command): void {
  const command = program
    .command('merge <source> <destination>')
    .description('Move a directory tree into another without overwriting existing files')
    .option('--dry-run', 'Show what would move without touching the filesystem');

  addCommonOptions(command).action((source: string, destination: string, options: MergeCommandOptions) => {
    try {
      const { config, logger } = setup(options);
      const dryRun = options.dryRun ?? false;
      const journal = new FileMergeJournal(getStatePath(config.root, config.stateFile), { readOnly: dryRun });
      const merger = new TreeMerger(logger, { journal });

      const report = merger.merge(resolveInside(config.root, source), resolveInside(config.root, destination), {
        dryRun,
        journalKey: `${source} -> ${destination}`,
      });
      mergeReport(report);

      if (report.status === 'partial') {
        process.exit(1);
      }
    } catch (error) {
      exitWithError(error);
    }
  });
}
