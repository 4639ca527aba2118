/**
 * scaffold-patch apply <plan>
 */

import { Command } from 'commander';
import { PlanRunner } from '../plan/runner.js';
import { createBackupBranch } from '../utils/git.js';
import { info, planSummary, step, stepResult, success, warn } from '../ui.js';
import { addCommonOptions, exitWithError, loadPlanArg, setup, type CommonOptions } from './context.js';

interface ApplyOptions extends CommonOptions {
  dryRun?: boolean;
  backup?: boolean;
}

export function registerApplyCommand(program: Command): void {
  const command = program
    .command('apply <plan>')
    .description('Apply a migration plan (file path or bundled plan name) to the project')
    .option('--dry-run', 'Show what would change without writing')
    .option('--backup', 'Create a git backup branch before patching');

  addCommonOptions(command).action(async (planArg: string, options: ApplyOptions) => {
    try {
      const { config, logger } = setup(options);
      const loaded = loadPlanArg(planArg);
      const dryRun = options.dryRun ?? false;

      step(`Applying ${loaded.plan.name} to ${config.root}`);
      if (loaded.plan.description) {
        info(loaded.plan.description);
      }

      if (options.backup && !dryRun) {
        const backup = await createBackupBranch(config.root);
        if (backup.created) {
          success(`Created backup branch ${backup.branch}`);
        } else if (backup.reason === 'exists') {
          info(`Backup branch ${backup.branch} already exists`);
        } else {
          warn('Not a git repository, no backup branch created');
        }
      }

      const report = new PlanRunner(logger).run(loaded, {
        root: config.root,
        dryRun,
        stateFile: config.stateFile,
      });

      console.log();
      for (const result of report.steps) {
        stepResult(result);
      }
      planSummary(report);

      if (!report.ok) {
        process.exit(1);
      }
    } catch (error) {
      exitWithError(error);
    }
  });
}
