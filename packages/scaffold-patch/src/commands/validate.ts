/**
 * scaffold-patch validate <plan>
 * Checks a plan's expectations without changing anything.
 */

import { Command } from 'commander';
import { PlanRunner } from '../plan/runner.js';
import { discrepancies, info, step } from '../ui.js';
import { addCommonOptions, exitWithError, loadPlanArg, setup, type CommonOptions } from './context.js';

export function registerValidateCommand(program: Command): void {
  const command = program
    .command('validate <plan>')
    .description("Check the project against a plan's expectations");

  addCommonOptions(command).action((planArg: string, options: CommonOptions) => {
    try {
      const { config, logger } = setup(options);
      const loaded = loadPlanArg(planArg);

      if (!loaded.plan.expect) {
        info(`Plan ${loaded.plan.name} has no expectations to check.`);
        return;
      }

      step(`Validating ${config.root} against ${loaded.plan.name}`);
      const found = new PlanRunner(logger).validate(loaded, config.root);
      discrepancies(found);

      if (found.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      exitWithError(error);
    }
  });
}
