/**
 * scaffold-patch plans
 */

import { Command } from 'commander';
import { listBundledPlans } from '../plan/bundled.js';
import { exitWithError } from './context.js';

export function registerPlansCommand(program: Command): void {
  program
    .command('plans')
    .description('List the bundled migration plans')
    .action(() => {
      try {
        const names = listBundledPlans();
        if (names.length === 0) {
          console.log('No bundled plans found.');
          return;
        }
        console.log('Bundled plans:\n');
        for (const name of names) {
          console.log(`  ${name}`);
        }
        console.log('\nRun "scaffold-patch apply <name>" to apply one.');
      } catch (error) {
        exitWithError(error);
      }
    });
}
