/**
 * Command tree for scaffold-patch
 */

import { Command } from 'commander';
import { registerApplyCommand } from './commands/apply.js';
import { registerMergeCommand } from './commands/merge.js';
import { registerPlansCommand } from './commands/plans.js';
import { registerValidateCommand } from './commands/validate.js';
import { readPackageVersion } from './utils/package-info.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('scaffold-patch')
    .description('Patch generated project scaffolds: strip boilerplate, insert snippets, merge directories, edit manifest lists')
    .version(readPackageVersion());

  registerApplyCommand(program);
  registerValidateCommand(program);
  registerMergeCommand(program);
  registerPlansCommand(program);

  return program;
}
