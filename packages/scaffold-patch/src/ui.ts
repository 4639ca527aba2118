import chalk from 'chalk';
import type { MergeReport } from './engine/tree-merger.js';
import type { PlanReport, StepResult } from './types.js';

export function success(msg: string): void {
  console.log(chalk.green('  ✓') + ' ' + msg);
}

export function warn(msg: string): void {
  console.log(chalk.yellow('  !') + ' ' + msg);
}

export function fail(msg: string): void {
  console.log(chalk.red('  ✗') + ' ' + msg);
}

export function info(msg: string): void {
  console.log(chalk.dim('  ~') + ' ' + msg);
}

export function step(msg: string): void {
  console.log(chalk.cyan('  →') + ' ' + msg);
}

const MAX_DETAILS = 20;

export function formatStep(result: StepResult): string {
  const label = `${result.step} ${result.target}`;
  const suffix = result.message ? chalk.dim(` (${result.message})`) : '';
  return `${result.action.padEnd(9)} ${label}${suffix}`;
}

export function stepResult(result: StepResult): void {
  const line = formatStep(result);
  switch (result.action) {
    case 'failed':
      fail(line);
      break;
    case 'skipped':
      warn(line);
      break;
    case 'unchanged':
      info(line);
      break;
    default:
      success(line);
  }

  for (const detail of result.details.slice(0, MAX_DETAILS)) {
    console.log(chalk.dim(`      ${detail}`));
  }
  if (result.details.length > MAX_DETAILS) {
    console.log(chalk.dim(`      ... and ${result.details.length - MAX_DETAILS} more`));
  }
  for (const issue of result.issues) {
    console.log(chalk.red(`      ${issue.kind}: ${issue.message}`));
  }
}

export function planSummary(report: PlanReport): void {
  const failed = report.steps.filter((s) => s.action === 'failed').length;
  const changed = report.steps.filter((s) => !['failed', 'skipped', 'unchanged'].includes(s.action)).length;
  const verb = report.dryRun ? 'would change' : 'changed';
  console.log();
  console.log(chalk.bold(`  ${report.plan}: ${changed} step(s) ${verb}, ${failed} failed`));
  if (report.dryRun) {
    console.log(chalk.dim('  Dry run: nothing was written.'));
  }
  console.log();
}

export function discrepancies(list: string[]): void {
  if (list.length === 0) {
    success('Validation passed: all expected files, directories and markers are present.');
    return;
  }
  fail('Validation failed:');
  for (const item of list) {
    console.log(chalk.red(`    - ${item}`));
  }
}

export function mergeReport(report: MergeReport): void {
  switch (report.status) {
    case 'nothing-to-merge':
      info(`Nothing to merge: ${report.source} does not exist`);
      return;
    case 'already-merged':
      info(`Already merged into ${report.destination}`);
      return;
    default:
      break;
  }
  const verb = report.dryRun ? 'Would move' : 'Moved';
  success(`${verb} ${report.moved.length} file(s) into ${report.destination}`);
  for (const file of report.moved.slice(0, MAX_DETAILS)) {
    console.log(chalk.green(`    + ${file}`));
  }
  if (report.moved.length > MAX_DETAILS) {
    console.log(chalk.dim(`    ... and ${report.moved.length - MAX_DETAILS} more`));
  }
  for (const issue of report.issues) {
    fail(`${issue.kind}: ${issue.message}`);
  }
}
