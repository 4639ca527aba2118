/**
 * Plan execution result types
 */

import type { ScaffoldIssue } from './engine/errors.js';

export type StepKind =
  | 'merge'
  | 'remove'
  | 'remove-matching'
  | 'purge'
  | 'ensure-dir'
  | 'create'
  | 'edit'
  | 'gitignore'
  | 'validate';

export type StepAction =
  | 'merged'
  | 'edited'
  | 'created'
  | 'removed'
  | 'unchanged'
  | 'skipped'
  | 'failed';

export interface StepResult {
  step: StepKind;
  target: string;            // Path relative to the project root
  action: StepAction;
  message?: string;
  details: string[];         // Per-item notes: moved files, added entries, discrepancies
  issues: ScaffoldIssue[];
}

export interface PlanReport {
  plan: string;
  root: string;
  dryRun: boolean;
  steps: StepResult[];
  /** True when no step failed */
  ok: boolean;
}
