/**
 * Plan runner: applies a MigrationPlan to a project root.
 *
 * Steps run in a fixed order (merges, removals, purges, directories,
 * creations, file edits, .gitignore entries, expectations) and each produces a StepResult. A step
 * that hits a ScaffoldError is recorded as failed and the run moves on to the
 * next step; any other error propagates.
 *
 * Exactly-once guarantees:
 * - list entries go through ensureEntries
 * - marker inserts are skipped when the block is already present verbatim
 * - directories and creations skip existing paths
 * - .gitignore entries skip existing lines
 */

import * as path from 'path';
import type { Logger } from 'pino';
import { NotFoundError, isScaffoldError, type ScaffoldIssue } from '../engine/errors.js';
import { ensureEntries, removeLinesContainingAny } from '../engine/list-block-editor.js';
import { insertAfterMarker, removeBlock } from '../engine/marker-insert.js';
import { filterLines } from '../engine/pattern-filter.js';
import { ScaffoldValidator } from '../engine/scaffold-validator.js';
import {
  containsBlock,
  findLine,
  readDocument,
  writeDocument,
  writeFileAtomic,
  type LoadedDocument,
} from '../engine/text-document.js';
import { TreeMerger, type MergeJournal } from '../engine/tree-merger.js';
import type { PlanReport, StepKind, StepResult } from '../types.js';
import {
  ensureDirectory,
  pathExists,
  purgeNamed,
  removeMatching,
  removePath,
  resolveInside,
} from '../utils/fs.js';
import { FileMergeJournal, getStatePath } from '../utils/state.js';
import { resolveContent, type LoadedPlan } from './loader.js';
import type { CreateSpec, Expectations, FileEdit, MergeSpec } from './schema.js';

export interface RunOptions {
  /** Project root; every plan path is relative to it */
  root: string;
  /** Compute every step without writing anything */
  dryRun?: boolean;
  /** Merge journal; defaults to the state file under the root */
  journal?: MergeJournal;
  /** State file name under the root, used when no journal is given */
  stateFile?: string;
}

interface RunContext {
  root: string;
  baseDir: string;
  dryRun: boolean;
}

export class PlanRunner {
  private readonly logger: Logger;
  private readonly validator: ScaffoldValidator;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'plan-runner' });
    this.validator = new ScaffoldValidator(logger);
  }

  run(loaded: LoadedPlan, options: RunOptions): PlanReport {
    const { plan } = loaded;
    const root = path.resolve(options.root);
    const dryRun = options.dryRun ?? false;
    const ctx: RunContext = { root, baseDir: loaded.baseDir, dryRun };
    const steps: StepResult[] = [];

    this.logger.info({ plan: plan.name, root, dryRun }, 'Applying plan');

    // Created on first use: reading the state file can fail like any merge step
    let merger: TreeMerger | undefined;
    for (const merge of plan.merges) {
      steps.push(this.guard('merge', `${merge.from} -> ${merge.to}`, () => {
        const active = (merger ??= new TreeMerger(this.logger, {
          journal: options.journal
            ?? new FileMergeJournal(getStatePath(root, options.stateFile), { readOnly: dryRun }),
        }));
        return this.applyMerge(ctx, active, merge);
      }));
    }

    for (const rel of plan.remove) {
      steps.push(this.guard('remove', rel, () => {
        const removed = removePath(resolveInside(root, rel), dryRun);
        return removed
          ? result('remove', rel, 'removed')
          : result('remove', rel, 'unchanged', { message: 'already removed' });
      }));
    }

    for (const matcher of plan.removeMatching) {
      steps.push(this.guard('remove-matching', matcher.dir, () => {
        const removed = removeMatching(resolveInside(root, matcher.dir), matcher.nameContains, dryRun);
        return removed.length > 0
          ? result('remove-matching', matcher.dir, 'removed', { details: removed })
          : result('remove-matching', matcher.dir, 'unchanged', { message: `nothing matching "${matcher.nameContains}"` });
      }));
    }

    for (const fileName of plan.purge) {
      steps.push(this.guard('purge', fileName, () => {
        const purged = purgeNamed(root, fileName, dryRun);
        return purged.length > 0
          ? result('purge', fileName, 'removed', { details: purged })
          : result('purge', fileName, 'unchanged', { message: 'no matching files' });
      }));
    }

    for (const rel of plan.ensureDirs) {
      steps.push(this.guard('ensure-dir', rel, () => {
        const created = ensureDirectory(resolveInside(root, rel), dryRun);
        return created
          ? result('ensure-dir', rel, 'created')
          : result('ensure-dir', rel, 'unchanged', { message: 'already exists' });
      }));
    }

    for (const creation of plan.create) {
      steps.push(this.guard('create', creation.path, () => this.applyCreate(ctx, creation)));
    }

    for (const edit of plan.files) {
      steps.push(this.guard('edit', edit.path, () => this.applyEdit(ctx, edit)));
    }

    if (plan.gitignore.length > 0) {
      steps.push(this.guard('gitignore', '.gitignore', () => this.applyGitignore(ctx, plan.gitignore)));
    }

    if (plan.expect) {
      const expect = plan.expect;
      steps.push(dryRun
        ? result('validate', '.', 'skipped', { message: 'dry run: expectations describe the patched state' })
        : this.guard('validate', '.', () => this.applyValidate(root, expect)));
    }

    const ok = steps.every((step) => step.action !== 'failed');
    this.logger.info({ plan: plan.name, steps: steps.length, ok }, 'Plan finished');
    return { plan: plan.name, root, dryRun, steps, ok };
  }

  /** Check a plan's expectations only; returns the discrepancies */
  validate(loaded: LoadedPlan, root: string): string[] {
    if (!loaded.plan.expect) {
      return [];
    }
    return this.validator.check(path.resolve(root), loaded.plan.expect);
  }

  private applyMerge(ctx: RunContext, merger: TreeMerger, merge: MergeSpec): StepResult {
    const target = `${merge.from} -> ${merge.to}`;
    const report = merger.merge(resolveInside(ctx.root, merge.from), resolveInside(ctx.root, merge.to), {
      dryRun: ctx.dryRun,
      journalKey: target,
      pruneBoundary: merge.pruneBoundary === undefined ? undefined : resolveInside(ctx.root, merge.pruneBoundary),
    });

    switch (report.status) {
      case 'nothing-to-merge':
        return result('merge', target, 'unchanged', { message: `nothing to merge: ${merge.from} does not exist` });
      case 'already-merged':
        return result('merge', target, 'unchanged', { message: 'already merged' });
      case 'partial':
        return result('merge', target, 'failed', {
          message: `${report.moved.length} moved, ${report.issues.length} issue(s)`,
          details: report.moved,
          issues: report.issues,
        });
      case 'merged':
        return result('merge', target, 'merged', {
          message: `${report.moved.length} file(s) moved`,
          details: report.moved,
        });
    }
  }

  private applyCreate(ctx: RunContext, creation: CreateSpec): StepResult {
    const target = resolveInside(ctx.root, creation.path);
    if (pathExists(target)) {
      return result('create', creation.path, 'unchanged', { message: 'already exists' });
    }
    const content = resolveContent(creation, ctx.baseDir);
    if (!ctx.dryRun) {
      writeFileAtomic(target, content);
    }
    return result('create', creation.path, 'created');
  }

  private applyEdit(ctx: RunContext, edit: FileEdit): StepResult {
    let doc: LoadedDocument;
    try {
      doc = readDocument(resolveInside(ctx.root, edit.path));
    } catch (error) {
      if (error instanceof NotFoundError) {
        const issue = new NotFoundError(edit.path, 'file').toIssue();
        this.logger.warn({ path: edit.path, required: edit.required }, 'File to edit not found');
        return edit.required
          ? result('edit', edit.path, 'failed', { issues: [issue] })
          : result('edit', edit.path, 'skipped', { message: 'file not found', issues: [issue] });
      }
      throw error;
    }

    const details: string[] = [];
    let lines = filterLines(doc.lines, edit.remove);
    noteRemoved(details, doc.lines.length - lines.length);

    for (const block of edit.retract) {
      const before = lines.length;
      lines = removeBlock(lines, resolveContent(block, ctx.baseDir));
      if (lines.length < before) {
        details.push(`retracted block (${before - lines.length} line(s))`);
      }
    }

    for (const list of edit.lists) {
      const before = lines.length;
      lines = removeLinesContainingAny(lines, list.remove);
      noteRemoved(details, before - lines.length, list.block);

      if (list.add.length === 0) continue;
      const edited = ensureEntries(lines, list.block, list.add, {
        close: list.close,
        indent: list.indent,
        path: edit.path,
      });
      if (!edited.ok) {
        // Nothing is written when a required block is missing
        return result('edit', edit.path, 'failed', { details, issues: [edited.error.toIssue()] });
      }
      lines = edited.lines;
      for (const entry of edited.added) {
        details.push(`added entry ${entry}`);
      }
    }

    for (const insertion of edit.insert) {
      const content = resolveContent(insertion, ctx.baseDir);
      if (containsBlock(lines, content)) {
        details.push('insert already present');
        continue;
      }
      if (insertion.marker !== undefined && findLine(lines, insertion.marker) === -1) {
        this.logger.warn({ path: edit.path, marker: insertion.marker }, 'Marker not found, appending');
        details.push(`marker "${insertion.marker}" not found, appended`);
      } else {
        details.push(insertion.marker !== undefined ? `inserted after "${insertion.marker}"` : 'appended block');
      }
      lines = insertAfterMarker(lines, insertion.marker, content);
    }

    if (sameLines(doc.lines, lines)) {
      return result('edit', edit.path, 'unchanged', { details });
    }
    if (!ctx.dryRun) {
      writeDocument(resolveInside(ctx.root, edit.path), { ...doc, lines });
    }
    return result('edit', edit.path, 'edited', { details });
  }

  private applyGitignore(ctx: RunContext, entries: string[]): StepResult {
    const file = resolveInside(ctx.root, '.gitignore');
    let doc: LoadedDocument;
    try {
      doc = readDocument(file);
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
      doc = { lines: [], eol: '\n', finalNewline: true };
    }

    const missing = [...new Set(entries)].filter((entry) => !doc.lines.some((line) => line.trim() === entry));
    if (missing.length === 0) {
      return result('gitignore', '.gitignore', 'unchanged', { message: 'entries already present' });
    }
    if (!ctx.dryRun) {
      writeDocument(file, { ...doc, lines: insertAfterMarker(doc.lines, undefined, missing), finalNewline: true });
    }
    return result('gitignore', '.gitignore', 'edited', { details: missing.map((entry) => `added ${entry}`) });
  }

  private applyValidate(root: string, expect: Expectations): StepResult {
    const discrepancies = this.validator.check(root, expect);
    return discrepancies.length > 0
      ? result('validate', '.', 'failed', { message: `${discrepancies.length} discrepancy(ies)`, details: discrepancies })
      : result('validate', '.', 'unchanged', { message: 'all expectations hold' });
  }

  /** Run a step, turning a ScaffoldError into a failed result */
  private guard(step: StepKind, target: string, fn: () => StepResult): StepResult {
    try {
      return fn();
    } catch (error) {
      if (!isScaffoldError(error)) {
        throw error;
      }
      this.logger.error({ step, target, kind: error.kind, path: error.path }, error.message);
      return result(step, target, 'failed', { message: error.message, issues: [error.toIssue()] });
    }
  }
}

function result(
  step: StepKind,
  target: string,
  action: StepResult['action'],
  extra: { message?: string; details?: string[]; issues?: ScaffoldIssue[] } = {},
): StepResult {
  return {
    step,
    target,
    action,
    ...(extra.message !== undefined ? { message: extra.message } : {}),
    details: extra.details ?? [],
    issues: extra.issues ?? [],
  };
}

function noteRemoved(details: string[], count: number, block?: string): void {
  if (count > 0) {
    details.push(block ? `removed ${count} line(s) for block "${block}"` : `removed ${count} line(s)`);
  }
}

function sameLines(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((line, i) => line === b[i]);
}
