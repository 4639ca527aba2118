/**
 * Tree merger: moves everything under a source directory into the same
 * relative positions under a destination directory.
 *
 * Rules:
 * - Directories are created in the destination before anything is placed in
 *   them, and removed from the source only once they are empty (post-order).
 * - An existing destination path is never overwritten. It is reported as a
 *   ConflictDetected issue and both copies stay where they are; the merge
 *   carries on with the remaining paths.
 * - A missing source is not an error. With a journal, a source-absent /
 *   destination-present state matching a recorded merge reports
 *   `already-merged`.
 *
 * Re-running after an interruption is safe: files already moved are no longer
 * under the source, so only the remainder is visited.
 */

import * as fs from 'fs';
import * as path from 'path';
import fse from 'fs-extra';
import type { Logger } from 'pino';
import {
  ConflictError,
  IOFailureError,
  toIOFailure,
  type ScaffoldIssue,
} from './errors.js';

export type MergeStatus =
  | 'merged'            // Every source entry was placed
  | 'partial'           // Some paths conflicted or failed; see issues
  | 'nothing-to-merge'  // Source does not exist
  | 'already-merged';   // Source absent, journal shows the move completed

/** Records which files each merge placed, keyed by merge */
export interface MergeJournal {
  recall(key: string): readonly string[] | undefined;
  record(key: string, placed: readonly string[]): void;
}

export interface TreeMergerConfig {
  journal?: MergeJournal;
}

export interface MergeOptions {
  /** Report what would move without touching the filesystem */
  dryRun?: boolean;
  /** Journal key; defaults to the absolute source and destination paths */
  journalKey?: string;
  /**
   * Remove empty ancestors of the source up to (excluding) this directory.
   * Defaults to the destination when it contains the source.
   */
  pruneBoundary?: string;
}

export interface MergeReport {
  source: string;
  destination: string;
  status: MergeStatus;
  dryRun: boolean;
  /** Files placed (or that would be placed), relative to source/destination */
  moved: string[];
  /** Directories created under the destination, relative */
  createdDirs: string[];
  /** Directories removed after being emptied, absolute */
  removedDirs: string[];
  /** ConflictDetected and IOFailure issues, in walk order */
  issues: ScaffoldIssue[];
}

interface WalkContext {
  report: MergeReport;
  dryRun: boolean;
}

export class TreeMerger {
  private readonly logger: Logger;
  private readonly journal: MergeJournal | undefined;

  constructor(logger: Logger, config: TreeMergerConfig = {}) {
    this.logger = logger.child({ component: 'tree-merger' });
    this.journal = config.journal;
  }

  /**
   * Merge `source` into `destination`.
   *
   * Throws IOFailureError when the arguments cannot describe a merge: the
   * source or destination is not a directory, or the destination lies inside
   * the source. Per-path problems are returned as issues instead.
   */
  merge(source: string, destination: string, options: MergeOptions = {}): MergeReport {
    const src = path.resolve(source);
    const dest = path.resolve(destination);
    const dryRun = options.dryRun ?? false;
    const key = options.journalKey ?? `${src} -> ${dest}`;

    const report: MergeReport = {
      source: src,
      destination: dest,
      status: 'merged',
      dryRun,
      moved: [],
      createdDirs: [],
      removedDirs: [],
      issues: [],
    };

    const srcStat = statPath(src);
    if (!srcStat) {
      report.status = this.isRecordedComplete(key, dest) ? 'already-merged' : 'nothing-to-merge';
      this.logger.info({ source: src, status: report.status }, 'Nothing to merge');
      return report;
    }
    if (!srcStat.isDirectory()) {
      throw new IOFailureError(src, `Merge source is not a directory: ${src}`);
    }
    if (dest === src || isInside(dest, src)) {
      throw new IOFailureError(dest, `Merge destination lies inside the source: ${dest}`);
    }
    const destStat = statPath(dest);
    if (destStat && !destStat.isDirectory()) {
      throw new IOFailureError(dest, `Merge destination is not a directory: ${dest}`);
    }

    if (!destStat && !dryRun) {
      fse.ensureDirSync(dest);
    }

    const ctx: WalkContext = { report, dryRun };
    this.walk(ctx, src, dest, '');

    if (!dryRun) {
      try {
        this.pruneSource(ctx, src, options.pruneBoundary ?? (isInside(src, dest) ? dest : undefined));
      } catch (error) {
        this.addIssue(ctx, toIOFailure(error, src, 'remove directory').toIssue());
      }
      if (report.moved.length > 0 && this.journal) {
        const previous = this.journal.recall(key) ?? [];
        this.journal.record(key, [...new Set([...previous, ...report.moved])]);
      }
    }

    report.status = report.issues.length > 0 ? 'partial' : 'merged';

    this.logger.info(
      {
        source: src,
        destination: dest,
        moved: report.moved.length,
        issues: report.issues.length,
        dryRun,
      },
      'Merge complete'
    );

    return report;
  }

  private walk(ctx: WalkContext, srcDir: string, destDir: string, rel: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(srcDir, { withFileTypes: true });
    } catch (error) {
      this.addIssue(ctx, toIOFailure(error, displayPath(rel), 'read directory').toIssue());
      return;
    }

    // Directory order from the OS is not stable; sort for a deterministic walk
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const relPath = rel ? `${rel}/${entry.name}` : entry.name;
      const srcPath = path.join(srcDir, entry.name);
      const destPath = path.join(destDir, entry.name);

      try {
        if (entry.isDirectory()) {
          this.mergeDirectory(ctx, srcPath, destPath, relPath);
        } else {
          this.moveEntry(ctx, srcPath, destPath, relPath);
        }
      } catch (error) {
        this.addIssue(ctx, toIOFailure(error, relPath, 'move').toIssue());
      }
    }
  }

  private mergeDirectory(ctx: WalkContext, srcPath: string, destPath: string, relPath: string): void {
    const existing = statPath(destPath);
    if (existing && !existing.isDirectory()) {
      this.addIssue(ctx, new ConflictError(relPath, 'destination is a file, source is a directory').toIssue());
      return;
    }
    if (!existing) {
      if (!ctx.dryRun) {
        fs.mkdirSync(destPath);
      }
      ctx.report.createdDirs.push(relPath);
    }

    this.walk(ctx, srcPath, destPath, relPath);

    if (!ctx.dryRun && isEmptyDir(srcPath)) {
      fs.rmdirSync(srcPath);
      ctx.report.removedDirs.push(srcPath);
    }
  }

  private moveEntry(ctx: WalkContext, srcPath: string, destPath: string, relPath: string): void {
    const existing = statPath(destPath);
    if (existing) {
      const detail = existing.isDirectory()
        ? 'destination is a directory, source is a file'
        : 'destination file already exists';
      this.addIssue(ctx, new ConflictError(relPath, detail).toIssue());
      return;
    }

    if (!ctx.dryRun) {
      fse.moveSync(srcPath, destPath, { overwrite: false });
      this.logger.debug({ path: relPath }, 'Moved file');
    }
    ctx.report.moved.push(relPath);
  }

  /** Remove the source root and its empty ancestors once the walk is done */
  private pruneSource(ctx: WalkContext, src: string, boundary: string | undefined): void {
    if (!isEmptyDir(src)) {
      return;
    }
    fs.rmdirSync(src);
    ctx.report.removedDirs.push(src);

    if (!boundary) {
      return;
    }
    const stop = path.resolve(boundary);
    let dir = path.dirname(src);
    while (dir !== stop && isInside(dir, stop) && isEmptyDir(dir)) {
      fs.rmdirSync(dir);
      ctx.report.removedDirs.push(dir);
      dir = path.dirname(dir);
    }
  }

  private isRecordedComplete(key: string, dest: string): boolean {
    const placed = this.journal?.recall(key);
    if (!placed || placed.length === 0) {
      return false;
    }
    return placed.every((rel) => statPath(path.join(dest, rel)) !== undefined);
  }

  private addIssue(ctx: WalkContext, issue: ScaffoldIssue): void {
    ctx.report.issues.push(issue);
    this.logger.warn({ kind: issue.kind, path: issue.path }, issue.message);
  }
}

/** lstat that returns undefined for a missing path */
function statPath(p: string): fs.Stats | undefined {
  try {
    return fs.lstatSync(p, { throwIfNoEntry: false });
  } catch (error) {
    throw toIOFailure(error, p, 'stat');
  }
}

function isEmptyDir(dir: string): boolean {
  const stat = statPath(dir);
  return stat !== undefined && stat.isDirectory() && fs.readdirSync(dir).length === 0;
}

/** Whether `child` is strictly inside `parent` */
export function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}

function displayPath(rel: string): string {
  return rel === '' ? '.' : rel;
}
