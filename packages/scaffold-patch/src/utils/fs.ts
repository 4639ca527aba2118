/**
 * Filesystem helpers for plan steps that delete things (rollback removals,
 * name-matched cleanup and recursive purges) and for directories a plan
 * needs in place before anything is written into them.
 */

import * as fs from 'fs';
import * as path from 'path';
import fse from 'fs-extra';
import { IOFailureError, errorCode, toIOFailure } from '../engine/errors.js';

/** Directories never descended into while purging */
const IGNORE_DIRS = new Set([
  '.git',
  'node_modules',
  '.build',
  '.swiftpm',
]);

/**
 * Resolve `rel` under `root`, refusing paths that escape it.
 */
export function resolveInside(root: string, rel: string): string {
  const absRoot = path.resolve(root);
  const target = path.resolve(absRoot, rel);
  const back = path.relative(absRoot, target);
  if (back.startsWith('..') || path.isAbsolute(back)) {
    throw new IOFailureError(rel, `Path escapes the project root: ${rel}`);
  }
  return target;
}

export function pathExists(p: string): boolean {
  try {
    return fs.lstatSync(p, { throwIfNoEntry: false }) !== undefined;
  } catch (error) {
    throw toIOFailure(error, p, 'stat');
  }
}

/**
 * Create `dir` and its missing parents; returns false when it already exists.
 * Throws IOFailure when something other than a directory sits at `dir`.
 */
export function ensureDirectory(dir: string, dryRun = false): boolean {
  let stat: fs.Stats | undefined;
  try {
    stat = fs.statSync(dir, { throwIfNoEntry: false });
  } catch (error) {
    throw toIOFailure(error, dir, 'stat');
  }
  if (stat) {
    if (!stat.isDirectory()) {
      throw new IOFailureError(dir, `Not a directory: ${dir}`);
    }
    return false;
  }
  if (!dryRun) {
    try {
      fse.ensureDirSync(dir);
    } catch (error) {
      throw toIOFailure(error, dir, 'create directory');
    }
  }
  return true;
}

/** Remove a file or directory tree; returns false when nothing was there */
export function removePath(p: string, dryRun = false): boolean {
  if (!pathExists(p)) {
    return false;
  }
  if (!dryRun) {
    try {
      fse.removeSync(p);
    } catch (error) {
      throw toIOFailure(error, p, 'remove');
    }
  }
  return true;
}

/**
 * Remove the direct children of `dir` whose name contains `needle`.
 * Returns the removed names, sorted. A missing directory yields [].
 */
export function removeMatching(dir: string, needle: string, dryRun = false): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw toIOFailure(error, dir, 'read directory');
  }
  const matched = names.filter((name) => name.includes(needle)).sort();
  for (const name of matched) {
    removePath(path.join(dir, name), dryRun);
  }
  return matched;
}

/**
 * Recursively collect files named exactly `fileName` under `root`.
 * Returns forward-slash paths relative to root.
 */
export function findNamed(root: string, fileName: string, subDir = ''): string[] {
  const results: string[] = [];
  const absDir = subDir ? path.join(root, subDir) : root;

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(absDir, { withFileTypes: true });
  } catch (error) {
    throw toIOFailure(error, absDir, 'read directory');
  }

  for (const entry of entries) {
    const relativePath = subDir ? `${subDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (!IGNORE_DIRS.has(entry.name)) {
        results.push(...findNamed(root, fileName, relativePath));
      }
    } else if (entry.name === fileName) {
      results.push(relativePath);
    }
  }

  return results.sort();
}

/** Delete every file named `fileName` under `root`; returns the relative paths */
export function purgeNamed(root: string, fileName: string, dryRun = false): string[] {
  const found = findNamed(root, fileName);
  for (const rel of found) {
    removePath(path.join(root, rel), dryRun);
  }
  return found;
}
