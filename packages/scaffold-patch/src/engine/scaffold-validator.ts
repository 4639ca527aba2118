/**
 * Read-only check of a project tree against a set of expected artifacts.
 *
 * Uses the same matching rules as the mutators so that "check passes" and
 * "mutation already applied" describe the same state:
 * - paths: existence (files must be files, directories must be directories)
 * - markers: substring containment in any line
 * - list entries: the block opener must be found (first match) and closed,
 *   and the entry text must be contained in some line of the document, which
 *   is the lookup ensureEntries uses to skip an entry
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from 'pino';
import { errorCode } from './errors.js';
import { findBlock } from './list-block-editor.js';
import { findLine, splitLines } from './text-document.js';

export interface MarkerExpectation {
  file: string;
  contains: string[];
}

export interface EntryExpectation {
  file: string;
  block: string;
  entries: string[];
  close?: string;
}

export interface ScaffoldExpectations {
  directories?: string[];
  files?: string[];
  markers?: MarkerExpectation[];
  entries?: EntryExpectation[];
  /** Paths that must not exist */
  absent?: string[];
  /** Text that must not appear in the named files */
  absentMarkers?: MarkerExpectation[];
}

type ReadOutcome =
  | { kind: 'ok'; lines: string[] }
  | { kind: 'missing' }
  | { kind: 'unreadable'; reason: string };

export class ScaffoldValidator {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'scaffold-validator' });
  }

  /**
   * Inspect `root` and return human-readable discrepancies, in expectation
   * order. An empty array means every expectation holds.
   */
  check(root: string, expectations: ScaffoldExpectations): string[] {
    const discrepancies: string[] = [];
    const reportedMissing = new Set<string>();
    const cache = new Map<string, ReadOutcome>();

    const read = (rel: string): ReadOutcome => {
      let outcome = cache.get(rel);
      if (!outcome) {
        outcome = readLines(path.join(root, rel));
        cache.set(rel, outcome);
      }
      return outcome;
    };

    const missingFile = (rel: string): void => {
      if (!reportedMissing.has(rel)) {
        reportedMissing.add(rel);
        discrepancies.push(`Missing file: ${rel}`);
      }
    };

    // Reports the read failure (once per file) and returns null, or the lines
    const linesOf = (rel: string): string[] | null => {
      const outcome = read(rel);
      if (outcome.kind === 'ok') {
        return outcome.lines;
      }
      if (outcome.kind === 'missing') {
        missingFile(rel);
      } else if (!reportedMissing.has(rel)) {
        reportedMissing.add(rel);
        discrepancies.push(`Unreadable file: ${rel} (${outcome.reason})`);
      }
      return null;
    };

    for (const dir of expectations.directories ?? []) {
      if (!isDirectory(path.join(root, dir))) {
        discrepancies.push(`Missing directory: ${dir}`);
      }
    }

    for (const file of expectations.files ?? []) {
      if (!isFile(path.join(root, file))) {
        missingFile(file);
      }
    }

    for (const expectation of expectations.markers ?? []) {
      const lines = linesOf(expectation.file);
      if (!lines) continue;
      for (const marker of expectation.contains) {
        if (findLine(lines, marker) === -1) {
          discrepancies.push(`Marker "${marker}" not found in: ${expectation.file}`);
        }
      }
    }

    for (const expectation of expectations.entries ?? []) {
      const lines = linesOf(expectation.file);
      if (!lines) continue;
      const block = findBlock(lines, expectation.block, expectation.close);
      if (!block) {
        discrepancies.push(`Block "${expectation.block}" not found in: ${expectation.file}`);
        continue;
      }
      if (block.closerLine === -1) {
        discrepancies.push(`Block "${expectation.block}" is not closed in: ${expectation.file}`);
        continue;
      }
      for (const entry of expectation.entries) {
        if (findLine(lines, entry.trim()) === -1) {
          discrepancies.push(`Entry "${entry.trim()}" missing from block "${expectation.block}" in: ${expectation.file}`);
        }
      }
    }

    for (const rel of expectations.absent ?? []) {
      if (fs.existsSync(path.join(root, rel))) {
        discrepancies.push(`Unexpected path: ${rel}`);
      }
    }

    for (const expectation of expectations.absentMarkers ?? []) {
      const outcome = read(expectation.file);
      // A missing file cannot contain the marker
      if (outcome.kind !== 'ok') continue;
      for (const marker of expectation.contains) {
        if (findLine(outcome.lines, marker) !== -1) {
          discrepancies.push(`Unexpected marker "${marker}" found in: ${expectation.file}`);
        }
      }
    }

    this.logger.debug({ root, discrepancies: discrepancies.length }, 'Scaffold check complete');
    return discrepancies;
  }
}

function readLines(filePath: string): ReadOutcome {
  try {
    return { kind: 'ok', lines: splitLines(fs.readFileSync(filePath, 'utf-8')) };
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      return { kind: 'missing' };
    }
    return { kind: 'unreadable', reason: code ?? (error instanceof Error ? error.message : String(error)) };
  }
}

function isFile(p: string): boolean {
  return statOf(p)?.isFile() ?? false;
}

function isDirectory(p: string): boolean {
  return statOf(p)?.isDirectory() ?? false;
}

// Best effort: a path that cannot be stat'ed (ENOTDIR, EACCES) counts as absent
function statOf(p: string): fs.Stats | undefined {
  try {
    return fs.statSync(p, { throwIfNoEntry: false });
  } catch (error) {
    if (errorCode(error)) {
      return undefined;
    }
    throw error;
  }
}
