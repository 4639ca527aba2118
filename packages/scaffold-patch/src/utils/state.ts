/**
 * Patch state persisted under the project root.
 *
 * Tracks which files each directory merge placed, so re-issuing a completed
 * merge is recognised as a no-op instead of "nothing to merge".
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorCode, toIOFailure } from '../engine/errors.js';
import type { MergeJournal } from '../engine/tree-merger.js';
import { writeFileAtomic } from '../engine/text-document.js';

export const DEFAULT_STATE_FILE = '.scaffold-patch-state.json';

const PatchStateSchema = z.object({
  version: z.literal('1'),
  merges: z.record(
    z.object({
      files: z.array(z.string()),   // Paths placed, relative to the merge destination
      mergedAt: z.string(),         // ISO timestamp of the last recording
    })
  ),
});

export type PatchState = z.infer<typeof PatchStateSchema>;

export function getStatePath(root: string, stateFile: string = DEFAULT_STATE_FILE): string {
  return path.join(root, stateFile);
}

export function emptyState(): PatchState {
  return { version: '1', merges: {} };
}

export function readState(statePath: string): PatchState | null {
  let content: string;
  try {
    content = fs.readFileSync(statePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw toIOFailure(error, statePath, 'read');
  }
  return parseState(content, statePath);
}

export function writeState(statePath: string, state: PatchState): void {
  writeFileAtomic(statePath, JSON.stringify(state, null, 2) + '\n');
}

function parseState(content: string, statePath: string): PatchState {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw toIOFailure(error, statePath, 'parse');
  }
  const parsed = PatchStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw toIOFailure(parsed.error, statePath, 'parse');
  }
  return parsed.data;
}

/**
 * MergeJournal backed by the state file. Reads once on creation; each
 * record() writes through unless the journal is read-only.
 */
export class FileMergeJournal implements MergeJournal {
  private readonly statePath: string;
  private readonly state: PatchState;
  private readonly readOnly: boolean;

  constructor(statePath: string, options: { readOnly?: boolean } = {}) {
    this.statePath = statePath;
    this.state = readState(statePath) ?? emptyState();
    this.readOnly = options.readOnly ?? false;
  }

  recall(key: string): readonly string[] | undefined {
    return this.state.merges[key]?.files;
  }

  record(key: string, placed: readonly string[]): void {
    this.state.merges[key] = { files: [...placed], mergedAt: new Date().toISOString() };
    if (!this.readOnly) {
      writeState(this.statePath, this.state);
    }
  }
}
