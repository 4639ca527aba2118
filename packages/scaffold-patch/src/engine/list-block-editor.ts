/**
 * Editor for bracketed list blocks embedded in text, such as the
 * `dependencies: [`, `resources: [` and `exclude: [` arrays of a build
 * manifest.
 *
 * A block is opened by the first line containing the opener token. When the
 * close token balances on that same line the block is inline (`exclude: []`,
 * `exclude: ["a"]`); otherwise it is closed by the first later line, at the
 * same nesting depth, whose trimmed text starts with the close token. The
 * editor treats the block as a set of unique entries and never touches text
 * outside the lines it inserts or removes.
 */

import { BlockNotFoundError } from './errors.js';
import { filterLines } from './pattern-filter.js';
import { findLine, indentationOf, type TextDocument } from './text-document.js';

const DEFAULT_CLOSE = ']';
const DEFAULT_ENTRY_INDENT = '    ';

const OPENING_FOR: Record<string, string> = {
  ']': '[',
  ')': '(',
  '}': '{',
};

export interface ListBlockOptions {
  /** Close token of the block (default `]`) */
  close?: string;
  /** Indentation for entries when the block has none to copy from */
  indent?: string;
  /** Path reported in BlockNotFound errors */
  path?: string;
}

export interface ListBlock {
  /** Line index of the opener */
  openerLine: number;
  /** Line index of the closer, or -1 when the block is unterminated */
  closerLine: number;
  /** Line indexes of top-level entries */
  entryLines: number[];
  /** Opener and closer share one line, e.g. `exclude: []` */
  inline: boolean;
  /** Column of the close token on the opener line, or -1 unless inline */
  closeColumn: number;
}

export type ListEditResult =
  | { ok: true; lines: string[]; added: string[]; present: string[] }
  | { ok: false; error: BlockNotFoundError };

/**
 * Locate the block opened by the first line containing `opener`.
 * Returns null when no line contains it.
 */
export function findBlock(
  doc: TextDocument,
  opener: string,
  close: string = DEFAULT_CLOSE,
): ListBlock | null {
  const openerLine = findLine(doc, opener);
  if (openerLine === -1) {
    return null;
  }

  const line = doc[openerLine];
  const start = line.indexOf(opener) + opener.length;
  const open = OPENING_FOR[close];
  const closeColumn = closingColumn(line, start, open, close);
  if (closeColumn !== -1) {
    return { openerLine, closerLine: openerLine, entryLines: [], inline: true, closeColumn };
  }

  const entryLines: number[] = [];
  // Brackets left open on the opener line nest everything below them
  const rest = line.slice(start);
  let depth = open ? Math.max(0, count(rest, open) - count(rest, close)) : 0;

  for (let i = openerLine + 1; i < doc.length; i++) {
    const trimmed = doc[i].trim();
    if (depth === 0 && trimmed.startsWith(close)) {
      return { openerLine, closerLine: i, entryLines, inline: false, closeColumn: -1 };
    }
    if (depth === 0 && trimmed !== '') {
      entryLines.push(i);
    }
    if (open) {
      depth = Math.max(0, depth + count(trimmed, open) - count(trimmed, close));
    }
  }

  return { openerLine, closerLine: -1, entryLines, inline: false, closeColumn: -1 };
}

/**
 * Ensure each entry appears in the document, inserting the missing ones
 * directly after the block opener in the order requested.
 *
 * An entry counts as present when any line of the document contains its
 * text, which makes a second call with the same entries a no-op. A block
 * that is never closed is reported as BlockNotFound.
 */
export function ensureEntries(
  doc: TextDocument,
  opener: string,
  entries: readonly string[],
  options: ListBlockOptions = {},
): ListEditResult {
  const close = options.close ?? DEFAULT_CLOSE;
  const block = findBlock(doc, opener, close);
  if (!block) {
    return { ok: false, error: new BlockNotFoundError(options.path ?? '<document>', opener) };
  }
  if (block.closerLine === -1) {
    const error = new BlockNotFoundError(options.path ?? '<document>', opener, `is not closed by "${close}"`);
    return { ok: false, error };
  }

  const requested = unique(entries.map((entry) => entry.trim()).filter((entry) => entry !== ''));
  const present = requested.filter((entry) => findLine(doc, entry) !== -1);
  const missing = requested.filter((entry) => !present.includes(entry));

  if (missing.length === 0) {
    return { ok: true, lines: [...doc], added: [], present };
  }

  const openerText = doc[block.openerLine];
  const indent = block.entryLines.length > 0
    ? indentationOf(doc[block.entryLines[0]])
    : options.indent ?? indentationOf(openerText) + DEFAULT_ENTRY_INDENT;
  const inserted = missing.map((entry) => indent + entry);

  const before = doc.slice(0, block.openerLine);
  const after = doc.slice(block.openerLine + 1);

  if (block.inline) {
    const split = openerText.indexOf(opener) + opener.length;
    const tail = openerText.slice(split).trimStart();

    if (openerText.slice(split, block.closeColumn).trim() !== '') {
      // A populated one-line block stays on its line: `["b", "a"]`
      const line = openerText.slice(0, split) + missing.join(' ') + ' ' + tail;
      return { ok: true, lines: [...before, line, ...after], added: missing, present };
    }

    // Open `name: []` into a multi-line block around the new entries
    const head = openerText.slice(0, split).trimEnd();
    return {
      ok: true,
      lines: [...before, head, ...inserted, indentationOf(openerText) + tail, ...after],
      added: missing,
      present,
    };
  }

  return { ok: true, lines: [...before, openerText, ...inserted, ...after], added: missing, present };
}

/**
 * Remove obsolete list entries: every line containing any of `patterns`.
 * Same semantics as filterLines, named for manifest edits.
 */
export function removeLinesContainingAny(doc: TextDocument, patterns: readonly string[]): string[] {
  return filterLines(doc, patterns);
}

/** Column of the close token that balances the opener on its own line, or -1 */
function closingColumn(line: string, from: number, open: string | undefined, close: string): number {
  if (!open) {
    return line.indexOf(close, from);
  }
  let depth = 0;
  for (let i = from; i < line.length; i++) {
    if (line.startsWith(open, i)) {
      depth++;
    } else if (line.startsWith(close, i)) {
      if (depth === 0) return i;
      depth--;
    }
  }
  return -1;
}

function count(text: string, token: string): number {
  return text.split(token).length - 1;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
