/**
 * Line-oriented documents and their on-disk form.
 *
 * Operations work on plain line arrays; the line ending and final-newline
 * flag are carried separately so a round trip through readDocument and
 * writeDocument leaves untouched files byte-identical.
 */

import * as fs from 'fs';
import * as path from 'path';
import fse from 'fs-extra';
import { NotFoundError, errorCode, toIOFailure } from './errors.js';

/** Ordered lines of a file, without line terminators */
export type TextDocument = readonly string[];

/** Content to insert: raw multi-line text or pre-split lines */
export type ContentBlock = string | readonly string[];

export type LineEnding = '\n' | '\r\n';

export interface LoadedDocument {
  lines: string[];
  eol: LineEnding;
  /** Whether the file ended with a line terminator */
  finalNewline: boolean;
}

/**
 * Split text into lines on `\r\n` or `\n`.
 * A single trailing terminator does not produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** Normalize a content block to its lines */
export function toLines(content: ContentBlock): string[] {
  return typeof content === 'string' ? splitLines(content) : [...content];
}

export function parseDocument(text: string): LoadedDocument {
  return {
    lines: splitLines(text),
    eol: text.includes('\r\n') ? '\r\n' : '\n',
    finalNewline: text.endsWith('\n'),
  };
}

export function serializeDocument(doc: LoadedDocument): string {
  if (doc.lines.length === 0) {
    return '';
  }
  const body = doc.lines.join(doc.eol);
  return doc.finalNewline ? body + doc.eol : body;
}

/** Index of the first line containing `needle`, or -1 */
export function findLine(doc: TextDocument, needle: string, from = 0): number {
  for (let i = from; i < doc.length; i++) {
    if (doc[i].includes(needle)) {
      return i;
    }
  }
  return -1;
}

/**
 * Index where `block` appears as a contiguous run of whole lines, or -1.
 * An empty block is never considered present.
 */
export function indexOfBlock(doc: TextDocument, block: ContentBlock): number {
  const needle = toLines(block);
  if (needle.length === 0 || needle.length > doc.length) {
    return -1;
  }
  for (let i = 0; i + needle.length <= doc.length; i++) {
    if (needle.every((line, j) => doc[i + j] === line)) {
      return i;
    }
  }
  return -1;
}

/** Whether `block` is already present verbatim in `doc` */
export function containsBlock(doc: TextDocument, block: ContentBlock): boolean {
  return indexOfBlock(doc, block) !== -1;
}

/** Leading whitespace of a line */
export function indentationOf(line: string): string {
  const match = /^\s*/.exec(line);
  return match ? match[0] : '';
}

/**
 * Read a file into a LoadedDocument.
 * Throws NotFoundError when the file is absent, IOFailureError otherwise.
 */
export function readDocument(filePath: string): LoadedDocument {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new NotFoundError(filePath, 'file');
    }
    throw toIOFailure(error, filePath, 'read');
  }
  return parseDocument(text);
}

/**
 * Write a document through a temporary sibling file and a rename, so a crash
 * mid-write leaves either the old or the new content. A file that already
 * exists keeps its permission bits.
 */
export function writeDocument(filePath: string, doc: LoadedDocument): void {
  writeFileAtomic(filePath, serializeDocument(doc));
}

export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    fse.ensureDirSync(dir);
    const existing = fs.statSync(filePath, { throwIfNoEntry: false });
    fs.writeFileSync(tmpPath, content);
    if (existing) {
      fs.chmodSync(tmpPath, existing.mode);
    }
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    // removeSync is a no-op when the temp file was never created
    fse.removeSync(tmpPath);
    throw toIOFailure(error, filePath, 'write');
  }
}
