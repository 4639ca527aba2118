import type { TextDocument } from './text-document.js';

/** Whether `line` contains any of the (non-empty) patterns */
export function matchesAny(line: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => pattern !== '' && line.includes(pattern));
}

/**
 * Keep only the lines that contain none of `patterns`.
 *
 * Matching is case-sensitive substring containment. Empty patterns are
 * ignored, so an empty (or all-empty) pattern set returns the document as is.
 */
export function filterLines(doc: TextDocument, patterns: readonly string[]): string[] {
  if (!patterns.some((pattern) => pattern !== '')) {
    return [...doc];
  }
  return doc.filter((line) => !matchesAny(line, patterns));
}
