/**
 * Marker-anchored block insertion and its inverse.
 *
 * insertAfterMarker is not idempotent: a second call with the
 * same arguments inserts the block again. Callers that need exactly-once
 * behaviour guard it with containsBlock (see PlanRunner) or use the list
 * block editor.
 */

import {
  findLine,
  indexOfBlock,
  toLines,
  type ContentBlock,
  type TextDocument,
} from './text-document.js';

/**
 * Insert `content` as whole lines directly after the first line containing
 * `marker`. Appends at the end when no line contains the marker, or when no
 * marker is given. An empty marker is contained in every line, so it anchors
 * on the first one.
 */
export function insertAfterMarker(
  doc: TextDocument,
  marker: string | undefined,
  content: ContentBlock,
): string[] {
  const block = toLines(content);
  const anchor = marker === undefined ? -1 : findLine(doc, marker);
  const at = anchor === -1 ? doc.length : anchor + 1;
  return [...doc.slice(0, at), ...block, ...doc.slice(at)];
}

/**
 * Remove the first verbatim occurrence of `content`.
 * Returns the document unchanged when the block is not present.
 */
export function removeBlock(doc: TextDocument, content: ContentBlock): string[] {
  const block = toLines(content);
  const at = indexOfBlock(doc, block);
  if (at === -1) {
    return [...doc];
  }
  return [...doc.slice(0, at), ...doc.slice(at + block.length)];
}
