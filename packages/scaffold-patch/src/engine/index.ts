export * from './errors.js';
export * from './text-document.js';
export { filterLines, matchesAny } from './pattern-filter.js';
export { insertAfterMarker, removeBlock } from './marker-insert.js';
export {
  ensureEntries,
  findBlock,
  removeLinesContainingAny,
  type ListBlock,
  type ListBlockOptions,
  type ListEditResult,
} from './list-block-editor.js';
export {
  TreeMerger,
  isInside,
  type MergeJournal,
  type MergeOptions,
  type MergeReport,
  type MergeStatus,
  type TreeMergerConfig,
} from './tree-merger.js';
export {
  ScaffoldValidator,
  type EntryExpectation,
  type MarkerExpectation,
  type ScaffoldExpectations,
} from './scaffold-validator.js';
