/**
 * @inikit/diff
 *
 * Structural comparison of INI documents and replay of the resulting
 * changes onto another document.
 */

export { compareDocuments, compareSections } from './compare';
export { mergeDiff, totalChanges } from './merge';
export { formatDiff, summarizeDiff } from './format';
export type { DiffSummary } from './format';
export {
  emptyDiff,
  emptySectionDiff,
  hasChanges,
  sectionHasChanges,
  DEFAULT_SECTION_DIFF_NAME,
} from './types';
export type { DocumentDiff, SectionDiff, MergeResult } from './types';
