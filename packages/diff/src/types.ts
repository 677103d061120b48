/**
 * Diff shapes.
 *
 * Plain objects rather than classes so callers can build a partial diff
 * (a single added section, one modified key) and hand it to mergeDiff.
 */

import type { MergeCounts, PropertyChange } from '@inikit/types';
import { DEFAULT_SECTION_NAME } from '@inikit/ini';
import type { Property, Section } from '@inikit/ini';

export interface SectionDiff {
  /**
   * Left-hand name. `$DEFAULT` (any case) addresses the default section;
   * documents reject it as the name of a named section.
   */
  sectionName: string;
  /** Clones of properties only on the right. */
  addedProperties: Property[];
  /** Clones of properties only on the left. */
  removedProperties: Property[];
  modifiedProperties: PropertyChange[];
}

export interface DocumentDiff {
  /** Clones of sections only on the right. */
  addedSections: Section[];
  /** Clones of sections only on the left. */
  removedSections: Section[];
  /** Sections present on both sides whose properties differ; default section first. */
  modifiedSections: SectionDiff[];
}

export interface MergeResult extends MergeCounts {
  totalChanges: number;
}

export const DEFAULT_SECTION_DIFF_NAME = DEFAULT_SECTION_NAME;

export function emptyDiff(): DocumentDiff {
  return { addedSections: [], removedSections: [], modifiedSections: [] };
}

export function emptySectionDiff(sectionName: string): SectionDiff {
  return { sectionName, addedProperties: [], removedProperties: [], modifiedProperties: [] };
}

export function sectionHasChanges(diff: SectionDiff): boolean {
  return diff.addedProperties.length > 0
    || diff.removedProperties.length > 0
    || diff.modifiedProperties.length > 0;
}

export function hasChanges(diff: DocumentDiff): boolean {
  return diff.addedSections.length > 0
    || diff.removedSections.length > 0
    || diff.modifiedSections.length > 0;
}
