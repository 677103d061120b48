/**
 * Structural comparison of two documents.
 *
 * Sections and keys are matched case-insensitively. Only values are
 * compared; comments and quoting are formatting, not content.
 */

import { DEFAULT_SECTION_NAME } from '@inikit/ini';
import type { Document, Section } from '@inikit/ini';
import { emptyDiff, emptySectionDiff, sectionHasChanges } from './types';
import type { DocumentDiff, SectionDiff } from './types';

// ============================================================================
// Public API
// ============================================================================

/**
 * Changes that turn `left` into `right`.
 *
 * @returns added/removed sections as clones, plus a SectionDiff for every
 * section on both sides (and the default section) whose keys differ
 */
export function compareDocuments(left: Document, right: Document): DocumentDiff {
  const diff = emptyDiff();

  const defaults = compareSections(left.defaultSection, right.defaultSection, DEFAULT_SECTION_NAME);
  if (sectionHasChanges(defaults)) {
    diff.modifiedSections.push(defaults);
  }

  for (const rightSection of right) {
    const leftSection = left.get(rightSection.name);
    if (!leftSection) {
      diff.addedSections.push(rightSection.clone());
      continue;
    }
    const sectionDiff = compareSections(leftSection, rightSection);
    if (sectionHasChanges(sectionDiff)) {
      diff.modifiedSections.push(sectionDiff);
    }
  }

  for (const leftSection of left) {
    if (!right.has(leftSection.name)) {
      diff.removedSections.push(leftSection.clone());
    }
  }

  return diff;
}

/** Key-level comparison of two sections; reported under `left`'s name unless `name` is given. */
export function compareSections(left: Section, right: Section, name: string = left.name): SectionDiff {
  const diff = emptySectionDiff(name);

  for (const rightProperty of right) {
    const leftProperty = left.get(rightProperty.name);
    if (!leftProperty) {
      diff.addedProperties.push(rightProperty.clone());
    } else if (leftProperty.value !== rightProperty.value) {
      diff.modifiedProperties.push({
        propertyName: rightProperty.name,
        oldValue: leftProperty.value,
        newValue: rightProperty.value,
      });
    }
  }

  for (const leftProperty of left) {
    if (!right.has(leftProperty.name)) {
      diff.removedProperties.push(leftProperty.clone());
    }
  }

  return diff;
}
