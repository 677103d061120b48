/**
 * Applying a DocumentDiff to a target document.
 *
 * Merging is forgiving: items already gone are skipped and modified keys
 * that no longer exist are re-added, so a diff taken against one
 * revision can be replayed onto a drifted copy.
 */

import { parseMergeOptions } from '@inikit/core';
import type { MergeOptionsInput } from '@inikit/core';
import type { MergeOptions } from '@inikit/types';
import { isReservedSectionName } from '@inikit/ini';
import type { Document, Section } from '@inikit/ini';
import type { DocumentDiff, MergeResult, SectionDiff } from './types';

// ============================================================================
// Public API
// ============================================================================

/**
 * Apply `diff` to `target` in place.
 *
 * By default additions and modifications are applied and removals are
 * not. Counters only include changes that actually altered the target.
 */
export function mergeDiff(target: Document, diff: DocumentDiff, options?: MergeOptionsInput): MergeResult {
  const opts = parseMergeOptions(options);
  const counts = {
    sectionsAdded: 0,
    sectionsRemoved: 0,
    propertiesAdded: 0,
    propertiesRemoved: 0,
    propertiesModified: 0,
  };

  if (opts.applyAddedSections) {
    for (const section of diff.addedSections) {
      const existing = isReservedSectionName(section.name) ? target.defaultSection : target.get(section.name);
      if (existing) {
        existing.mergeFrom(section, 'FirstWin');
      } else {
        target.add(section.clone());
        counts.sectionsAdded++;
      }
    }
  }

  if (opts.applyRemovedSections) {
    for (const section of diff.removedSections) {
      if (target.remove(section.name)) counts.sectionsRemoved++;
    }
  }

  for (const sectionDiff of diff.modifiedSections) {
    applySectionDiff(target, sectionDiff, opts, counts);
  }

  return { ...counts, totalChanges: totalChanges(counts) };
}

export function totalChanges(counts: Omit<MergeResult, 'totalChanges'>): number {
  return counts.sectionsAdded
    + counts.sectionsRemoved
    + counts.propertiesAdded
    + counts.propertiesRemoved
    + counts.propertiesModified;
}

// ============================================================================
// Helpers
// ============================================================================

function resolveSection(target: Document, name: string, create: boolean): Section | undefined {
  if (isReservedSectionName(name)) return target.defaultSection;
  return create ? target.getOrCreate(name) : target.get(name);
}

function applySectionDiff(
  target: Document,
  diff: SectionDiff,
  opts: MergeOptions,
  counts: Omit<MergeResult, 'totalChanges'>
): void {
  const writes = (opts.applyAddedProperties && diff.addedProperties.length > 0)
    || (opts.applyModifiedProperties && diff.modifiedProperties.length > 0);
  const section = resolveSection(target, diff.sectionName, writes);
  if (!section) return;

  if (opts.applyAddedProperties) {
    for (const property of diff.addedProperties) {
      if (section.has(property.name)) continue;
      section.add(property.clone());
      counts.propertiesAdded++;
    }
  }

  if (opts.applyRemovedProperties) {
    for (const property of diff.removedProperties) {
      if (section.remove(property.name)) counts.propertiesRemoved++;
    }
  }

  if (opts.applyModifiedProperties) {
    for (const change of diff.modifiedProperties) {
      const property = section.get(change.propertyName);
      if (!property) {
        section.add(change.propertyName, change.newValue);
      } else if (property.value !== change.newValue) {
        property.value = change.newValue;
      } else {
        continue;
      }
      counts.propertiesModified++;
    }
  }
}
