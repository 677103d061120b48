/**
 * Human-readable and JSON renderings of a DocumentDiff.
 */

import type { PropertyChange } from '@inikit/types';
import type { Property, Section } from '@inikit/ini';
import { hasChanges } from './types';
import type { DocumentDiff } from './types';

export interface DiffSummary {
  hasChanges: boolean;
  addedSections: SectionSummary[];
  removedSections: SectionSummary[];
  modifiedSections: Array<{
    sectionName: string;
    addedProperties: PropertySummary[];
    removedProperties: PropertySummary[];
    modifiedProperties: PropertyChange[];
  }>;
}

interface SectionSummary {
  name: string;
  properties: PropertySummary[];
}

interface PropertySummary {
  name: string;
  value: string;
}

/**
 * One line per change: `~ [S]` heads a modified section and its key lines
 * are indented; added and removed sections list their keys the same way.
 * Returns an empty string when there is nothing to report.
 */
export function formatDiff(diff: DocumentDiff): string {
  const lines: string[] = [];

  for (const section of diff.modifiedSections) {
    lines.push(`~ [${section.sectionName}]`);
    for (const p of section.addedProperties) lines.push(`  + ${p.name} = ${p.value}`);
    for (const p of section.removedProperties) lines.push(`  - ${p.name} = ${p.value}`);
    for (const c of section.modifiedProperties) lines.push(`  ~ ${c.propertyName}: ${c.oldValue} -> ${c.newValue}`);
  }
  for (const section of diff.addedSections) {
    lines.push(`+ [${section.name}]`);
    for (const p of section) lines.push(`  + ${p.name} = ${p.value}`);
  }
  for (const section of diff.removedSections) {
    lines.push(`- [${section.name}]`);
    for (const p of section) lines.push(`  - ${p.name} = ${p.value}`);
  }

  return lines.join('\n');
}

export function summarizeDiff(diff: DocumentDiff): DiffSummary {
  return {
    hasChanges: hasChanges(diff),
    addedSections: diff.addedSections.map(summarizeSection),
    removedSections: diff.removedSections.map(summarizeSection),
    modifiedSections: diff.modifiedSections.map(s => ({
      sectionName: s.sectionName,
      addedProperties: s.addedProperties.map(summarizeProperty),
      removedProperties: s.removedProperties.map(summarizeProperty),
      modifiedProperties: s.modifiedProperties.map(c => ({ ...c })),
    })),
  };
}

function summarizeSection(section: Section): SectionSummary {
  return { name: section.name, properties: section.toArray().map(summarizeProperty) };
}

function summarizeProperty(property: Property): PropertySummary {
  return { name: property.name, value: property.value };
}
