/**
 * Name-order sorting for sections and properties.
 */

import type { Document } from './document';
import type { Section } from './section';

/** Ordinal, case-insensitive comparison of element names. */
export function compareNames(a: { name: string }, b: { name: string }): number {
  const x = a.name.toUpperCase();
  const y = b.name.toUpperCase();
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

export function sortPropertiesByName(section: Section): void {
  section.sort(compareNames);
}

export function sortSectionsByName(doc: Document): void {
  doc.sort(compareNames);
}

/** Sorts the sections, then the properties of every named section. */
export function sortAllByName(doc: Document): void {
  sortSectionsByName(doc);
  for (const section of doc) {
    sortPropertiesByName(section);
  }
}
