/**
 * Read-only lookups across a document, plus filtered copies.
 */

import { Document } from './document';
import type { Property } from './property';
import { Section } from './section';

export interface PropertyMatch {
  section: Section;
  property: Property;
}

/**
 * Strings compile case-insensitively. A caller's RegExp is copied without
 * `g`/`y`, whose `lastIndex` would carry over from one name to the next.
 */
function toRegExp(pattern: string | RegExp): RegExp {
  if (typeof pattern !== 'string') {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  if (pattern === '') {
    throw new TypeError('Name pattern cannot be empty');
  }
  return new RegExp(pattern, 'i');
}

export function findSections(doc: Document, predicate: (section: Section) => boolean): Section[] {
  return doc.toArray().filter(predicate);
}

export function findSectionsByPattern(doc: Document, pattern: string | RegExp): Section[] {
  const regex = toRegExp(pattern);
  return doc.toArray().filter(s => regex.test(s.name));
}

export function findProperties(section: Section, predicate: (property: Property) => boolean): Property[] {
  return section.toArray().filter(predicate);
}

export function findPropertiesByPattern(section: Section, pattern: string | RegExp): Property[] {
  const regex = toRegExp(pattern);
  return section.toArray().filter(p => regex.test(p.name));
}

export function findPropertiesWithValue(section: Section, value: string): Property[] {
  return section.toArray().filter(p => p.value === value);
}

export function findPropertiesContaining(section: Section, substring: string): Property[] {
  return section.toArray().filter(p => p.value.includes(substring));
}

/** Every section, default first, holding a property named `name`. */
export function findPropertiesByName(doc: Document, name: string): PropertyMatch[] {
  if (name === '') {
    throw new TypeError('Property name cannot be empty');
  }
  const matches: PropertyMatch[] = [];
  for (const section of [doc.defaultSection, ...doc]) {
    const property = section.get(name);
    if (property) matches.push({ section, property });
  }
  return matches;
}

/** Every property, default section first, whose value equals `value` exactly. */
export function findPropertiesByValue(doc: Document, value: string): PropertyMatch[] {
  const matches: PropertyMatch[] = [];
  for (const section of [doc.defaultSection, ...doc]) {
    for (const property of section) {
      if (property.value === value) matches.push({ section, property });
    }
  }
  return matches;
}

/** New document with the default section's properties and the accepted sections, all cloned. */
export function copyWithSections(source: Document, filter: (section: Section) => boolean): Document {
  const copy = new Document({
    commentPrefixChars: source.commentPrefixChars,
    defaultCommentPrefixChar: source.defaultCommentPrefixChar,
  });
  for (const property of source.defaultSection) {
    copy.defaultSection.add(property.clone());
  }
  for (const section of source) {
    if (filter(section)) copy.add(section.clone());
  }
  return copy;
}

/** New section of the same name holding clones of the accepted properties. */
export function copyWithProperties(source: Section, filter: (property: Property) => boolean): Section {
  const copy = new Section(source.name);
  for (const property of source) {
    if (filter(property)) copy.add(property.clone());
  }
  return copy;
}
