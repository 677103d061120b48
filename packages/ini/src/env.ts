/**
 * `${VAR}` / `%VAR%` substitution in property values.
 * Unknown variables are left exactly as written.
 */

import type { Document } from './document';
import type { Property } from './property';
import type { Section } from './section';

export type Environment = Readonly<Record<string, string | undefined>>;

const ENV_VAR_RE = /\$\{([^}]+)\}|%([^%]+)%/g;

export function substituteValue(value: string, env: Environment = process.env): string {
  if (value === '') return value;
  return value.replace(ENV_VAR_RE, (match: string, braced: string | undefined, percent: string | undefined) => {
    const name = braced ?? percent ?? '';
    return env[name] ?? match;
  });
}

/** Returns true when the value changed. */
export function substituteProperty(property: Property, env: Environment = process.env): boolean {
  const next = substituteValue(property.value, env);
  if (next === property.value) return false;
  property.value = next;
  return true;
}

/** Returns the number of properties whose value changed. */
export function substituteSection(section: Section, env: Environment = process.env): number {
  let changed = 0;
  for (const property of section) {
    if (substituteProperty(property, env)) changed++;
  }
  return changed;
}

/** Default section and every named section; returns the number of changed values. */
export function substituteDocument(doc: Document, env: Environment = process.env): number {
  let changed = substituteSection(doc.defaultSection, env);
  for (const section of doc) {
    changed += substituteSection(section, env);
  }
  return changed;
}
