/**
 * JSON and CSV renderings of a document.
 *
 * JSON is written by hand rather than through an object literal so that
 * section and key order survives (integer-like keys would otherwise be
 * hoisted by the engine).
 */

import type { Document } from './document';
import type { Property } from './property';
import type { Section } from './section';

// ============================================================================
// JSON
// ============================================================================

export interface JsonExportOptions {
  /** Two-space indentation; default true. */
  indented?: boolean;
  /** Emit `_preComments`/`_comment` on sections and `{ value, preComments, comment }` on properties. */
  includeComments?: boolean;
  /** Write default-section keys at the root instead of under `_default`. */
  flattenDefaultSection?: boolean;
  /** Emit booleans and numbers for values that read as such. */
  autoConvertTypes?: boolean;
}

export const DEFAULT_SECTION_JSON_KEY = '_default';

type JsonValue = string | number | boolean | JsonValue[] | JsonObject;

/** Ordered entries; a raw value is already-serialized number text. */
interface JsonObject {
  entries: Array<[string, JsonValue | { raw: string }]>;
}

function isJsonObject(value: JsonValue | { raw: string }): value is JsonObject {
  return typeof value === 'object' && !Array.isArray(value) && 'entries' in value;
}

function isRaw(value: JsonValue | { raw: string }): value is { raw: string } {
  return typeof value === 'object' && !Array.isArray(value) && 'raw' in value;
}

function stringify(value: JsonValue | { raw: string }, indent: string, depth: number): string {
  if (isRaw(value)) return value.raw;
  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const items = value.map(v => stringify(v, indent, depth + 1));
    return wrap('[', ']', items, indent, depth);
  }
  if (isJsonObject(value)) {
    if (value.entries.length === 0) return '{}';
    const sep = indent === '' ? ':' : ': ';
    const items = value.entries.map(([k, v]) => `${JSON.stringify(k)}${sep}${stringify(v, indent, depth + 1)}`);
    return wrap('{', '}', items, indent, depth);
  }
  return JSON.stringify(value);
}

function wrap(open: string, close: string, items: string[], indent: string, depth: number): string {
  if (indent === '') return `${open}${items.join(',')}${close}`;
  const inner = indent.repeat(depth + 1);
  const outer = indent.repeat(depth);
  return `${open}\n${items.map(i => inner + i).join(',\n')}\n${outer}${close}`;
}

const INT64_RE = /^[+-]?\d+$/;
const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** Boolean, then 64-bit integer, then double; anything else stays a string. */
export function autoTypedValue(value: string): JsonValue | { raw: string } {
  const t = value.trim();
  const lower = t.toLowerCase();
  if (lower === 'true' || lower === 'yes' || t === '1') return true;
  if (lower === 'false' || lower === 'no' || t === '0') return false;

  if (INT64_RE.test(t)) {
    const n = BigInt(t);
    if (n >= INT64_MIN && n <= INT64_MAX) return { raw: n.toString() };
  }
  if (NUMBER_RE.test(t)) {
    const n = Number(t);
    if (Number.isFinite(n)) return n;
  }
  return value;
}

function propertyEntry(property: Property, options: JsonExportOptions): [string, JsonValue | { raw: string }] {
  const hasComments = property.preComments.length > 0 || property.comment !== null;
  if (options.includeComments && hasComments) {
    const entries: JsonObject['entries'] = [['value', property.value]];
    if (property.preComments.length > 0) {
      entries.push(['preComments', property.preComments.toArray().map(c => c.value)]);
    }
    if (property.comment !== null) {
      entries.push(['comment', property.comment.value]);
    }
    return [property.name, { entries }];
  }
  return [property.name, options.autoConvertTypes ? autoTypedValue(property.value) : property.value];
}

function sectionObject(section: Section, options: JsonExportOptions): JsonObject {
  const entries: JsonObject['entries'] = [];
  if (options.includeComments && section.preComments.length > 0) {
    entries.push(['_preComments', section.preComments.toArray().map(c => c.value)]);
  }
  if (options.includeComments && section.comment !== null) {
    entries.push(['_comment', section.comment.value]);
  }
  for (const property of section) {
    entries.push(propertyEntry(property, options));
  }
  return { entries };
}

export function toJson(doc: Document, options: JsonExportOptions = {}): string {
  const root: JsonObject = { entries: [] };

  if (doc.defaultSection.length > 0) {
    if (options.flattenDefaultSection) {
      for (const property of doc.defaultSection) {
        root.entries.push(propertyEntry(property, options));
      }
    } else {
      root.entries.push([DEFAULT_SECTION_JSON_KEY, sectionObject(doc.defaultSection, options)]);
    }
  }

  for (const section of doc) {
    root.entries.push([section.name, sectionObject(section, options)]);
  }

  return stringify(root, options.indented === false ? '' : '  ', 0);
}

// ============================================================================
// CSV
// ============================================================================

export interface CsvExportOptions {
  /** Default `,`. */
  delimiter?: string;
  /** Default true. */
  includeHeader?: boolean;
  /** Adds a Comment column holding the inline comment. */
  includeComments?: boolean;
  alwaysQuote?: boolean;
}

function csvField(value: string, delimiter: string, alwaysQuote: boolean): string {
  if (value === '') return alwaysQuote ? '""' : '';
  const quote = alwaysQuote
    || value.includes(delimiter)
    || value.includes('"')
    || value.includes('\r')
    || value.includes('\n');
  return quote ? `"${value.replace(/"/g, '""')}"` : value;
}

/** One row per property, default section first with an empty Section column. */
export function toCsv(doc: Document, options: CsvExportOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const alwaysQuote = options.alwaysQuote ?? false;
  const rows: string[] = [];

  if (options.includeHeader ?? true) {
    const header = ['Section', 'Key', 'Value'];
    if (options.includeComments) header.push('Comment');
    rows.push(header.join(delimiter));
  }

  const pushRows = (sectionName: string, section: Section): void => {
    for (const property of section) {
      const fields = [sectionName, property.name, property.value];
      if (options.includeComments) fields.push(property.comment?.value ?? '');
      rows.push(fields.map(f => csvField(f, delimiter, alwaysQuote)).join(delimiter));
    }
  };

  pushRows('', doc.defaultSection);
  for (const section of doc) {
    pushRows(section.name, section);
  }

  return rows.map(r => r + '\n').join('');
}
