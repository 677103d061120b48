/**
 * INI Formatter: emits INI text from a Document.
 *
 * Pure: entities are read, never changed. Values that cannot survive a
 * bare write are quoted on output even when `isQuoted` is false.
 */

import { parseFormatOptions } from '@inikit/core';
import type { FormatOptionsInput } from '@inikit/core';
import type { Comment } from './comment';
import type { Document } from './document';
import type { ElementBase } from './element';
import { escapeQuoted, needsQuoting } from './escape';
import type { Property } from './property';
import type { Section } from './section';

export function formatIni(doc: Document, options?: FormatOptionsInput): string {
  const { newline } = parseFormatOptions(options);
  const lines: string[] = [];

  for (const property of doc.defaultSection) {
    pushProperty(lines, property, doc);
  }

  for (const section of doc) {
    if (lines.length > 0) lines.push('');
    pushSection(lines, section, doc);
  }

  return lines.length > 0 ? lines.join(newline) + newline : '';
}

/** Text a single value is written as, including surrounding quotes. */
export function formatValue(property: Property, commentPrefixChars: readonly string[]): string {
  if (property.isQuoted || needsQuoting(property.value, commentPrefixChars)) {
    return `"${escapeQuoted(property.value)}"`;
  }
  return property.value;
}

function pushSection(lines: string[], section: Section, doc: Document): void {
  pushPreComments(lines, section, doc);
  lines.push(`[${section.name}]${inlineComment(section.comment, doc)}`);
  for (const property of section) {
    pushProperty(lines, property, doc);
  }
}

function pushProperty(lines: string[], property: Property, doc: Document): void {
  pushPreComments(lines, property, doc);
  const value = formatValue(property, doc.commentPrefixChars);
  lines.push(`${property.name} = ${value}${inlineComment(property.comment, doc)}`);
}

function pushPreComments(lines: string[], element: ElementBase, doc: Document): void {
  for (const comment of element.preComments) {
    lines.push(commentText(comment, doc));
  }
}

function inlineComment(comment: Comment | null, doc: Document): string {
  if (comment === null || comment.value === '') return '';
  return ` ${commentText(comment, doc)}`;
}

// A prefix the document would not read back is written with its default.
function commentText(comment: Comment, doc: Document): string {
  const prefix = doc.commentPrefixChars.includes(comment.prefix)
    ? comment.prefix
    : doc.defaultCommentPrefixChar;
  return prefix + comment.value;
}
