/**
 * INI Parser: single-pass, line-oriented conversion of text to a Document.
 *
 * Malformed lines produce ParsingErrorRecords. In collect mode they are
 * gathered and parsing continues with the next line; otherwise the first
 * one aborts the load with a ParsingError. Duplicate sections and keys are
 * resolved as they are met, per the configured policies.
 */

import {
  DuplicateElementError,
  DuplicateNameError,
  ParsingError,
  parseIniOptions,
} from '@inikit/core';
import type { IniOptionsInput } from '@inikit/core';
import type { IniOptions, ParsingErrorRecord } from '@inikit/types';
import { Comment } from './comment';
import { Document, isReservedSectionName } from './document';
import { validateElementName } from './element';
import { unescapeChar } from './escape';
import { Property } from './property';
import { Section } from './section';

export interface ParseOptions extends IniOptionsInput {
  /** Called once per malformed line, before the error is collected or thrown. */
  onParsingError?: (error: ParsingErrorRecord) => void;
}

export interface ParseResult {
  document: Document;
  errors: ParsingErrorRecord[];
}

export const PARSE_ERROR = {
  MISSING_BRACKET: 'Missing closing bracket in section declaration',
  EMPTY_SECTION_NAME: 'Section name cannot be empty',
  RESERVED_SECTION_NAME: "Section name '$DEFAULT' is reserved for the default section",
  MISSING_EQUALS: 'Missing equals sign in key-value pair',
  EMPTY_KEY: 'Key is empty',
  INCOMPLETE_ESCAPE: 'Invalid escape sequence: incomplete escape marker',
  UNTERMINATED_QUOTE: 'Unterminated quote: missing closing quotation mark',
  CONTENT_AFTER_QUOTE: 'Invalid content after closing quote',
  INVALID_QUOTE_FORMAT: 'Invalid quote format',
} as const;

/** Thrown internally to stop the line loop once the error budget is spent. */
class StopParsing extends Error {}

export function parseIni(input: string, options: ParseOptions = {}): ParseResult {
  const { onParsingError, ...rest } = options;
  const opts = parseIniOptions(rest);
  const state = new ParserState(opts, onParsingError);

  try {
    const lines = splitLines(input);
    for (let i = 0; i < lines.length; i++) {
      state.consumeLine(lines[i], i + 1);
    }
  } catch (err) {
    if (!(err instanceof StopParsing)) throw err;
  }

  state.finish();
  state.document.setParsingErrors(state.errors);
  return { document: state.document, errors: state.errors };
}

export function splitLines(input: string): string[] {
  const text = input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
  return text.split(/\r\n|\r|\n/);
}

function indexOfAny(text: string, chars: readonly string[], from = 0): number {
  for (let i = from; i < text.length; i++) {
    if (chars.includes(text[i])) return i;
  }
  return -1;
}

interface ValueScan {
  value: string;
  comment: Comment | null;
  isQuoted: boolean;
}

class ParserState {
  readonly document: Document;
  readonly errors: ParsingErrorRecord[] = [];
  private current: Section;
  private pendingComments: Comment[] = [];
  /** Duplicate section being collected for a Merge-policy fold. */
  private mergeTarget: { into: Section; from: Section } | null = null;

  constructor(
    private readonly opts: IniOptions,
    private readonly onParsingError: ((error: ParsingErrorRecord) => void) | undefined
  ) {
    this.document = new Document({
      commentPrefixChars: opts.commentPrefixChars,
      defaultCommentPrefixChar: opts.defaultCommentPrefixChar,
    });
    this.current = this.document.defaultSection;
  }

  consumeLine(line: string, lineNumber: number): void {
    if (this.opts.maxLineLength > 0 && line.length > this.opts.maxLineLength) {
      this.report(lineNumber, line, `Line exceeds maximum length of ${this.opts.maxLineLength}`);
      return;
    }

    const trimmed = line.trim();
    if (trimmed === '') return;

    const prefixes = this.opts.commentPrefixChars;
    if (prefixes.includes(trimmed[0])) {
      this.pushComment(new Comment(trimmed.slice(1), trimmed[0]));
      return;
    }

    if (trimmed[0] === '[') {
      this.consumeSectionHeader(trimmed, line, lineNumber);
      return;
    }

    this.consumeKeyValue(trimmed, line, lineNumber);
  }

  finish(): void {
    this.flushMerge();
  }

  // --- Comments ---

  private pushComment(comment: Comment): void {
    this.pendingComments.push(comment);
    const max = this.opts.maxPendingComments;
    if (max > 0 && this.pendingComments.length > max) {
      this.pendingComments.shift();
    }
  }

  private takeComments(element: Section | Property): void {
    if (this.pendingComments.length === 0) return;
    element.preComments.addRange(this.pendingComments);
    this.pendingComments = [];
  }

  // --- Sections ---

  private consumeSectionHeader(trimmed: string, line: string, lineNumber: number): void {
    const close = trimmed.indexOf(']');
    if (close === -1) {
      this.report(lineNumber, line, PARSE_ERROR.MISSING_BRACKET);
      return;
    }

    const name = trimmed.slice(1, close).trim();
    if (name === '') {
      this.report(lineNumber, line, PARSE_ERROR.EMPTY_SECTION_NAME);
      return;
    }

    this.flushMerge();

    if (isReservedSectionName(name)) {
      // Keys under the rejected header are detached and dropped.
      this.current = new Section(name);
      this.takeComments(this.current);
      this.report(lineNumber, line, PARSE_ERROR.RESERVED_SECTION_NAME);
      return;
    }

    const section = new Section(name);
    this.takeComments(section);

    const after = trimmed.slice(close + 1).trimStart();
    if (after.length > 1 && this.opts.commentPrefixChars.includes(after[0])) {
      section.comment = new Comment(after.slice(1), after[0]);
    }

    const existing = this.document.get(name);
    if (!existing) {
      const max = this.opts.maxSections;
      if (max > 0 && this.document.length >= max) {
        this.current = section;
        this.report(lineNumber, line, `Maximum section count of ${max} exceeded`);
        return;
      }
      this.document.add(section);
      this.current = section;
      return;
    }

    switch (this.opts.duplicateSectionPolicy) {
      case 'ThrowError':
        throw new DuplicateElementError('Section', name);
      case 'FirstWin':
        // Detached: the later block and everything in it is dropped.
        this.current = section;
        return;
      case 'LastWin':
        this.document.remove(name);
        this.document.add(section);
        this.current = section;
        return;
      case 'Merge':
        this.mergeTarget = { into: existing, from: section };
        this.current = section;
        return;
    }
  }

  private flushMerge(): void {
    if (this.mergeTarget === null) return;
    const { into, from } = this.mergeTarget;
    this.mergeTarget = null;
    try {
      into.mergeFrom(from, this.opts.duplicateKeyPolicy);
    } catch (err) {
      if (err instanceof DuplicateNameError) {
        throw new DuplicateElementError('Property', err.elementName, into.name);
      }
      throw err;
    }
  }

  // --- Key/value lines ---

  private consumeKeyValue(trimmed: string, line: string, lineNumber: number): void {
    const equals = trimmed.indexOf('=');
    if (equals === -1) {
      this.report(lineNumber, line, PARSE_ERROR.MISSING_EQUALS);
      return;
    }

    const key = trimmed.slice(0, equals).trim();
    if (key === '') {
      this.report(lineNumber, line, PARSE_ERROR.EMPTY_KEY);
      return;
    }
    const invalid = validateElementName(key);
    if (invalid !== null) {
      this.report(lineNumber, line, `Invalid key name: ${invalid}`);
      return;
    }

    const raw = trimmed.slice(equals + 1).trimStart();
    const scanned = raw.startsWith('"')
      ? this.scanQuoted(raw, line, lineNumber)
      : this.scanBare(raw);
    if (scanned === null) return;

    const maxValue = this.opts.maxValueLength;
    if (maxValue > 0 && scanned.value.length > maxValue) {
      this.report(lineNumber, line, `Value exceeds maximum length of ${maxValue}`);
      return;
    }

    const property = new Property(key, scanned.value);
    property.isQuoted = scanned.isQuoted;
    this.takeComments(property);
    property.comment = scanned.comment;

    this.placeProperty(property, line, lineNumber);
  }

  private placeProperty(property: Property, line: string, lineNumber: number): void {
    const section = this.current;
    if (!section.has(property.name)) {
      const max = this.opts.maxPropertiesPerSection;
      if (max > 0 && section.length >= max) {
        this.report(lineNumber, line, `Maximum property count of ${max} exceeded in section '${section.name}'`);
        return;
      }
      section.add(property);
      return;
    }

    switch (this.opts.duplicateKeyPolicy) {
      case 'ThrowError':
        throw new DuplicateElementError('Property', property.name, section.name);
      case 'FirstWin':
        return;
      case 'LastWin':
        section.remove(property.name);
        section.add(property);
        return;
    }
  }

  private scanQuoted(raw: string, line: string, lineNumber: number): ValueScan | null {
    let value = '';
    let escaped = false;
    let terminated = false;
    let i = 1;

    for (; i < raw.length; i++) {
      const c = raw[i];
      if (escaped) {
        value += unescapeChar(c);
        escaped = false;
      } else if (c === '\\') {
        escaped = true;
      } else if (c === '"') {
        terminated = true;
        i++;
        break;
      } else {
        value += c;
      }
    }

    if (escaped) {
      this.report(lineNumber, line, PARSE_ERROR.INCOMPLETE_ESCAPE);
      return null;
    }
    if (!terminated) {
      this.report(lineNumber, line, PARSE_ERROR.UNTERMINATED_QUOTE);
      return null;
    }

    const after = raw.slice(i).trimStart();
    const prefixAt = indexOfAny(after, this.opts.commentPrefixChars);
    if (prefixAt > 0) {
      this.report(lineNumber, line, PARSE_ERROR.CONTENT_AFTER_QUOTE);
      return null;
    }
    if (prefixAt === -1 && after.trim() !== '') {
      this.report(lineNumber, line, PARSE_ERROR.INVALID_QUOTE_FORMAT);
      return null;
    }

    return {
      value,
      comment: prefixAt === 0 ? this.inlineComment(after) : null,
      isQuoted: true,
    };
  }

  private scanBare(raw: string): ValueScan {
    const prefixes = this.opts.commentPrefixChars;
    let value = '';

    for (let i = 0; i < raw.length; i++) {
      const c = raw[i];
      if (c === '\\' && i + 1 < raw.length && prefixes.includes(raw[i + 1])) {
        value += raw[i + 1];
        i++;
        continue;
      }
      if (prefixes.includes(c)) {
        return { value: value.trimEnd(), comment: this.inlineComment(raw.slice(i)), isQuoted: false };
      }
      value += c;
    }

    return { value: value.trimEnd(), comment: null, isQuoted: false };
  }

  /** `text` starts with the prefix char; empty comments are dropped. */
  private inlineComment(text: string): Comment | null {
    return text.length > 1 ? new Comment(text.slice(1), text[0]) : null;
  }

  // --- Errors ---

  private report(lineNumber: number, line: string, reason: string): void {
    const record: ParsingErrorRecord = { lineNumber, line, reason };
    this.onParsingError?.(record);

    if (!this.opts.collectParsingErrors) {
      throw new ParsingError([record]);
    }

    this.errors.push(record);
    const max = this.opts.maxParsingErrors;
    if (max > 0 && this.errors.length >= max) {
      throw new StopParsing();
    }
  }
}
