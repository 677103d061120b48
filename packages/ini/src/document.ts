/**
 * An INI document: a reserved default section for keys that appear before
 * any header, followed by an ordered set of named sections.
 */

import {
  CommentFormatError,
  DuplicateNameError,
  IndexOutOfRangeError,
  InvalidNameError,
  NotFoundError,
  ValueConversionError,
  err,
} from '@inikit/core';
import type { Result } from '@inikit/core';
import type { ParsingErrorRecord, ValueKind } from '@inikit/types';
import { NamedList, foldName } from './named-list';
import { Section } from './section';
import type { ScalarValue, ValueKindMap } from './value-codec';

export const DEFAULT_SECTION_NAME = '$DEFAULT';
export const DEFAULT_COMMENT_PREFIX_CHARS: readonly string[] = [';', '#'];

/** `$DEFAULT`, in any case, names the default section and no other. */
export function isReservedSectionName(name: string): boolean {
  return foldName(name) === foldName(DEFAULT_SECTION_NAME);
}

function assertSectionName(name: string): void {
  if (isReservedSectionName(name)) {
    throw new InvalidNameError(`Section name '${DEFAULT_SECTION_NAME}' is reserved for the default section`, name);
  }
}

export interface DocumentOptions {
  commentPrefixChars?: readonly string[];
  defaultCommentPrefixChar?: string;
}

export class Document implements Iterable<Section> {
  public readonly defaultSection = new Section(DEFAULT_SECTION_NAME);
  public readonly commentPrefixChars: readonly string[];
  private readonly sections = new NamedList<Section>();
  private _defaultCommentPrefixChar: string;
  private _parsingErrors: readonly ParsingErrorRecord[] = [];

  constructor(options: DocumentOptions = {}) {
    const chars = [...(options.commentPrefixChars ?? DEFAULT_COMMENT_PREFIX_CHARS)];
    if (chars.length === 0 || chars.some(c => [...c].length !== 1)) {
      throw new CommentFormatError('Comment prefix characters must be single characters');
    }
    this.commentPrefixChars = Object.freeze(chars);
    this._defaultCommentPrefixChar = chars[0];
    this.defaultCommentPrefixChar = options.defaultCommentPrefixChar ?? chars[0];
  }

  /** Prefix used when the library writes new comments; always one of commentPrefixChars. */
  get defaultCommentPrefixChar(): string {
    return this._defaultCommentPrefixChar;
  }

  set defaultCommentPrefixChar(prefix: string) {
    if (!this.commentPrefixChars.includes(prefix)) {
      throw new CommentFormatError(`Invalid comment prefix '${prefix}'`);
    }
    this._defaultCommentPrefixChar = prefix;
  }

  /** Errors collected by the load that produced this document. */
  get parsingErrors(): readonly ParsingErrorRecord[] {
    return this._parsingErrors;
  }

  /** Used by loaders to attach collected errors; replaces any previous list. */
  setParsingErrors(errors: readonly ParsingErrorRecord[]): void {
    this._parsingErrors = Object.freeze([...errors]);
  }

  get length(): number {
    return this.sections.length;
  }

  // --- Lookup (never creates) ---

  get(name: string): Section | undefined {
    return this.sections.get(name);
  }

  getAt(index: number): Section | undefined {
    return this.sections.at(index);
  }

  has(name: string): boolean {
    return this.sections.has(name);
  }

  indexOf(name: string): number {
    return this.sections.indexOf(name);
  }

  /** Returns the section, creating an empty one at the end when missing. */
  getOrCreate(name: string): Section {
    const existing = this.sections.get(name);
    if (existing) return existing;
    assertSectionName(name);
    const created = new Section(name);
    this.sections.append(created);
    return created;
  }

  // --- Mutation ---

  add(section: Section | string): Section {
    const entity = typeof section === 'string' ? new Section(section) : section;
    assertSectionName(entity.name);
    if (!this.sections.append(entity)) {
      throw new DuplicateNameError('Section', entity.name);
    }
    return entity;
  }

  insert(index: number, section: Section | string): Section {
    if (!Number.isInteger(index) || index < 0 || index > this.sections.length) {
      throw new IndexOutOfRangeError(index, this.sections.length);
    }
    const entity = typeof section === 'string' ? new Section(section) : section;
    assertSectionName(entity.name);
    if (!this.sections.insertAt(index, entity)) {
      throw new DuplicateNameError('Section', entity.name);
    }
    return entity;
  }

  remove(name: string): boolean {
    return this.sections.delete(name) !== undefined;
  }

  removeAt(index: number): boolean {
    return this.sections.deleteAt(index) !== undefined;
  }

  move(fromIndex: number, toIndex: number): void {
    const length = this.sections.length;
    if (!Number.isInteger(fromIndex) || fromIndex < 0 || fromIndex >= length) {
      throw new IndexOutOfRangeError(fromIndex, length);
    }
    if (!Number.isInteger(toIndex) || toIndex < 0 || toIndex >= length) {
      throw new IndexOutOfRangeError(toIndex, length);
    }
    this.sections.move(fromIndex, toIndex);
  }

  /** Swaps in a section of the same name at the same position. */
  replace(section: Section): boolean {
    return this.sections.replace(section);
  }

  sort(compare: (a: Section, b: Section) => number): void {
    this.sections.sort(compare);
  }

  /** Removes every named section; the default section is left as is. */
  clear(): void {
    this.sections.clear();
  }

  // --- Typed access ---

  getValue<K extends ValueKind>(
    sectionName: string,
    key: string,
    kind: K
  ): Result<ValueKindMap[K], ValueConversionError | NotFoundError> {
    const section = this.sections.get(sectionName);
    if (!section) return err(new NotFoundError('Section', sectionName));
    return section.getValue(key, kind);
  }

  getValueOrDefault<K extends ValueKind>(
    sectionName: string,
    key: string,
    kind: K,
    fallback: ValueKindMap[K]
  ): ValueKindMap[K] {
    const section = this.sections.get(sectionName);
    return section ? section.getValueOrDefault(key, kind, fallback) : fallback;
  }

  // --- Copy ---

  clone(): Document {
    const copy = new Document({
      commentPrefixChars: this.commentPrefixChars,
      defaultCommentPrefixChar: this._defaultCommentPrefixChar,
    });
    copy.defaultSection.mergeFrom(this.defaultSection, 'FirstWin');
    copy.defaultSection.preComments.addRange(this.defaultSection.preComments);
    copy.defaultSection.comment = this.defaultSection.comment;
    for (const section of this.sections) {
      copy.sections.append(section.clone());
    }
    copy._parsingErrors = this._parsingErrors;
    return copy;
  }

  toArray(): readonly Section[] {
    return this.sections.toArray();
  }

  [Symbol.iterator](): Iterator<Section> {
    return this.sections[Symbol.iterator]();
  }

  // --- Fluent helpers ---

  withSection(section: Section | string): this {
    this.add(section);
    return this;
  }

  withDefaultProperty(key: string, value: ScalarValue): this {
    this.defaultSection.add(key, String(value));
    return this;
  }
}
