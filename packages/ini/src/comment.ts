/**
 * Comments attached to INI elements.
 *
 * A Comment is one physical line: a prefix character plus text that never
 * contains a line terminator. CommentCollection holds the run of comment
 * lines that precede an element ("pre-comments").
 */

import { CommentFormatError } from '@inikit/core';

export const DEFAULT_COMMENT_PREFIX = ';';

const LINE_TERMINATOR_RE = /[\r\n]/;

function assertPrefix(prefix: string): void {
  if ([...prefix].length !== 1) {
    throw new CommentFormatError(`Comment prefix must be a single character, got '${prefix}'`);
  }
}

function assertSingleLine(value: string): void {
  if (LINE_TERMINATOR_RE.test(value)) {
    throw new CommentFormatError('Comment value cannot contain newline characters');
  }
}

export class Comment {
  private _prefix: string;
  private _value: string;

  constructor(value = '', prefix: string = DEFAULT_COMMENT_PREFIX) {
    assertPrefix(prefix);
    assertSingleLine(value);
    this._prefix = prefix;
    this._value = value;
  }

  get prefix(): string {
    return this._prefix;
  }

  set prefix(prefix: string) {
    assertPrefix(prefix);
    this._prefix = prefix;
  }

  get value(): string {
    return this._value;
  }

  set value(value: string) {
    assertSingleLine(value);
    this._value = value;
  }

  /** Like the `value` setter, but reports a rejected value instead of throwing. */
  trySetValue(value: string): boolean {
    if (LINE_TERMINATOR_RE.test(value)) return false;
    this._value = value;
    return true;
  }

  clone(): Comment {
    return new Comment(this._value, this._prefix);
  }

  toString(): string {
    return `${this._prefix}${this._value}`;
  }
}

export class CommentCollection implements Iterable<Comment> {
  private items: Comment[] = [];

  get length(): number {
    return this.items.length;
  }

  at(index: number): Comment | undefined {
    return this.items[index];
  }

  /** Stores a copy; the caller's instance is never shared. */
  add(comment: Comment | string): void {
    this.items.push(typeof comment === 'string' ? new Comment(comment) : comment.clone());
  }

  addRange(comments: Iterable<Comment>): void {
    const copies = [...comments].map(c => c.clone());
    this.items.push(...copies);
  }

  insert(index: number, comment: Comment | string): void {
    this.items.splice(index, 0, typeof comment === 'string' ? new Comment(comment) : comment.clone());
  }

  removeAt(index: number): boolean {
    if (index < 0 || index >= this.items.length) return false;
    this.items.splice(index, 1);
    return true;
  }

  clear(): void {
    this.items = [];
  }

  toArray(): readonly Comment[] {
    return this.items;
  }

  [Symbol.iterator](): Iterator<Comment> {
    return this.items[Symbol.iterator]();
  }

  /** One comment value per line, joined with `\n`. */
  toMultiLineText(): string {
    return this.items.map(c => c.value).join('\n');
  }

  /**
   * Replaces the contents with one comment per line of `text`.
   * Empty text clears the collection. All-or-nothing: nothing changes
   * when any line is rejected.
   */
  trySetMultiLineText(text: string, prefix: string = DEFAULT_COMMENT_PREFIX): boolean {
    if (text === '') {
      this.items = [];
      return true;
    }

    const next: Comment[] = [];
    try {
      for (const line of text.split(/\r\n|\r|\n/)) {
        next.push(new Comment(line, prefix));
      }
    } catch (err) {
      if (err instanceof CommentFormatError) return false;
      throw err;
    }

    this.items = next;
    return true;
  }

  clone(): CommentCollection {
    const copy = new CommentCollection();
    copy.addRange(this.items);
    return copy;
  }
}
