/**
 * Shared base for sections and properties: a validated, immutable name
 * plus pre-comments and an optional inline comment.
 */

import { InvalidNameError } from '@inikit/core';
import { Comment, CommentCollection } from './comment';

export function validateElementName(name: string): string | null {
  if (name.trim() === '') return 'Element name cannot be empty or whitespace';
  if (name.trim() !== name) return 'Element name cannot have leading or trailing whitespace';
  if (/[\r\n]/.test(name)) return 'Element name cannot contain newline characters';
  return null;
}

export abstract class ElementBase {
  public readonly name: string;
  public readonly preComments: CommentCollection = new CommentCollection();
  private _comment: Comment | null = null;

  constructor(name: string) {
    const problem = validateElementName(name);
    if (problem !== null) {
      throw new InvalidNameError(problem, name);
    }
    this.name = name;
  }

  /** Inline comment written on the element's own line. */
  get comment(): Comment | null {
    return this._comment;
  }

  /** Assigning stores a copy of the given comment. */
  set comment(comment: Comment | null) {
    this._comment = comment === null ? null : comment.clone();
  }

  setComment(text: string, prefix?: string): void {
    this._comment = new Comment(text, prefix ?? this._comment?.prefix);
  }

  /** Appends `comment`'s text to the inline comment, keeping the existing prefix. */
  appendComment(comment: Comment | null): void {
    if (comment === null) return;
    this._comment = this._comment === null
      ? comment.clone()
      : new Comment(this._comment.value + comment.value, this._comment.prefix);
  }

  protected copyCommentsTo(target: ElementBase): void {
    target.preComments.addRange(this.preComments);
    target.comment = this._comment;
  }
}
