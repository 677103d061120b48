/**
 * Undoable edits over the document model.
 *
 * Each command goes through the public Document/Section API only, so every
 * invariant the model enforces also holds for replayed edits. The manager
 * keeps bounded undo/redo stacks; executing a new command clears redo.
 */

import { DuplicateNameError, NotFoundError } from '@inikit/core';
import { foldName } from './named-list';
import type { Comment } from './comment';
import type { Document } from './document';
import { Property } from './property';
import type { Section } from './section';
import { compareNames } from './sort';

export interface Command {
  readonly description: string;
  execute(): void;
  undo(): void;
}

export const DEFAULT_MAX_UNDO_DEPTH = 100;

export class CommandManager {
  private undoStack: Command[] = [];
  private redoStack: Command[] = [];

  constructor(
    private readonly maxDepth: number = DEFAULT_MAX_UNDO_DEPTH,
    private readonly onStateChanged?: () => void
  ) {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError('Max undo depth must be at least 1');
    }
  }

  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  get undoDescription(): string | null {
    return this.undoStack[this.undoStack.length - 1]?.description ?? null;
  }

  get redoDescription(): string | null {
    return this.redoStack[this.redoStack.length - 1]?.description ?? null;
  }

  /** Runs the command; nothing is recorded when it throws. */
  execute(command: Command): void {
    command.execute();
    this.undoStack.push(command);
    if (this.undoStack.length > this.maxDepth) {
      this.undoStack.shift();
    }
    this.redoStack = [];
    this.onStateChanged?.();
  }

  undo(): boolean {
    const command = this.undoStack.pop();
    if (!command) return false;
    command.undo();
    this.redoStack.push(command);
    this.onStateChanged?.();
    return true;
  }

  redo(): boolean {
    const command = this.redoStack.pop();
    if (!command) return false;
    command.execute();
    this.undoStack.push(command);
    this.onStateChanged?.();
    return true;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.onStateChanged?.();
  }
}

// ============================================================================
// Sections
// ============================================================================

export class AddSectionCommand implements Command {
  constructor(
    private readonly doc: Document,
    private readonly section: Section,
    private readonly index?: number
  ) {}

  get description(): string {
    return `Add Section '${this.section.name}'`;
  }

  execute(): void {
    this.doc.insert(this.index ?? this.doc.length, this.section);
  }

  undo(): void {
    this.doc.remove(this.section.name);
  }
}

export class RemoveSectionCommand implements Command {
  private removed: { section: Section; index: number } | null = null;

  constructor(private readonly doc: Document, private readonly name: string) {}

  get description(): string {
    return `Delete Section '${this.name}'`;
  }

  execute(): void {
    const index = this.doc.indexOf(this.name);
    const section = this.doc.getAt(index);
    if (!section) throw new NotFoundError('Section', this.name);
    this.doc.removeAt(index);
    this.removed = { section, index };
  }

  undo(): void {
    if (!this.removed) return;
    this.doc.insert(this.removed.index, this.removed.section);
    this.removed = null;
  }
}

export class MoveSectionCommand implements Command {
  constructor(
    private readonly doc: Document,
    private readonly fromIndex: number,
    private readonly toIndex: number
  ) {}

  get description(): string {
    return `Move Section '${this.doc.getAt(this.fromIndex)?.name ?? this.fromIndex}'`;
  }

  execute(): void {
    this.doc.move(this.fromIndex, this.toIndex);
  }

  undo(): void {
    this.doc.move(this.toIndex, this.fromIndex);
  }
}

export class SortSectionsCommand implements Command {
  readonly description = 'Sort Sections';
  private original: readonly Section[] = [];

  constructor(private readonly doc: Document) {}

  execute(): void {
    this.original = this.doc.toArray();
    this.doc.sort(compareNames);
  }

  undo(): void {
    const position = new Map(this.original.map((s, i) => [s, i] as const));
    this.doc.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
  }
}

// ============================================================================
// Properties
// ============================================================================

export class AddPropertyCommand implements Command {
  constructor(
    private readonly section: Section,
    private readonly property: Property,
    private readonly index?: number
  ) {}

  get description(): string {
    return `Add Property '${this.property.name}'`;
  }

  execute(): void {
    this.section.insert(this.index ?? this.section.length, this.property);
  }

  undo(): void {
    this.section.remove(this.property.name);
  }
}

export class RemovePropertyCommand implements Command {
  private removed: { property: Property; index: number } | null = null;

  constructor(private readonly section: Section, private readonly name: string) {}

  get description(): string {
    return `Delete Property '${this.name}'`;
  }

  execute(): void {
    const index = this.section.indexOf(this.name);
    const property = this.section.getAt(index);
    if (!property) throw new NotFoundError('Property', this.name, this.section.name);
    this.section.removeAt(index);
    this.removed = { property, index };
  }

  undo(): void {
    if (!this.removed) return;
    this.section.insert(this.removed.index, this.removed.property);
    this.removed = null;
  }
}

export interface PropertyEdit {
  name?: string;
  value?: string;
  isQuoted?: boolean;
  /** `null` removes the inline comment. */
  comment?: Comment | null;
}

/**
 * Replaces a property with an edited copy at the same position. The copy
 * gets its own clones of the comments, so the undone and redone states
 * never share a Comment instance.
 */
export class EditPropertyCommand implements Command {
  private swap: { before: Property; after: Property; index: number } | null = null;

  constructor(
    private readonly section: Section,
    private readonly name: string,
    private readonly edit: PropertyEdit
  ) {}

  get description(): string {
    return `Edit Property '${this.name}' to '${this.edit.name ?? this.name}'`;
  }

  execute(): void {
    const index = this.section.indexOf(this.name);
    const before = this.section.getAt(index);
    if (!before) throw new NotFoundError('Property', this.name, this.section.name);

    const newName = this.edit.name ?? before.name;
    if (foldName(newName) !== foldName(before.name) && this.section.has(newName)) {
      throw new DuplicateNameError('Property', newName);
    }

    const after = new Property(newName, this.edit.value ?? before.value);
    after.isQuoted = this.edit.isQuoted ?? before.isQuoted;
    after.preComments.addRange(before.preComments);
    after.comment = this.edit.comment === undefined ? before.comment : this.edit.comment;

    this.section.removeAt(index);
    this.section.insert(index, after);
    this.swap = { before, after, index };
  }

  undo(): void {
    if (!this.swap) return;
    const { before, after, index } = this.swap;
    this.section.remove(after.name);
    this.section.insert(index, before);
    this.swap = null;
  }
}

export class MovePropertyCommand implements Command {
  constructor(
    private readonly section: Section,
    private readonly fromIndex: number,
    private readonly toIndex: number
  ) {}

  get description(): string {
    return `Move Property '${this.section.getAt(this.fromIndex)?.name ?? this.fromIndex}'`;
  }

  execute(): void {
    this.section.move(this.fromIndex, this.toIndex);
  }

  undo(): void {
    this.section.move(this.toIndex, this.fromIndex);
  }
}

export class SortPropertiesCommand implements Command {
  readonly description = 'Sort Properties';
  private original: readonly Property[] = [];

  constructor(private readonly section: Section) {}

  execute(): void {
    this.original = this.section.toArray();
    this.section.sort(compareNames);
  }

  undo(): void {
    const position = new Map(this.original.map((p, i) => [p, i] as const));
    this.section.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
  }
}
