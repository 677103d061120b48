/**
 * A `[name]` block: an ordered, case-insensitively unique set of properties.
 */

import {
  DuplicateNameError,
  IndexOutOfRangeError,
  InvalidNameError,
  NotFoundError,
  ValueConversionError,
  err,
} from '@inikit/core';
import type { Result } from '@inikit/core';
import type { DuplicateKeyPolicy, ValueKind } from '@inikit/types';
import { Comment } from './comment';
import { ElementBase } from './element';
import { NamedList } from './named-list';
import { Property } from './property';
import type { ScalarValue, ValueKindMap } from './value-codec';

export class Section extends ElementBase implements Iterable<Property> {
  private readonly properties = new NamedList<Property>();

  constructor(name: string) {
    super(name);
    if (name.includes(']')) {
      throw new InvalidNameError("Section name cannot contain ']'", name);
    }
  }

  get length(): number {
    return this.properties.length;
  }

  // --- Lookup (never creates) ---

  get(name: string): Property | undefined {
    return this.properties.get(name);
  }

  getAt(index: number): Property | undefined {
    return this.properties.at(index);
  }

  has(name: string): boolean {
    return this.properties.has(name);
  }

  indexOf(name: string): number {
    return this.properties.indexOf(name);
  }

  /** Returns the property, creating an empty one at the end when missing. */
  getOrCreate(name: string): Property {
    const existing = this.properties.get(name);
    if (existing) return existing;
    const created = new Property(name);
    this.properties.append(created);
    return created;
  }

  // --- Mutation ---

  add(property: Property): void;
  add(name: string, value?: string): void;
  add(propertyOrName: Property | string, value = ''): void {
    const property = typeof propertyOrName === 'string' ? new Property(propertyOrName, value) : propertyOrName;
    if (!this.properties.append(property)) {
      throw new DuplicateNameError('Property', property.name);
    }
  }

  addRange(properties: Iterable<Property>): void {
    for (const property of properties) {
      this.add(property);
    }
  }

  insert(index: number, property: Property): void {
    if (!Number.isInteger(index) || index < 0 || index > this.properties.length) {
      throw new IndexOutOfRangeError(index, this.properties.length);
    }
    if (!this.properties.insertAt(index, property)) {
      throw new DuplicateNameError('Property', property.name);
    }
  }

  /** Inserts `property` directly before the property named `targetName`. */
  insertBefore(targetName: string, property: Property): void {
    const index = this.properties.indexOf(targetName);
    if (index === -1) {
      throw new NotFoundError('Property', targetName, this.name);
    }
    this.insert(index, property);
  }

  remove(name: string): boolean {
    return this.properties.delete(name) !== undefined;
  }

  removeAt(index: number): boolean {
    return this.properties.deleteAt(index) !== undefined;
  }

  move(fromIndex: number, toIndex: number): void {
    const length = this.properties.length;
    if (!Number.isInteger(fromIndex) || fromIndex < 0 || fromIndex >= length) {
      throw new IndexOutOfRangeError(fromIndex, length);
    }
    if (!Number.isInteger(toIndex) || toIndex < 0 || toIndex >= length) {
      throw new IndexOutOfRangeError(toIndex, length);
    }
    this.properties.move(fromIndex, toIndex);
  }

  /** Swaps in a property of the same name at the same position. */
  replace(property: Property): boolean {
    return this.properties.replace(property);
  }

  /** Updates the value of an existing property, or appends a new one. */
  set(name: string, value: ScalarValue): Property {
    const property = this.getOrCreate(name);
    property.setValue(value);
    return property;
  }

  sort(compare: (a: Property, b: Property) => number): void {
    this.properties.sort(compare);
  }

  /** Removes every property and both kinds of comment. */
  clear(): void {
    this.preComments.clear();
    this.comment = null;
    this.properties.clear();
  }

  // --- Typed access ---

  getValue<K extends ValueKind>(name: string, kind: K): Result<ValueKindMap[K], ValueConversionError | NotFoundError> {
    const property = this.properties.get(name);
    if (!property) return err(new NotFoundError('Property', name, this.name));
    return property.getValue(kind);
  }

  getValueOrDefault<K extends ValueKind>(name: string, kind: K, fallback: ValueKindMap[K]): ValueKindMap[K] {
    const property = this.properties.get(name);
    return property ? property.getValueOrDefault(kind, fallback) : fallback;
  }

  // --- Merge & copy ---

  /**
   * Folds a copy of `other` into this section.
   *
   * FirstWin keeps existing keys and appends new ones. LastWin replaces
   * colliding keys in place and takes other's comments. ThrowError
   * rejects any collision before changing anything.
   */
  mergeFrom(other: Section, policy: DuplicateKeyPolicy = 'FirstWin'): void {
    const source = other.clone();

    switch (policy) {
      case 'FirstWin':
        for (const property of source) {
          if (!this.has(property.name)) this.properties.append(property);
        }
        return;

      case 'LastWin':
        this.preComments.clear();
        this.preComments.addRange(source.preComments);
        this.comment = source.comment;
        for (const property of source) {
          if (!this.properties.replace(property)) this.properties.append(property);
        }
        return;

      case 'ThrowError': {
        const collision = source.toArray().find(p => this.has(p.name));
        if (collision) {
          throw new DuplicateNameError('Property', collision.name);
        }
        this.preComments.addRange(source.preComments);
        this.appendComment(source.comment);
        for (const property of source) {
          this.properties.append(property);
        }
        return;
      }
    }
  }

  clone(): Section {
    const copy = new Section(this.name);
    for (const property of this.properties) {
      copy.properties.append(property.clone());
    }
    this.copyCommentsTo(copy);
    return copy;
  }

  toArray(): readonly Property[] {
    return this.properties.toArray();
  }

  [Symbol.iterator](): Iterator<Property> {
    return this.properties[Symbol.iterator]();
  }

  // --- Fluent helpers ---

  withProperty(name: string, value: ScalarValue): this {
    this.add(name, String(value));
    return this;
  }

  withComment(text: string): this {
    this.setComment(text);
    return this;
  }

  withPreComment(comment: Comment | string): this {
    this.preComments.add(comment);
    return this;
  }
}
