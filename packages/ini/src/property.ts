/**
 * A single `key = value` entry.
 */

import { InvalidNameError } from '@inikit/core';
import type { ValueConversionError, Result } from '@inikit/core';
import type { ValueKind } from '@inikit/types';
import { Comment } from './comment';
import { ElementBase } from './element';
import {
  convertValue,
  decodeTypedArray,
  encodeArray,
  formatScalar,
} from './value-codec';
import type { ScalarValue, ValueKindMap } from './value-codec';

export class Property extends ElementBase {
  public value: string;
  /** Serialization hint: write the value inside double quotes. */
  public isQuoted = false;

  /** A key may not hold `=` or start with `[`. */
  constructor(name: string, value = '') {
    super(name);
    if (name.includes('=') || name.startsWith('[')) {
      throw new InvalidNameError("Property name cannot contain '=' or start with '['", name);
    }
    this.value = value;
  }

  get isEmpty(): boolean {
    return this.value === '';
  }

  getValue<K extends ValueKind>(kind: K): Result<ValueKindMap[K], ValueConversionError> {
    return convertValue(this.value, kind);
  }

  getValueOrDefault<K extends ValueKind>(kind: K, fallback: ValueKindMap[K]): ValueKindMap[K] {
    const result = convertValue(this.value, kind);
    return result.ok ? result.value : fallback;
  }

  setValue(value: ScalarValue): void {
    this.value = formatScalar(value);
  }

  getArray<K extends ValueKind = 'string'>(
    kind?: K,
    maxElements?: number
  ): Result<Array<ValueKindMap[K]>, ValueConversionError>;
  getArray(kind: ValueKind = 'string', maxElements?: number): Result<Array<ValueKindMap[ValueKind]>, ValueConversionError> {
    return decodeTypedArray(this.value, kind, maxElements);
  }

  setArray(values: readonly ScalarValue[]): void {
    this.value = encodeArray(values);
  }

  clone(): Property {
    const copy = new Property(this.name, this.value);
    copy.isQuoted = this.isQuoted;
    this.copyCommentsTo(copy);
    return copy;
  }

  // --- Fluent helpers ---

  withValue(value: ScalarValue): this {
    this.setValue(value);
    return this;
  }

  withQuoted(quoted = true): this {
    this.isQuoted = quoted;
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
