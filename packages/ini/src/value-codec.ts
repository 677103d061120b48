/**
 * Typed projections over property string values.
 *
 * Conversions never store parsed state; they read the string each time
 * and report failures as ValueConversionError results.
 */

import { ValueConversionError, ok, err } from '@inikit/core';
import type { Result } from '@inikit/core';
import type { ValueKind } from '@inikit/types';

export interface ValueKindMap {
  string: string;
  int: number;
  long: bigint;
  float: number;
  double: number;
  /** Canonical decimal text; JavaScript has no decimal type to hold it. */
  decimal: string;
  bool: boolean;
}

export type ScalarValue = string | number | bigint | boolean;

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const KIND_LABEL: Record<ValueKind, string> = {
  string: 'String',
  int: 'Int32',
  long: 'Int64',
  float: 'Single',
  double: 'Double',
  decimal: 'Decimal',
  bool: 'Boolean',
};

type Conversion<K extends ValueKind> = Result<ValueKindMap[K], ValueConversionError>;

type Converters = { [K in ValueKind]: (text: string) => Conversion<K> };

const converters: Converters = {
  string: text => ok(text),
  int: text => {
    const t = text.trim();
    if (!INTEGER_RE.test(t)) return err(new ValueConversionError(text, KIND_LABEL.int));
    const n = Number(t);
    if (n < INT32_MIN || n > INT32_MAX) {
      return err(new ValueConversionError(text, KIND_LABEL.int, 'value out of range'));
    }
    return ok(n);
  },
  long: text => {
    const t = text.trim();
    if (!INTEGER_RE.test(t)) return err(new ValueConversionError(text, KIND_LABEL.long));
    const n = BigInt(t);
    if (n < INT64_MIN || n > INT64_MAX) {
      return err(new ValueConversionError(text, KIND_LABEL.long, 'value out of range'));
    }
    return ok(n);
  },
  float: text => {
    const t = text.trim();
    if (!FLOAT_RE.test(t)) return err(new ValueConversionError(text, KIND_LABEL.float));
    const n = Math.fround(Number(t));
    if (!Number.isFinite(n)) return err(new ValueConversionError(text, KIND_LABEL.float, 'value out of range'));
    return ok(n);
  },
  double: text => {
    const t = text.trim();
    if (!FLOAT_RE.test(t)) return err(new ValueConversionError(text, KIND_LABEL.double));
    const n = Number(t);
    if (!Number.isFinite(n)) return err(new ValueConversionError(text, KIND_LABEL.double, 'value out of range'));
    return ok(n);
  },
  decimal: text => {
    const t = text.trim();
    if (!DECIMAL_RE.test(t)) return err(new ValueConversionError(text, KIND_LABEL.decimal));
    return ok(t);
  },
  bool: text => {
    const t = text.trim().toLowerCase();
    if (t === 'true' || t === '1' || t === 'yes') return ok(true);
    if (t === 'false' || t === '0' || t === 'no') return ok(false);
    return err(new ValueConversionError(text, KIND_LABEL.bool));
  },
};

export function convertValue<K extends ValueKind>(text: string, kind: K): Conversion<K> {
  const convert: (text: string) => Conversion<K> = converters[kind];
  return convert(text);
}

export function formatScalar(value: ScalarValue): string {
  return String(value);
}

// ============================================================================
// Arrays: {a, b, "c,d"}
// ============================================================================

const ARRAY_SPECIAL_RE = /[,{}" ]/;

export const DEFAULT_MAX_ARRAY_ELEMENTS = 10000;

export function encodeArray(values: readonly ScalarValue[]): string {
  if (values.length === 0) return '{}';
  const parts = values.map(v => {
    const s = formatScalar(v);
    return ARRAY_SPECIAL_RE.test(s) ? `"${s.replace(/"/g, '\\"')}"` : s;
  });
  return `{${parts.join(', ')}}`;
}

/** Splits `{a, b, "c,d"}` into raw element strings. maxElements 0 = unlimited. */
export function decodeArray(
  text: string,
  maxElements: number = DEFAULT_MAX_ARRAY_ELEMENTS
): Result<string[], ValueConversionError> {
  const trimmed = text.trim();
  if (trimmed.length < 2 || !trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    return err(new ValueConversionError(text, 'Array', 'Invalid array format'));
  }

  const body = trimmed.slice(1, -1);
  const values: string[] = [];
  let start = 0;
  let inQuotes = false;

  const take = (raw: string): ValueConversionError | null => {
    let item = raw.trim();
    if (item === '') return null;
    if (maxElements > 0 && values.length >= maxElements) {
      return new ValueConversionError(text, 'Array', `Array exceeds maximum allowed size (${maxElements} elements)`);
    }
    if (item.length >= 2 && item.startsWith('"') && item.endsWith('"')) {
      item = item.slice(1, -1).replace(/\\"/g, '"');
    }
    values.push(item);
    return null;
  };

  for (let i = 0; i <= body.length; i++) {
    if (i === body.length) {
      if (inQuotes) {
        return err(new ValueConversionError(text, 'Array', 'Unterminated quote in array'));
      }
      const problem = take(body.slice(start, i));
      if (problem) return err(problem);
      break;
    }

    const c = body[i];
    if (c === '"') {
      if (i > 0 && body[i - 1] === '\\') continue;
      inQuotes = !inQuotes;
      continue;
    }

    if (!inQuotes && c === ',') {
      const problem = take(body.slice(start, i));
      if (problem) return err(problem);
      start = i + 1;
    }
  }

  return ok(values);
}

export function decodeTypedArray<K extends ValueKind>(
  text: string,
  kind: K,
  maxElements?: number
): Result<Array<ValueKindMap[K]>, ValueConversionError> {
  const raw = decodeArray(text, maxElements);
  if (!raw.ok) return raw;

  const out: Array<ValueKindMap[K]> = [];
  for (const item of raw.value) {
    const converted = convertValue(item, kind);
    if (!converted.ok) return converted;
    out.push(converted.value);
  }
  return ok(out);
}
