/**
 * Escape table for double-quoted values.
 *
 * One `[original, trigger]` pair list drives both the parser's unescape
 * and the serializer's escape.
 */

const ESCAPE_PAIRS: ReadonlyArray<readonly [original: string, trigger: string]> = [
  ['\0', '0'],
  ['\x07', 'a'],
  ['\b', 'b'],
  ['\t', 't'],
  ['\r', 'r'],
  ['\n', 'n'],
  [';', ';'],
  ['#', '#'],
  ['"', '"'],
  ['\\', '\\'],
];

const ESCAPE_MAP: ReadonlyMap<string, string> = new Map(
  ESCAPE_PAIRS.map(([original, trigger]) => [original, `\\${trigger}`])
);

const UNESCAPE_MAP: ReadonlyMap<string, string> = new Map(
  ESCAPE_PAIRS.map(([original, trigger]) => [trigger, original])
);

export function escapeQuoted(value: string): string {
  let out = '';
  for (const c of value) {
    out += ESCAPE_MAP.get(c) ?? c;
  }
  return out;
}

/** Character produced by `\c`; unknown escapes yield `c` itself. */
export function unescapeChar(c: string): string {
  return UNESCAPE_MAP.get(c) ?? c;
}

const BARE_UNSAFE_RE = /[\\"\0\x07\b\t\r\n]/;

/**
 * Whether `value` must be quoted to survive a write/read cycle:
 * it holds a comment prefix, a backslash, a quote or a control character,
 * or has surrounding whitespace.
 */
export function needsQuoting(value: string, commentPrefixChars: readonly string[]): boolean {
  if (value === '') return false;
  if (BARE_UNSAFE_RE.test(value)) return true;
  if (commentPrefixChars.some(c => value.includes(c))) return true;
  return value.trim() !== value;
}
