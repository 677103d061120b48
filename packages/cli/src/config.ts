/**
 * .inikit.json Config Loader
 *
 * Project defaults for parser, serializer and merge behaviour. Every
 * field is optional; missing ones fall back to the library defaults.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { FormatOptionsSchema, IniOptionsShape, MergeOptionsSchema } from '@inikit/core';

// ============================================================================
// Config Types
// ============================================================================

export const EncodingSchema = z.enum(['utf8', 'utf16le', 'latin1', 'ascii']);

export type Encoding = z.infer<typeof EncodingSchema>;

const ConfigSchema = z.object({
  /** Parser options; cross-field rules are checked when a file is loaded. */
  parse: IniOptionsShape.partial().default({}),
  /** Serializer options used by fmt, set and merge --write. */
  format: FormatOptionsSchema.partial().default({}),
  /** Default merge flags; --apply overrides them. */
  merge: MergeOptionsSchema.partial().default({}),
  encoding: EncodingSchema.default('utf8'),
});

export type InikitConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: InikitConfig = ConfigSchema.parse({});

// ============================================================================
// Config Loading
// ============================================================================

/**
 * Load config from the given JSON file.
 * Falls back to defaults if the file is missing or invalid.
 */
export function loadConfig(configFile: string): InikitConfig {
  if (!fs.existsSync(configFile)) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf-8'));
  } catch {
    console.warn(`Warning: Failed to parse ${configFile}, using defaults`);
    return DEFAULT_CONFIG;
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    console.warn(`Warning: Invalid config in ${configFile} (${issues}), using defaults`);
    return DEFAULT_CONFIG;
  }
  return result.data;
}
