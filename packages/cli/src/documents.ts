/**
 * File access shared by the commands: config-aware load and save.
 */

import * as fs from 'node:fs';
import { loadIniFile, saveIniFile } from '@inikit/ini';
import type { Document, ParseResult } from '@inikit/ini';
import type { IniOptionsInput } from '@inikit/core';
import type { ParsingErrorRecord } from '@inikit/types';
import type { CLIOptions } from './index';
import { CLIError } from './index';
import { loadConfig } from './config';
import type { Encoding, InikitConfig } from './config';

export interface CommandContext {
  config: InikitConfig;
  encoding: Encoding;
}

export function commandContext(options: CLIOptions): CommandContext {
  const config = loadConfig(options.configPath);
  return { config, encoding: options.encoding ?? config.encoding };
}

export function assertFileExists(filePath: string): void {
  if (!fs.existsSync(filePath)) {
    throw new CLIError(`File not found: ${filePath}`);
  }
}

export interface LoadDocumentOptions {
  /** Wins over the configured parser options. */
  parse?: IniOptionsInput;
  /** Warn once about collected parse errors; off for callers that report them. */
  warnOnErrors?: boolean;
}

/**
 * Parse `filePath` with the configured options. Lines skipped under
 * `collectParsingErrors` are listed in a single warning.
 */
export function loadDocument(ctx: CommandContext, filePath: string, options: LoadDocumentOptions = {}): ParseResult {
  assertFileExists(filePath);
  const result = loadIniFile(filePath, { ...ctx.config.parse, ...options.parse, encoding: ctx.encoding });
  if ((options.warnOnErrors ?? true) && result.errors.length > 0) {
    console.warn(formatParseWarning(filePath, result.errors));
  }
  return result;
}

export function formatParseWarning(filePath: string, errors: readonly ParsingErrorRecord[]): string {
  const lines = errors.map(e => `  Line ${e.lineNumber}: ${e.reason}`);
  return [`Warning: ${filePath}: ${errors.length} malformed line(s) skipped`, ...lines].join('\n');
}

/** Decoded file text without a byte-order mark, as the parser sees it. */
export function readText(ctx: CommandContext, filePath: string): string {
  assertFileExists(filePath);
  return fs.readFileSync(filePath, { encoding: ctx.encoding }).replace(/^\uFEFF/, '');
}

export function saveDocument(ctx: CommandContext, filePath: string, doc: Document): void {
  saveIniFile(filePath, doc, { ...ctx.config.format, encoding: ctx.encoding });
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
