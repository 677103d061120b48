/**
 * File, buffer and stream entry points around parseIni / formatIni.
 */

import * as fs from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';
import type { FormatOptionsInput } from '@inikit/core';
import type { Document } from './document';
import { formatIni } from './formatter';
import { parseIni } from './parser';
import type { ParseOptions, ParseResult } from './parser';

export interface LoadOptions extends ParseOptions {
  /** Defaults to utf8. A leading byte-order mark is dropped. */
  encoding?: BufferEncoding;
  /** Keeps only the named sections for which this returns true. */
  sectionFilter?: (sectionName: string) => boolean;
}

export interface SaveOptions extends FormatOptionsInput {
  encoding?: BufferEncoding;
}

export function loadIni(input: string | Uint8Array, options: LoadOptions = {}): ParseResult {
  const { encoding = 'utf8', sectionFilter, ...parseOptions } = options;
  const text = typeof input === 'string' ? input : Buffer.from(input).toString(encoding);
  const result = parseIni(text, parseOptions);

  if (sectionFilter) {
    for (const section of result.document.toArray()) {
      if (!sectionFilter(section.name)) {
        result.document.remove(section.name);
      }
    }
  }

  return result;
}

export function loadIniFile(filePath: string, options: LoadOptions = {}): ParseResult {
  return loadIni(fs.readFileSync(filePath), options);
}

export async function loadIniFileAsync(filePath: string, options: LoadOptions = {}): Promise<ParseResult> {
  return loadIni(await readFile(filePath), options);
}

export async function loadIniStream(stream: Readable, options: LoadOptions = {}): Promise<ParseResult> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return loadIni(Buffer.concat(chunks), options);
}

export function saveIniFile(filePath: string, doc: Document, options: SaveOptions = {}): void {
  const { encoding = 'utf8', ...formatOptions } = options;
  fs.writeFileSync(filePath, formatIni(doc, formatOptions), { encoding });
}

export async function saveIniFileAsync(filePath: string, doc: Document, options: SaveOptions = {}): Promise<void> {
  const { encoding = 'utf8', ...formatOptions } = options;
  await writeFile(filePath, formatIni(doc, formatOptions), { encoding });
}

/** Writes the document to `stream`; the stream is left open. */
export function saveIniStream(stream: Writable, doc: Document, options: SaveOptions = {}): Promise<void> {
  const { encoding = 'utf8', ...formatOptions } = options;
  const text = formatIni(doc, formatOptions);
  return new Promise<void>((resolve, reject) => {
    stream.write(text, encoding, error => {
      if (error) reject(error);
      else resolve();
    });
  });
}
