/**
 * inikit get
 */

import { isReservedSectionName } from '@inikit/ini';
import type { Document, Section } from '@inikit/ini';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { requirePositionals } from '../flags';
import { commandContext, loadDocument, printJson } from '../documents';

const USAGE = 'inikit get <file> <section> <key>';

/** `$DEFAULT`, in any case, addresses the keys above the first header. */
export function resolveSection(doc: Document, name: string): Section | undefined {
  return isReservedSectionName(name) ? doc.defaultSection : doc.get(name);
}

export async function getCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file, sectionName, key] = requirePositionals(args, ['file', 'section', 'key'], USAGE);
  const ctx = commandContext(options);

  const { document } = loadDocument(ctx, file);
  const section = resolveSection(document, sectionName);
  if (!section) {
    throw new CLIError(`Section "${sectionName}" not found`, EXIT_CODE.POLICY_VIOLATION);
  }
  const property = section.get(key);
  if (!property) {
    throw new CLIError(`Property "${key}" not found in section "${sectionName}"`, EXIT_CODE.POLICY_VIOLATION);
  }

  if (options.format === 'json') {
    printJson({ section: section.name, key: property.name, value: property.value, isQuoted: property.isQuoted });
  } else {
    console.log(property.value);
  }
  return EXIT_CODE.SUCCESS;
}
