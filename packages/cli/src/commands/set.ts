/**
 * inikit set
 *
 * Writes one value and saves the file. A missing section or key is
 * created at the end; everything else keeps its place and comments.
 */

import { IniInputValidator, isReservedSectionName } from '@inikit/ini';
import type { InputValidation } from '@inikit/types';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { requirePositionals } from '../flags';
import { commandContext, loadDocument, printJson, saveDocument } from '../documents';
import { resolveSection } from './get';

const USAGE = 'inikit set <file> <section> <key> <value> [--quoted]';

export async function setCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file, sectionName, key, value] = requirePositionals(args, ['file', 'section', 'key', 'value'], USAGE);
  const quoted = args.includes('--quoted');
  const ctx = commandContext(options);

  const validator = new IniInputValidator();
  const checks: InputValidation[] = [
    isReservedSectionName(sectionName) ? { valid: true } : validator.validateSectionName(sectionName),
    validator.validateKey(key),
    validator.validateValue(value, quoted),
  ];
  for (const check of checks) {
    if (check.message !== undefined) {
      throw new CLIError(check.message);
    }
  }

  const { document } = loadDocument(ctx, file);
  const section = resolveSection(document, sectionName) ?? document.add(sectionName);
  const property = section.getOrCreate(key);
  const previous = property.value;
  property.value = value;
  if (quoted) property.isQuoted = true;

  saveDocument(ctx, file, document);

  if (options.format === 'json') {
    printJson({ file, section: section.name, key: property.name, previous, value });
  } else {
    console.log(`  Set [${section.name}] ${property.name} = ${value}`);
  }
  return EXIT_CODE.SUCCESS;
}
