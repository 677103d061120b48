/**
 * inikit export
 *
 * Converts a file to JSON or CSV on stdout.
 */

import { toCsv, toJson } from '@inikit/ini';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, requirePositionals } from '../flags';
import { commandContext, loadDocument } from '../documents';

const USAGE = 'inikit export <file> --to <json|csv> [--comments] [--flatten] [--types] [--compact]';

export async function exportCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file] = requirePositionals(args, ['file'], USAGE);
  const to = getFlag(args, '--to');
  if (to !== 'json' && to !== 'csv') {
    throw new CLIError(`Invalid --to value: ${to ?? '(missing)'}. Use json or csv.`);
  }
  const includeComments = args.includes('--comments');
  const ctx = commandContext(options);

  const { document } = loadDocument(ctx, file);

  if (to === 'json') {
    console.log(toJson(document, {
      indented: !args.includes('--compact'),
      includeComments,
      flattenDefaultSection: args.includes('--flatten'),
      autoConvertTypes: args.includes('--types'),
    }));
  } else {
    process.stdout.write(toCsv(document, { includeComments }));
  }
  return EXIT_CODE.SUCCESS;
}
