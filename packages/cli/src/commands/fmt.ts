/**
 * inikit fmt
 *
 * Rewrites a file in canonical form. Comments, order and quoting
 * survive; spacing around `=` and blank lines are normalized.
 */

import * as fs from 'node:fs';
import { formatIni } from '@inikit/ini';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { requirePositionals } from '../flags';
import { commandContext, loadDocument, printJson, readText } from '../documents';

const USAGE = 'inikit fmt <file> [--check] [--write]';

export async function fmtCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file] = requirePositionals(args, ['file'], USAGE);
  const check = args.includes('--check');
  const write = args.includes('--write');
  const ctx = commandContext(options);

  const { document } = loadDocument(ctx, file);
  const formatted = formatIni(document, ctx.config.format);
  const changed = formatted !== readText(ctx, file);

  if (write && changed) {
    fs.writeFileSync(file, formatted, { encoding: ctx.encoding });
  }

  if (options.format === 'json') {
    printJson({ file, changed, written: write && changed });
  } else if (check) {
    console.log(changed ? `  ${file}: not formatted` : `  ${file}: ok`);
  } else if (write) {
    console.log(changed ? `  Formatted ${file}` : `  ${file} already formatted`);
  } else {
    process.stdout.write(formatted);
  }

  return check && changed && !write ? EXIT_CODE.POLICY_VIOLATION : EXIT_CODE.SUCCESS;
}
