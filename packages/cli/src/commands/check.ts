/**
 * inikit check
 *
 * Parses a file in collecting mode and reports every malformed line,
 * then every section name or key that would not survive a rewrite.
 */

import { validateDocument } from '@inikit/ini';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { requirePositionals } from '../flags';
import { commandContext, loadDocument, printJson } from '../documents';

const USAGE = 'inikit check <file>';

export async function checkCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [file] = requirePositionals(args, ['file'], USAGE);
  const ctx = commandContext(options);

  const { document, errors } = loadDocument(ctx, file, {
    parse: { collectParsingErrors: true },
    warnOnErrors: false,
  });
  const issues = validateDocument(document);
  const valid = errors.length === 0 && issues.length === 0;

  if (options.format === 'json') {
    printJson({ file, valid, parseErrors: errors, issues });
  } else {
    console.log(`\n  ${file}: ${valid ? 'ok' : 'invalid'}`);
    if (errors.length > 0) {
      console.log(`\n  Parse errors (${errors.length}):`);
      for (const e of errors) {
        console.log(`    Line ${e.lineNumber}: ${e.reason}`);
      }
    }
    if (issues.length > 0) {
      console.log(`\n  Invalid names (${issues.length}):`);
      for (const issue of issues) {
        const where = issue.key === undefined ? `[${issue.section}]` : `[${issue.section}] ${issue.key}`;
        console.log(`    ${where}: ${issue.message}`);
      }
    }
    console.log('');
  }

  return valid ? EXIT_CODE.SUCCESS : EXIT_CODE.POLICY_VIOLATION;
}
