/**
 * inikit diff
 *
 * Section- and key-level changes that turn <left> into <right>. Exits 1
 * when the files differ, like diff(1).
 */

import { compareDocuments, formatDiff, hasChanges, summarizeDiff } from '@inikit/diff';
import type { CLIOptions } from '../index';
import { EXIT_CODE } from '../index';
import { requirePositionals } from '../flags';
import { commandContext, loadDocument, printJson } from '../documents';

const USAGE = 'inikit diff <left> <right>';

export async function diffCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [leftFile, rightFile] = requirePositionals(args, ['left', 'right'], USAGE);
  const ctx = commandContext(options);

  const left = loadDocument(ctx, leftFile).document;
  const right = loadDocument(ctx, rightFile).document;
  const diff = compareDocuments(left, right);
  const changed = hasChanges(diff);

  if (options.format === 'json') {
    printJson({ left: leftFile, right: rightFile, ...summarizeDiff(diff) });
  } else {
    console.log(changed ? formatDiff(diff) : 'No differences.');
  }

  return changed ? EXIT_CODE.POLICY_VIOLATION : EXIT_CODE.SUCCESS;
}
