/**
 * inikit merge
 *
 * Brings <target> toward <source>: the diff between them is replayed
 * onto target under the configured merge flags.
 */

import { formatIni } from '@inikit/ini';
import { compareDocuments, mergeDiff } from '@inikit/diff';
import type { MergeOptions } from '@inikit/types';
import type { CLIOptions } from '../index';
import { CLIError, EXIT_CODE } from '../index';
import { getFlag, requirePositionals } from '../flags';
import { commandContext, loadDocument, printJson, saveDocument } from '../documents';

const USAGE = 'inikit merge <target> <source> [--write] [--apply <list>]';

const APPLY_FLAGS: Record<string, keyof MergeOptions> = {
  'added-sections': 'applyAddedSections',
  'removed-sections': 'applyRemovedSections',
  'added-properties': 'applyAddedProperties',
  'removed-properties': 'applyRemovedProperties',
  'modified-properties': 'applyModifiedProperties',
};

/**
 * Turn an `--apply` list into merge flags. Listed changes are enabled
 * and every other kind is disabled; `all` enables everything.
 */
export function parseApplyList(list: string): MergeOptions {
  const options: MergeOptions = {
    applyAddedSections: false,
    applyRemovedSections: false,
    applyAddedProperties: false,
    applyRemovedProperties: false,
    applyModifiedProperties: false,
  };

  for (const item of list.split(',').map(s => s.trim()).filter(s => s.length > 0)) {
    if (item === 'all') {
      for (const key of Object.values(APPLY_FLAGS)) options[key] = true;
      continue;
    }
    const key = APPLY_FLAGS[item];
    if (key === undefined) {
      throw new CLIError(`Unknown --apply item: ${item}. Use ${Object.keys(APPLY_FLAGS).join(', ')} or all.`);
    }
    options[key] = true;
  }

  return options;
}

export async function mergeCommand(options: CLIOptions, args: string[]): Promise<number> {
  const [targetFile, sourceFile] = requirePositionals(args, ['target', 'source'], USAGE);
  const write = args.includes('--write');
  const apply = getFlag(args, '--apply');
  const ctx = commandContext(options);

  const target = loadDocument(ctx, targetFile).document;
  const source = loadDocument(ctx, sourceFile).document;
  const mergeOptions = apply === undefined ? ctx.config.merge : parseApplyList(apply);
  const result = mergeDiff(target, compareDocuments(target, source), mergeOptions);

  if (write) {
    saveDocument(ctx, targetFile, target);
  }

  if (options.format === 'json') {
    printJson({ target: targetFile, source: sourceFile, written: write, ...result });
  } else if (write) {
    console.log(`  Merged ${sourceFile} into ${targetFile}: ${result.totalChanges} change(s)`);
    console.log(`    sections   +${result.sectionsAdded} -${result.sectionsRemoved}`);
    console.log(`    properties +${result.propertiesAdded} -${result.propertiesRemoved} ~${result.propertiesModified}`);
  } else {
    process.stdout.write(formatIni(target, ctx.config.format));
  }

  return EXIT_CODE.SUCCESS;
}
