/**
 * inikit CLI
 *
 * Formatting, validation, diff and merge for INI files from the shell
 * and in CI.
 */

import { fmtCommand } from './commands/fmt';
import { checkCommand } from './commands/check';
import { diffCommand } from './commands/diff';
import { mergeCommand } from './commands/merge';
import { getCommand } from './commands/get';
import { setCommand } from './commands/set';
import { exportCommand } from './commands/export';
import { EncodingSchema } from './config';
import type { Encoding } from './config';
import { getFlag } from './flags';
import packageJson from '../package.json';

const CLI_VERSION = packageJson.version;

export const HELP = `
inikit - comment-preserving INI toolkit

Usage:
  inikit fmt <file> [--check] [--write]
                                   Print the canonical form, verify it (--check) or rewrite the file (--write)
  inikit check <file>              Report parse errors and invalid names
  inikit diff <left> <right>       Show section and key changes between two files
  inikit merge <target> <source> [--write] [--apply <list>]
                                   Apply the changes from target to source onto target
  inikit get <file> <section> <key>
                                   Print a value ($DEFAULT addresses keys before the first section)
  inikit set <file> <section> <key> <value> [--quoted]
                                   Set a value and rewrite the file
  inikit export <file> --to <json|csv> [--comments] [--flatten] [--types] [--compact]
                                   Convert to JSON or CSV
  inikit --help                    Show this help
  inikit --version                 Show version

Options:
  --config <path>    Path to config file (default: .inikit.json)
  --format <type>    Output format: text, json (default: text)
  --encoding <enc>   File encoding: utf8, utf16le, latin1, ascii (default: utf8)
  --apply <list>     Merge only: comma-separated subset of added-sections,
                     removed-sections, added-properties, removed-properties,
                     modified-properties, or "all"
`;

export const EXIT_CODE = {
  SUCCESS: 0,
  POLICY_VIOLATION: 1,
  RUNTIME_ERROR: 2,
} as const;

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = EXIT_CODE.RUNTIME_ERROR
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

export interface CLIOptions {
  configPath: string;
  format: 'text' | 'json';
  /** Overrides the config file's encoding when set. */
  encoding?: Encoding;
}

export const DEFAULT_CONFIG_PATH = '.inikit.json';

/** Flags that consume the argument after them. */
export const VALUE_FLAGS = ['--config', '--format', '--encoding', '--apply', '--to'];

export async function run(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`inikit v${CLI_VERSION}`);
    return EXIT_CODE.SUCCESS;
  }

  const configPath = getFlag(args, '--config') || DEFAULT_CONFIG_PATH;
  const rawFormat = getFlag(args, '--format') || 'text';
  if (rawFormat !== 'text' && rawFormat !== 'json') {
    throw new CLIError(`Invalid --format value: ${rawFormat}. Use text or json.`);
  }

  const rawEncoding = getFlag(args, '--encoding');
  let encoding: Encoding | undefined;
  if (rawEncoding !== undefined) {
    const parsed = EncodingSchema.safeParse(rawEncoding);
    if (!parsed.success) {
      throw new CLIError(`Invalid --encoding value: ${rawEncoding}. Use utf8, utf16le, latin1 or ascii.`);
    }
    encoding = parsed.data;
  }

  const options: CLIOptions = { configPath, format: rawFormat, encoding };

  if (args.length === 0 || args[0].startsWith('-')) {
    console.log(HELP);
    return EXIT_CODE.SUCCESS;
  }

  const command = args[0];
  const restArgs = args.slice(1);

  switch (command) {
    case 'fmt':
      return fmtCommand(options, restArgs);
    case 'check':
      return checkCommand(options, restArgs);
    case 'diff':
      return diffCommand(options, restArgs);
    case 'merge':
      return mergeCommand(options, restArgs);
    case 'get':
      return getCommand(options, restArgs);
    case 'set':
      return setCommand(options, restArgs);
    case 'export':
      return exportCommand(options, restArgs);
    default:
      throw new CLIError(`Unknown command: ${command}\n${HELP}`);
  }
}
