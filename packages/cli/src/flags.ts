/**
 * Shared CLI flag helpers.
 */

import { CLIError, VALUE_FLAGS } from './index';

/**
 * Extract a named flag's value from an argument array.
 * Returns the string following `flag`, or undefined if not present.
 */
export function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/** Arguments that are neither flags nor the values of value-taking flags. */
export function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.includes(arg)) {
      i++;
    } else if (!arg.startsWith('--')) {
      result.push(arg);
    }
  }
  return result;
}

/**
 * Positional arguments, throwing a usage error when fewer than `names`
 * were given.
 */
export function requirePositionals(args: string[], names: string[], usage: string): string[] {
  const values = positionals(args);
  if (values.length < names.length) {
    const missing = names.slice(values.length).map(n => `<${n}>`).join(' ');
    throw new CLIError(`Missing ${missing}. Usage: ${usage}`);
  }
  return values;
}
