/**
 * Parsing utilities for command-line input.
 */

import { ValidationException } from './exceptions';

export type CliArgs = Record<string, string>;

/** Flags that never take a value, besides any `--no-*` flag. */
const BOOLEAN_FLAGS = new Set(['help']);

function isBooleanFlag(key: string): boolean {
  return BOOLEAN_FLAGS.has(key) || key.startsWith('no-');
}

/**
 * Collect `--key=value` and `--key value` options. A bare `--flag`, or a
 * boolean flag such as `--help`, maps to the empty string; arguments that
 * are not options are returned separately.
 *
 * @example
 * parseCliArgs(['--season=2025', '--no-debug', 'extra'])
 * // => { options: { season: '2025', 'no-debug': '' }, positionals: ['extra'] }
 */
export function parseCliArgs(argv: string[]): { options: CliArgs; positionals: string[] } {
  const options: CliArgs = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [key, ...rest] = arg.slice(2).split('=');
    if (rest.length > 0) {
      options[key] = rest.join('=');
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--') && !isBooleanFlag(key)) {
      options[key] = next;
      i++;
    } else {
      options[key] = '';
    }
  }

  return { options, positionals };
}

/**
 * Safely parse an integer from a string with validation.
 *
 * @param value - The string value to parse
 * @param name - The name of the field for error messages
 * @throws ValidationException if value is missing or not an integer
 *
 * @example
 * const season = parseInteger(process.argv[4], 'season');
 */
export function parseInteger(value: string | undefined, name: string): number {
  if (!value) {
    throw new ValidationException(`${name} is required`);
  }

  if (!/^-?\d+$/.test(value.trim())) {
    throw new ValidationException(`${name} must be a valid integer`);
  }

  return parseInt(value, 10);
}

/**
 * Parse an optional integer, falling back when the value is absent.
 */
export function parseOptionalInteger(
  value: string | undefined,
  name: string,
  fallback: number
): number {
  if (!value) {
    return fallback;
  }

  return parseInteger(value, name);
}
