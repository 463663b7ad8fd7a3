import * as path from 'node:path';
import { isValid, parse } from 'date-fns';

/**
 * Value of a `--name=value` flag, or undefined when absent or empty.
 */
export function readFlag(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  const value = arg?.slice(prefix.length).trim();
  return value ? value : undefined;
}

/**
 * Resolves `~/` to the home directory and makes the path absolute.
 */
export function resolveUserPath(input: string): string {
  const expanded = input.startsWith('~/') ? path.join(process.env.HOME ?? '', input.slice(2)) : input;
  return path.resolve(expanded);
}

/**
 * Parses a `YYYY-MM-DD` reference date as local midnight.
 */
export function parseReferenceDate(value: string): Date {
  const date = parse(value, 'yyyy-MM-dd', new Date(0));
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !isValid(date)) {
    throw new Error(`Invalid reference date "${value}": expected YYYY-MM-DD`);
  }
  return date;
}
