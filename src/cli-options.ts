import { InvalidOptionError } from './core/errors.js';

/** Parse a row-count flag such as --limit; undefined when the flag was not given */
export function parseRowLimit(raw: string | undefined, option: string = '--limit'): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) throw new InvalidOptionError(option, raw);
  return parseInt(trimmed, 10);
}
