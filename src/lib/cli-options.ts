/**
 * Option parsers for CLI commands
 */

import { InvalidArgumentError } from 'commander';

/**
 * Case-insensitive match against `choices`; undefined passes through
 */
export function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  name: string
): T | undefined {
  if (value === undefined) return undefined;
  const upper = value.toUpperCase();
  const match = choices.find((choice) => choice === upper);
  if (!match) {
    throw new InvalidArgumentError(`Invalid ${name} "${value}", expected one of ${choices.join(', ')}`);
  }
  return match;
}

/**
 * Page size (1-500); undefined passes through
 */
export function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 500) {
    throw new InvalidArgumentError('Limit must be an integer between 1 and 500');
  }
  return limit;
}

/**
 * `1,2, 3` → ['1', '2', '3']
 */
export function parseIdList(value: string): string[] {
  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}
