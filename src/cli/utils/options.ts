/**
 * Commander argument parsers
 */

import { InvalidArgumentError } from 'commander';

/**
 * Parse an integer >= 1
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a whole number >= 1.');
  }
  return parsed;
}

/**
 * Parse a finite number > 0
 */
export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a number > 0.');
  }
  return parsed;
}
