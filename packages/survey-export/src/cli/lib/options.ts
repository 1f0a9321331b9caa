/**
 * Commander option parsers
 *
 * @module cli/lib/options
 */

import { InvalidArgumentError } from 'commander';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`);
  }
  return parsed;
}

/**
 * Accumulator for repeatable options
 */
export function collect(value: string, previous: readonly string[]): string[] {
  return [...previous, value];
}
