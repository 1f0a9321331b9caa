/**
 * Type Guards for Survey Export
 *
 * Response bodies enter the pipeline as `unknown`; these guards are the only
 * way they get narrowed to the JSON model.
 */

import type { JsonObject } from './types.js';

/**
 * Plain JSON object (not an array, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the object entries of an array, dropping scalars and nested arrays
 */
export function objectEntries(value: unknown): JsonObject[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isJsonObject);
}

/**
 * Non-empty string or finite number, rendered as string
 */
export function asCursor(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

/**
 * Finite number from a number or numeric string
 */
export function asFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    return Number.isFinite(num) ? num : undefined;
  }
  return undefined;
}
