/**
 * FlattenEngine
 *
 * Turns an ordered sequence of schema-free pages into:
 * 1. A column union (every key path seen, first-seen order across the run)
 * 2. One FlatRow per record, or per location item for records that carry
 *    location history
 * 3. One GeoPoint per row with a resolvable latitude/longitude pair
 *
 * FLATTENING RULES:
 * - Nested mappings join keys with `.` (`geo.city`)
 * - Sequences of scalars join values with `;` (`a;b;c`)
 * - The first of `locationData` / `locations` holding mappings expands into
 *   one row per item: parent fields first, then the item's own fields
 * - Any other sequence holding mappings keeps index paths (`tags.0.name`)
 * - `null` renders as an empty string
 *
 * Pure functions only; reading pages back from disk is the caller's job.
 */

import type {
  FlatRow,
  FlattenResult,
  GeoPoint,
  JsonObject,
  JsonScalar,
  JsonValue,
  Page,
  SurveyRecord,
} from '../core/types.js';
import { isJsonObject } from '../core/type-guards.js';

// ============================================================================
// Constants
// ============================================================================

export const PATH_SEPARATOR = '.';
export const SEQUENCE_JOINER = ';';

/** Keys whose items become separate rows, in priority order */
export const EXPANSION_KEYS: readonly string[] = ['locationData', 'locations'];

export const LATITUDE_KEYS: readonly string[] = ['lat', 'latitude', 'trilat'];
export const LONGITUDE_KEYS: readonly string[] = ['lon', 'lng', 'longitude', 'trilong'];

/** Placemark label candidates, first non-empty wins */
export const NAME_KEYS: readonly string[] = ['ssid', 'name', 'netid', 'id'];

// ============================================================================
// Tagged Value Model
// ============================================================================

export type ClassifiedValue =
  | { readonly kind: 'scalar'; readonly value: JsonScalar }
  | { readonly kind: 'sequence'; readonly items: readonly JsonValue[] }
  | { readonly kind: 'mapping'; readonly entries: JsonObject };

export function classify(value: JsonValue): ClassifiedValue {
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value };
  }
  if (isJsonObject(value)) {
    return { kind: 'mapping', entries: value };
  }
  return { kind: 'scalar', value };
}

export function renderScalar(value: JsonScalar): string {
  return value === null ? '' : String(value);
}

// ============================================================================
// Record Flattening
// ============================================================================

function joinPath(prefix: string, key: string): string {
  return prefix === '' ? key : `${prefix}${PATH_SEPARATOR}${key}`;
}

/**
 * Depth-first walk writing (path, text) pairs into `target`
 */
function flattenInto(target: Map<string, string>, value: JsonValue, path: string): void {
  const node = classify(value);

  switch (node.kind) {
    case 'scalar':
      target.set(path, renderScalar(node.value));
      return;

    case 'mapping': {
      const entries = Object.entries(node.entries);
      if (entries.length === 0 && path !== '') {
        target.set(path, '');
        return;
      }
      for (const [key, child] of entries) {
        flattenInto(target, child, joinPath(path, key));
      }
      return;
    }

    case 'sequence': {
      const scalars: string[] = [];
      for (const item of node.items) {
        const inner = classify(item);
        if (inner.kind !== 'scalar') {
          node.items.forEach((entry, index) => flattenInto(target, entry, joinPath(path, String(index))));
          return;
        }
        scalars.push(renderScalar(inner.value));
      }
      target.set(path, scalars.join(SEQUENCE_JOINER));
      return;
    }
  }
}

interface Expansion {
  readonly key: string;
  readonly items: readonly JsonObject[];
}

/**
 * Location list of a record, if it has one
 *
 * A single mapping counts as a one-item list.
 */
function findExpansion(record: SurveyRecord): Expansion | undefined {
  for (const key of EXPANSION_KEYS) {
    if (!(key in record)) continue;

    const value = record[key];
    if (isJsonObject(value)) {
      return { key, items: [value] };
    }
    if (Array.isArray(value) && value.every(isJsonObject)) {
      return { key, items: value };
    }
  }
  return undefined;
}

/**
 * Rows for one record
 *
 * Records with a non-empty location list yield one row per item; everything
 * else yields exactly one row.
 */
export function flattenRecord(record: SurveyRecord): FlatRow[] {
  const expansion = findExpansion(record);

  const parent = new Map<string, string>();
  for (const [key, value] of Object.entries(record)) {
    if (expansion && key === expansion.key) continue;
    flattenInto(parent, value, key);
  }

  if (!expansion || expansion.items.length === 0) {
    return [parent];
  }

  return expansion.items.map((item) => {
    const row = new Map(parent);
    for (const [key, value] of Object.entries(item)) {
      flattenInto(row, value, key);
    }
    return row;
  });
}

// ============================================================================
// Coordinates
// ============================================================================

function firstNonEmpty(row: FlatRow, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = row.get(key)?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Latitude/longitude pair of a row, when both are present, numeric and in range
 */
export function resolveCoordinates(
  row: FlatRow
): { readonly latitude: number; readonly longitude: number } | undefined {
  const latText = firstNonEmpty(row, LATITUDE_KEYS);
  const lonText = firstNonEmpty(row, LONGITUDE_KEYS);
  if (latText === undefined || lonText === undefined) return undefined;

  const latitude = Number(latText);
  const longitude = Number(lonText);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return undefined;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return undefined;

  return { latitude, longitude };
}

export function placemarkName(row: FlatRow): string {
  return firstNonEmpty(row, NAME_KEYS) ?? '';
}

function toGeoPoint(row: FlatRow, columns: readonly string[]): GeoPoint | undefined {
  const coordinates = resolveCoordinates(row);
  if (!coordinates) return undefined;

  return {
    ...coordinates,
    name: placemarkName(row),
    attributes: columns.map((column) => [column, row.get(column) ?? ''] as const),
  };
}

// ============================================================================
// Run Accumulation
// ============================================================================

/**
 * Incremental union over a run's pages
 *
 * Feed pages in run order; `result()` can be taken at any point for an
 * export over whatever has been seen so far.
 */
export class FlattenAccumulator {
  private readonly columnSet = new Set<string>();
  private readonly rowList: FlatRow[] = [];

  addRecord(record: SurveyRecord): void {
    for (const row of flattenRecord(record)) {
      for (const column of row.keys()) {
        this.columnSet.add(column);
      }
      this.rowList.push(row);
    }
  }

  addPage(page: Pick<Page, 'records'>): void {
    for (const record of page.records) {
      this.addRecord(record);
    }
  }

  result(): FlattenResult {
    const columns = [...this.columnSet];
    const points: GeoPoint[] = [];
    for (const row of this.rowList) {
      const point = toGeoPoint(row, columns);
      if (point) points.push(point);
    }
    return { columns, rows: [...this.rowList], points };
  }
}

export function flattenPages(pages: Iterable<Pick<Page, 'records'>>): FlattenResult {
  const accumulator = new FlattenAccumulator();
  for (const page of pages) {
    accumulator.addPage(page);
  }
  return accumulator.result();
}

/**
 * Same as flattenPages over an async page sequence (e.g. `PageStore.pages()`)
 */
export async function flattenPageStream(pages: AsyncIterable<Page>): Promise<FlattenResult> {
  const accumulator = new FlattenAccumulator();
  for await (const page of pages) {
    accumulator.addPage(page);
  }
  return accumulator.result();
}
