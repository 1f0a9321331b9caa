/**
 * Search parameter helpers
 *
 * Caller filters arrive as `key=value` strings; a bounding box arrives as two
 * corners in any order and is sent as `latrange1/latrange2/longrange1/longrange2`
 * with the minimum first.
 */

import type { QueryParams } from '../core/http-client.js';
import { ConfigurationError } from '../core/errors.js';

export interface BoundingBoxCorners {
  readonly lat1: number;
  readonly lon1: number;
  readonly lat2: number;
  readonly lon2: number;
}

/**
 * `key=value` pairs to a query map; later keys win
 *
 * @throws {ConfigurationError} On a pair without `=` or with an empty key
 */
export function parseParamPairs(pairs: readonly string[]): QueryParams {
  const params: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    const key = separator > 0 ? pair.slice(0, separator).trim() : '';
    if (key === '') {
      throw new ConfigurationError(`Invalid search parameter "${pair}" (expected key=value)`);
    }
    params[key] = pair.slice(separator + 1).trim();
  }
  return params;
}

/**
 * Normalised bounding box query
 *
 * @example
 * boundingBoxParams({ lat1: 41.2, lon1: -87.5, lat2: 41.0, lon2: -87.9 })
 * // { latrange1: '41.000000', latrange2: '41.200000',
 * //   longrange1: '-87.900000', longrange2: '-87.500000' }
 *
 * @throws {ConfigurationError} When a corner is outside valid coordinates
 */
export function boundingBoxParams(corners: BoundingBoxCorners): QueryParams {
  const { lat1, lon1, lat2, lon2 } = corners;
  for (const lat of [lat1, lat2]) {
    if (!Number.isFinite(lat) || Math.abs(lat) > 90) {
      throw new ConfigurationError(`Latitude out of range: ${lat}`);
    }
  }
  for (const lon of [lon1, lon2]) {
    if (!Number.isFinite(lon) || Math.abs(lon) > 180) {
      throw new ConfigurationError(`Longitude out of range: ${lon}`);
    }
  }

  return {
    latrange1: Math.min(lat1, lat2).toFixed(6),
    latrange2: Math.max(lat1, lat2).toFixed(6),
    longrange1: Math.min(lon1, lon2).toFixed(6),
    longrange2: Math.max(lon1, lon2).toFixed(6),
  };
}
