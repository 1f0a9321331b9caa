/**
 * Detail identifiers
 *
 * A detail lookup is keyed either by `netid` (BSSID / Bluetooth address) or
 * by the cell disambiguating fields. Batch files list one netid per line.
 */

import { readFile } from 'node:fs/promises';
import type { QueryParams } from '../core/http-client.js';
import { ConfigurationError, describeError } from '../core/errors.js';

/** Cell tower fields, in the order they name a bundle */
export const DISAMBIGUATING_FIELDS = [
  'operator',
  'lac',
  'cid',
  'system',
  'network',
  'basestation',
] as const;

export interface CellId {
  readonly operator: string;
  readonly lac: string;
  readonly cid: string;
}

/**
 * Query for one batch identifier: shared fields plus `netid`
 */
export function detailParamsFor(identifier: string, fixed: QueryParams = {}): QueryParams {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(fixed)) {
    if (key !== 'netid' && value !== '') params[key] = value;
  }
  params.netid = identifier;
  return params;
}

/**
 * Split a cell search id of the form `OP_LAC_CID`
 *
 * @example
 * parseCellId('310410_7033_17811')  // { operator: '310410', lac: '7033', cid: '17811' }
 */
export function parseCellId(id: string): CellId | null {
  const parts = id.trim().split('_');
  if (parts.length !== 3 || parts.some((part) => part === '')) {
    return null;
  }
  const [operator, lac, cid] = parts;
  return { operator, lac, cid };
}

/**
 * Identifier used to name a detail bundle
 *
 * `netid` when present, otherwise `field-value` pairs joined by `_`.
 */
export function identifierFor(params: QueryParams): string {
  if (params.netid) return params.netid;

  const parts = DISAMBIGUATING_FIELDS.filter((field) => params[field]).map(
    (field) => `${field}-${params[field]}`
  );
  return parts.length > 0 ? parts.join('_') : 'detail';
}

/**
 * Identifiers from batch file text: trimmed, blank lines and `#` comments dropped
 */
export function parseBatchIdentifiers(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * @throws {ConfigurationError} When the file cannot be read or lists no identifiers
 */
export async function readBatchFile(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read batch file ${path}: ${describeError(error)}`);
  }

  const identifiers = parseBatchIdentifiers(text);
  if (identifiers.length === 0) {
    throw new ConfigurationError(`Batch file ${path} lists no identifiers`);
  }
  return identifiers;
}
