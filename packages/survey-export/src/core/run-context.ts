/**
 * RunContext
 *
 * Immutable settings for one run, built once and passed by reference to the
 * fetcher, store, exporters and orchestrator. Nothing in the pipeline reads
 * ambient state for these values.
 */

import { join, resolve } from 'node:path';
import { ConfigurationError } from './errors.js';
import type { RetentionPolicy } from './types.js';

export interface ExportFormats {
  readonly csv: boolean;
  readonly kml: boolean;
}

export interface RunContext {
  /** Parent directory for every RunBundle of this run */
  readonly outputRoot: string;
  /** Naming token, e.g. `wifi-search` or `network-detail` */
  readonly kind: string;
  /** Epoch seconds; pins bundle names so reruns are auditable */
  readonly runTimestamp: number;
  readonly formats: ExportFormats;
  readonly rawJson: RetentionPolicy;
  /** resultsPerPage bound for search requests */
  readonly pageSize: number;
  /** Stop after this many pages (undefined = until exhaustion) */
  readonly maxPages?: number;
}

export interface RunContextInit {
  readonly outputRoot: string;
  readonly kind: string;
  readonly runTimestamp?: number;
  readonly formats?: Partial<ExportFormats>;
  readonly rawJson?: RetentionPolicy;
  readonly pageSize?: number;
  readonly maxPages?: number;
}

const KIND_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

export const RETENTION_POLICIES: readonly RetentionPolicy[] = ['delete', 'keep', 'merge'];

export function isRetentionPolicy(value: unknown): value is RetentionPolicy {
  return RETENTION_POLICIES.some((policy) => policy === value);
}

/**
 * Validate and freeze a RunContext
 *
 * @throws {ConfigurationError} On an invalid kind, page size or page limit
 */
export function createRunContext(init: RunContextInit): RunContext {
  if (!KIND_PATTERN.test(init.kind)) {
    throw new ConfigurationError(`Invalid run kind: "${init.kind}"`);
  }

  const pageSize = init.pageSize ?? 100;
  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new ConfigurationError(`Page size must be a positive integer, got ${pageSize}`);
  }

  if (init.maxPages !== undefined && (!Number.isInteger(init.maxPages) || init.maxPages <= 0)) {
    throw new ConfigurationError(`Max pages must be a positive integer, got ${init.maxPages}`);
  }

  const rawJson = init.rawJson ?? 'delete';
  if (!isRetentionPolicy(rawJson)) {
    throw new ConfigurationError(`Unknown raw JSON policy: ${String(rawJson)}`);
  }

  return Object.freeze({
    outputRoot: resolve(init.outputRoot),
    kind: init.kind,
    runTimestamp: init.runTimestamp ?? Math.floor(Date.now() / 1000),
    formats: Object.freeze({
      csv: init.formats?.csv ?? true,
      kml: init.formats?.kml ?? true,
    }),
    rawJson,
    pageSize,
    maxPages: init.maxPages,
  });
}

/**
 * `<kind>-<runTimestamp>`
 */
export function runTag(ctx: RunContext): string {
  return `${ctx.kind}-${ctx.runTimestamp}`;
}

/**
 * Output directory for a search run
 */
export function bundleDir(ctx: RunContext): string {
  return join(ctx.outputRoot, runTag(ctx));
}

/**
 * Output directory for one identifier of a batch
 *
 * Pass the names already handed out in this batch: identifiers that reduce
 * to the same basename (`aa:bb` and `aabb`) get `-2`, `-3`, ... suffixes.
 */
export function itemBundleDir(ctx: RunContext, identifier: string, taken?: Set<string>): string {
  return join(bundleDir(ctx), taken ? claimBasename(identifier, taken) : toBasename(identifier));
}

/**
 * Basename not yet in `taken`; records it there
 */
export function claimBasename(identifier: string, taken: Set<string>): string {
  const base = toBasename(identifier);
  let name = base;
  for (let n = 2; taken.has(name); n += 1) {
    name = `${base}-${n}`;
  }
  taken.add(name);
  return name;
}

/**
 * Filesystem-safe name for an identifier
 *
 * Colons are dropped (so MAC addresses stay compact), any other run of
 * characters outside [A-Za-z0-9_-] becomes a single underscore.
 *
 * @example
 * toBasename('aa:bb:cc:dd:ee:ff')  // 'aabbccddeeff'
 * toBasename('310 410/1234')      // '310_410_1234'
 */
export function toBasename(identifier: string): string {
  const safe = identifier.replace(/:/g, '').replace(/[^A-Za-z0-9_-]+/g, '_');
  return safe.length > 0 ? safe : 'detail';
}
