/**
 * Detail run
 *
 * Single-identifier lookup through the same store → flatten → export →
 * retention path as a search. The response is persisted as page 1 of a
 * store named after the identifier.
 *
 * An unknown identifier ends the run with status `empty`.
 */

import { PageStore } from '../acquisition/page-store.js';
import type { DetailSource } from '../acquisition/api-sources.js';
import { identifierFor } from '../acquisition/identifiers.js';
import { bundleDir, runTag, toBasename, type RunContext } from '../core/run-context.js';
import type { RunBundle } from '../core/types.js';
import type { QueryParams } from '../core/http-client.js';
import { silentListener } from '../core/events.js';
import { toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { completeRun, ensureOutputDirectory, type RunOptions } from './run-pipeline.js';

const log = createLogger({ module: 'detail-run' });

export interface DetailRunOptions extends RunOptions {
  /** Bundle directory; defaults to the context's bundle directory */
  readonly directory?: string;
}

/**
 * Fetch and export one identifier
 *
 * @throws {AuthorizationError} After cleanup and the summary event
 * @throws {ConfigurationError} When the output directory is not writable
 */
export async function runDetail(
  ctx: RunContext,
  source: DetailSource,
  params: QueryParams,
  options: DetailRunOptions = {}
): Promise<RunBundle> {
  const onEvent = options.onEvent ?? silentListener;
  const identifier = identifierFor(params);
  const directory = options.directory ?? bundleDir(ctx);
  const store = new PageStore(directory, toBasename(identifier));
  const runLog = log.forRun(runTag(ctx));

  let cancelled = false;
  let error: Error | undefined;

  try {
    await ensureOutputDirectory(directory);

    const url = source.describe(params);
    onEvent({ type: 'submitted', url, message: `Detail submitted: ${url}` });

    if (options.signal?.aborted) {
      cancelled = true;
    } else {
      const records = await source.fetchDetail(params, identifier, options.signal);
      const stored = await store.append(records);
      onEvent({
        type: 'page',
        index: stored.index,
        count: stored.recordCount,
        cumulative: stored.recordCount,
        path: stored.path,
        message: `Saved raw detail JSON page (${stored.recordCount} result(s)): ${stored.path}`,
      });
    }
  } catch (caught) {
    error = toError(caught);
    runLog.warn('Detail lookup ended with error', { identifier, error: error.message });
  }

  return completeRun(
    ctx,
    store,
    {
      pages: store.storedPages.length,
      records: store.recordCount,
      cancelled,
      error,
    },
    `Detail ${identifier}`,
    options
  );
}
