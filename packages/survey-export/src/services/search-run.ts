/**
 * Search run
 *
 * RunContext → PaginatedFetcher → PageStore → FlattenEngine → exporters →
 * retention → summary, for one paginated search.
 *
 * Output lands in `<outputRoot>/<kind>-<ts>/`:
 *   <kind>-<ts>-page_<n>.json   raw pages (subject to retention)
 *   <kind>-<ts>.csv / .kml      artifacts
 *   <kind>-<ts>.json            merged pages (retention `merge` only)
 */

import { PageStore } from '../acquisition/page-store.js';
import { PaginatedFetcher, type FetchOutcome, type PageSource } from '../acquisition/paginated-fetcher.js';
import { bundleDir, runTag, type RunContext } from '../core/run-context.js';
import type { RunBundle } from '../core/types.js';
import { silentListener, type RunEventListener, type StopReason } from '../core/events.js';
import { AuthorizationError, describeError, toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { completeRun, ensureOutputDirectory, type RunOptions } from './run-pipeline.js';

const log = createLogger({ module: 'search-run' });

const STOP_MESSAGES: Record<StopReason, string> = {
  exhausted: 'No more pages (no continuation cursor)',
  stalled: 'Cursor repeated; stopping',
  'empty-page': 'Empty page returned; stopping',
  'max-pages': 'Page limit reached',
  cancelled: 'Search cancelled',
};

/**
 * Informational total via a one-record request
 *
 * Only an authorization failure matters here; anything else is logged.
 */
async function probeTotal(
  source: PageSource,
  onEvent: RunEventListener,
  signal?: AbortSignal
): Promise<void> {
  if (!source.probeTotal) return;

  try {
    const total = await source.probeTotal(signal);
    if (total !== undefined) {
      onEvent({ type: 'total', total, message: `Total in DB: ${total}` });
    }
  } catch (error) {
    if (error instanceof AuthorizationError) throw error;
    log.warn('Total probe failed', { error: describeError(error) });
  }
}

/**
 * Run one paginated search to completion
 *
 * @throws {AuthorizationError} After cleanup and the summary event
 * @throws {ConfigurationError} When the output directory is not writable
 */
export async function runSearch(
  ctx: RunContext,
  source: PageSource,
  options: RunOptions = {}
): Promise<RunBundle> {
  const onEvent = options.onEvent ?? silentListener;
  const directory = bundleDir(ctx);
  const store = new PageStore(directory, runTag(ctx));
  const runLog = log.forRun(runTag(ctx));

  let outcome: FetchOutcome | undefined;
  let error: Error | undefined;

  try {
    await ensureOutputDirectory(directory);

    const url = source.describe();
    runLog.info('Search submitted', { url, directory });
    onEvent({ type: 'submitted', url, message: `Search submitted: ${url}` });

    await probeTotal(source, onEvent, options.signal);

    const fetcher = new PaginatedFetcher(source, { maxPages: ctx.maxPages });
    outcome = await fetcher.drain(store, onEvent, options.signal);
    onEvent({ type: 'stopped', reason: outcome.stopReason, message: STOP_MESSAGES[outcome.stopReason] });
  } catch (caught) {
    error = toError(caught);
    runLog.warn('Search acquisition ended with error', { error: error.message });
  }

  return completeRun(
    ctx,
    store,
    {
      pages: store.storedPages.length,
      records: store.recordCount,
      cancelled: outcome?.stopReason === 'cancelled',
      error,
    },
    'Search',
    options
  );
}
