/**
 * PaginatedFetcher
 *
 * Walks a cursor-paginated search endpoint one page at a time. Each request
 * depends on the cursor of the previous response, so requests are strictly
 * sequential.
 *
 * TERMINATION:
 * - exhausted:  response carried no cursor
 * - stalled:    response handed back a cursor already sent (A, A or A, B, A)
 * - empty-page: response had zero records (even if it advertised a cursor)
 * - max-pages:  configured page limit reached
 * - cancelled:  caller's signal aborted (checked before every request)
 *
 * A failed page ends the walk with FetchPageError; pages already persisted
 * stay on disk. AuthorizationError propagates unchanged.
 */

import type { Page, PageResponse } from '../core/types.js';
import type { RunEventListener, StopReason } from '../core/events.js';
import { AuthorizationError, FetchPageError, RunCancelledError, toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { PageStore } from './page-store.js';

const log = createLogger({ module: 'paginated-fetcher' });

/**
 * Source of raw pages. The HTTP implementation lives in api-sources.ts;
 * tests supply in-process fakes.
 */
export interface PageSource {
  /** URL of the first request, for the submitted event */
  describe(): string;
  fetchPage(cursor: string | undefined, signal?: AbortSignal): Promise<PageResponse>;
  /** Optional one-record request reporting the total-in-source hint */
  probeTotal?(signal?: AbortSignal): Promise<number | undefined>;
}

export interface FetchOutcome {
  readonly pages: number;
  readonly records: number;
  readonly stopReason: StopReason;
}

export interface PaginatedFetcherOptions {
  readonly maxPages?: number;
}

export class PaginatedFetcher {
  private consumed = false;

  constructor(
    private readonly source: PageSource,
    private readonly options: PaginatedFetcherOptions = {}
  ) {}

  /**
   * Lazy page sequence
   *
   * Not restartable: upstream cursors are single-use.
   *
   * @throws {FetchPageError} When a page cannot be fetched
   * @throws {AuthorizationError} When credentials are rejected
   */
  async *pages(signal?: AbortSignal): AsyncGenerator<Page, FetchOutcome> {
    if (this.consumed) {
      throw new Error('PaginatedFetcher can only be consumed once');
    }
    this.consumed = true;

    let cursor: string | undefined;
    const sent = new Set<string>();
    let index = 1;
    let pages = 0;
    let records = 0;

    const finish = (stopReason: StopReason): FetchOutcome => {
      log.info('Pagination stopped', { stopReason, pages, records });
      return { pages, records, stopReason };
    };

    while (true) {
      if (this.options.maxPages !== undefined && index > this.options.maxPages) {
        return finish('max-pages');
      }
      if (signal?.aborted) {
        return finish('cancelled');
      }

      let response: PageResponse;
      try {
        response = await this.source.fetchPage(cursor, signal);
      } catch (error) {
        if (error instanceof AuthorizationError) throw error;
        if (error instanceof RunCancelledError) return finish('cancelled');
        throw new FetchPageError(index, toError(error));
      }

      if (response.records.length === 0) {
        return finish('empty-page');
      }

      pages += 1;
      records += response.records.length;
      yield {
        index,
        records: response.records,
        cursor: response.cursor,
        total: response.total,
      };

      const next = response.cursor;
      if (next === undefined) {
        return finish('exhausted');
      }
      if (cursor !== undefined) sent.add(cursor);
      if (sent.has(next)) {
        log.warn('Cursor already consumed; treating as exhausted', { page: index, cursor: next });
        return finish('stalled');
      }

      cursor = next;
      index += 1;
    }
  }

  /**
   * Persist every page into the store, one progress event per page
   *
   * The store write completes before the next request is issued.
   */
  async drain(
    store: PageStore,
    onEvent: RunEventListener,
    signal?: AbortSignal
  ): Promise<FetchOutcome> {
    const iterator = this.pages(signal);
    let cumulative = 0;

    while (true) {
      const step = await iterator.next();
      if (step.done) {
        return step.value;
      }

      const page = step.value;
      const stored = await store.append(page.records);
      cumulative += stored.recordCount;

      const totalNote = page.total !== undefined ? ` of ${page.total}` : '';
      onEvent({
        type: 'page',
        index: stored.index,
        count: stored.recordCount,
        cumulative,
        total: page.total,
        path: stored.path,
        message: `Page ${stored.index}: ${stored.recordCount} results saved (${cumulative}${totalNote} total): ${stored.path}`,
      });
    }
  }
}
