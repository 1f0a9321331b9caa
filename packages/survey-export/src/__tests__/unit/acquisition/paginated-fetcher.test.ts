/**
 * PaginatedFetcher Tests
 *
 * Termination rules, persistence ordering and error classification for the
 * cursor walk.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { PaginatedFetcher } from '../../../acquisition/paginated-fetcher.js';
import { PageStore } from '../../../acquisition/page-store.js';
import type { RunEvent } from '../../../core/events.js';
import {
  AuthorizationError,
  FetchPageError,
  HTTPError,
  RunCancelledError,
  TransientFetchError,
} from '../../../core/errors.js';
import type { Page } from '../../../core/types.js';
import { ScriptedPageSource } from '../../utils/fakes.js';
import { makeTempDir, removeTempDir, wifiRecord } from '../../utils/fixtures.js';

async function collectPages(fetcher: PaginatedFetcher, signal?: AbortSignal): Promise<Page[]> {
  const pages: Page[] = [];
  for await (const page of fetcher.pages(signal)) {
    pages.push(page);
  }
  return pages;
}

describe('PaginatedFetcher', () => {
  describe('pages', () => {
    it('should stop when a response carries no cursor', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00'), wifiRecord('aa:01')], cursor: 'c1', total: 3 },
        { records: [wifiRecord('aa:02')] },
      ]);

      const pages = await collectPages(new PaginatedFetcher(source));

      expect(pages.map((page) => page.index)).toEqual([1, 2]);
      expect(pages[0].total).toBe(3);
      expect(source.cursorsSent).toEqual([undefined, 'c1']);
    });

    it('should stop when the cursor repeats', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00')], cursor: 'c1' },
        { records: [wifiRecord('aa:01')], cursor: 'c1' },
      ]);
      const iterator = new PaginatedFetcher(source).pages();

      const first = await iterator.next();
      const second = await iterator.next();
      const last = await iterator.next();

      expect(first.done).toBe(false);
      expect(second.done).toBe(false);
      expect(last).toEqual({ done: true, value: { pages: 2, records: 2, stopReason: 'stalled' } });
      expect(source.calls).toBe(2);
    });

    it('should stop when the service cycles back to an earlier cursor', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00')], cursor: 'A' },
        { records: [wifiRecord('aa:01')], cursor: 'B' },
        { records: [wifiRecord('aa:02')], cursor: 'A' },
        { records: [wifiRecord('aa:03')], cursor: 'B' },
      ]);
      const iterator = new PaginatedFetcher(source).pages();

      const indexes: number[] = [];
      let step = await iterator.next();
      while (!step.done) {
        indexes.push(step.value.index);
        step = await iterator.next();
      }

      expect(indexes).toEqual([1, 2, 3]);
      expect(step.value).toEqual({ pages: 3, records: 3, stopReason: 'stalled' });
      expect(source.cursorsSent).toEqual([undefined, 'A', 'B']);
    });

    it('should never send the same cursor twice', async () => {
      const script = ['c1', 'c2', 'c3', 'c2', 'c4'].map((cursor, i) => ({
        records: [wifiRecord(`aa:${i}`)],
        cursor,
      }));
      const source = new ScriptedPageSource(script);

      const pages = await collectPages(new PaginatedFetcher(source));

      expect(pages).toHaveLength(4);
      expect(source.cursorsSent).toEqual([undefined, 'c1', 'c2', 'c3']);
      expect(new Set(source.cursorsSent).size).toBe(source.cursorsSent.length);
    });

    it('should stop on an empty page even when a cursor is advertised', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00')], cursor: 'c1' },
        { records: [], cursor: 'c2' },
      ]);
      const iterator = new PaginatedFetcher(source).pages();

      await iterator.next();
      const last = await iterator.next();

      expect(last).toEqual({ done: true, value: { pages: 1, records: 1, stopReason: 'empty-page' } });
    });

    it('should honour the page limit', async () => {
      let n = 0;
      const script = Array.from({ length: 10 }, () => {
        n += 1;
        return { records: [wifiRecord(`aa:${n}`)], cursor: `c${n}` };
      });
      const source = new ScriptedPageSource(script);

      const pages = await collectPages(new PaginatedFetcher(source, { maxPages: 3 }));

      expect(pages).toHaveLength(3);
      expect(source.calls).toBe(3);
    });

    it('should not issue a request once the signal is aborted', async () => {
      const source = new ScriptedPageSource([{ records: [wifiRecord('aa:00')], cursor: 'c1' }]);
      const controller = new AbortController();
      controller.abort();

      const iterator = new PaginatedFetcher(source).pages(controller.signal);
      const last = await iterator.next();

      expect(last).toEqual({ done: true, value: { pages: 0, records: 0, stopReason: 'cancelled' } });
      expect(source.calls).toBe(0);
    });

    it('should treat a cancelled request as a cancelled stop', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00')], cursor: 'c1' },
        new RunCancelledError(),
      ]);
      const iterator = new PaginatedFetcher(source).pages();

      await iterator.next();
      const last = await iterator.next();

      expect(last).toEqual({ done: true, value: { pages: 1, records: 1, stopReason: 'cancelled' } });
    });

    it('should propagate authorization failures unchanged', async () => {
      const auth = new AuthorizationError(401, 'https://api.test/v2/network/search');
      const source = new ScriptedPageSource([auth]);

      await expect(collectPages(new PaginatedFetcher(source))).rejects.toBe(auth);
    });

    it('should wrap other failures with the page index', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00')], cursor: 'c1' },
        new TransientFetchError('https://api.test', 4, new HTTPError('HTTP 503: Service Unavailable', 503, 'https://api.test')),
      ]);

      const error = await collectPages(new PaginatedFetcher(source)).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(FetchPageError);
      expect(error).toMatchObject({ pageIndex: 2 });
    });

    it('should refuse a second walk', async () => {
      const fetcher = new PaginatedFetcher(new ScriptedPageSource([{ records: [wifiRecord('aa:00')] }]));
      await collectPages(fetcher);

      await expect(collectPages(fetcher)).rejects.toThrow('can only be consumed once');
    });
  });

  describe('drain', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('should persist each page and emit one progress event per page', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00'), wifiRecord('aa:01')], cursor: 'c1', total: 3 },
        { records: [wifiRecord('aa:02')] },
      ]);
      const store = new PageStore(dir, 'wifi-search-1700000000');
      const events: RunEvent[] = [];

      const outcome = await new PaginatedFetcher(source).drain(store, (event) => events.push(event));

      expect(outcome).toEqual({ pages: 2, records: 3, stopReason: 'exhausted' });
      expect(store.storedPages.map((page) => page.recordCount)).toEqual([2, 1]);
      expect(existsSync(store.pagePath(1))).toBe(true);
      expect(existsSync(store.pagePath(2))).toBe(true);
      expect(events.map((event) => event.message)).toEqual([
        `Page 1: 2 results saved (2 of 3 total): ${store.pagePath(1)}`,
        `Page 2: 1 results saved (3 total): ${store.pagePath(2)}`,
      ]);
    });

    it('should keep earlier pages on disk when a later page fails', async () => {
      const source = new ScriptedPageSource([
        { records: [wifiRecord('aa:00')], cursor: 'c1' },
        new Error('socket hang up'),
      ]);
      const store = new PageStore(dir, 'wifi-search-1700000000');

      await expect(new PaginatedFetcher(source).drain(store, () => undefined)).rejects.toThrow(
        'Page 2 failed: socket hang up'
      );
      expect(store.storedPages).toHaveLength(1);
      expect(existsSync(store.pagePath(1))).toBe(true);
    });
  });
});
