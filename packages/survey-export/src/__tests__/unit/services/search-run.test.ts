/**
 * Search Run Tests
 *
 * Whole-pipeline behaviour against a scripted page source and a scratch
 * output root.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { runSearch } from '../../../services/search-run.js';
import { createRunContext, type RunContextInit } from '../../../core/run-context.js';
import type { RunEvent } from '../../../core/events.js';
import { AuthorizationError } from '../../../core/errors.js';
import { ScriptedPageSource } from '../../utils/fakes.js';
import { makeTempDir, removeTempDir, wifiRecord } from '../../utils/fixtures.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const TAG = 'wifi-search-1700000000';

function twoPages(): ScriptedPageSource {
  return new ScriptedPageSource(
    [
      { records: [wifiRecord('aa:00'), wifiRecord('aa:01')], cursor: 'c1', total: 3 },
      { records: [wifiRecord('aa:02', { trilat: null, trilong: null })] },
    ],
    { total: 3 }
  );
}

describe('runSearch', () => {
  let root: string;
  let events: RunEvent[];
  const record = (event: RunEvent): void => {
    events.push(event);
  };

  beforeEach(async () => {
    root = await makeTempDir();
    events = [];
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  function context(overrides: Partial<RunContextInit> = {}) {
    return createRunContext({ outputRoot: root, kind: 'wifi-search', runTimestamp: 1700000000, ...overrides });
  }

  it('should export every record and clean up raw pages', async () => {
    const bundle = await runSearch(context(), twoPages(), { onEvent: record });
    const dir = join(root, TAG);

    expect(bundle.status).toBe('succeeded');
    expect(bundle.directory).toBe(dir);
    expect(bundle).toMatchObject({ pages: 2, records: 3 });
    expect(bundle.artifacts).toEqual([
      { format: 'csv', status: 'written', path: join(dir, `${TAG}.csv`), count: 3 },
      { format: 'kml', status: 'written', path: join(dir, `${TAG}.kml`), count: 2 },
    ]);
    expect(bundle.cleanup).toMatchObject({ policy: 'delete', removed: 2, errors: [] });
    expect(existsSync(join(dir, `${TAG}-page_1.json`))).toBe(false);
  });

  it('should report progress in pipeline order with one summary', async () => {
    await runSearch(context(), twoPages(), { onEvent: record });

    expect(events.map((event) => event.type)).toEqual([
      'submitted',
      'total',
      'page',
      'page',
      'stopped',
      'export',
      'export',
      'cleanup',
      'summary',
    ]);
    expect(events[1].message).toBe('Total in DB: 3');
    expect(events[events.length - 1].message).toBe(
      'Search complete: 2 page(s), 3 record(s). Created 1 CSV(s) and 1 KML(s).'
    );
  });

  it('should write nothing for an empty search', async () => {
    const source = new ScriptedPageSource([{ records: [] }]);

    const bundle = await runSearch(context(), source, { onEvent: record });

    expect(bundle.status).toBe('empty');
    expect(bundle.artifacts.map((artifact) => artifact.status)).toEqual(['skipped', 'skipped']);
    expect(events[events.length - 1].message).toBe(
      'Search returned no results: 0 page(s), 0 record(s). Created 0 CSV(s) and 0 KML(s).'
    );
  });

  it('should export the pages fetched before a failure', async () => {
    const source = new ScriptedPageSource([
      { records: [wifiRecord('aa:00')], cursor: 'c1' },
      new Error('socket hang up'),
    ]);

    const bundle = await runSearch(context(), source);
    const csv = await readFile(join(root, TAG, `${TAG}.csv`), 'utf-8');

    expect(bundle.status).toBe('partial');
    expect(bundle.error).toBe('Page 2 failed: socket hang up');
    expect(csv.split('\n')).toHaveLength(3);
  });

  it('should export what was fetched when cancelled between pages', async () => {
    const controller = new AbortController();
    const source = new ScriptedPageSource([
      { records: [wifiRecord('aa:00')], cursor: 'c1' },
      { records: [wifiRecord('aa:01')], cursor: 'c2' },
    ]);

    const bundle = await runSearch(context(), source, {
      signal: controller.signal,
      onEvent: (event) => {
        record(event);
        if (event.type === 'page') controller.abort();
      },
    });

    expect(bundle).toMatchObject({ status: 'cancelled', pages: 1, records: 1 });
    expect(source.calls).toBe(1);
    expect(bundle.artifacts.filter((artifact) => artifact.status === 'written')).toHaveLength(2);
  });

  it('should rethrow authorization failures after the summary', async () => {
    const source = new ScriptedPageSource([new AuthorizationError(401, 'https://api.test')]);

    await expect(runSearch(context(), source, { onEvent: record })).rejects.toBeInstanceOf(AuthorizationError);

    const summary = events[events.length - 1];
    expect(summary).toMatchObject({ type: 'summary', status: 'failed' });
    expect(events.some((event) => event.type === 'export')).toBe(false);
  });

  it('should merge raw pages when asked', async () => {
    await runSearch(context({ rawJson: 'merge' }), twoPages());
    const merged: unknown = JSON.parse(await readFile(join(root, TAG, `${TAG}.json`), 'utf-8'));

    expect(Array.isArray(merged) && merged.length).toBe(3);
  });

  it('should honour disabled formats', async () => {
    const bundle = await runSearch(context({ formats: { csv: false } }), twoPages());

    expect(bundle.artifacts.map((artifact) => artifact.format)).toEqual(['kml']);
    expect(existsSync(join(root, TAG, `${TAG}.csv`))).toBe(false);
  });

  it('should stop at the page limit', async () => {
    const bundle = await runSearch(context({ maxPages: 1 }), twoPages(), { onEvent: record });

    expect(bundle.pages).toBe(1);
    expect(events.find((event) => event.type === 'stopped')?.message).toBe('Page limit reached');
  });
});
