/**
 * PageStore Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PageStore } from '../../../acquisition/page-store.js';
import type { Page } from '../../../core/types.js';
import { makeTempDir, removeTempDir, wifiRecord } from '../../utils/fixtures.js';

describe('PageStore', () => {
  let dir: string;
  let store: PageStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new PageStore(join(dir, 'bundle'), 'wifi-search-1700000000');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  async function readAll(): Promise<Page[]> {
    const pages: Page[] = [];
    for await (const page of store.pages()) pages.push(page);
    return pages;
  }

  it('should number pages from 1 and name files after the prefix', async () => {
    const first = await store.append([wifiRecord('aa:00')]);
    const second = await store.append([wifiRecord('aa:01'), wifiRecord('aa:02')]);

    expect(first).toEqual({
      index: 1,
      path: join(dir, 'bundle', 'wifi-search-1700000000-page_1.json'),
      recordCount: 1,
    });
    expect(second.index).toBe(2);
    expect(store.recordCount).toBe(3);
  });

  it('should read pages back in page order', async () => {
    await store.append([wifiRecord('aa:00')]);
    await store.append([wifiRecord('aa:01')]);

    const pages = await readAll();

    expect(pages.map((page) => page.index)).toEqual([1, 2]);
    expect(pages[1].records).toEqual([wifiRecord('aa:01')]);
  });

  it('should remove page files under the delete policy', async () => {
    await store.append([wifiRecord('aa:00')]);
    await store.append([wifiRecord('aa:01')]);

    const report = await store.finalize('delete');

    expect(report).toEqual({ policy: 'delete', removed: 2, mergedPath: undefined, errors: [] });
    expect(existsSync(store.pagePath(1))).toBe(false);
    expect(existsSync(store.pagePath(2))).toBe(false);
  });

  it('should leave page files untouched under the keep policy', async () => {
    await store.append([wifiRecord('aa:00')]);

    const report = await store.finalize('keep');

    expect(report).toEqual({ policy: 'keep', removed: 0, errors: [] });
    expect(existsSync(store.pagePath(1))).toBe(true);
  });

  it('should merge every record into one file under the merge policy', async () => {
    await store.append([wifiRecord('aa:00'), wifiRecord('aa:01')]);
    await store.append([wifiRecord('aa:02')]);

    const report = await store.finalize('merge');
    const mergedPath = join(dir, 'bundle', 'wifi-search-1700000000.json');
    const merged: unknown = JSON.parse(await readFile(mergedPath, 'utf-8'));

    expect(report.mergedPath).toBe(mergedPath);
    expect(report.removed).toBe(2);
    expect(merged).toEqual([wifiRecord('aa:00'), wifiRecord('aa:01'), wifiRecord('aa:02')]);
    expect(existsSync(store.pagePath(1))).toBe(false);
  });

  it('should report nothing to clean up when no page was stored', async () => {
    expect(await store.finalize('merge')).toEqual({ policy: 'merge', removed: 0, errors: [] });
  });

  it('should reject appends after finalize', async () => {
    await store.finalize('keep');

    await expect(store.append([wifiRecord('aa:00')])).rejects.toThrow('is finalized');
  });
});
