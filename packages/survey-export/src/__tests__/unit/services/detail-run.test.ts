/**
 * Detail Run Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { runDetail } from '../../../services/detail-run.js';
import { createRunContext, type RunContext } from '../../../core/run-context.js';
import type { RunEvent } from '../../../core/events.js';
import { MapDetailSource } from '../../utils/fakes.js';
import { detailRecord, makeTempDir, removeTempDir } from '../../utils/fixtures.js';

describe('runDetail', () => {
  let root: string;
  let ctx: RunContext;

  beforeEach(async () => {
    root = await makeTempDir();
    ctx = createRunContext({ outputRoot: root, kind: 'network-detail', runTimestamp: 1700000000 });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('should export one row and one placemark per location', async () => {
    const source = new MapDetailSource(
      new Map([['aa:bb:cc:dd:ee:ff', [detailRecord('aa:bb:cc:dd:ee:ff', [[41.1, -87.1], [41.2, -87.2]])]]])
    );
    const dir = join(root, 'network-detail-1700000000');

    const bundle = await runDetail(ctx, source, { netid: 'aa:bb:cc:dd:ee:ff' });

    expect(bundle.status).toBe('succeeded');
    expect(bundle.artifacts).toEqual([
      { format: 'csv', status: 'written', path: join(dir, 'aabbccddeeff.csv'), count: 2 },
      { format: 'kml', status: 'written', path: join(dir, 'aabbccddeeff.kml'), count: 2 },
    ]);
  });

  it('should end an unknown identifier as empty', async () => {
    const events: RunEvent[] = [];

    const bundle = await runDetail(ctx, new MapDetailSource(new Map()), { netid: 'nope' }, {
      onEvent: (event) => events.push(event),
    });

    expect(bundle.status).toBe('empty');
    expect(bundle.error).toBe('No results for nope');
    expect(events[events.length - 1].message).toBe(
      'Detail nope returned no results: 0 page(s), 0 record(s). Created 0 CSV(s) and 0 KML(s). No results for nope'
    );
  });

  it('should name cell lookups after their fields', async () => {
    const params = { operator: '310410', lac: '7033', cid: '17811' };
    const source = new MapDetailSource(new Map([['operator-310410_lac-7033_cid-17811', [{ trilat: 1, trilong: 2 }]]]));

    const bundle = await runDetail(ctx, source, params, { directory: join(root, 'cell') });

    expect(bundle.artifacts[0]).toMatchObject({ path: join(root, 'cell', 'operator-310410_lac-7033_cid-17811.csv') });
    expect(source.requested).toEqual([params]);
  });

  it('should not call the service once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new MapDetailSource(new Map([['aa:00', [{ netid: 'aa:00' }]]]));

    const bundle = await runDetail(ctx, source, { netid: 'aa:00' }, { signal: controller.signal });

    expect(bundle.status).toBe('cancelled');
    expect(source.requested).toEqual([]);
  });
});
