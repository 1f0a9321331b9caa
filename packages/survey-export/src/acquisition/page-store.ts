/**
 * PageStore
 *
 * Append-only holder of the raw pages of one run. Each page is written to
 * `<dir>/<prefix>-page_<n>.json` before the fetcher asks for the next one,
 * so whatever was fetched survives a later failure or cancellation.
 *
 * The store owns its directory exclusively for the lifetime of the run.
 */

import { mkdir, readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { describeError } from '../core/errors.js';
import { objectEntries } from '../core/type-guards.js';
import type {
  CleanupReport,
  Page,
  RetentionPolicy,
  StoredPage,
  SurveyRecord,
} from '../core/types.js';

const log = createLogger({ module: 'page-store' });

export class PageStore {
  private readonly stored: StoredPage[] = [];
  private finalized = false;

  constructor(
    readonly directory: string,
    readonly prefix: string
  ) {}

  /**
   * Pages written so far, in page order
   */
  get storedPages(): readonly StoredPage[] {
    return this.stored;
  }

  get recordCount(): number {
    return this.stored.reduce((sum, page) => sum + page.recordCount, 0);
  }

  pagePath(index: number): string {
    return join(this.directory, `${this.prefix}-page_${index}.json`);
  }

  /**
   * Persist the next page
   *
   * @returns The stored page, numbered from 1
   */
  async append(records: readonly SurveyRecord[]): Promise<StoredPage> {
    if (this.finalized) {
      throw new Error(`PageStore ${this.directory} is finalized`);
    }

    const index = this.stored.length + 1;
    const path = this.pagePath(index);

    await mkdir(this.directory, { recursive: true });
    await atomicWriteJSON(path, records);

    const page: StoredPage = { index, path, recordCount: records.length };
    this.stored.push(page);
    log.debug('Page persisted', { index, path, records: records.length });
    return page;
  }

  /**
   * Read persisted pages back, in page order
   */
  async *pages(): AsyncGenerator<Page> {
    for (const stored of this.stored) {
      const text = await readFile(stored.path, 'utf-8');
      const parsed: unknown = JSON.parse(text);
      yield { index: stored.index, records: objectEntries(parsed) };
    }
  }

  /**
   * Apply the retention policy once export is done
   *
   * Deletion failures are reported, never thrown; the artifacts are already
   * written by the time this runs.
   */
  async finalize(policy: RetentionPolicy): Promise<CleanupReport> {
    this.finalized = true;

    if (policy === 'keep' || this.stored.length === 0) {
      return { policy, removed: 0, errors: [] };
    }

    let mergedPath: string | undefined;
    if (policy === 'merge') {
      const merged: SurveyRecord[] = [];
      for await (const page of this.pages()) {
        merged.push(...page.records);
      }
      mergedPath = join(this.directory, `${this.prefix}.json`);
      await atomicWriteJSON(mergedPath, merged);
    }

    const errors: string[] = [];
    let removed = 0;
    for (const page of this.stored) {
      try {
        await unlink(page.path);
        removed += 1;
      } catch (error) {
        const message = `Could not remove ${page.path}: ${describeError(error)}`;
        log.warn('Page cleanup failed', { path: page.path, error: describeError(error) });
        errors.push(message);
      }
    }

    log.info('Raw pages finalized', { policy, removed, mergedPath });
    return { policy, removed, mergedPath, errors };
  }
}
