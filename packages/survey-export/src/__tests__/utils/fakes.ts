/**
 * In-process stand-ins for the remote search and detail endpoints
 */

import type { PageSource } from '../../acquisition/paginated-fetcher.js';
import type { DetailSource } from '../../acquisition/api-sources.js';
import type { QueryParams } from '../../core/http-client.js';
import { buildUrl } from '../../core/http-client.js';
import { NotFoundError } from '../../core/errors.js';
import type { PageResponse, SurveyRecord } from '../../core/types.js';

export type ScriptStep = PageResponse | Error;

/**
 * Replays a fixed script of responses. Once the script runs out the last
 * step repeats forever, which is how a stuck upstream cursor behaves.
 */
export class ScriptedPageSource implements PageSource {
  readonly cursorsSent: (string | undefined)[] = [];
  private readonly total?: number;

  constructor(
    private readonly script: readonly ScriptStep[],
    options: { readonly total?: number } = {}
  ) {
    this.total = options.total;
  }

  describe(): string {
    return 'https://api.test/v2/network/search?resultsPerPage=2';
  }

  async fetchPage(cursor: string | undefined): Promise<PageResponse> {
    this.cursorsSent.push(cursor);
    const step = this.script[Math.min(this.cursorsSent.length - 1, this.script.length - 1)];
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }

  async probeTotal(): Promise<number | undefined> {
    return this.total;
  }

  get calls(): number {
    return this.cursorsSent.length;
  }
}

/**
 * Detail lookups answered from a map keyed by netid; errors are thrown as-is
 */
export class MapDetailSource implements DetailSource {
  readonly requested: QueryParams[] = [];

  constructor(private readonly answers: ReadonlyMap<string, readonly SurveyRecord[] | Error>) {}

  describe(params: QueryParams): string {
    return buildUrl('https://api.test/v2/network/detail', params);
  }

  async fetchDetail(params: QueryParams, identifier: string): Promise<SurveyRecord[]> {
    this.requested.push(params);
    const answer = this.answers.get(params.netid ?? identifier);
    if (answer instanceof Error) {
      throw answer;
    }
    if (!answer || answer.length === 0) {
      throw new NotFoundError(identifier);
    }
    return [...answer];
  }
}
