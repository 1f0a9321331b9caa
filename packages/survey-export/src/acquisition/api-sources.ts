/**
 * HTTP page and detail sources
 *
 * The pipeline depends only on "list of records + optional cursor + optional
 * total" for search, and "records for one identifier" for detail. This
 * module reduces the service's JSON bodies to those shapes.
 *
 * Search bodies: `{ results: [...], searchAfter | search_after, totalResults }`
 * Detail bodies: `{ results: [...] }` or `{ result: {...} }`
 */

import type { HTTPClient, QueryParams } from '../core/http-client.js';
import { buildUrl } from '../core/http-client.js';
import { HTTPError, NotFoundError } from '../core/errors.js';
import { asCursor, asFiniteNumber, isJsonObject, objectEntries } from '../core/type-guards.js';
import type { PageResponse, SurveyRecord } from '../core/types.js';
import type { PageSource } from './paginated-fetcher.js';

// ============================================================================
// Endpoints
// ============================================================================

export type SearchKind = 'wifi' | 'bt' | 'cell';
export type DetailKind = 'network' | 'bt';

export const SEARCH_KINDS: readonly SearchKind[] = ['wifi', 'bt', 'cell'];
export const DETAIL_KINDS: readonly DetailKind[] = ['network', 'bt'];

const SEARCH_PATHS: Record<SearchKind, string> = {
  wifi: '/network/search',
  bt: '/bluetooth/search',
  cell: '/cell/search',
};

const DETAIL_PATHS: Record<DetailKind, string> = {
  network: '/network/detail',
  bt: '/bluetooth/detail',
};

/** Query keys owned by the fetcher, never taken from caller filters */
const PAGINATION_KEYS = new Set(['resultsPerPage', 'searchAfter', 'search_after']);

export function isSearchKind(value: string): value is SearchKind {
  return SEARCH_KINDS.some((kind) => kind === value);
}

export function isDetailKind(value: string): value is DetailKind {
  return DETAIL_KINDS.some((kind) => kind === value);
}

export function searchEndpoint(baseUrl: string, kind: SearchKind): string {
  return `${baseUrl.replace(/\/+$/, '')}${SEARCH_PATHS[kind]}`;
}

export function detailEndpoint(baseUrl: string, kind: DetailKind): string {
  return `${baseUrl.replace(/\/+$/, '')}${DETAIL_PATHS[kind]}`;
}

// ============================================================================
// Response Parsing
// ============================================================================

/**
 * Reduce a search response body to records + cursor + total
 *
 * @throws Error if the body is not an object or reports `success: false`
 */
export function parseSearchResponse(body: unknown): PageResponse {
  if (!isJsonObject(body)) {
    throw new Error(`Unexpected search response: ${Array.isArray(body) ? 'array' : typeof body}`);
  }
  if (body.success === false) {
    const message = typeof body.message === 'string' ? body.message : 'service reported failure';
    throw new Error(`Search rejected: ${message}`);
  }

  return {
    records: objectEntries(body.results),
    cursor: asCursor(body.searchAfter ?? body.search_after),
    total: asFiniteNumber(body.totalResults),
  };
}

/**
 * Reduce a detail response body to the records of one identifier
 *
 * @throws {NotFoundError} When the body carries no result
 */
export function parseDetailResponse(body: unknown, identifier: string): SurveyRecord[] {
  if (!isJsonObject(body)) {
    throw new Error(`Unexpected detail response: ${Array.isArray(body) ? 'array' : typeof body}`);
  }

  const results = objectEntries(body.results);
  if (results.length > 0) return results;
  if (isJsonObject(body.result)) return [body.result];

  const message = typeof body.message === 'string' ? body.message : undefined;
  throw new NotFoundError(identifier, message);
}

// ============================================================================
// HTTP Sources
// ============================================================================

export class ApiPageSource implements PageSource {
  private readonly params: QueryParams;

  constructor(
    private readonly client: HTTPClient,
    private readonly endpoint: string,
    params: QueryParams,
    private readonly pageSize: number
  ) {
    this.params = Object.fromEntries(
      Object.entries(params).filter(([key, value]) => !PAGINATION_KEYS.has(key) && value !== '')
    );
  }

  describe(): string {
    return buildUrl(this.endpoint, this.query(undefined));
  }

  async fetchPage(cursor: string | undefined, signal?: AbortSignal): Promise<PageResponse> {
    const body = await this.client.fetchJSON(this.endpoint, {
      query: this.query(cursor),
      signal,
    });
    return parseSearchResponse(body);
  }

  async probeTotal(signal?: AbortSignal): Promise<number | undefined> {
    const body = await this.client.fetchJSON(this.endpoint, {
      query: { ...this.params, resultsPerPage: '1' },
      signal,
      retries: 0,
    });
    return parseSearchResponse(body).total;
  }

  private query(cursor: string | undefined): QueryParams {
    return {
      ...this.params,
      resultsPerPage: String(this.pageSize),
      ...(cursor !== undefined ? { searchAfter: cursor } : {}),
    };
  }
}

/**
 * Single-identifier lookups
 */
export interface DetailSource {
  describe(params: QueryParams): string;
  fetchDetail(params: QueryParams, identifier: string, signal?: AbortSignal): Promise<SurveyRecord[]>;
}

export class ApiDetailSource implements DetailSource {
  constructor(
    private readonly client: HTTPClient,
    private readonly endpoint: string
  ) {}

  describe(params: QueryParams): string {
    return buildUrl(this.endpoint, params);
  }

  async fetchDetail(
    params: QueryParams,
    identifier: string,
    signal?: AbortSignal
  ): Promise<SurveyRecord[]> {
    let body: unknown;
    try {
      body = await this.client.fetchJSON(this.endpoint, { query: params, signal });
    } catch (error) {
      if (error instanceof HTTPError && error.statusCode === 404) {
        throw new NotFoundError(identifier, 'HTTP 404');
      }
      throw error;
    }
    return parseDetailResponse(body, identifier);
  }
}
