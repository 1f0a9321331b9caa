/**
 * HTTP Client for Survey Export
 *
 * One place for every request the pipeline makes:
 * - Exponential backoff with jitter on timeouts, network failures, 408/429/5xx
 * - Timeouts via AbortController, merged with the run's cancellation signal
 * - Basic-auth credentials from a CredentialProvider on every request
 * - 401/403 → AuthorizationError immediately (never retried)
 * - 404 → NotFoundError-worthy HTTPError for callers to classify
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 3, timeoutMs: 60000 }, credentials);
 * const body = await client.fetchJSON('https://api.example.net/v2/network/search', {
 *   query: { ssidlike: 'cafe%', resultsPerPage: '100' },
 * });
 * ```
 */

import type { CredentialProvider } from './credentials.js';
import {
  AuthorizationError,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
  RunCancelledError,
  TransientFetchError,
  toError,
} from './errors.js';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'http-client' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts after the first request (default: 3) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 1000) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 30000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

export type QueryParams = Readonly<Record<string, string>>;

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly query?: QueryParams;
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
  /** Run cancellation */
  readonly signal?: AbortSignal;
}

export const DEFAULT_HTTP_CONFIG: HTTPClientConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 60000,
  userAgent: 'survey-export/1.0 (+local)',
  jitterFactor: 0.1,
};

/**
 * Compose endpoint URL and query string
 */
export function buildUrl(endpoint: string, query?: QueryParams): string {
  const url = new URL(endpoint);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
  }
  return url.toString();
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;
  private readonly credentials?: CredentialProvider;

  constructor(config?: Partial<HTTPClientConfig>, credentials?: CredentialProvider) {
    this.config = { ...DEFAULT_HTTP_CONFIG, ...config };
    this.credentials = credentials;
  }

  /**
   * Fetch and parse JSON response
   *
   * @throws {AuthorizationError} On 401/403
   * @throws {HTTPError} For non-retryable HTTP error responses
   * @throws {TransientFetchError} If all retry attempts fail
   * @throws {HTTPJSONParseError} If response is not valid JSON
   * @throws {RunCancelledError} If the caller's signal aborts
   */
  async fetchJSON(endpoint: string, options?: FetchOptions): Promise<unknown> {
    const url = buildUrl(endpoint, options?.query);
    const response = await this.fetchWithRetry(url, options);
    const text = await response.text();

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(url, text, toError(error));
    }
  }

  /**
   * Fetch raw response with retry logic
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = options?.retries ?? this.config.maxRetries;
    const maxAttempts = maxRetries + 1;
    let lastError: Error = new Error('No attempts made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (options?.signal?.aborted) {
        throw new RunCancelledError();
      }

      try {
        const response = await this.fetchWithTimeout(url, options);
        if (response.ok) {
          return response;
        }

        if (response.status === 401 || response.status === 403) {
          const detail = await this.readErrorDetail(response);
          throw new AuthorizationError(response.status, url, detail);
        }

        const error = new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url
        );
        if (!this.isRetryableStatus(response.status)) {
          throw error;
        }
        lastError = error;
      } catch (error) {
        const normalized = toError(error);
        if (!this.isRetryableError(normalized)) {
          throw normalized;
        }
        lastError = normalized;
      }

      log.warn('HTTPClient attempt failed', {
        attempt,
        maxAttempts,
        error: lastError.message,
        url,
      });

      if (attempt < maxAttempts) {
        await this.sleep(this.calculateBackoffDelay(attempt), options?.signal);
      }
    }

    throw new TransientFetchError(url, maxAttempts, lastError);
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    const signal = options?.signal
      ? this.mergeAbortSignals([controller.signal, options.signal])
      : controller.signal;

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'User-Agent': this.config.userAgent,
          ...this.authorizationHeader(),
          ...options?.headers,
        },
        signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (options?.signal?.aborted) {
          throw new RunCancelledError();
        }
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, toError(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private authorizationHeader(): Record<string, string> {
    const credentials = this.credentials?.getCredentials();
    if (!credentials) return {};
    const encoded = Buffer.from(`${credentials.name}:${credentials.token}`).toString('base64');
    return { Authorization: `Basic ${encoded}` };
  }

  private async readErrorDetail(response: Response): Promise<string | undefined> {
    try {
      const text = await response.text();
      return text.trim().slice(0, 200) || undefined;
    } catch (error) {
      log.debug('Could not read error body', { error: toError(error).message });
      return undefined;
    }
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter range: [delay * (1 - jitterFactor), delay * (1 + jitterFactor)]
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 || // Request Timeout
      status === 429 || // Too Many Requests
      status >= 500
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }
    // Auth, cancellation, parse errors: deterministic, fail fast
    return false;
  }

  /**
   * Merge multiple AbortSignals into one
   */
  private mergeAbortSignals(signals: readonly AbortSignal[]): AbortSignal {
    const controller = new AbortController();

    for (const signal of signals) {
      if (signal.aborted) {
        controller.abort();
        break;
      }
      signal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    return controller.signal;
  }

  /**
   * Sleep between attempts; wakes early with RunCancelledError on abort
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new RunCancelledError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Create HTTP client with custom config
 */
export function createHTTPClient(
  config?: Partial<HTTPClientConfig>,
  credentials?: CredentialProvider
): HTTPClient {
  return new HTTPClient(config, credentials);
}
