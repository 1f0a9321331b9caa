/**
 * Survey Export Error Types
 *
 * Transport errors (HTTP*) describe what happened on the wire. Pipeline
 * errors describe what it means for the run:
 *
 * - TransientFetchError: retries exhausted on a recoverable failure
 * - AuthorizationError: 401/403, fatal for the run and for a batch
 * - NotFoundError: identifier unknown to the detail endpoint
 * - FetchPageError: one page could not be fetched; earlier pages stay on disk
 * - ExportIOError: one artifact could not be written; others still attempt
 * - RunCancelledError / RunBusyError: executor state
 * - ConfigurationError: invalid settings or unwritable output root, fatal
 */

function capture(target: Error, ctor: Function): void {
  // Maintain proper stack trace for where error was thrown (V8 only)
  if (Error.captureStackTrace) {
    Error.captureStackTrace(target, ctor);
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

/**
 * Non-2xx HTTP response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    capture(this, HTTPError);
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
    capture(this, HTTPTimeoutError);
  }
}

/**
 * Network error (connection failed, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
    capture(this, HTTPNetworkError);
  }
}

/**
 * JSON parse error
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;
  readonly cause: Error;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
    this.cause = cause;
    capture(this, HTTPJSONParseError);
  }
}

// ============================================================================
// Pipeline Errors
// ============================================================================

/**
 * Timeout, network failure, 408/429 or 5xx that survived every retry
 */
export class TransientFetchError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly cause: Error;

  constructor(url: string, attempts: number, cause: Error) {
    super(`Request failed after ${attempts} attempts: ${cause.message}`);
    this.name = 'TransientFetchError';
    this.url = url;
    this.attempts = attempts;
    this.cause = cause;
    capture(this, TransientFetchError);
  }
}

/**
 * Credentials rejected (401/403). Retrying cannot fix it.
 */
export class AuthorizationError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(statusCode: number, url: string, detail?: string) {
    super(
      `Authorization failed (HTTP ${statusCode})${detail ? `: ${detail}` : ''}`
    );
    this.name = 'AuthorizationError';
    this.statusCode = statusCode;
    this.url = url;
    capture(this, AuthorizationError);
  }
}

/**
 * Detail lookup for an identifier the service does not know
 */
export class NotFoundError extends Error {
  readonly identifier: string;

  constructor(identifier: string, detail?: string) {
    super(`No results for ${identifier}${detail ? ` (${detail})` : ''}`);
    this.name = 'NotFoundError';
    this.identifier = identifier;
    capture(this, NotFoundError);
  }
}

/**
 * A single page failed; the walk stops but earlier pages remain durable
 */
export class FetchPageError extends Error {
  readonly pageIndex: number;
  readonly cause: Error;

  constructor(pageIndex: number, cause: Error) {
    super(`Page ${pageIndex} failed: ${cause.message}`);
    this.name = 'FetchPageError';
    this.pageIndex = pageIndex;
    this.cause = cause;
    capture(this, FetchPageError);
  }
}

/**
 * One export artifact could not be written
 */
export class ExportIOError extends Error {
  readonly format: string;
  readonly path: string;
  readonly cause: Error;

  constructor(format: string, path: string, cause: Error) {
    super(`${format.toUpperCase()} export to ${path} failed: ${cause.message}`);
    this.name = 'ExportIOError';
    this.format = format;
    this.path = path;
    this.cause = cause;
    capture(this, ExportIOError);
  }
}

export class RunCancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'RunCancelledError';
    capture(this, RunCancelledError);
  }
}

export class RunBusyError extends Error {
  constructor() {
    super('A run is already active for this output context');
    this.name = 'RunBusyError';
    capture(this, RunBusyError);
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    capture(this, ConfigurationError);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Errors that end a whole run or batch rather than one page or identifier
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof AuthorizationError || error instanceof ConfigurationError;
}

/**
 * Render any thrown value as a message
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize any thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
