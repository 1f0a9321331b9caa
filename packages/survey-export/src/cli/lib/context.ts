/**
 * CLI global context and exit codes
 *
 * Initialized once by the root command's preAction hook; commands read it
 * through getGlobalContext().
 *
 * @module cli/lib/context
 */

import {
  AuthorizationError,
  ConfigurationError,
  HTTPError,
  HTTPNetworkError,
  HTTPTimeoutError,
  RunCancelledError,
  TransientFetchError,
} from '../../core/errors.js';
import { StaticCredentialProvider } from '../../core/credentials.js';
import { createHTTPClient, type HTTPClient } from '../../core/http-client.js';
import type { RunStatus } from '../../core/types.js';
import { loadConfig, type CLIConfig, type LoadConfigOptions } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForStatus(status: RunStatus): ExitCode {
  switch (status) {
    case 'succeeded':
    case 'empty':
      return EXIT_CODES.SUCCESS;
    case 'partial':
      return EXIT_CODES.WARNINGS;
    case 'cancelled':
      return EXIT_CODES.USER_CANCELLED;
    case 'failed':
      return EXIT_CODES.ERRORS;
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof RunCancelledError) return EXIT_CODES.USER_CANCELLED;
  if (
    error instanceof AuthorizationError ||
    error instanceof TransientFetchError ||
    error instanceof HTTPError ||
    error instanceof HTTPTimeoutError ||
    error instanceof HTTPNetworkError
  ) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export function hasGlobalContext(): boolean {
  return globalContext !== null;
}

export async function initializeContext(options: LoadConfigOptions): Promise<GlobalContext> {
  const startTime = Date.now();
  const config = await loadConfig(options);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

/**
 * HTTP client carrying the configured credentials
 *
 * @throws {ConfigurationError} When no credentials are configured
 */
export function createApiClient(config: CLIConfig): HTTPClient {
  const credentials = new StaticCredentialProvider(config.credentials.name, config.credentials.token);
  if (!credentials.ready()) {
    throw new ConfigurationError(
      'API credentials missing: set SURVEY_EXPORT_API_NAME and SURVEY_EXPORT_API_TOKEN, or credentials in .survey-exportrc'
    );
  }

  return createHTTPClient(
    {
      timeoutMs: config.api.timeout,
      maxRetries: config.api.maxRetries,
      userAgent: config.api.userAgent,
    },
    credentials
  );
}
