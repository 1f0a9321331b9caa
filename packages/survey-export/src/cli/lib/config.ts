/**
 * Survey Export CLI Configuration Management
 *
 * Loads configuration from .survey-exportrc (YAML) with environment variable
 * overrides and sensible defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SURVEY_EXPORT_*)
 * 3. Config file (.survey-exportrc or --config path)
 * 4. Default values
 *
 * Example .survey-exportrc:
 * ```yaml
 * version: 1
 * api:
 *   baseUrl: https://api.wigle.net/api/v2
 *   timeout: 60000
 * credentials:
 *   name: AIDexample
 *   token: test-secret
 * output:
 *   root: ./exports
 *   rawJson: merge
 * search:
 *   pageSize: 100
 * ```
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, describeError } from '../../core/errors.js';
import { isRetentionPolicy } from '../../core/run-context.js';
import { isJsonObject } from '../../core/type-guards.js';
import type { JsonObject, RetentionPolicy } from '../../core/types.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface ApiConfig {
  readonly baseUrl: string;
  /** Request timeout in milliseconds */
  readonly timeout: number;
  readonly maxRetries: number;
  readonly userAgent: string;
}

/**
 * API name/token pair. Storage is the config file or environment.
 */
export interface CredentialsConfig {
  readonly name?: string;
  readonly token?: string;
}

export interface OutputConfig {
  /** Parent directory for run bundles */
  readonly root: string;
  readonly csv: boolean;
  readonly kml: boolean;
  readonly rawJson: RetentionPolicy;
}

export interface SearchConfig {
  readonly pageSize: number;
  readonly maxPages?: number;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;
  readonly api: ApiConfig;
  readonly credentials: CredentialsConfig;
  readonly output: OutputConfig;
  readonly search: SearchConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure after reading
 */
interface ConfigFileSchema {
  version?: number;
  api?: Partial<ApiConfig>;
  credentials?: CredentialsConfig;
  output?: {
    root?: string;
    csv?: boolean;
    kml?: boolean;
    rawJson?: string;
  };
  search?: Partial<SearchConfig>;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'credentials' | 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  api: {
    baseUrl: 'https://api.wigle.net/api/v2',
    timeout: 60000,
    maxRetries: 3,
    userAgent: 'survey-export/1.0 (+local)',
  },

  output: {
    root: './exports',
    csv: true,
    kml: true,
    rawJson: 'delete',
  },

  search: {
    pageSize: 100,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.survey-exportrc',
  '.survey-exportrc.yaml',
  '.survey-exportrc.yml',
  '.survey-exportrc.json',
];

const ENV_PREFIX = 'SURVEY_EXPORT_';

/**
 * Find config file in current directory or parent directories
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

function section(value: JsonObject, key: string): JsonObject | undefined {
  const child = value[key];
  return isJsonObject(child) ? child : undefined;
}

function stringField(value: JsonObject | undefined, key: string): string | undefined {
  const field = value?.[key];
  return typeof field === 'string' && field !== '' ? field : undefined;
}

function numberField(value: JsonObject | undefined, key: string): number | undefined {
  const field = value?.[key];
  return typeof field === 'number' ? field : undefined;
}

function booleanField(value: JsonObject | undefined, key: string): boolean | undefined {
  const field = value?.[key];
  return typeof field === 'boolean' ? field : undefined;
}

/**
 * Narrow a parsed config document to the known keys; unknown keys are ignored
 */
export function readConfigDocument(document: unknown): ConfigFileSchema {
  if (document === null || document === undefined) return {};
  if (!isJsonObject(document)) {
    throw new ConfigurationError('Config file must contain a mapping at the top level');
  }

  const api = section(document, 'api');
  const credentials = section(document, 'credentials');
  const output = section(document, 'output');
  const search = section(document, 'search');

  return {
    version: numberField(document, 'version'),
    api: {
      baseUrl: stringField(api, 'baseUrl'),
      timeout: numberField(api, 'timeout'),
      maxRetries: numberField(api, 'maxRetries'),
      userAgent: stringField(api, 'userAgent'),
    },
    credentials: {
      name: stringField(credentials, 'name'),
      token: stringField(credentials, 'token'),
    },
    output: {
      root: stringField(output, 'root'),
      csv: booleanField(output, 'csv'),
      kml: booleanField(output, 'kml'),
      rawJson: stringField(output, 'rawJson'),
    },
    search: {
      pageSize: numberField(search, 'pageSize'),
      maxPages: numberField(search, 'maxPages'),
    },
  };
}

/**
 * Parse config file content
 */
function parseConfigFile(filePath: string): ConfigFileSchema {
  let document: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    document = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${describeError(error)}`);
  }
  return readConfigDocument(document);
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`${ENV_PREFIX}${name}`];
  return value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    timeout?: number;
    output?: string;
    csv?: boolean;
    kml?: boolean;
    rawJson?: string;
    pageSize?: number;
    maxPages?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigurationError} When a named config file is missing or malformed
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  // Find config file
  let configPath: string | null = null;
  let fileConfig: ConfigFileSchema = {};

  if (options.configPath) {
    // Explicit config path provided
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const overrides = options.overrides ?? {};

  const rawJson =
    overrides.rawJson ??
    getEnvVar('RAW_JSON') ??
    fileConfig.output?.rawJson ??
    DEFAULT_CONFIG.output.rawJson;
  if (!isRetentionPolicy(rawJson)) {
    throw new ConfigurationError(`Invalid rawJson policy: ${rawJson}. Must be one of: delete, keep, merge`);
  }

  // Merge configuration layers
  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    api: {
      baseUrl: getEnvVar('BASE_URL') ?? fileConfig.api?.baseUrl ?? DEFAULT_CONFIG.api.baseUrl,
      timeout:
        overrides.timeout ??
        getEnvNumber('TIMEOUT') ??
        fileConfig.api?.timeout ??
        DEFAULT_CONFIG.api.timeout,
      maxRetries:
        getEnvNumber('MAX_RETRIES') ?? fileConfig.api?.maxRetries ?? DEFAULT_CONFIG.api.maxRetries,
      userAgent: fileConfig.api?.userAgent ?? DEFAULT_CONFIG.api.userAgent,
    },

    credentials: {
      name: getEnvVar('API_NAME') ?? fileConfig.credentials?.name,
      token: getEnvVar('API_TOKEN') ?? fileConfig.credentials?.token,
    },

    output: {
      root:
        overrides.output ??
        getEnvVar('OUTPUT_DIR') ??
        fileConfig.output?.root ??
        DEFAULT_CONFIG.output.root,
      csv: overrides.csv ?? getEnvBool('CSV') ?? fileConfig.output?.csv ?? DEFAULT_CONFIG.output.csv,
      kml: overrides.kml ?? getEnvBool('KML') ?? fileConfig.output?.kml ?? DEFAULT_CONFIG.output.kml,
      rawJson,
    },

    search: {
      pageSize:
        overrides.pageSize ??
        getEnvNumber('PAGE_SIZE') ??
        fileConfig.search?.pageSize ??
        DEFAULT_CONFIG.search.pageSize,
      maxPages: overrides.maxPages ?? getEnvNumber('MAX_PAGES') ?? fileConfig.search?.maxPages,
    },

    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Resolve the output root relative to the config file, or the cwd
 */
export function resolveOutputRoot(config: CLIConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.output.root);
}

/**
 * Validate configuration
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!Number.isFinite(config.api.timeout) || config.api.timeout <= 0) {
    throw new ConfigurationError('Timeout must be a positive number');
  }

  if (!Number.isInteger(config.api.maxRetries) || config.api.maxRetries < 0) {
    throw new ConfigurationError('maxRetries must be a non-negative integer');
  }

  if (!Number.isInteger(config.search.pageSize) || config.search.pageSize <= 0) {
    throw new ConfigurationError('pageSize must be a positive integer');
  }

  if (
    config.search.maxPages !== undefined &&
    (!Number.isInteger(config.search.maxPages) || config.search.maxPages <= 0)
  ) {
    throw new ConfigurationError('maxPages must be a positive integer');
  }

  if (!isRetentionPolicy(config.output.rawJson)) {
    throw new ConfigurationError(`Invalid rawJson policy: ${String(config.output.rawJson)}`);
  }

  try {
    new URL(config.api.baseUrl);
  } catch (error) {
    throw new ConfigurationError(`Invalid api.baseUrl: ${config.api.baseUrl} (${describeError(error)})`);
  }
}
