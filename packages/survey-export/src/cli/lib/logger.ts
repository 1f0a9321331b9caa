/**
 * Survey Export CLI Structured Logging
 *
 * Structured JSON lines for machine consumption, coloured one-line text for
 * interactive use. Also the sink for run status events.
 *
 * @module cli/lib/logger
 */

import type { RunEvent } from '../../core/events.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry metadata
 */
export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Structured log entry for JSON output
 */
export interface StructuredLogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly message: string;
  readonly command?: string;
  readonly duration_ms?: number;
  readonly [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface CLILoggerConfig {
  /** Minimum log level to output */
  readonly level: LogLevel;
  /** Output as JSON */
  readonly json: boolean;
  /** Service name */
  readonly service?: string;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime: number;
  private commandContext: string | null = null;

  constructor(config: CLILoggerConfig) {
    this.config = {
      service: 'survey-export',
      ...config,
    };
    this.startTime = Date.now();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private getElapsedMs(): number {
    return Date.now() - this.startTime;
  }

  /**
   * Format message for JSON output
   */
  formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const entry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(this.commandContext ? { command: this.commandContext } : {}),
      ...(metadata && Object.keys(metadata).length > 0 ? metadata : {}),
    };
    return JSON.stringify(entry);
  }

  /**
   * Format message for human-readable output
   */
  formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const color = LEVEL_COLORS[level];
    const label = LEVEL_LABELS[level];

    let line = `${COLORS.dim}${new Date().toISOString()}${COLORS.reset} `;
    line += `${color}${label}${COLORS.reset} `;
    line += message;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }

    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    switch (level) {
      case 'debug':
        console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  }

  setCommand(command: string): void {
    this.commandContext = command;
    this.startTime = Date.now();
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }

  commandStart(command: string, options?: LogMetadata): void {
    this.setCommand(command);
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const duration_ms = this.getElapsedMs();
    const baseMetadata = { duration_ms, ...metadata };

    if (success) {
      this.info(`Command completed in ${formatDuration(duration_ms)}`, baseMetadata);
    } else {
      this.error(`Command failed after ${formatDuration(duration_ms)}`, baseMetadata);
    }
  }

  /**
   * Status channel sink
   *
   * Every event is shown at info, except failures (warn) and page progress
   * in JSON mode, which carries its numbers as metadata.
   */
  event(event: RunEvent): void {
    switch (event.type) {
      case 'page':
        this.info(event.message, this.config.json
          ? { page: event.index, count: event.count, cumulative: event.cumulative, total: event.total }
          : undefined);
        return;
      case 'export':
        if (event.outcome.status === 'failed') {
          this.warn(event.message);
        } else {
          this.info(event.message);
        }
        return;
      case 'cleanup':
        for (const error of event.report.errors) {
          this.warn(error);
        }
        this.info(event.message);
        return;
      case 'item':
        this.info(this.config.json ? event.message : `${'='.repeat(64)}\n${event.message}`);
        return;
      case 'item-done':
      case 'summary':
        if (event.status === 'failed') {
          this.error(event.message, { status: event.status });
        } else if (event.status === 'partial' || event.status === 'cancelled') {
          this.warn(event.message, { status: event.status });
        } else {
          this.info(event.message, { status: event.status });
        }
        return;
      default:
        this.info(event.message);
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}): CLILogger {
  return new CLILogger({
    level: config.level ?? 'info',
    json: config.json ?? false,
    service: config.service ?? 'survey-export',
  });
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}
