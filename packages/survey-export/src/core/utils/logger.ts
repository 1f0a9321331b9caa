/**
 * Structured logging utility for Survey Export
 *
 * Console-based; JSON lines in production, one-line text otherwise. A module
 * logger narrowed with `forRun` stamps every line with the run tag
 * (`wifi-search-1700000000`), so interleaved batch items stay attributable.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerConfig {
  readonly level: LogLevel;
  readonly module: string;
  readonly run?: string;
  readonly pretty: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private readonly config: LoggerConfig) {}

  /**
   * Same module and level, every line tagged with the run
   */
  forRun(run: string): Logger {
    return new Logger({ ...this.config, run });
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  formatMessage(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;
    const { module, run } = this.config;

    if (this.config.pretty) {
      const scope = run ? `${module} ${run}` : module;
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${scope}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      module,
      ...(run ? { run } : {}),
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

/**
 * Logger scoped to a module
 */
export function createLogger(context: { readonly module: string; readonly run?: string }): Logger {
  return new Logger({
    level: getLogLevel(),
    module: context.module,
    run: context.run,
    pretty: process.env.NODE_ENV !== 'production',
  });
}
