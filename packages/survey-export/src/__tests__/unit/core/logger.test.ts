/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, createLogger } from '../../../core/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should stamp JSON lines with module and run', () => {
    const log = new Logger({ level: 'info', module: 'search-run', pretty: false }).forRun('wifi-search-1700000000');

    const line: unknown = JSON.parse(log.formatMessage('info', 'Run finished', { records: 3 }));

    expect(line).toMatchObject({
      level: 'info',
      module: 'search-run',
      run: 'wifi-search-1700000000',
      message: 'Run finished',
      records: 3,
    });
  });

  it('should leave the run out of lines logged outside a run', () => {
    const log = new Logger({ level: 'info', module: 'http-client', pretty: false });

    const line: unknown = JSON.parse(log.formatMessage('warn', 'Retrying'));

    expect(line).not.toHaveProperty('run');
  });

  it('should put module and run ahead of the message in text mode', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-02T03:04:05.000Z'));
    const log = new Logger({ level: 'debug', module: 'batch-orchestrator', pretty: true }).forRun(
      'network-detail-1700000000'
    );

    expect(log.formatMessage('warn', 'Batch item failed', { identifier: 'aa:00' })).toBe(
      '[2024-01-02T03:04:05.000Z] WARN batch-orchestrator network-detail-1700000000: Batch item failed {"identifier":"aa:00"}'
    );
  });

  it('should drop lines below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = new Logger({ level: 'info', module: 'page-store', pretty: true });

    log.debug('hidden');

    expect(debug).not.toHaveBeenCalled();
    debug.mockRestore();
  });

  it('should read the level from LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);

    createLogger({ module: 'run-pipeline' }).info('hidden');

    expect(info).not.toHaveBeenCalled();
    info.mockRestore();
    vi.unstubAllEnvs();
  });
});
