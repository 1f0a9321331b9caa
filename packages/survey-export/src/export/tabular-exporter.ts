/**
 * TabularExporter
 *
 * CSV with the run's column union as header, rows in source order.
 * Missing keys render as empty fields. Output depends only on the
 * FlattenResult, so rewriting the same result yields a byte-identical file.
 */

import type { ArtifactOutcome, FlatRow, FlattenResult } from '../core/types.js';
import { ExportIOError, toError } from '../core/errors.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import type { ArtifactExporter } from './types.js';

const log = createLogger({ module: 'tabular-exporter' });

const DELIMITER = ',';
const LINE_END = '\n';

/**
 * Quote a field containing the delimiter, a quote or a line break
 */
export function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatRow(values: readonly string[]): string {
  return values.map(escapeCSV).join(DELIMITER);
}

/**
 * Full CSV document, header first, trailing newline
 */
export function renderCSV(columns: readonly string[], rows: readonly FlatRow[]): string {
  const lines = [formatRow(columns)];
  for (const row of rows) {
    lines.push(formatRow(columns.map((column) => row.get(column) ?? '')));
  }
  return lines.join(LINE_END) + LINE_END;
}

export class TabularExporter implements ArtifactExporter {
  readonly format = 'csv' as const;
  readonly extension = '.csv';

  async write(result: FlattenResult, path: string): Promise<ArtifactOutcome> {
    if (result.rows.length === 0) {
      return { format: this.format, status: 'skipped', reason: 'no rows to export' };
    }

    try {
      await atomicWriteFile(path, renderCSV(result.columns, result.rows));
    } catch (error) {
      throw new ExportIOError(this.format, path, toError(error));
    }

    log.info('CSV exported', { path, rows: result.rows.length, columns: result.columns.length });
    return { format: this.format, status: 'written', path, count: result.rows.length };
  }
}
