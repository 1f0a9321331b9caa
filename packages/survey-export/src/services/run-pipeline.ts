/**
 * Run completion shared by search and detail runs
 *
 * Once acquisition has stopped (for whatever reason) every run ends the same
 * way:
 * 1. Flatten whatever the PageStore holds and write each enabled artifact
 *    (skipped entirely after a fatal error)
 * 2. Apply the raw JSON retention policy
 * 3. Emit exactly one summary event
 * 4. Rethrow fatal errors (authorization, configuration) to the caller
 */

import { access, constants, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { PageStore } from '../acquisition/page-store.js';
import { flattenPageStream } from '../transformation/flatten-engine.js';
import { TabularExporter } from '../export/tabular-exporter.js';
import { GeoExporter } from '../export/geo-exporter.js';
import type { ArtifactExporter } from '../export/types.js';
import { runTag, type RunContext } from '../core/run-context.js';
import type {
  ArtifactOutcome,
  CleanupReport,
  FlattenResult,
  RunBundle,
  RunStatus,
} from '../core/types.js';
import type { RunEventListener } from '../core/events.js';
import { describeArtifact, describeCleanup, silentListener } from '../core/events.js';
import {
  ConfigurationError,
  ExportIOError,
  NotFoundError,
  RunCancelledError,
  describeError,
  isFatalError,
} from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'run-pipeline' });

// ============================================================================
// Types
// ============================================================================

export interface RunOptions {
  readonly onEvent?: RunEventListener;
  readonly signal?: AbortSignal;
  /** Defaults to CSV + KML, filtered by the context's format toggles */
  readonly exporters?: readonly ArtifactExporter[];
}

/**
 * How acquisition ended
 */
export interface AcquisitionResult {
  readonly pages: number;
  readonly records: number;
  readonly cancelled: boolean;
  readonly error?: Error;
}

// ============================================================================
// Helpers
// ============================================================================

export function defaultExporters(): ArtifactExporter[] {
  return [new TabularExporter(), new GeoExporter()];
}

/**
 * Create the bundle directory and confirm it is writable
 *
 * @throws {ConfigurationError} When the directory cannot be created or written
 */
export async function ensureOutputDirectory(directory: string): Promise<void> {
  try {
    await mkdir(directory, { recursive: true });
    await access(directory, constants.W_OK);
  } catch (error) {
    throw new ConfigurationError(`Output directory not writable: ${directory} (${describeError(error)})`);
  }
}

function deriveStatus(acquisition: AcquisitionResult, artifacts: readonly ArtifactOutcome[]): RunStatus {
  const { error } = acquisition;
  if (error && isFatalError(error)) return 'failed';
  if (acquisition.cancelled || error instanceof RunCancelledError) return 'cancelled';
  if (error instanceof NotFoundError) return 'empty';
  if (acquisition.records === 0) return error ? 'failed' : 'empty';
  if (error || artifacts.some((artifact) => artifact.status === 'failed')) return 'partial';
  return 'succeeded';
}

const STATUS_WORDS: Record<RunStatus, string> = {
  succeeded: 'complete',
  partial: 'partially complete',
  empty: 'returned no results',
  cancelled: 'cancelled',
  failed: 'failed',
};

export function countWritten(artifacts: readonly ArtifactOutcome[], format: 'csv' | 'kml'): number {
  return artifacts.filter((artifact) => artifact.format === format && artifact.status === 'written').length;
}

/**
 * One-line run summary
 *
 * @example
 * summarizeRun('Search', 'succeeded', 2, 150, artifacts)
 * // 'Search complete: 2 page(s), 150 record(s). Created 1 CSV(s) and 1 KML(s).'
 */
export function summarizeRun(
  label: string,
  status: RunStatus,
  pages: number,
  records: number,
  artifacts: readonly ArtifactOutcome[],
  error?: string
): string {
  const created = `Created ${countWritten(artifacts, 'csv')} CSV(s) and ${countWritten(artifacts, 'kml')} KML(s).`;
  const base = `${label} ${STATUS_WORDS[status]}: ${pages} page(s), ${records} record(s). ${created}`;
  return error ? `${base} ${error}` : base;
}

// ============================================================================
// Completion
// ============================================================================

async function exportArtifacts(
  ctx: RunContext,
  store: PageStore,
  exporters: readonly ArtifactExporter[],
  onEvent: RunEventListener
): Promise<ArtifactOutcome[]> {
  const enabled = exporters.filter((exporter) => ctx.formats[exporter.format]);
  if (enabled.length === 0) return [];

  const pathFor = (exporter: ArtifactExporter): string =>
    join(store.directory, `${store.prefix}${exporter.extension}`);

  let result: FlattenResult;
  try {
    result = await flattenPageStream(store.pages());
  } catch (error) {
    log.error('Could not read stored pages for export', { directory: store.directory, error: describeError(error) });
    const outcomes = enabled.map((exporter): ArtifactOutcome => ({
      format: exporter.format,
      status: 'failed',
      path: pathFor(exporter),
      error: `Could not read stored pages: ${describeError(error)}`,
    }));
    for (const outcome of outcomes) {
      onEvent({ type: 'export', outcome, message: describeArtifact(outcome) });
    }
    return outcomes;
  }

  const outcomes: ArtifactOutcome[] = [];
  for (const exporter of enabled) {
    const path = pathFor(exporter);
    let outcome: ArtifactOutcome;
    try {
      outcome = await exporter.write(result, path);
    } catch (error) {
      const failedPath = error instanceof ExportIOError ? error.path : path;
      log.warn('Artifact export failed', { format: exporter.format, path: failedPath, error: describeError(error) });
      outcome = { format: exporter.format, status: 'failed', path: failedPath, error: describeError(error) };
    }
    outcomes.push(outcome);
    onEvent({ type: 'export', outcome, message: describeArtifact(outcome) });
  }
  return outcomes;
}

async function applyRetention(ctx: RunContext, store: PageStore): Promise<CleanupReport> {
  try {
    return await store.finalize(ctx.rawJson);
  } catch (error) {
    log.warn('Raw JSON retention failed', { policy: ctx.rawJson, error: describeError(error) });
    return { policy: ctx.rawJson, removed: 0, errors: [describeError(error)] };
  }
}

/**
 * Export, clean up and summarize a run whose acquisition has ended
 *
 * @throws The acquisition error when it is fatal, after the summary event
 */
export async function completeRun(
  ctx: RunContext,
  store: PageStore,
  acquisition: AcquisitionResult,
  label: string,
  options: RunOptions = {}
): Promise<RunBundle> {
  const onEvent = options.onEvent ?? silentListener;
  const fatal = acquisition.error !== undefined && isFatalError(acquisition.error);

  const artifacts = fatal
    ? []
    : await exportArtifacts(ctx, store, options.exporters ?? defaultExporters(), onEvent);

  const cleanup = await applyRetention(ctx, store);
  onEvent({ type: 'cleanup', report: cleanup, message: describeCleanup(cleanup) });

  const status = deriveStatus(acquisition, artifacts);
  const error = acquisition.error ? describeError(acquisition.error) : undefined;
  const message = summarizeRun(label, status, acquisition.pages, acquisition.records, artifacts, error);

  const runLog = log.forRun(runTag(ctx));
  if (status === 'failed') {
    runLog.error('Run failed', { label, error });
  } else {
    runLog.info('Run finished', { label, status, pages: acquisition.pages, records: acquisition.records });
  }
  onEvent({ type: 'summary', status, message });

  if (fatal && acquisition.error) {
    throw acquisition.error;
  }

  return {
    directory: store.directory,
    status,
    pages: acquisition.pages,
    records: acquisition.records,
    artifacts,
    cleanup,
    error,
  };
}
