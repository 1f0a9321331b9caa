/**
 * Batch Orchestrator
 *
 * Runs the detail pipeline once per identifier, strictly one after another,
 * each into its own bundle directory under `<outputRoot>/<kind>-<ts>/`.
 * Identifiers sharing a basename get numbered directories.
 *
 * Item runs report completion as `item-done`; the batch sends the only
 * `summary`.
 *
 * FAILURE POLICY:
 * - Not found, fetch errors, export errors: recorded, batch continues
 * - Authorization / configuration errors: recorded, remaining identifiers skipped
 * - Cancellation: checked before each identifier; the current one finishes
 *   its own cleanup first
 */

import type { DetailSource } from '../acquisition/api-sources.js';
import { detailParamsFor } from '../acquisition/identifiers.js';
import { itemBundleDir, runTag, type RunContext } from '../core/run-context.js';
import type { RunBundle, RunStatus } from '../core/types.js';
import { silentListener } from '../core/events.js';
import { describeError, isFatalError, toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { runDetail } from './detail-run.js';
import { countWritten } from './run-pipeline.js';
import type {
  BatchFailure,
  BatchOrchestratorOptions,
  BatchResult,
  BatchRunOptions,
} from './batch-orchestrator.types.js';

const log = createLogger({ module: 'batch-orchestrator' });

export class BatchOrchestrator {
  constructor(
    private readonly ctx: RunContext,
    private readonly source: DetailSource,
    private readonly options: BatchOrchestratorOptions = {}
  ) {}

  async run(identifiers: readonly string[], runOptions: BatchRunOptions = {}): Promise<BatchResult> {
    const onEvent = runOptions.onEvent ?? silentListener;
    const { signal } = runOptions;

    const bundles: RunBundle[] = [];
    const failures: BatchFailure[] = [];
    let processed = 0;
    let succeeded = 0;
    let cancelled = false;
    let fatalError: Error | undefined;
    const directories = new Set<string>();
    const batchLog = log.forRun(runTag(this.ctx));

    batchLog.info('Batch started', { identifiers: identifiers.length, kind: this.ctx.kind });

    for (const [offset, identifier] of identifiers.entries()) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      const position = offset + 1;
      onEvent({
        type: 'item',
        identifier,
        position,
        of: identifiers.length,
        message: `[${position}/${identifiers.length}] NETID: ${identifier}`,
      });

      let bundle: RunBundle;
      try {
        bundle = await runDetail(this.ctx, this.source, detailParamsFor(identifier, this.options.fixedParams), {
          directory: itemBundleDir(this.ctx, identifier, directories),
          exporters: this.options.exporters,
          onEvent: (event) =>
            onEvent(
              event.type === 'summary'
                ? { type: 'item-done', identifier, status: event.status, message: event.message }
                : event
            ),
          signal,
        });
      } catch (error) {
        processed += 1;
        failures.push({ identifier, error: describeError(error) });
        if (isFatalError(error)) {
          fatalError = toError(error);
          batchLog.error('Batch aborted', { identifier, error: fatalError.message });
          break;
        }
        batchLog.warn('Batch item failed', { identifier, error: describeError(error) });
        continue;
      }

      if (bundle.status === 'cancelled') {
        bundles.push(bundle);
        cancelled = true;
        break;
      }

      processed += 1;
      bundles.push(bundle);
      if (bundle.status === 'succeeded') {
        succeeded += 1;
      } else {
        const error = bundle.error ?? `Run ${bundle.status}`;
        failures.push({ identifier, error });
        batchLog.warn('Batch item failed', { identifier, status: bundle.status, error });
      }
    }

    const result = this.buildResult({ processed, succeeded, failures, bundles, cancelled, fatalError });
    onEvent({ type: 'summary', status: result.status, message: result.summary });
    batchLog.info('Batch finished', {
      processed: result.processed,
      succeeded: result.succeeded,
      failed: result.failed,
      status: result.status,
    });
    return result;
  }

  private buildResult(state: {
    readonly processed: number;
    readonly succeeded: number;
    readonly failures: readonly BatchFailure[];
    readonly bundles: readonly RunBundle[];
    readonly cancelled: boolean;
    readonly fatalError?: Error;
  }): BatchResult {
    const failed = state.failures.length;
    const artifacts = state.bundles.flatMap((bundle) => bundle.artifacts);
    const csvCount = countWritten(artifacts, 'csv');
    const kmlCount = countWritten(artifacts, 'kml');
    const aborted = state.fatalError !== undefined;

    let status: RunStatus;
    if (aborted) status = 'failed';
    else if (state.cancelled) status = 'cancelled';
    else if (state.processed === 0) status = 'empty';
    else if (failed === 0) status = 'succeeded';
    else if (state.succeeded > 0) status = 'partial';
    else status = 'failed';

    const heading = aborted ? 'Batch aborted' : state.cancelled ? 'Batch cancelled' : 'Batch complete';
    let summary =
      `${heading}: ${state.processed} processed, ${state.succeeded} succeeded, ${failed} failed. ` +
      `Created ${csvCount} CSV(s) and ${kmlCount} KML(s).`;
    if (state.fatalError) {
      summary += ` ${state.fatalError.message}`;
    }

    return {
      processed: state.processed,
      succeeded: state.succeeded,
      failed,
      failures: state.failures,
      bundles: state.bundles,
      csvCount,
      kmlCount,
      aborted,
      cancelled: state.cancelled,
      fatalError: state.fatalError,
      status,
      summary,
    };
  }
}
