/**
 * Detail Command
 *
 * Single-identifier lookup, or a batch of identifiers from a file, each
 * exported into its own bundle directory.
 *
 * Usage:
 *   survey-export detail network --id aa:bb:cc:dd:ee:ff
 *   survey-export detail network --cell-id 310410_7033_17811
 *   survey-export detail network --operator 310410 --lac 7033 --cid 17811
 *   survey-export detail bt --batch ids.txt
 *
 * Batch files list one netid per line; blank lines and `#` comments are skipped.
 */

import type { Command } from 'commander';
import {
  ApiDetailSource,
  DETAIL_KINDS,
  detailEndpoint,
  isDetailKind,
  type DetailKind,
} from '../../acquisition/api-sources.js';
import { DISAMBIGUATING_FIELDS, parseCellId, readBatchFile } from '../../acquisition/identifiers.js';
import { createRunContext, type RunContext } from '../../core/run-context.js';
import { ConfigurationError } from '../../core/errors.js';
import type { QueryParams } from '../../core/http-client.js';
import { runDetail } from '../../services/detail-run.js';
import { BatchOrchestrator } from '../../services/batch-orchestrator.js';
import { resolveOutputRoot } from '../lib/config.js';
import {
  createApiClient,
  exitCodeForError,
  exitCodeForStatus,
  getGlobalContext,
  type ExitCode,
} from '../lib/context.js';
import { runInterruptible } from '../lib/interrupt.js';

/**
 * Detail options from CLI
 */
export interface DetailOptions {
  readonly id?: string;
  readonly cellId?: string;
  readonly operator?: string;
  readonly lac?: string;
  readonly cid?: string;
  readonly system?: string;
  readonly network?: string;
  readonly basestation?: string;
  readonly batch?: string;
}

export function registerDetailCommand(program: Command): void {
  program
    .command('detail <kind>')
    .description(`Detail lookup with CSV/KML export (kind: ${DETAIL_KINDS.join('|')})`)
    .option('--id <netid>', 'Network or device identifier (BSSID / MAC)')
    .option('--cell-id <id>', 'Cell id as OPERATOR_LAC_CID')
    .option('--operator <id>', 'GSM/LTE/WCDMA/NR operator id')
    .option('--lac <id>', 'Location area code')
    .option('--cid <id>', 'Cell id')
    .option('--system <id>', 'CDMA system id')
    .option('--network <id>', 'CDMA network id')
    .option('--basestation <id>', 'CDMA base station id')
    .option('--batch <file>', 'File with one identifier per line')
    .option('--no-csv', 'Skip CSV export')
    .option('--no-kml', 'Skip KML export')
    .option('--raw-json <policy>', 'Raw page retention: delete|keep|merge')
    .option('-o, --output <dir>', 'Output root directory')
    .action(async (kind: string, options: DetailOptions) => {
      process.exitCode = await executeDetail(kind, options);
    });
}

/**
 * Cell fields from `--cell-id` and the individual flags; flags win
 */
export function cellParams(options: DetailOptions): Record<string, string> {
  const params: Record<string, string> = {};

  if (options.cellId) {
    const cell = parseCellId(options.cellId);
    if (!cell) {
      throw new ConfigurationError(`Invalid --cell-id "${options.cellId}" (expected OPERATOR_LAC_CID)`);
    }
    params.operator = cell.operator;
    params.lac = cell.lac;
    params.cid = cell.cid;
  }

  for (const field of DISAMBIGUATING_FIELDS) {
    const value = options[field]?.trim();
    if (value) params[field] = value;
  }
  return params;
}

/**
 * Query for a single lookup
 *
 * @throws {ConfigurationError} On missing or conflicting identifiers
 */
export function buildDetailParams(kind: DetailKind, options: DetailOptions): QueryParams {
  const cell = cellParams(options);
  const hasCell = Object.keys(cell).length > 0;

  if (kind === 'bt' && hasCell) {
    throw new ConfigurationError('Bluetooth detail takes --id only');
  }

  const id = options.id?.trim();
  if (!id && !hasCell) {
    throw new ConfigurationError('Provide --id, cell fields (--cell-id or --operator/--lac/--cid), or --batch');
  }

  return id ? { ...cell, netid: id } : cell;
}

async function executeDetail(kind: string, options: DetailOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();

  if (!isDetailKind(kind)) {
    throw new ConfigurationError(`Unknown detail kind "${kind}". Expected one of: ${DETAIL_KINDS.join(', ')}`);
  }
  if (options.batch && options.id) {
    throw new ConfigurationError('--batch and --id are mutually exclusive');
  }

  const ctx = createRunContext({
    outputRoot: resolveOutputRoot(config),
    kind: `${kind}-detail`,
    formats: { csv: config.output.csv, kml: config.output.kml },
    rawJson: config.output.rawJson,
  });
  const source = new ApiDetailSource(createApiClient(config), detailEndpoint(config.api.baseUrl, kind));

  if (options.batch) {
    return executeBatch(ctx, source, options.batch, kind === 'bt' ? {} : cellParams(options));
  }

  const params = buildDetailParams(kind, options);
  logger.commandStart(`detail ${kind}`, { params });

  const completion = await runInterruptible(logger, (signal) =>
    runDetail(ctx, source, params, { onEvent: (event) => logger.event(event), signal })
  );
  if (!completion.ok) {
    throw completion.error;
  }

  const bundle = completion.value;
  logger.info(`Output folder: ${bundle.directory}`);
  logger.commandEnd(bundle.status !== 'failed', { status: bundle.status, records: bundle.records });
  return exitCodeForStatus(bundle.status);
}

async function executeBatch(
  ctx: RunContext,
  source: ApiDetailSource,
  batchFile: string,
  fixedParams: QueryParams
): Promise<ExitCode> {
  const { logger } = getGlobalContext();

  const identifiers = await readBatchFile(batchFile);
  logger.commandStart(`detail ${ctx.kind} --batch`, { batchFile, identifiers: identifiers.length });

  const orchestrator = new BatchOrchestrator(ctx, source, { fixedParams });
  const completion = await runInterruptible(logger, (signal) =>
    orchestrator.run(identifiers, { onEvent: (event) => logger.event(event), signal })
  );
  if (!completion.ok) {
    throw completion.error;
  }

  const result = completion.value;
  for (const failure of result.failures) {
    logger.warn(`${failure.identifier}: ${failure.error}`);
  }
  logger.commandEnd(result.status === 'succeeded' || result.status === 'partial', {
    processed: result.processed,
    succeeded: result.succeeded,
    failed: result.failed,
  });

  return result.fatalError ? exitCodeForError(result.fatalError) : exitCodeForStatus(result.status);
}
