/**
 * Search Command
 *
 * Walks a paginated search endpoint to exhaustion and exports the union of
 * every field seen as CSV and KML.
 *
 * Usage:
 *   survey-export search <wifi|bt|cell> [options]
 *
 * Options:
 *   -p, --param <key=value>   Search filter (repeatable), e.g. ssidlike=cafe%
 *   --lat1/--lon1/--lat2/--lon2 <deg>  Bounding box corners (any order)
 *   --page-size <n>           resultsPerPage (default: 100)
 *   --max-pages <n>           Stop after n pages
 *   --no-csv / --no-kml       Skip an artifact
 *   --raw-json <policy>       delete|keep|merge (default: delete)
 *   -o, --output <dir>        Output root (default: ./exports)
 */

import type { Command } from 'commander';
import { ApiPageSource, isSearchKind, searchEndpoint, SEARCH_KINDS } from '../../acquisition/api-sources.js';
import { boundingBoxParams, parseParamPairs } from '../../acquisition/search-params.js';
import { createRunContext } from '../../core/run-context.js';
import { ConfigurationError } from '../../core/errors.js';
import type { QueryParams } from '../../core/http-client.js';
import { runSearch } from '../../services/search-run.js';
import { resolveOutputRoot } from '../lib/config.js';
import { createApiClient, exitCodeForStatus, getGlobalContext, type ExitCode } from '../lib/context.js';
import { runInterruptible } from '../lib/interrupt.js';
import { collect, parseInteger, parseNumber } from '../lib/options.js';

/**
 * Search options from CLI
 *
 * Page size, page limit, formats, retention and output root are folded into
 * the loaded config by the preAction hook.
 */
export interface SearchOptions {
  readonly param: readonly string[];
  readonly lat1?: number;
  readonly lon1?: number;
  readonly lat2?: number;
  readonly lon2?: number;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search <kind>')
    .description(`Paginated search with CSV/KML export (kind: ${SEARCH_KINDS.join('|')})`)
    .option('-p, --param <key=value>', 'Search filter, repeatable', collect, [])
    .option('--lat1 <deg>', 'Bounding box first corner latitude', parseNumber)
    .option('--lon1 <deg>', 'Bounding box first corner longitude', parseNumber)
    .option('--lat2 <deg>', 'Bounding box opposite corner latitude', parseNumber)
    .option('--lon2 <deg>', 'Bounding box opposite corner longitude', parseNumber)
    .option('--page-size <n>', 'Results per page', parseInteger)
    .option('--max-pages <n>', 'Stop after this many pages', parseInteger)
    .option('--no-csv', 'Skip CSV export')
    .option('--no-kml', 'Skip KML export')
    .option('--raw-json <policy>', 'Raw page retention: delete|keep|merge')
    .option('-o, --output <dir>', 'Output root directory')
    .action(async (kind: string, options: SearchOptions) => {
      process.exitCode = await executeSearch(kind, options);
    });
}

/**
 * Combine filters and bounding box
 *
 * @throws {ConfigurationError} When only some bounding box corners are given
 */
export function buildSearchParams(options: SearchOptions): QueryParams {
  const params = parseParamPairs(options.param);
  const { lat1, lon1, lat2, lon2 } = options;
  const given = [lat1, lon1, lat2, lon2].filter((value) => value !== undefined).length;

  if (given === 0) return params;
  if (lat1 === undefined || lon1 === undefined || lat2 === undefined || lon2 === undefined) {
    throw new ConfigurationError('Bounding box needs all of --lat1, --lon1, --lat2, --lon2');
  }
  return { ...params, ...boundingBoxParams({ lat1, lon1, lat2, lon2 }) };
}

async function executeSearch(kind: string, options: SearchOptions): Promise<ExitCode> {
  const { config, logger } = getGlobalContext();

  if (!isSearchKind(kind)) {
    throw new ConfigurationError(`Unknown search kind "${kind}". Expected one of: ${SEARCH_KINDS.join(', ')}`);
  }

  const params = buildSearchParams(options);
  const ctx = createRunContext({
    outputRoot: resolveOutputRoot(config),
    kind: `${kind}-search`,
    formats: { csv: config.output.csv, kml: config.output.kml },
    rawJson: config.output.rawJson,
    pageSize: config.search.pageSize,
    maxPages: config.search.maxPages,
  });

  logger.commandStart(`search ${kind}`, { params, pageSize: ctx.pageSize, maxPages: ctx.maxPages });

  const source = new ApiPageSource(
    createApiClient(config),
    searchEndpoint(config.api.baseUrl, kind),
    params,
    ctx.pageSize
  );

  const completion = await runInterruptible(logger, (signal) =>
    runSearch(ctx, source, { onEvent: (event) => logger.event(event), signal })
  );
  if (!completion.ok) {
    throw completion.error;
  }

  const bundle = completion.value;
  logger.info(`Output folder: ${bundle.directory}`);
  logger.commandEnd(bundle.status !== 'failed', {
    status: bundle.status,
    pages: bundle.pages,
    records: bundle.records,
  });
  return exitCodeForStatus(bundle.status);
}
