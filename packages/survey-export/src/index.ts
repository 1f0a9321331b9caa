/**
 * survey-export
 *
 * Fetch → store → flatten → export pipeline for paginated survey APIs.
 *
 * ```typescript
 * import { ApiPageSource, createHTTPClient, createRunContext, runSearch } from 'survey-export';
 *
 * const ctx = createRunContext({ outputRoot: './exports', kind: 'wifi-search' });
 * const source = new ApiPageSource(client, 'https://api.wigle.net/api/v2/network/search', { ssidlike: 'cafe%' }, ctx.pageSize);
 * const bundle = await runSearch(ctx, source, { onEvent: (event) => console.log(event.message) });
 * ```
 */

// Core
export type * from './core/types.js';
export * from './core/errors.js';
export * from './core/type-guards.js';
export * from './core/run-context.js';
export * from './core/events.js';
export * from './core/credentials.js';
export * from './core/http-client.js';
export { Logger, createLogger } from './core/utils/logger.js';
export { atomicWriteFile, atomicWriteJSON } from './core/utils/atomic-write.js';

// Acquisition
export * from './acquisition/page-store.js';
export * from './acquisition/paginated-fetcher.js';
export * from './acquisition/api-sources.js';
export * from './acquisition/identifiers.js';
export * from './acquisition/search-params.js';

// Transformation
export * from './transformation/flatten-engine.js';

// Export
export type { ArtifactExporter } from './export/types.js';
export * from './export/tabular-exporter.js';
export * from './export/geo-exporter.js';

// Services
export * from './services/run-pipeline.js';
export * from './services/search-run.js';
export * from './services/detail-run.js';
export * from './services/batch-orchestrator.js';
export type * from './services/batch-orchestrator.types.js';
export * from './services/run-executor.js';
