/**
 * Survey Export Core Types
 *
 * Shared data model for the fetch → store → flatten → export pipeline.
 * Records arrive from the remote service with no fixed schema, so the
 * model only commits to "JSON object" at the record level.
 */

// ============================================================================
// JSON Values
// ============================================================================

export type JsonScalar = string | number | boolean | null;

export type JsonValue = JsonScalar | JsonValue[] | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * One entity returned by the service (network, device or cell tower
 * observation). Any two records may have disjoint key sets.
 */
export type SurveyRecord = JsonObject;

// ============================================================================
// Pages
// ============================================================================

/**
 * One paginated response. Immutable once fetched.
 */
export interface Page {
  /** 1-based position within the run */
  readonly index: number;
  readonly records: readonly SurveyRecord[];
  /** Continuation cursor returned with this page, absent on the last one */
  readonly cursor?: string;
  /** Total-in-source hint, informational only */
  readonly total?: number;
}

/**
 * Shape every page source must reduce a response body to
 */
export interface PageResponse {
  readonly records: readonly SurveyRecord[];
  readonly cursor?: string;
  readonly total?: number;
}

/**
 * Page after it has been durably written by the PageStore
 */
export interface StoredPage {
  readonly index: number;
  readonly path: string;
  readonly recordCount: number;
}

// ============================================================================
// Flattened Output
// ============================================================================

/**
 * Single-level view of a record (or of one location item within it)
 */
export type FlatRow = ReadonlyMap<string, string>;

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
  /** Placemark label */
  readonly name: string;
  /** Every column of the source row, in column order */
  readonly attributes: readonly (readonly [string, string])[];
}

export interface FlattenResult {
  /** Union of every key path seen, in first-seen order */
  readonly columns: readonly string[];
  readonly rows: readonly FlatRow[];
  readonly points: readonly GeoPoint[];
}

// ============================================================================
// Run Output
// ============================================================================

export type ArtifactFormat = 'csv' | 'kml';

export type ArtifactOutcome =
  | { readonly format: ArtifactFormat; readonly status: 'written'; readonly path: string; readonly count: number }
  | { readonly format: ArtifactFormat; readonly status: 'skipped'; readonly reason: string }
  | { readonly format: ArtifactFormat; readonly status: 'failed'; readonly path: string; readonly error: string };

/**
 * Raw page retention after export
 * - delete: remove page files
 * - keep: leave page files unchanged
 * - merge: write one combined JSON file, then remove page files
 */
export type RetentionPolicy = 'delete' | 'keep' | 'merge';

export interface CleanupReport {
  readonly policy: RetentionPolicy;
  readonly removed: number;
  readonly mergedPath?: string;
  readonly errors: readonly string[];
}

export type RunStatus = 'succeeded' | 'partial' | 'empty' | 'cancelled' | 'failed';

/**
 * Output artifact set for one fetch target
 */
export interface RunBundle {
  readonly directory: string;
  readonly status: RunStatus;
  readonly pages: number;
  readonly records: number;
  readonly artifacts: readonly ArtifactOutcome[];
  readonly cleanup: CleanupReport;
  readonly error?: string;
}
