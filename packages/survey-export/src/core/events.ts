/**
 * Status channel
 *
 * Human-readable progress handed to whatever drives the run (CLI, UI).
 * One `page` event per persisted page, exactly one `summary` per run. In a
 * batch each identifier's run ends with `item-done` and the batch sends the
 * summary.
 */

import type { ArtifactOutcome, CleanupReport, RunStatus } from './types.js';

export type StopReason = 'exhausted' | 'stalled' | 'empty-page' | 'max-pages' | 'cancelled';

export type RunEvent =
  | { readonly type: 'submitted'; readonly url: string; readonly message: string }
  | { readonly type: 'total'; readonly total: number; readonly message: string }
  | {
      readonly type: 'page';
      readonly index: number;
      readonly count: number;
      readonly cumulative: number;
      readonly total?: number;
      readonly path: string;
      readonly message: string;
    }
  | { readonly type: 'stopped'; readonly reason: StopReason; readonly message: string }
  | { readonly type: 'export'; readonly outcome: ArtifactOutcome; readonly message: string }
  | { readonly type: 'cleanup'; readonly report: CleanupReport; readonly message: string }
  | {
      readonly type: 'item';
      readonly identifier: string;
      readonly position: number;
      readonly of: number;
      readonly message: string;
    }
  | {
      readonly type: 'item-done';
      readonly identifier: string;
      readonly status: RunStatus;
      readonly message: string;
    }
  | { readonly type: 'summary'; readonly status: RunStatus; readonly message: string };

export type RunEventListener = (event: RunEvent) => void;

/** Listener that drops everything */
export const silentListener: RunEventListener = () => undefined;

export function describeArtifact(outcome: ArtifactOutcome): string {
  const label = outcome.format.toUpperCase();
  switch (outcome.status) {
    case 'written':
      return `${label} exported: ${outcome.path} (${outcome.count} ${outcome.format === 'kml' ? 'placemarks' : 'rows'})`;
    case 'skipped':
      return `${label} skipped: ${outcome.reason}`;
    case 'failed':
      return `${label} failed: ${outcome.error}`;
  }
}

export function describeCleanup(report: CleanupReport): string {
  switch (report.policy) {
    case 'keep':
      return 'Raw JSON pages kept';
    case 'merge':
      return report.mergedPath
        ? `Merged raw JSON saved: ${report.mergedPath}; removed ${report.removed} page file(s)`
        : 'No raw JSON pages to merge';
    case 'delete':
      return `Cleaned ${report.removed} temporary JSON file(s)`;
  }
}
