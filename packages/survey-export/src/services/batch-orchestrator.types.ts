/**
 * Batch Orchestrator Type Definitions
 */

import type { QueryParams } from '../core/http-client.js';
import type { RunBundle, RunStatus } from '../core/types.js';
import type { RunEventListener } from '../core/events.js';
import type { ArtifactExporter } from '../export/types.js';

/**
 * Identifier whose pipeline did not succeed
 */
export interface BatchFailure {
  readonly identifier: string;
  readonly error: string;
}

export interface BatchResult {
  /** Identifiers whose pipeline ran to a terminal state */
  readonly processed: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly failures: readonly BatchFailure[];
  readonly bundles: readonly RunBundle[];
  readonly csvCount: number;
  readonly kmlCount: number;
  /** A fatal error stopped the remaining identifiers */
  readonly aborted: boolean;
  readonly cancelled: boolean;
  readonly fatalError?: Error;
  readonly status: RunStatus;
  /** Single line handed to the collaborator for display */
  readonly summary: string;
}

export interface BatchOrchestratorOptions {
  /** Disambiguating fields sent with every identifier */
  readonly fixedParams?: QueryParams;
  readonly exporters?: readonly ArtifactExporter[];
}

export interface BatchRunOptions {
  readonly onEvent?: RunEventListener;
  readonly signal?: AbortSignal;
}
