/**
 * Export artifact contract
 */

import type { ArtifactFormat, ArtifactOutcome, FlattenResult } from '../core/types.js';

export interface ArtifactExporter {
  readonly format: ArtifactFormat;
  /** File extension including the dot */
  readonly extension: string;

  /**
   * Write the whole artifact in one pass, replacing any previous file
   *
   * Resolves to `written` or `skipped` (nothing to write, no file created).
   *
   * @throws {ExportIOError} When the destination cannot be written
   */
  write(result: FlattenResult, path: string): Promise<ArtifactOutcome>;
}
