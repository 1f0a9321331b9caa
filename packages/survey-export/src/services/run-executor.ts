/**
 * Single-run executor
 *
 * Owns at most one active run per output context. The task receives an
 * AbortSignal it must honour at its suspension points; the completion
 * callback fires exactly once with the result or the error.
 */

import { RunBusyError, toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'run-executor' });

export type RunTask<T> = (signal: AbortSignal) => Promise<T>;

export type RunCompletion<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: Error };

export type CompletionCallback<T> = (completion: RunCompletion<T>) => void;

export class RunExecutor {
  private controller: AbortController | null = null;

  get busy(): boolean {
    return this.controller !== null;
  }

  /**
   * Start a run
   *
   * The returned promise never rejects; it resolves to the same completion
   * handed to `onComplete`.
   *
   * @throws {RunBusyError} When a run is already active
   */
  submit<T>(task: RunTask<T>, onComplete?: CompletionCallback<T>): Promise<RunCompletion<T>> {
    if (this.controller) {
      throw new RunBusyError();
    }

    const controller = new AbortController();
    this.controller = controller;

    return this.execute(task, controller).then((completion) => {
      this.controller = null;
      onComplete?.(completion);
      return completion;
    });
  }

  /**
   * Request cooperative cancellation of the active run
   *
   * @returns false when nothing is running
   */
  cancel(): boolean {
    if (!this.controller) return false;
    log.info('Cancellation requested');
    this.controller.abort();
    return true;
  }

  private async execute<T>(task: RunTask<T>, controller: AbortController): Promise<RunCompletion<T>> {
    try {
      const value = await task(controller.signal);
      return { ok: true, value };
    } catch (error) {
      log.debug('Run ended with error', { error: toError(error).message });
      return { ok: false, error: toError(error) };
    }
  }
}
