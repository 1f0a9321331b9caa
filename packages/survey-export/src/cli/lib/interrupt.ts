/**
 * SIGINT handling for long runs
 *
 * First Ctrl+C requests cooperative cancellation through the RunExecutor;
 * the run still exports and cleans up what it already fetched. A second
 * Ctrl+C exits immediately.
 *
 * @module cli/lib/interrupt
 */

import { RunExecutor, type RunCompletion, type RunTask } from '../../services/run-executor.js';
import { EXIT_CODES } from './context.js';
import type { CLILogger } from './logger.js';

export async function runInterruptible<T>(logger: CLILogger, task: RunTask<T>): Promise<RunCompletion<T>> {
  const executor = new RunExecutor();
  let interrupts = 0;

  const onSigint = (): void => {
    interrupts += 1;
    if (interrupts > 1) {
      logger.error('Interrupted again, exiting without cleanup');
      process.exit(EXIT_CODES.USER_CANCELLED);
    }
    logger.warn('Cancelling after the current request (Ctrl+C again to exit now)');
    executor.cancel();
  };

  process.on('SIGINT', onSigint);
  try {
    return await executor.submit(task);
  } finally {
    process.off('SIGINT', onSigint);
  }
}
