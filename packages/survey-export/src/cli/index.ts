/**
 * Survey Export CLI
 *
 * @module cli
 */

export * from './lib/config.js';
export * from './lib/context.js';
export * from './lib/logger.js';
export * from './commands/index.js';
