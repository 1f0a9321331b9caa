/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSearchCommand } from './search.js';
import { registerDetailCommand } from './detail.js';

export { registerSearchCommand, buildSearchParams } from './search.js';
export { registerDetailCommand, buildDetailParams, cellParams } from './detail.js';

/**
 * Register every command on the root program
 */
export function registerCommands(program: Command): void {
  registerSearchCommand(program);
  registerDetailCommand(program);
}
