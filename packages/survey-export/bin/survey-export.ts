#!/usr/bin/env node
/**
 * Survey Export CLI Entry Point
 *
 * Paginated search and detail export for wireless survey APIs:
 *   survey-export search wifi --param ssidlike=cafe% --raw-json merge
 *   survey-export detail network --batch ids.txt
 *
 * @module survey-export-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describeError } from '../src/core/errors.js';
import { isJsonObject } from '../src/core/type-guards.js';
import {
  EXIT_CODES,
  exitCodeForError,
  getGlobalContext,
  hasGlobalContext,
  initializeContext,
} from '../src/cli/lib/context.js';
import { registerCommands } from '../src/cli/commands/index.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // Source layout (bin/) and build layout (dist/bin/)
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (isJsonObject(parsed) && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch (error) {
      if (process.env.LOG_LEVEL === 'debug') {
        console.debug(`package.json not read from ${candidate}: ${describeError(error)}`);
      }
    }
  }
  return '0.0.0';
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Negatable flags (`--no-csv`) always carry a default; only a value typed on
 * the command line may override the config file.
 */
function fromCommandLine(command: Command, name: string): boolean | undefined {
  return command.getOptionValueSource(name) === 'cli'
    ? optionalBoolean(command.getOptionValue(name))
    : undefined;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('survey-export')
    .description('Fetch paginated survey records and export them as CSV and KML')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON lines (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .survey-exportrc)')
    .option('--timeout <ms>', 'Request timeout in milliseconds', (value: string) => parseInt(value, 10))
    .hook('preAction', async (thisCommand, actionCommand) => {
      const root = thisCommand.opts();
      const local = actionCommand.opts();
      try {
        await initializeContext({
          configPath: optionalString(root.config),
          overrides: {
            verbose: optionalBoolean(root.verbose),
            json: optionalBoolean(root.json),
            timeout: optionalNumber(root.timeout),
            output: optionalString(local.output),
            pageSize: optionalNumber(local.pageSize),
            maxPages: optionalNumber(local.maxPages),
            rawJson: optionalString(local.rawJson),
            csv: fromCommandLine(actionCommand, 'csv'),
            kml: fromCommandLine(actionCommand, 'kml'),
          },
        });
      } catch (error) {
        console.error(`Configuration error: ${describeError(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);
  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (hasGlobalContext()) {
      const { logger, startTime } = getGlobalContext();
      logger.error('Command failed', {
        error: describeError(error),
        duration_ms: Date.now() - startTime,
      });
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
    process.exit(exitCodeForError(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
