#!/usr/bin/env node
/**
 * corpus-ingest CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'node:module';
import type { GlobalOptions, CommandContext } from './types.js';
import { createConfigCommand } from './commands/config.js';
import { createInsertCommand } from './commands/insert.js';
import { createStatusCommand } from './commands/status.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import { createConsoleLogger } from '../utils/logger.js';

function readVersion(): string {
  const pkg: unknown = createRequire(import.meta.url)('../../package.json');
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

// Create the root program
const program = new Command();

program
  .name('corpus-ingest')
  .description('Insert pre-chunked text into a vector store and a keyword index')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .option('-c, --config <path>', 'Config file (default: ~/.corpus-ingest/config.toml)')

  .addHelpText(
    'after',
    `
${chalk.dim('Examples:')}
  ${chalk.cyan('corpus-ingest insert')}                          Insert every *.jsonl under paths.chunk_root
  ${chalk.cyan('corpus-ingest insert chunked/books')}            Insert one directory
  ${chalk.cyan('corpus-ingest insert --only-failed')}            Retry files with abandoned batches
  ${chalk.cyan('corpus-ingest status')}                          Recent runs and abandoned batches
  ${chalk.cyan('corpus-ingest config set insert.batch_size 128')} Change a setting
`
  );

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
    createLogger: (level) => createConsoleLogger({ level: options.verbose ? 'debug' : level }),
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
    config: opts.config,
  };
}

program.addCommand(createInsertCommand(() => createContext(getGlobalOptions())));
program.addCommand(createStatusCommand(() => createContext(getGlobalOptions())));
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: corpus-ingest --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
