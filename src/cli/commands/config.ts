/**
 * Config Command
 *
 * Manages the active config file (~/.corpus-ingest/config.toml or --config):
 *   corpus-ingest config get <key>          - Get a specific value
 *   corpus-ingest config set <key> <value>  - Set a value
 *   corpus-ingest config list               - Show all configuration
 *   corpus-ingest config path               - Show config file location
 *   corpus-ingest config reset --force      - Restore the template
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  CONFIG_TEMPLATE,
  getConfigValue,
  listConfig,
  resolveConfigPath,
  setConfigValue,
} from '../../config/index.js';
import { formatError, getExitCode } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., corpus-ingest config get insert.batch_size)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key, ctx.options.config);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('corpus-ingest config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ key, value: key.endsWith('api_key') ? '********' : value }));
        } else {
          ctx.log(key.endsWith('api_key') ? '********' : formatValue(value));
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., corpus-ingest config set insert.retry_max 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value, ctx.options.config);
        const stored = getConfigValue(key, ctx.options.config);

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, key, value: key.endsWith('api_key') ? '********' : stored }));
        } else {
          const shown = key.endsWith('api_key') ? '********' : formatValue(stored);
          ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(shown)}`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig(ctx.options.config);

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');

        // Group by section (insert.vector_store, insert.embeddings, ...)
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.split('.').slice(0, -1).join('.');
          if (group !== currentGroup) {
            if (currentGroup !== '') ctx.log('');
            currentGroup = group;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${resolveConfigPath(ctx.options.config)}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = resolveConfigPath(ctx.options.config);

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = resolveConfigPath(ctx.options.config);
        fs.mkdirSync(path.dirname(configPath), { recursive: true });
        fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, path: configPath }));
        } else {
          ctx.log(`${chalk.green('✓')} Configuration reset to defaults (${configPath})`);
        }
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Print a config error with its hint; the exit code follows the error type.
 */
function handleConfigError(ctx: CommandContext, error: unknown): void {
  console.error(formatError(error, { json: ctx.options.json, verbose: ctx.options.verbose }));
  process.exitCode = getExitCode(error);
}
