/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.corpus-ingest/
 * ├── config.toml     (default configuration file)
 * └── state/
 *     └── ledger.db   (run ledger: runs, file outcomes, abandoned batches)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const APP_DIR = join(homedir(), '.corpus-ingest');
export const CONFIG_PATH = join(APP_DIR, 'config.toml');
export const STATE_DIR = join(APP_DIR, 'state');

/** File name of the run ledger inside `paths.state_dir` */
export const LEDGER_FILE = 'ledger.db';

/**
 * Get the default config file path (~/.corpus-ingest/config.toml)
 */
export function getDefaultConfigPath(): string {
  return CONFIG_PATH;
}

/**
 * Get the ledger database path for a state directory
 */
export function getLedgerPath(stateDir: string): string {
  return join(stateDir, LEDGER_FILE);
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}
