/**
 * Database Connection Module
 *
 * Opens better-sqlite3 databases for the run ledger and the local sinks.
 * Connections are owned by the caller and closed explicitly; `:memory:`
 * opens a private in-memory database (used by tests).
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DatabaseError, toError } from '../errors/index.js';

export const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) a SQLite database file.
 *
 * @example
 * ```ts
 * const db = openDatabase(getLedgerPath(config.paths.state_dir));
 * try {
 *   // ...
 * } finally {
 *   closeDatabase(db);
 * }
 * ```
 */
export function openDatabase(path: string): Database.Database {
  try {
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path);

    // Enable foreign keys (OFF by default in SQLite!)
    db.pragma('foreign_keys = ON');

    if (path !== IN_MEMORY) {
      // WAL lets `status` read while an insert run is writing
      db.pragma('journal_mode = WAL');
      db.pragma('busy_timeout = 5000');
    }

    return db;
  } catch (error) {
    throw new DatabaseError(`Failed to open database at ${path}`, toError(error));
  }
}

/**
 * Close a connection. Safe to call on an already closed connection.
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
  }
}
