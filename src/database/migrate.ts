/**
 * Database Migration Runner
 *
 * Applies embedded SQL migrations in order, tracking applied names in a
 * `_migrations` table. Each database kind (ledger, vector store, search
 * index) has its own ordered list; running a list twice is a no-op.
 */

import type Database from 'better-sqlite3';
import { DatabaseError, toError } from '../errors/index.js';

export interface Migration {
  name: string;
  sql: string;
}

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

export const LEDGER_MIGRATIONS: Migration[] = [
  {
    name: '001-ledger.sql',
    sql: `
-- One row per insert run
CREATE TABLE IF NOT EXISTS runs (
  id TEXT PRIMARY KEY,
  started_at TEXT NOT NULL,
  finished_at TEXT,
  status TEXT NOT NULL CHECK (status IN ('running', 'completed', 'stopped', 'failed')),
  totals TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(started_at);

-- Final state and counters of each chunk file within a run
CREATE TABLE IF NOT EXISTS file_runs (
  run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
  file TEXT NOT NULL,
  path TEXT NOT NULL,
  state TEXT NOT NULL,
  records_read INTEGER NOT NULL DEFAULT 0,
  records_skipped INTEGER NOT NULL DEFAULT 0,
  embedded_from_cache INTEGER NOT NULL DEFAULT 0,
  embedded_computed INTEGER NOT NULL DEFAULT 0,
  committed_vectors INTEGER NOT NULL DEFAULT 0,
  committed_documents INTEGER NOT NULL DEFAULT 0,
  batches_completed INTEGER NOT NULL DEFAULT 0,
  batches_abandoned INTEGER NOT NULL DEFAULT 0,
  duration_ms INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (run_id, path)
);

-- Batches not committed to one or both sinks, kept until a later run completes the file
CREATE TABLE IF NOT EXISTS abandoned_batches (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
  file TEXT NOT NULL,
  path TEXT NOT NULL,
  batch_ordinal INTEGER NOT NULL,
  chunk_ids TEXT NOT NULL,
  vectors_status TEXT NOT NULL,
  vectors_error TEXT,
  documents_status TEXT NOT NULL,
  documents_error TEXT,
  created_at TEXT NOT NULL,
  resolved_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_abandoned_unresolved ON abandoned_batches(path) WHERE resolved_at IS NULL;
`,
  },
];

export const VECTOR_STORE_MIGRATIONS: Migration[] = [
  {
    name: '001-vectors.sql',
    sql: `
CREATE TABLE IF NOT EXISTS collections (
  name TEXT PRIMARY KEY,
  dimension INTEGER NOT NULL,
  distance TEXT NOT NULL
);

-- Vectors stored as little-endian Float32 BLOBs
CREATE TABLE IF NOT EXISTS points (
  collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
  id TEXT NOT NULL,
  vector BLOB NOT NULL,
  payload TEXT NOT NULL,
  PRIMARY KEY (collection, id)
);
`,
  },
];

export const SEARCH_INDEX_MIGRATIONS: Migration[] = [
  {
    name: '001-documents.sql',
    sql: `
CREATE TABLE IF NOT EXISTS documents (
  index_id TEXT NOT NULL,
  id TEXT NOT NULL,
  document_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  metadata TEXT NOT NULL,
  PRIMARY KEY (index_id, id)
);

-- Rows written in deferred commit mode, moved to documents by commit()
CREATE TABLE IF NOT EXISTS documents_staging (
  index_id TEXT NOT NULL,
  id TEXT NOT NULL,
  document_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  metadata TEXT NOT NULL,
  PRIMARY KEY (index_id, id)
);

-- Keyword index over committed documents (BM25 ranking via bm25())
CREATE VIRTUAL TABLE IF NOT EXISTS documents_fts USING fts5(
  index_id UNINDEXED,
  id UNINDEXED,
  text,
  tokenize = 'porter unicode61'
);
`,
  },
];

// ============================================================================
// Runner
// ============================================================================

/**
 * Apply every migration of `migrations` not yet recorded in `_migrations`.
 * Each migration runs in its own transaction.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(
    db
      .prepare('SELECT name FROM _migrations')
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string')
  );

  for (const migration of migrations) {
    if (done.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
      done.add(migration.name);
    } catch (error) {
      failed.push({ name: migration.name, error: toError(error).message });
    }
  }

  return { applied, failed };
}

/**
 * Run migrations and throw DatabaseError when any of them failed.
 */
export function migrateOrThrow(db: Database.Database, migrations: Migration[], what: string): void {
  const result = runMigrations(db, migrations);
  const first = result.failed[0];
  if (first) {
    throw new DatabaseError(
      `Failed to migrate ${what} (${first.name}): ${first.error}`,
      new Error(first.error)
    );
  }
}

/**
 * Names of applied migrations, oldest first.
 */
export function getAppliedMigrations(db: Database.Database): string[] {
  const tableExists = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='_migrations'")
    .get();
  if (!tableExists) {
    return [];
  }

  return db
    .prepare('SELECT name FROM _migrations ORDER BY id')
    .pluck()
    .all()
    .filter((name): name is string => typeof name === 'string');
}
