/**
 * Database Module
 *
 * SQLite persistence: the run ledger, plus the migrations and row codecs
 * shared with the local SQLite sinks.
 */

export { openDatabase, closeDatabase, IN_MEMORY } from './connection.js';

export {
  runMigrations,
  migrateOrThrow,
  getAppliedMigrations,
  LEDGER_MIGRATIONS,
  VECTOR_STORE_MIGRATIONS,
  SEARCH_INDEX_MIGRATIONS,
} from './migrate.js';
export type { Migration, MigrationResult } from './migrate.js';

export { vectorToBlob, blobToVector } from './schema.js';
export type { Run, RunStatus, FileRun, AbandonedBatch } from './schema.js';

export {
  RunRowSchema,
  FileRunRowSchema,
  AbandonedBatchRowSchema,
  CollectionRowSchema,
  DocumentRowSchema,
  CountRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

export { RunLedger } from './operations.js';
