/**
 * Run Ledger Operations
 *
 * Records every insert run, the final state of each chunk file, and the
 * batches that were abandoned, so a later run can re-submit exactly the
 * files that still have unresolved failures (`insert --only-failed`).
 *
 * Re-submission is always safe: both sinks upsert by deterministic id.
 */

import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import { openDatabase, closeDatabase } from './connection.js';
import { LEDGER_MIGRATIONS, migrateOrThrow } from './migrate.js';
import type { AbandonedBatch, FileRun, Run, RunStatus } from './schema.js';
import {
  AbandonedBatchRowSchema,
  CountRowSchema,
  FileRunRowSchema,
  RunRowSchema,
  validateRow,
  validateRows,
} from './validation.js';
import type { BatchOutcome, FileReport, RunTotals } from '../ingest/types.js';

export class RunLedger {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => Date = () => new Date()
  ) {
    migrateOrThrow(db, LEDGER_MIGRATIONS, 'run ledger');
  }

  /**
   * Open the ledger file, creating and migrating it when needed.
   */
  static open(path: string): RunLedger {
    return new RunLedger(openDatabase(path));
  }

  close(): void {
    closeDatabase(this.db);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  // ==========================================================================
  // Runs
  // ==========================================================================

  startRun(id: string = randomUUID()): Run {
    const run: Run = {
      id,
      started_at: this.timestamp(),
      finished_at: null,
      status: 'running',
      totals: null,
    };
    this.db
      .prepare(
        'INSERT INTO runs (id, started_at, finished_at, status, totals) VALUES (@id, @started_at, @finished_at, @status, @totals)'
      )
      .run(run);
    return run;
  }

  finishRun(id: string, status: Exclude<RunStatus, 'running'>, totals?: RunTotals): void {
    this.db
      .prepare('UPDATE runs SET finished_at = ?, status = ?, totals = ? WHERE id = ?')
      .run(this.timestamp(), status, totals ? JSON.stringify(totals) : null, id);
  }

  getRun(id: string): Run | undefined {
    const row = this.db.prepare('SELECT * FROM runs WHERE id = ?').get(id);
    return row ? validateRow(RunRowSchema, row, `runs.id=${id}`) : undefined;
  }

  /**
   * Most recent runs, newest first.
   */
  recentRuns(limit = 10): Run[] {
    const rows = this.db
      .prepare('SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
      .all(limit);
    return validateRows(RunRowSchema, rows, 'runs');
  }

  // ==========================================================================
  // Files
  // ==========================================================================

  /**
   * Store the final counters of a file. A completed file resolves every
   * abandoned batch recorded for it by earlier runs.
   */
  recordFile(runId: string, report: FileReport): void {
    const upsert = this.db.prepare(`
      INSERT INTO file_runs (
        run_id, file, path, state, records_read, records_skipped,
        embedded_from_cache, embedded_computed, committed_vectors, committed_documents,
        batches_completed, batches_abandoned, duration_ms
      ) VALUES (
        @run_id, @file, @path, @state, @records_read, @records_skipped,
        @embedded_from_cache, @embedded_computed, @committed_vectors, @committed_documents,
        @batches_completed, @batches_abandoned, @duration_ms
      )
      ON CONFLICT(run_id, path) DO UPDATE SET
        state = excluded.state,
        records_read = excluded.records_read,
        records_skipped = excluded.records_skipped,
        embedded_from_cache = excluded.embedded_from_cache,
        embedded_computed = excluded.embedded_computed,
        committed_vectors = excluded.committed_vectors,
        committed_documents = excluded.committed_documents,
        batches_completed = excluded.batches_completed,
        batches_abandoned = excluded.batches_abandoned,
        duration_ms = excluded.duration_ms
    `);

    const row: FileRun = {
      run_id: runId,
      file: report.file,
      path: report.path,
      state: report.state,
      records_read: report.recordsRead,
      records_skipped: report.recordsSkipped,
      embedded_from_cache: report.embeddedFromCache,
      embedded_computed: report.embeddedComputed,
      committed_vectors: report.committedVectors,
      committed_documents: report.committedDocuments,
      batches_completed: report.batchesCompleted,
      batches_abandoned: report.batchesAbandoned,
      duration_ms: Math.round(report.durationMs),
    };

    this.db.transaction(() => {
      upsert.run(row);
      if (report.state === 'completed') {
        this.resolveFile(report.path);
      }
    })();
  }

  fileRuns(runId: string): FileRun[] {
    const rows = this.db.prepare('SELECT * FROM file_runs WHERE run_id = ? ORDER BY file').all(runId);
    return validateRows(FileRunRowSchema, rows, `file_runs.run_id=${runId}`);
  }

  // ==========================================================================
  // Abandoned batches
  // ==========================================================================

  recordAbandoned(runId: string, outcome: BatchOutcome): void {
    this.db
      .prepare(
        `INSERT INTO abandoned_batches (
          run_id, file, path, batch_ordinal, chunk_ids,
          vectors_status, vectors_error, documents_status, documents_error, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        runId,
        outcome.file,
        outcome.path,
        outcome.ordinal,
        JSON.stringify(outcome.chunkIds),
        outcome.vectors.status,
        outcome.vectors.status === 'fatal' ? outcome.vectors.cause.message : null,
        outcome.documents.status,
        outcome.documents.status === 'fatal' ? outcome.documents.cause.message : null,
        this.timestamp()
      );
  }

  /**
   * Mark every unresolved abandoned batch of `path` as resolved.
   *
   * @returns Number of batches resolved
   */
  resolveFile(path: string): number {
    const result = this.db
      .prepare('UPDATE abandoned_batches SET resolved_at = ? WHERE path = ? AND resolved_at IS NULL')
      .run(this.timestamp(), path);
    return result.changes;
  }

  unresolvedBatches(limit = 100): AbandonedBatch[] {
    const rows = this.db
      .prepare('SELECT * FROM abandoned_batches WHERE resolved_at IS NULL ORDER BY id LIMIT ?')
      .all(limit);
    return validateRows(AbandonedBatchRowSchema, rows, 'abandoned_batches');
  }

  countUnresolved(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM abandoned_batches WHERE resolved_at IS NULL')
      .get();
    return validateRow(CountRowSchema, row, 'abandoned_batches.count').count;
  }

  /**
   * Chunk files that still have unresolved abandoned batches, sorted.
   */
  unresolvedFiles(): string[] {
    return this.db
      .prepare('SELECT DISTINCT path FROM abandoned_batches WHERE resolved_at IS NULL ORDER BY path')
      .pluck()
      .all()
      .filter((path): path is string => typeof path === 'string');
  }
}
