/**
 * Local keyword index in a SQLite file (documents table + FTS5).
 *
 * Immediate mode upserts straight into `documents` and `documents_fts`.
 * Deferred mode upserts into `documents_staging`; commit() moves every staged
 * row into the live tables in one transaction and clears the staging table,
 * so readers never see a half-committed run.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { SearchIndexConfig } from '../../config/schema.js';
import {
  CountRowSchema,
  DocumentRowSchema,
  SEARCH_INDEX_MIGRATIONS,
  closeDatabase,
  migrateOrThrow,
  openDatabase,
  validateRow,
  validateRows,
} from '../../database/index.js';
import { mapSqliteError } from './sqlite-vector-store.js';
import type { CommitMode, SearchDocument, SearchSink } from './types.js';

/** A keyword search hit */
export interface SearchHit {
  id: string;
  document_id: string;
  chunk_index: number;
  text: string;
  /** bm25() rank, lower is better */
  rank: number;
}

const SearchHitRowSchema = DocumentRowSchema.pick({
  id: true,
  document_id: true,
  chunk_index: true,
  text: true,
}).extend({ rank: z.number() });

export class SqliteSearchIndex implements SearchSink {
  readonly name = 'sqlite-documents';
  readonly indexId: string;
  readonly commitMode: CommitMode;

  constructor(
    private readonly db: Database.Database,
    config: SearchIndexConfig
  ) {
    this.indexId = config.index_id;
    this.commitMode = config.commit_mode;
    migrateOrThrow(db, SEARCH_INDEX_MIGRATIONS, 'search index');
  }

  static open(config: SearchIndexConfig): SqliteSearchIndex {
    return new SqliteSearchIndex(openDatabase(config.path), config);
  }

  async ingest(documents: readonly SearchDocument[]): Promise<void> {
    if (documents.length === 0) return;

    try {
      if (this.commitMode === 'immediate') {
        this.db.transaction(() => {
          for (const document of documents) {
            this.writeLive(document);
          }
        })();
      } else {
        this.stage(documents);
      }
    } catch (error) {
      throw mapSqliteError(this.name, error);
    }
  }

  async commit(): Promise<void> {
    if (this.commitMode === 'immediate') return;

    try {
      this.db.transaction(() => {
        const staged = validateRows(
          DocumentRowSchema,
          this.db
            .prepare(
              'SELECT id, document_id, chunk_index, text, metadata FROM documents_staging WHERE index_id = ? ORDER BY rowid'
            )
            .all(this.indexId),
          'documents_staging'
        );
        for (const row of staged) {
          this.writeLiveRow(row.id, row.document_id, row.chunk_index, row.text, row.metadata);
        }
        this.db.prepare('DELETE FROM documents_staging WHERE index_id = ?').run(this.indexId);
      })();
    } catch (error) {
      throw mapSqliteError(this.name, error);
    }
  }

  async probe(): Promise<void> {
    this.db.prepare('SELECT 1').get();
  }

  /**
   * Keyword search over committed documents, best match first.
   */
  search(query: string, limit = 10): SearchHit[] {
    const rows = this.db
      .prepare(
        `SELECT d.id, d.document_id, d.chunk_index, d.text, bm25(documents_fts) AS rank
         FROM documents_fts
         JOIN documents d ON d.index_id = documents_fts.index_id AND d.id = documents_fts.id
         WHERE documents_fts MATCH ? AND documents_fts.index_id = ?
         ORDER BY rank
         LIMIT ?`
      )
      .all(query, this.indexId, limit);
    return validateRows(SearchHitRowSchema, rows, 'documents_fts');
  }

  /** Committed documents */
  count(): number {
    return this.countIn('documents');
  }

  /** Documents waiting for commit() */
  stagedCount(): number {
    return this.countIn('documents_staging');
  }

  close(): void {
    closeDatabase(this.db);
  }

  private countIn(table: 'documents' | 'documents_staging'): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS count FROM ${table} WHERE index_id = ?`).get(this.indexId);
    return validateRow(CountRowSchema, row, `${table}.count`).count;
  }

  private stage(documents: readonly SearchDocument[]): void {
    const statement = this.db.prepare(`
      INSERT INTO documents_staging (index_id, id, document_id, chunk_index, text, metadata)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT (index_id, id) DO UPDATE SET
        document_id = excluded.document_id,
        chunk_index = excluded.chunk_index,
        text = excluded.text,
        metadata = excluded.metadata
    `);
    this.db.transaction(() => {
      for (const document of documents) {
        statement.run(
          this.indexId,
          document.id,
          document.document_id,
          document.chunk_index,
          document.text,
          JSON.stringify(document.metadata)
        );
      }
    })();
  }

  private writeLive(document: SearchDocument): void {
    this.writeLiveRow(
      document.id,
      document.document_id,
      document.chunk_index,
      document.text,
      JSON.stringify(document.metadata)
    );
  }

  private writeLiveRow(id: string, documentId: string, chunkIndex: number, text: string, metadata: string): void {
    this.db
      .prepare(
        `INSERT INTO documents (index_id, id, document_id, chunk_index, text, metadata)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT (index_id, id) DO UPDATE SET
           document_id = excluded.document_id,
           chunk_index = excluded.chunk_index,
           text = excluded.text,
           metadata = excluded.metadata`
      )
      .run(this.indexId, id, documentId, chunkIndex, text, metadata);
    // FTS5 has no upsert: replace the row for this id
    this.db.prepare('DELETE FROM documents_fts WHERE index_id = ? AND id = ?').run(this.indexId, id);
    this.db
      .prepare('INSERT INTO documents_fts (index_id, id, text) VALUES (?, ?, ?)')
      .run(this.indexId, id, text);
  }
}
