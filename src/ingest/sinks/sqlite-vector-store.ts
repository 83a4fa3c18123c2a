/**
 * Local vector store in a SQLite file.
 *
 * Collections record their dimension and distance; points are upserted with
 * `ON CONFLICT (collection, id) DO UPDATE`, one transaction per batch.
 * Useful without a Qdrant server and in tests (`:memory:`).
 */

import Database from 'better-sqlite3';
import type { Distance, VectorStoreConfig } from '../../config/schema.js';
import { ConfigError, DatabaseError, SinkRejectedError, TransientIOError, toError } from '../../errors/index.js';
import {
  CollectionRowSchema,
  CountRowSchema,
  VECTOR_STORE_MIGRATIONS,
  blobToVector,
  closeDatabase,
  migrateOrThrow,
  openDatabase,
  validateRow,
  vectorToBlob,
} from '../../database/index.js';
import { z } from 'zod';
import type { VectorPoint, VectorSink } from './types.js';

const PointRowSchema = z.object({
  id: z.string(),
  vector: z.instanceof(Buffer),
  payload: z.string(),
});

/** A point read back from the store */
export interface StoredPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

/**
 * Map a SQLite failure: lock contention is transient, the rest is not.
 */
export function mapSqliteError(sink: string, error: unknown): Error {
  if (error instanceof Database.SqliteError && /^SQLITE_(BUSY|LOCKED)/.test(error.code)) {
    return new TransientIOError(`${sink}: database is busy (${error.code})`, { cause: error });
  }
  if (error instanceof Error && !(error instanceof Database.SqliteError)) {
    return error;
  }
  return new DatabaseError(`${sink}: ${toError(error).message}`, toError(error));
}

export class SqliteVectorStore implements VectorSink {
  readonly name = 'sqlite-vectors';
  readonly collection: string;
  readonly dimension: number;
  readonly distance: Distance;

  constructor(
    private readonly db: Database.Database,
    private readonly config: VectorStoreConfig
  ) {
    this.collection = config.collection;
    this.dimension = config.vector_size;
    this.distance = config.distance;
    migrateOrThrow(db, VECTOR_STORE_MIGRATIONS, 'vector store');
  }

  static open(config: VectorStoreConfig): SqliteVectorStore {
    return new SqliteVectorStore(openDatabase(config.path), config);
  }

  /**
   * Create the collection if absent. An existing collection must have the
   * configured dimension and distance.
   */
  async ensureCollection(): Promise<void> {
    const row = this.db.prepare('SELECT * FROM collections WHERE name = ?').get(this.collection);
    if (row) {
      const existing = validateRow(CollectionRowSchema, row, `collections.name=${this.collection}`);
      if (existing.dimension !== this.dimension || existing.distance !== this.distance) {
        throw new ConfigError(
          `Collection '${this.collection}' exists with size ${existing.dimension}/${existing.distance}, ` +
            `config asks for ${this.dimension}/${this.distance}`,
          'Use another collection name, or set insert.vector_store.vector_size to match'
        );
      }
      return;
    }

    if (!this.config.create_collection) {
      return;
    }
    this.db
      .prepare('INSERT INTO collections (name, dimension, distance) VALUES (?, ?, ?)')
      .run(this.collection, this.dimension, this.distance);
  }

  async upsert(points: readonly VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    const exists = this.db.prepare('SELECT 1 FROM collections WHERE name = ?').get(this.collection);
    if (!exists) {
      throw new SinkRejectedError(this.name, 404, `collection '${this.collection}' does not exist`);
    }

    const statement = this.db.prepare(`
      INSERT INTO points (collection, id, vector, payload) VALUES (?, ?, ?, ?)
      ON CONFLICT (collection, id) DO UPDATE SET vector = excluded.vector, payload = excluded.payload
    `);

    try {
      this.db.transaction((batch: readonly VectorPoint[]) => {
        for (const point of batch) {
          statement.run(this.collection, point.id, vectorToBlob(point.vector), JSON.stringify(point.payload));
        }
      })(points);
    } catch (error) {
      throw mapSqliteError(this.name, error);
    }
  }

  async probe(): Promise<void> {
    this.db.prepare('SELECT 1').get();
  }

  count(): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS count FROM points WHERE collection = ?')
      .get(this.collection);
    return validateRow(CountRowSchema, row, 'points.count').count;
  }

  getPoint(id: string): StoredPoint | undefined {
    const row = this.db
      .prepare('SELECT id, vector, payload FROM points WHERE collection = ? AND id = ?')
      .get(this.collection, id);
    if (!row) return undefined;

    const point = validateRow(PointRowSchema, row, `points.id=${id}`);
    const payload = z.record(z.unknown()).parse(JSON.parse(point.payload));
    return { id: point.id, vector: blobToVector(point.vector), payload };
  }

  close(): void {
    closeDatabase(this.db);
  }
}
