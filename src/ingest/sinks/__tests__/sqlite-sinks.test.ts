import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteVectorStore, mapSqliteError } from '../sqlite-vector-store.js';
import { SqliteSearchIndex } from '../sqlite-search-index.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import type { SearchIndexConfig, VectorStoreConfig } from '../../../config/schema.js';
import { ConfigError, DatabaseError, SinkRejectedError, TransientIOError } from '../../../errors/index.js';
import { openDatabase, closeDatabase, IN_MEMORY } from '../../../database/index.js';

const vectorConfig: VectorStoreConfig = {
  ...DEFAULT_CONFIG.insert.vector_store,
  backend: 'sqlite',
  path: IN_MEMORY,
  collection: 'chunks',
  vector_size: 2,
};

const indexConfig: SearchIndexConfig = {
  ...DEFAULT_CONFIG.insert.search_index,
  backend: 'sqlite',
  path: IN_MEMORY,
  index_id: 'chunks',
};

describe('SqliteVectorStore', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(IN_MEMORY);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('upserts by id without duplicating points', async () => {
    const store = new SqliteVectorStore(db, vectorConfig);
    await store.ensureCollection();

    await store.upsert([{ id: 'a', vector: [1, 2], payload: { title: 'Dune' } }]);
    await store.upsert([{ id: 'a', vector: [0.5, 0.25], payload: { title: 'Dune Messiah' } }]);

    expect(store.count()).toBe(1);
    expect(store.getPoint('a')).toEqual({ id: 'a', vector: [0.5, 0.25], payload: { title: 'Dune Messiah' } });
    expect(store.getPoint('missing')).toBeUndefined();
  });

  it('rejects writes to a collection that does not exist', async () => {
    const store = new SqliteVectorStore(db, { ...vectorConfig, create_collection: false });
    await store.ensureCollection();

    await expect(store.upsert([{ id: 'a', vector: [1, 2], payload: {} }])).rejects.toBeInstanceOf(SinkRejectedError);
  });

  it('refuses an existing collection with another dimension', async () => {
    await new SqliteVectorStore(db, vectorConfig).ensureCollection();

    const resized = new SqliteVectorStore(db, { ...vectorConfig, vector_size: 3 });

    await expect(resized.ensureCollection()).rejects.toBeInstanceOf(ConfigError);
    await expect(resized.ensureCollection()).rejects.toThrow(
      "Collection 'chunks' exists with size 2/Cosine, config asks for 3/Cosine"
    );
  });

  it('keeps collections apart', async () => {
    const first = new SqliteVectorStore(db, vectorConfig);
    const second = new SqliteVectorStore(db, { ...vectorConfig, collection: 'other' });
    await first.ensureCollection();
    await second.ensureCollection();

    await first.upsert([{ id: 'a', vector: [1, 2], payload: {} }]);

    expect(first.count()).toBe(1);
    expect(second.count()).toBe(0);
  });
});

describe('SqliteSearchIndex', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(IN_MEMORY);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  const doc = (id: string, text: string) => ({ id, text, document_id: 'dune', chunk_index: 0, metadata: {} });

  it('makes documents searchable at once in immediate mode', async () => {
    const index = new SqliteSearchIndex(db, indexConfig);

    await index.ingest([doc('a', 'Arrakis desert planet'), doc('b', 'ocean world Caladan')]);

    expect(index.count()).toBe(2);
    expect(index.search('arrakis').map((hit) => hit.id)).toEqual(['a']);
  });

  it('replaces the text of a re-ingested document', async () => {
    const index = new SqliteSearchIndex(db, indexConfig);

    await index.ingest([doc('a', 'Arrakis desert')]);
    await index.ingest([doc('a', 'Giedi Prime')]);

    expect(index.count()).toBe(1);
    expect(index.search('arrakis')).toEqual([]);
    expect(index.search('giedi').map((hit) => hit.text)).toEqual(['Giedi Prime']);
  });

  it('stages documents until commit in deferred mode', async () => {
    const index = new SqliteSearchIndex(db, { ...indexConfig, commit_mode: 'deferred' });

    await index.ingest([doc('a', 'Arrakis'), doc('b', 'Caladan')]);
    await index.ingest([doc('a', 'Arrakis again')]);

    expect(index.count()).toBe(0);
    expect(index.stagedCount()).toBe(2);
    expect(index.search('arrakis')).toEqual([]);

    await index.commit();

    expect(index.count()).toBe(2);
    expect(index.stagedCount()).toBe(0);
    expect(index.search('again').map((hit) => hit.id)).toEqual(['a']);
  });
});

describe('mapSqliteError', () => {
  it('treats lock contention as transient', () => {
    const mapped = mapSqliteError('sqlite-vectors', new Database.SqliteError('database is locked', 'SQLITE_BUSY'));

    expect(mapped).toBeInstanceOf(TransientIOError);
    expect(mapped.message).toBe('sqlite-vectors: database is busy (SQLITE_BUSY)');
  });

  it('wraps other SQLite errors in DatabaseError', () => {
    const mapped = mapSqliteError('sqlite-vectors', new Database.SqliteError('disk I/O error', 'SQLITE_IOERR'));

    expect(mapped).toBeInstanceOf(DatabaseError);
    expect(mapped.message).toBe('sqlite-vectors: disk I/O error');
  });

  it('passes errors of the taxonomy through', () => {
    const error = new ConfigError('bad');

    expect(mapSqliteError('sqlite-vectors', error)).toBe(error);
  });
});
