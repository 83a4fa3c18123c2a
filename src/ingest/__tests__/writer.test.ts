import { describe, it, expect } from 'vitest';
import {
  DualSinkWriter,
  selectMetadata,
  toSearchDocument,
  toVectorPoint,
  validateVectors,
  type DualSinkWriterOptions,
} from '../writer.js';
import { chunkId } from '../identity.js';
import { SinkRejectedError, TransientIOError, ValidationError } from '../../errors/index.js';
import { FakeSearchSink, FakeVectorSink, createFakeScheduler } from '../../test-utils/index.js';
import type { Batch, ChunkRecord, MetadataPolicy, SinkKind, WriteOutcome } from '../types.js';

const allMetadata: MetadataPolicy = {
  includeSourcePath: true,
  includeTitle: true,
  includeAuthors: true,
  includeLanguage: true,
  includePublished: true,
};

function record(index: number, metadata: Record<string, unknown> = {}): ChunkRecord {
  return {
    id: chunkId('dune', index),
    text: `chunk ${index}`,
    sourcePath: '/library/dune.epub',
    documentId: 'dune',
    index,
    metadata,
  };
}

function batch(count: number): Batch {
  return {
    file: 'dune.jsonl',
    path: '/data/dune.jsonl',
    ordinal: 0,
    records: Array.from({ length: count }, (_, i) => record(i)),
  };
}

function createWriter(overrides: Partial<DualSinkWriterOptions> = {}) {
  const vectors = new FakeVectorSink(2);
  const documents = new FakeSearchSink();
  const scheduler = createFakeScheduler();
  const writer = new DualSinkWriter({
    vectors,
    documents,
    metadata: allMetadata,
    retry: { retryMax: 5, backoffMs: 100, backoffMaxMs: 1000 },
    scheduler,
    ...overrides,
  });
  return { writer, vectors, documents, scheduler };
}

describe('payloads', () => {
  const meta = { title: 'Dune', authors: ['Frank Herbert'], language: 'en', published: '1965', genre: 'sf' };

  it('keeps every key when the policy includes everything', () => {
    expect(selectMetadata(record(0, meta), allMetadata)).toEqual({ ...meta, source_path: '/library/dune.epub' });
  });

  it('drops excluded well-known keys and keeps unknown ones', () => {
    const policy: MetadataPolicy = {
      includeSourcePath: false,
      includeTitle: true,
      includeAuthors: false,
      includeLanguage: false,
      includePublished: false,
    };

    expect(selectMetadata(record(0, { ...meta, source_path: '/elsewhere' }), policy)).toEqual({
      title: 'Dune',
      genre: 'sf',
    });
  });

  it('builds vector points and search documents keyed by chunk id', () => {
    const r = record(3, { title: 'Dune' });

    expect(toVectorPoint(r, [1, 2], allMetadata)).toEqual({
      id: chunkId('dune', 3),
      vector: [1, 2],
      payload: { title: 'Dune', source_path: '/library/dune.epub', document_id: 'dune', chunk_index: 3 },
    });
    expect(toSearchDocument(r, allMetadata)).toEqual({
      id: chunkId('dune', 3),
      text: 'chunk 3',
      document_id: 'dune',
      chunk_index: 3,
      metadata: { title: 'Dune', source_path: '/library/dune.epub' },
    });
  });
});

describe('validateVectors', () => {
  it('accepts vectors of the configured dimension', () => {
    expect(validateVectors(batch(2), [[1, 2], [3, 4]], 2)).toBeUndefined();
  });

  it('lists every mismatch', () => {
    const error = validateVectors(batch(2), [[1, 2, 3], [4]], 2);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error?.issues).toEqual([
      `${chunkId('dune', 0)}: dimension 3, expected 2`,
      `${chunkId('dune', 1)}: dimension 1, expected 2`,
    ]);
  });

  it('reports a count mismatch', () => {
    expect(validateVectors(batch(2), [[1, 2]], 2)?.issues).toEqual(['expected 2 vectors, got 1']);
  });
});

describe('DualSinkWriter', () => {
  it('commits both sinks on the first attempt', async () => {
    const { writer, vectors, documents } = createWriter();
    const b = batch(2);

    const [v, d] = await Promise.all([writer.writeVectors(b, [[1, 2], [3, 4]]), writer.writeDocuments(b)]);

    expect(v).toEqual({ status: 'committed', attempts: 1 });
    expect(d).toEqual({ status: 'committed', attempts: 1 });
    expect(vectors.points.size).toBe(2);
    expect(documents.documents.size).toBe(2);
  });

  it('retries a sink that fails twice and reports three attempts', async () => {
    const events: Array<[SinkKind, WriteOutcome['status']]> = [];
    const { writer, vectors, scheduler } = createWriter({
      onOutcome: (kind, _batch, outcome) => events.push([kind, outcome.status]),
    });
    vectors.failNext(new TransientIOError('503'), new TransientIOError('503'));

    const outcome = await writer.writeVectors(batch(1), [[1, 2]]);

    expect(outcome).toEqual({ status: 'committed', attempts: 3 });
    expect(vectors.attempts).toBe(3);
    expect(scheduler.sleeps).toEqual([100, 200]);
    expect(events).toEqual([
      ['vectors', 'retrying'],
      ['vectors', 'retrying'],
      ['vectors', 'committed'],
    ]);
  });

  it('fails a dimension mismatch with zero attempts and never calls the store', async () => {
    const { writer, vectors } = createWriter();

    const outcome = await writer.writeVectors(batch(1), [[1, 2, 3]]);

    expect(outcome.status).toBe('fatal');
    expect(outcome.attempts).toBe(0);
    expect(vectors.attempts).toBe(0);
  });

  it('does not retry a sink rejection', async () => {
    const { writer, documents } = createWriter();
    documents.failNext(new SinkRejectedError('fake-documents', 400, 'bad'));

    const outcome = await writer.writeDocuments(batch(1));

    expect(outcome).toMatchObject({ status: 'fatal', attempts: 1 });
    expect(documents.attempts).toBe(1);
  });

  it('gives up after retryMax + 1 attempts', async () => {
    const { writer, documents } = createWriter({ retry: { retryMax: 2, backoffMs: 0, backoffMaxMs: 0 } });
    documents.failNext(new TransientIOError('a'), new TransientIOError('b'), new TransientIOError('c'));

    const outcome = await writer.writeDocuments(batch(1));

    expect(outcome).toMatchObject({ status: 'fatal', attempts: 3 });
    expect(outcome.status === 'fatal' && outcome.cause.message).toBe('c');
  });

  it('keeps one sink independent of the other', async () => {
    const { writer, vectors, documents } = createWriter({ retry: { retryMax: 0, backoffMs: 0, backoffMaxMs: 0 } });
    vectors.failNext(new TransientIOError('vector store down'));
    const b = batch(2);

    const [v, d] = await Promise.all([writer.writeVectors(b, [[1, 2], [3, 4]]), writer.writeDocuments(b)]);

    expect(v.status).toBe('fatal');
    expect(d).toEqual({ status: 'committed', attempts: 1 });
    expect(documents.documents.size).toBe(2);
  });

  it('records skipped vectors without contacting the store', () => {
    const { writer, vectors } = createWriter();
    const cause = new TransientIOError('embedding failed');

    expect(writer.skipVectors(batch(1), cause)).toEqual({ status: 'fatal', attempts: 0, cause });
    expect(vectors.attempts).toBe(0);
  });

  it('creates the collection on prepare', async () => {
    const { writer, vectors } = createWriter();

    await writer.prepare();

    expect(vectors.ensureCalls).toBe(1);
  });

  it('retries the deferred commit', async () => {
    const documents = new FakeSearchSink('deferred').failNextCommit(new TransientIOError('busy'));
    const { writer } = createWriter({ documents });

    expect(writer.documentsCommitMode).toBe('deferred');
    expect(await writer.commitDocuments()).toEqual({ status: 'committed', attempts: 2 });
    expect(documents.commits).toBe(2);
  });
});
