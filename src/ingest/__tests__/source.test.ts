import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { mkdirSync, writeFileSync } from 'node:fs';
import { batchRecords, discoverChunkFiles, parseChunkLine, readChunkRecords, type ChunkFile } from '../source.js';
import { chunkId } from '../identity.js';
import { FileNotFoundError } from '../../errors/index.js';
import {
  createRecordingLogger,
  createTempDir,
  documentRecords,
  removeTempDir,
  writeChunkFile,
} from '../../test-utils/index.js';
import type { ChunkRecord } from '../types.js';

const file: ChunkFile = { path: '/data/chunked/books/dune.jsonl', file: 'books/dune.jsonl' };

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) result.push(item);
  return result;
}

describe('parseChunkLine', () => {
  it('parses an explicit record and normalizes its text', () => {
    const result = parseChunkLine(
      JSON.stringify({ text: '  Arrakis\n  desert ', document_id: 'dune', index: 3, metadata: { title: 'Dune' } }),
      { file, ordinal: 0 }
    );

    expect(result).toEqual({
      ok: true,
      record: {
        id: chunkId('dune', 3),
        text: 'Arrakis desert',
        sourcePath: file.path,
        documentId: 'dune',
        index: 3,
        metadata: { title: 'Dune' },
      },
    });
  });

  it('derives identity from legacy metadata and ignores the random id', () => {
    const result = parseChunkLine(
      JSON.stringify({
        id: 'f47ac10b-58cc-4372-a567-0e02b2c3d479',
        text: 'spice',
        metadata: { source_rel: 'books/dune.epub', chunk_index: 7, source_path: '/library/dune.epub' },
      }),
      { file, ordinal: 0 }
    );

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.record.documentId).toBe('books/dune.epub');
      expect(result.record.index).toBe(7);
      expect(result.record.sourcePath).toBe('/library/dune.epub');
      expect(result.record.id).toBe(chunkId('books/dune.epub', 7));
    }
  });

  it('falls back to calibre_id, then the file name and ordinal', () => {
    const calibre = parseChunkLine(JSON.stringify({ text: 'a', metadata: { calibre_id: 42 } }), { file, ordinal: 5 });
    const bare = parseChunkLine(JSON.stringify({ text: 'a' }), { file, ordinal: 5 });

    expect(calibre.ok && calibre.record.documentId).toBe('42');
    expect(calibre.ok && calibre.record.index).toBe(5);
    expect(bare.ok && bare.record.documentId).toBe('books/dune.jsonl');
    expect(bare.ok && bare.record.id).toBe(chunkId('books/dune.jsonl', 5));
  });

  it('rejects invalid JSON', () => {
    const result = parseChunkLine('{"text": ', { file, ordinal: 0 });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toMatch(/^invalid JSON/);
  });

  it('rejects a record without text', () => {
    expect(parseChunkLine('{"document_id":"d"}', { file, ordinal: 0 })).toEqual({
      ok: false,
      reason: 'text: Required',
    });
  });

  it('rejects text that is blank after normalization', () => {
    expect(parseChunkLine('{"text":" \\n "}', { file, ordinal: 0 })).toEqual({
      ok: false,
      reason: 'text is empty after normalization',
    });
  });

  it('rejects a negative index', () => {
    expect(parseChunkLine('{"text":"a","index":-1}', { file, ordinal: 0 }).ok).toBe(false);
  });
});

describe('reading chunk files', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('skips blank and malformed lines and counts them', async () => {
    const chunkFile = writeChunkFile(dir, 'mixed.jsonl', [
      { text: 'first' },
      '',
      'not json',
      { text: 'second' },
      '   ',
    ]);
    const logger = createRecordingLogger();
    const stats = { recordsRead: 0, recordsSkipped: 0 };

    const records = await collect(readChunkRecords(chunkFile, { logger, stats }));

    expect(records.map((record) => record.text)).toEqual(['first', 'second']);
    // ordinals count valid records only
    expect(records.map((record) => record.index)).toEqual([0, 1]);
    expect(stats).toEqual({ recordsRead: 2, recordsSkipped: 1 });
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({ level: 'warn', message: 'skipping malformed record' });
    expect(logger.entries[0]?.context.line).toBe(3);
  });

  it('groups records into ordered batches', async () => {
    const chunkFile = writeChunkFile(dir, 'doc.jsonl', documentRecords('doc', 5));

    const batches = await collect(batchRecords(readChunkRecords(chunkFile), 2, chunkFile));

    expect(batches.map((batch) => batch.ordinal)).toEqual([0, 1, 2]);
    expect(batches.map((batch) => batch.records.map((record: ChunkRecord) => record.index))).toEqual([
      [0, 1],
      [2, 3],
      [4],
    ]);
    expect(batches[0]?.file).toBe('doc.jsonl');
  });

  it('yields no batch for an empty file', async () => {
    const chunkFile = writeChunkFile(dir, 'empty.jsonl', ['']);

    expect(await collect(batchRecords(readChunkRecords(chunkFile), 2, chunkFile))).toEqual([]);
  });
});

describe('discoverChunkFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
    mkdirSync(join(dir, 'books', 'sf'), { recursive: true });
    writeFileSync(join(dir, 'books', 'sf', 'dune.jsonl'), '');
    writeFileSync(join(dir, 'books', 'atlas.jsonl'), '');
    writeFileSync(join(dir, 'books', 'notes.txt'), '');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('finds *.jsonl files recursively, sorted and relative to the chunk root', async () => {
    const files = await discoverChunkFiles([dir], dir);

    expect(files.map((f) => f.file)).toEqual([join('books', 'atlas.jsonl'), join('books', 'sf', 'dune.jsonl')]);
    expect(files[0]?.path).toBe(join(dir, 'books', 'atlas.jsonl'));
  });

  it('removes duplicates between directory and file inputs', async () => {
    const files = await discoverChunkFiles([join(dir, 'books', 'atlas.jsonl'), join(dir, 'books')], dir);

    expect(files).toHaveLength(2);
  });

  it('keeps absolute paths for files outside the chunk root', async () => {
    const files = await discoverChunkFiles([join(dir, 'books', 'atlas.jsonl')], join(dir, 'elsewhere'));

    expect(files[0]?.file).toBe(join(dir, 'books', 'atlas.jsonl'));
  });

  it('throws FileNotFoundError for a missing input', async () => {
    await expect(discoverChunkFiles([join(dir, 'missing')], dir)).rejects.toBeInstanceOf(FileNotFoundError);
  });
});
