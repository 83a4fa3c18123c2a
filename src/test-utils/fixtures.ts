/**
 * Test Utilities - Fixtures
 *
 * Temporary chunk files and configs pointing at them.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config, InsertConfig } from '../config/schema.js';
import type { ChunkFile } from '../ingest/source.js';

export function createTempDir(prefix = 'corpus-ingest-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** A line of a chunk file: a record to serialize, or raw text written as is */
export type ChunkLine = Record<string, unknown> | string;

/**
 * Write a `.jsonl` chunk file below `root` and return it as a ChunkFile.
 */
export function writeChunkFile(root: string, name: string, lines: readonly ChunkLine[]): ChunkFile {
  const path = join(root, name);
  mkdirSync(dirname(path), { recursive: true });
  const body = lines.map((line) => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n');
  writeFileSync(path, body + '\n', 'utf-8');
  return { path, file: name };
}

/**
 * `count` records of one document, texts `${prefix} 0`, `${prefix} 1`, ...
 */
export function documentRecords(documentId: string, count: number, prefix = documentId): Record<string, unknown>[] {
  return Array.from({ length: count }, (_, index) => ({
    text: `${prefix} ${index}`,
    document_id: documentId,
    index,
  }));
}

/**
 * Default config with both sinks on SQLite files below `dir` and no
 * backoff delays.
 */
export function sqliteConfig(dir: string, overrides: Partial<InsertConfig> = {}): Config {
  const insert = DEFAULT_CONFIG.insert;
  return {
    logging: { level: 'error' },
    paths: { chunk_root: join(dir, 'chunked'), state_dir: join(dir, 'state') },
    insert: {
      ...insert,
      retry_backoff_ms: 0,
      vector_store: {
        ...insert.vector_store,
        backend: 'sqlite',
        path: join(dir, 'vectors.db'),
        vector_size: 4,
      },
      search_index: {
        ...insert.search_index,
        backend: 'sqlite',
        path: join(dir, 'documents.db'),
      },
      ...overrides,
    },
  };
}
