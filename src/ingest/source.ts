/**
 * Chunk Source
 *
 * Discovers `*.jsonl` chunk files and streams their records. Each line is a
 * self-contained JSON record; blank lines are ignored and malformed lines are
 * skipped with a warning, never aborting the file.
 *
 * Records written by older chunkers carry their identity in `metadata`
 * (`source_rel`, `calibre_id`, `chunk_index`) and a random `id`; the
 * fallbacks below derive a stable identity from those, and the random `id`
 * is always replaced by the deterministic one.
 */

import { statSync } from 'node:fs';
import { open } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { isAbsolute, relative, resolve } from 'node:path';
import fg from 'fast-glob';
import { z } from 'zod';
import { FileNotFoundError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { chunkId, normalizeText } from './identity.js';
import type { Batch, ChunkRecord } from './types.js';

/** Glob matching chunk files below a directory */
export const CHUNK_FILE_PATTERN = '**/*.jsonl';

export interface ChunkFile {
  /** Absolute path */
  path: string;
  /** Display name: relative to the chunk root when inside it */
  file: string;
}

// ============================================================================
// DISCOVERY
// ============================================================================

function displayName(path: string, chunkRoot: string): string {
  const rel = relative(chunkRoot, path);
  return rel && !rel.startsWith('..') && !isAbsolute(rel) ? rel : path;
}

/**
 * Resolve files and directories to a sorted, de-duplicated list of chunk files.
 *
 * @throws FileNotFoundError when an input does not exist
 */
export async function discoverChunkFiles(inputs: readonly string[], chunkRoot: string): Promise<ChunkFile[]> {
  const root = resolve(chunkRoot);
  const found = new Set<string>();

  for (const input of inputs) {
    const absolute = resolve(input);
    let isDirectory: boolean;
    try {
      isDirectory = statSync(absolute).isDirectory();
    } catch {
      throw new FileNotFoundError(absolute);
    }

    if (!isDirectory) {
      found.add(absolute);
      continue;
    }

    const entries = await fg(CHUNK_FILE_PATTERN, {
      cwd: absolute,
      absolute: true,
      onlyFiles: true,
      dot: false,
      suppressErrors: true,
    });
    for (const entry of entries) {
      found.add(resolve(entry));
    }
  }

  return [...found].sort().map((path) => ({ path, file: displayName(path, root) }));
}

// ============================================================================
// PARSING
// ============================================================================

const MetadataSchema = z.record(z.unknown());

/**
 * One line of a chunk file. Unknown top-level keys (such as a legacy `id`)
 * are dropped.
 */
export const RawChunkRecordSchema = z.object({
  text: z.string(),
  document_id: z.string().min(1).optional(),
  index: z.number().int().nonnegative().optional(),
  source_path: z.string().min(1).optional(),
  metadata: MetadataSchema.optional(),
});

export type RawChunkRecord = z.infer<typeof RawChunkRecordSchema>;

const MetaStringSchema = z.union([z.string().min(1), z.number()]).transform(String);
const MetaIndexSchema = z.number().int().nonnegative();

export type ParseResult = { ok: true; record: ChunkRecord } | { ok: false; reason: string };

export interface ParseContext {
  file: ChunkFile;
  /** Position of this record among the valid records of the file */
  ordinal: number;
}

function fromMetadata<T>(metadata: Record<string, unknown>, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
  const parsed = schema.safeParse(metadata[key]);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Parse and validate one line into a ChunkRecord.
 *
 * Fallbacks, first present wins:
 * - documentId: `document_id`, `metadata.source_rel`, `metadata.calibre_id`, file name
 * - index:      `index`, `metadata.chunk_index`, ordinal in the file
 * - sourcePath: `source_path`, `metadata.source_path`, chunk file path
 */
export function parseChunkLine(line: string, context: ParseContext): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    return { ok: false, reason: `invalid JSON (${error instanceof Error ? error.message : String(error)})` };
  }

  const parsed = RawChunkRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      reason: issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'invalid record',
    };
  }

  const raw = parsed.data;
  const text = normalizeText(raw.text);
  if (text.length === 0) {
    return { ok: false, reason: 'text is empty after normalization' };
  }

  const metadata = raw.metadata ?? {};
  const documentId =
    raw.document_id ??
    fromMetadata(metadata, 'source_rel', MetaStringSchema) ??
    fromMetadata(metadata, 'calibre_id', MetaStringSchema) ??
    context.file.file;
  const index = raw.index ?? fromMetadata(metadata, 'chunk_index', MetaIndexSchema) ?? context.ordinal;
  const sourcePath =
    raw.source_path ?? fromMetadata(metadata, 'source_path', z.string().min(1)) ?? context.file.path;

  return {
    ok: true,
    record: {
      id: chunkId(documentId, index),
      text,
      sourcePath,
      documentId,
      index,
      metadata,
    },
  };
}

// ============================================================================
// STREAMING
// ============================================================================

export interface SourceStats {
  /** Valid records yielded */
  recordsRead: number;
  /** Malformed lines skipped */
  recordsSkipped: number;
}

export interface ReadOptions {
  logger?: Logger;
  /** Updated as lines are consumed */
  stats?: SourceStats;
}

/**
 * Stream the valid records of one chunk file, in file order.
 */
export async function* readChunkRecords(file: ChunkFile, options: ReadOptions = {}): AsyncGenerator<ChunkRecord> {
  const logger = options.logger ?? silentLogger;
  const stats = options.stats ?? { recordsRead: 0, recordsSkipped: 0 };
  // a missing or unreadable file rejects here, before any line is read
  const handle = await open(file.path, 'r');
  const input = handle.createReadStream({ encoding: 'utf-8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  let lineNumber = 0;
  let ordinal = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim().length === 0) continue;

      const result = parseChunkLine(line, { file, ordinal });
      if (!result.ok) {
        stats.recordsSkipped++;
        logger.warn('skipping malformed record', { line: lineNumber, reason: result.reason });
        continue;
      }

      ordinal++;
      stats.recordsRead++;
      yield result.record;
    }
  } finally {
    lines.close();
    input.destroy();
  }
}

/**
 * Group records into batches of at most `size`, preserving order.
 */
export async function* batchRecords(
  records: AsyncIterable<ChunkRecord>,
  size: number,
  file: ChunkFile
): AsyncGenerator<Batch> {
  let current: ChunkRecord[] = [];
  let ordinal = 0;

  for await (const record of records) {
    current.push(record);
    if (current.length >= size) {
      yield { file: file.file, path: file.path, ordinal: ordinal++, records: current };
      current = [];
    }
  }
  if (current.length > 0) {
    yield { file: file.file, path: file.path, ordinal, records: current };
  }
}
