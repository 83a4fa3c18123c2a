/**
 * Ingest Types
 *
 * Data model shared by the chunk source, embedding client, dual-sink writer
 * and pipeline orchestrator.
 */

import type { MetadataConfig } from '../config/schema.js';

// ============================================================================
// CHUNK RECORDS
// ============================================================================

/**
 * Free-form record metadata. Well-known keys (`title`, `authors`,
 * `language`, `published`) are subject to the metadata inclusion policy;
 * any other key is passed through to the sinks unchanged.
 */
export type ChunkMetadata = Record<string, unknown>;

/**
 * Immutable unit of work, produced by the chunk source.
 */
export interface ChunkRecord {
  /** Deterministic storage key derived from (documentId, index) */
  readonly id: string;
  /** Normalized text (NFKC, whitespace collapsed, trimmed) */
  readonly text: string;
  readonly sourcePath: string;
  readonly documentId: string;
  /** Ordinal of the chunk within its source document */
  readonly index: number;
  readonly metadata: Readonly<ChunkMetadata>;
}

/**
 * Ordered group of records from one file, the unit of retry for both sinks.
 */
export interface Batch {
  /** Chunk file the batch was read from (relative to the chunk root when possible) */
  readonly file: string;
  /** Absolute path of the chunk file */
  readonly path: string;
  /** 0-based position of the batch within its file */
  readonly ordinal: number;
  readonly records: readonly ChunkRecord[];
}

/**
 * A record paired with the vector computed (or cached) for its text.
 */
export interface EmbeddedRecord {
  readonly record: ChunkRecord;
  readonly vector: readonly number[];
}

// ============================================================================
// WRITE OUTCOMES
// ============================================================================

/** Which downstream store a write targets */
export type SinkKind = 'vectors' | 'documents';

/** Every attempt of the write was acknowledged by the sink */
export interface CommittedOutcome {
  readonly status: 'committed';
  /** Number of attempts made, including the successful one */
  readonly attempts: number;
}

/** An attempt failed with a transient error and another attempt is scheduled */
export interface RetryableFailureOutcome {
  readonly status: 'retrying';
  /** The attempt that just failed (1-based) */
  readonly attempt: number;
  readonly cause: Error;
  /** Delay before the next attempt */
  readonly delayMs: number;
}

/** The write will not be attempted again for this batch */
export interface FatalFailureOutcome {
  readonly status: 'fatal';
  /** Attempts made before giving up; 0 when rejected before sending */
  readonly attempts: number;
  readonly cause: Error;
}

/**
 * Per batch, per sink outcome.
 */
export type WriteOutcome = CommittedOutcome | RetryableFailureOutcome | FatalFailureOutcome;

/** Outcome a write resolves with once it stops retrying */
export type FinalWriteOutcome = CommittedOutcome | FatalFailureOutcome;

/**
 * The two independent result slots of one batch.
 */
export interface BatchOutcome {
  readonly file: string;
  readonly path: string;
  readonly ordinal: number;
  readonly chunkIds: readonly string[];
  readonly vectors: FinalWriteOutcome;
  readonly documents: FinalWriteOutcome;
}

// ============================================================================
// RUN STATE AND REPORTING
// ============================================================================

/** Per-file state machine: Pending → InFlight → {Completed, Abandoned} */
export type FileState = 'pending' | 'in-flight' | 'completed' | 'abandoned';

/**
 * Counters for one chunk file.
 */
export interface FileReport {
  file: string;
  /** Absolute path of the chunk file */
  path: string;
  state: FileState;
  recordsRead: number;
  recordsSkipped: number;
  embeddedFromCache: number;
  embeddedComputed: number;
  committedVectors: number;
  committedDocuments: number;
  batchesCompleted: number;
  batchesAbandoned: number;
  /** Identifiers of every chunk in an abandoned batch */
  abandonedChunkIds: string[];
  durationMs: number;
}

/**
 * Outcome of the end-of-run commit of a deferred search index.
 */
export type DeferredCommitOutcome =
  | { status: 'not-needed' }
  | { status: 'committed' }
  | { status: 'failed'; error: string };

/**
 * Aggregate counters of one insert run.
 */
export interface RunTotals {
  files: number;
  filesCompleted: number;
  filesAbandoned: number;
  recordsRead: number;
  recordsSkipped: number;
  embeddedFromCache: number;
  embeddedComputed: number;
  committedVectors: number;
  committedDocuments: number;
  batchesCompleted: number;
  batchesAbandoned: number;
  chunksAbandoned: number;
}

/**
 * Aggregate result of one insert run.
 */
export interface InsertRunResult {
  files: FileReport[];
  totals: RunTotals;
  deferredCommit: DeferredCommitOutcome;
  /** True when the stop signal prevented some files or batches from being admitted */
  stopped: boolean;
  durationMs: number;
}

/**
 * Metadata inclusion policy, camel-cased from `[insert.metadata]`.
 */
export interface MetadataPolicy {
  includeSourcePath: boolean;
  includeTitle: boolean;
  includeAuthors: boolean;
  includeLanguage: boolean;
  includePublished: boolean;
}

export function toMetadataPolicy(config: MetadataConfig): MetadataPolicy {
  return {
    includeSourcePath: config.include_source_path,
    includeTitle: config.include_title,
    includeAuthors: config.include_authors,
    includeLanguage: config.include_language,
    includePublished: config.include_published,
  };
}
