/**
 * Sink Interfaces
 *
 * A sink is a downstream store receiving committed chunk data. Every write is
 * an upsert keyed by the chunk's deterministic id, so replaying a batch never
 * creates duplicates.
 *
 * Sinks throw the errors of the shared taxonomy: TransientIOError for
 * failures worth retrying, anything else for failures that are not.
 */

import type { Distance } from '../../config/schema.js';

/**
 * One point of the vector store.
 */
export interface VectorPoint {
  readonly id: string;
  readonly vector: readonly number[];
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * One document of the keyword index.
 */
export interface SearchDocument {
  readonly id: string;
  readonly text: string;
  readonly document_id: string;
  readonly chunk_index: number;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface VectorSink {
  /** Name used in logs ("qdrant", "sqlite-vectors") */
  readonly name: string;
  readonly collection: string;
  readonly dimension: number;
  readonly distance: Distance;
  /** Create the collection if absent (no-op when creation is disabled) */
  ensureCollection(): Promise<void>;
  upsert(points: readonly VectorPoint[]): Promise<void>;
  /** Resolve when the store answers; throw otherwise */
  probe(): Promise<void>;
  close(): void;
}

export type CommitMode = 'immediate' | 'deferred';

export interface SearchSink {
  readonly name: string;
  readonly indexId: string;
  readonly commitMode: CommitMode;
  /** Upsert documents; visible at once in immediate mode, after commit() otherwise */
  ingest(documents: readonly SearchDocument[]): Promise<void>;
  /** End-of-run commit of everything ingested in deferred mode */
  commit(): Promise<void>;
  probe(): Promise<void>;
  close(): void;
}
