/**
 * Database Schema Types
 *
 * TypeScript shapes of the run ledger tables, plus the BLOB codec used by
 * the SQLite vector store.
 */

import type { FileState } from '../ingest/types.js';

// ============================================================================
// Runs Table
// ============================================================================

export type RunStatus = 'running' | 'completed' | 'stopped' | 'failed';

/**
 * One `corpus-ingest insert` invocation.
 */
export interface Run {
  id: string;
  /** ISO timestamp */
  started_at: string;
  finished_at: string | null;
  status: RunStatus;
  /** JSON of InsertRunResult['totals'] once finished */
  totals: string | null;
}

// ============================================================================
// File Runs Table
// ============================================================================

export interface FileRun {
  run_id: string;
  file: string;
  path: string;
  state: FileState;
  records_read: number;
  records_skipped: number;
  embedded_from_cache: number;
  embedded_computed: number;
  committed_vectors: number;
  committed_documents: number;
  batches_completed: number;
  batches_abandoned: number;
  duration_ms: number;
}

// ============================================================================
// Abandoned Batches Table
// ============================================================================

export interface AbandonedBatch {
  id: number;
  run_id: string;
  file: string;
  path: string;
  batch_ordinal: number;
  /** Parsed from the JSON `chunk_ids` column */
  chunk_ids: string[];
  vectors_status: 'committed' | 'fatal';
  vectors_error: string | null;
  documents_status: 'committed' | 'fatal';
  documents_error: string | null;
  created_at: string;
  resolved_at: string | null;
}

// ============================================================================
// Vector BLOB codec
// ============================================================================

/**
 * Encode a vector as a Float32 BLOB.
 *
 * @example
 * ```ts
 * db.prepare('INSERT INTO points (id, vector) VALUES (?, ?)').run(id, vectorToBlob(vector));
 * ```
 */
export function vectorToBlob(vector: readonly number[]): Buffer {
  const floats = Float32Array.from(vector);
  return Buffer.from(floats.buffer, floats.byteOffset, floats.byteLength);
}

/**
 * Decode a Float32 BLOB back into numbers.
 */
export function blobToVector(blob: Buffer): number[] {
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return Array.from(new Float32Array(copy.buffer));
}
