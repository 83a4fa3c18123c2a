/**
 * Dual-Sink Writer
 *
 * Commits one batch to the vector store and, independently, to the search
 * index. The two writes never share a lock or a result: each has its own
 * retry loop and resolves with its own FinalWriteOutcome, so a batch stuck
 * retrying against one sink does not hold up the other.
 *
 * Vectors are checked against the configured dimension before anything is
 * sent. A mismatch is a configuration problem, so the vector write fails at
 * once with zero attempts.
 */

import { ValidationError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { withRetry, systemScheduler, type RetryPolicy, type Scheduler } from './retry.js';
import type { CommitMode, SearchDocument, SearchSink, VectorPoint, VectorSink } from './sinks/types.js';
import type {
  Batch,
  ChunkRecord,
  FatalFailureOutcome,
  FinalWriteOutcome,
  MetadataPolicy,
  SinkKind,
  WriteOutcome,
} from './types.js';

// ============================================================================
// PAYLOADS
// ============================================================================

/** Metadata keys controlled by the inclusion policy */
const POLICY_KEYS: Record<string, keyof MetadataPolicy> = {
  title: 'includeTitle',
  authors: 'includeAuthors',
  language: 'includeLanguage',
  published: 'includePublished',
  source_path: 'includeSourcePath',
};

/**
 * Record metadata filtered by the inclusion policy. Keys outside the policy
 * pass through; `source_path` comes from the record itself.
 */
export function selectMetadata(record: ChunkRecord, policy: MetadataPolicy): Record<string, unknown> {
  const selected: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record.metadata)) {
    const flag = POLICY_KEYS[key];
    if (value === undefined || (flag !== undefined && !policy[flag])) continue;
    selected[key] = value;
  }
  if (policy.includeSourcePath) {
    selected.source_path = record.sourcePath;
  }
  return selected;
}

export function toVectorPoint(record: ChunkRecord, vector: readonly number[], policy: MetadataPolicy): VectorPoint {
  return {
    id: record.id,
    vector,
    payload: {
      ...selectMetadata(record, policy),
      document_id: record.documentId,
      chunk_index: record.index,
    },
  };
}

export function toSearchDocument(record: ChunkRecord, policy: MetadataPolicy): SearchDocument {
  return {
    id: record.id,
    text: record.text,
    document_id: record.documentId,
    chunk_index: record.index,
    metadata: selectMetadata(record, policy),
  };
}

/**
 * Check that there is one vector per record and every vector has `dimension`
 * components.
 */
export function validateVectors(
  batch: Batch,
  vectors: ReadonlyArray<readonly number[]>,
  dimension: number
): ValidationError | undefined {
  const issues: string[] = [];
  if (vectors.length !== batch.records.length) {
    issues.push(`expected ${batch.records.length} vectors, got ${vectors.length}`);
  }
  vectors.forEach((vector, i) => {
    if (vector.length !== dimension) {
      const id = batch.records[i]?.id ?? `#${i}`;
      issues.push(`${id}: dimension ${vector.length}, expected ${dimension}`);
    }
  });

  if (issues.length === 0) {
    return undefined;
  }
  return new ValidationError(
    `Vector dimension mismatch in batch ${batch.ordinal} of ${batch.file}`,
    issues
  );
}

// ============================================================================
// WRITER
// ============================================================================

export interface DualSinkWriterOptions {
  vectors: VectorSink;
  documents: SearchSink;
  metadata: MetadataPolicy;
  retry: RetryPolicy;
  scheduler?: Scheduler;
  logger?: Logger;
  /** Every outcome, including each retryable failure */
  onOutcome?: (kind: SinkKind, batch: Batch, outcome: WriteOutcome) => void;
}

export class DualSinkWriter {
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;

  constructor(private readonly options: DualSinkWriterOptions) {
    this.scheduler = options.scheduler ?? systemScheduler;
    this.logger = options.logger ?? silentLogger;
  }

  get documentsCommitMode(): CommitMode {
    return this.options.documents.commitMode;
  }

  get dimension(): number {
    return this.options.vectors.dimension;
  }

  /**
   * One-time setup before the first write: create the vector collection
   * when configured to.
   */
  async prepare(): Promise<void> {
    await this.options.vectors.ensureCollection();
  }

  /**
   * Upsert the batch's vectors. `vectors[i]` belongs to `batch.records[i]`.
   */
  async writeVectors(
    batch: Batch,
    vectors: ReadonlyArray<readonly number[]>,
    logger: Logger = this.logger
  ): Promise<FinalWriteOutcome> {
    const invalid = validateVectors(batch, vectors, this.options.vectors.dimension);
    if (invalid) {
      return this.fail('vectors', batch, invalid, logger);
    }

    const points = batch.records.map((record, i) =>
      toVectorPoint(record, vectors[i] ?? [], this.options.metadata)
    );
    return this.write('vectors', batch, () => this.options.vectors.upsert(points), logger);
  }

  /**
   * Upsert the batch's text and metadata into the search index.
   */
  async writeDocuments(batch: Batch, logger: Logger = this.logger): Promise<FinalWriteOutcome> {
    const documents = batch.records.map((record) => toSearchDocument(record, this.options.metadata));
    return this.write('documents', batch, () => this.options.documents.ingest(documents), logger);
  }

  /**
   * Record a vector write that cannot happen (its embeddings failed).
   * The vector store is not contacted.
   */
  skipVectors(batch: Batch, cause: Error, logger: Logger = this.logger): FatalFailureOutcome {
    return this.fail('vectors', batch, cause, logger);
  }

  /**
   * End-of-run commit of a deferred search index, retried like any write.
   */
  async commitDocuments(logger: Logger = this.logger): Promise<FinalWriteOutcome> {
    const result = await withRetry(() => this.options.documents.commit(), {
      policy: this.options.retry,
      scheduler: this.scheduler,
      onRetry: (attempt, cause, delayMs) => {
        logger.warn('search index commit failed, retrying', {
          op: 'documents',
          attempt,
          delay_ms: delayMs,
          error: cause.message,
        });
      },
    });

    if (result.ok) {
      logger.info('search index committed', { op: 'documents', attempts: result.attempts });
      return { status: 'committed', attempts: result.attempts };
    }
    logger.error('search index commit failed', {
      op: 'documents',
      attempts: result.attempts,
      error: result.error.message,
    });
    return { status: 'fatal', attempts: result.attempts, cause: result.error };
  }

  private emit(kind: SinkKind, batch: Batch, outcome: WriteOutcome): void {
    this.options.onOutcome?.(kind, batch, outcome);
  }

  private fail(kind: SinkKind, batch: Batch, cause: Error, logger: Logger): FatalFailureOutcome {
    const outcome: FatalFailureOutcome = { status: 'fatal', attempts: 0, cause };
    logger.error(`${kind} write abandoned before sending`, {
      op: kind,
      batch: batch.ordinal,
      error: cause.message,
    });
    this.emit(kind, batch, outcome);
    return outcome;
  }

  private async write(
    kind: SinkKind,
    batch: Batch,
    operation: () => Promise<void>,
    logger: Logger
  ): Promise<FinalWriteOutcome> {
    const result = await withRetry(operation, {
      policy: this.options.retry,
      scheduler: this.scheduler,
      onRetry: (attempt, cause, delayMs) => {
        logger.warn(`${kind} write failed, retrying`, {
          op: kind,
          batch: batch.ordinal,
          attempt,
          delay_ms: delayMs,
          error: cause.message,
        });
        this.emit(kind, batch, { status: 'retrying', attempt, cause, delayMs });
      },
    });

    const outcome: FinalWriteOutcome = result.ok
      ? { status: 'committed', attempts: result.attempts }
      : { status: 'fatal', attempts: result.attempts, cause: result.error };

    if (outcome.status === 'committed') {
      logger.debug(`${kind} committed`, { op: kind, batch: batch.ordinal, attempts: outcome.attempts });
    } else {
      logger.error(`${kind} write abandoned`, {
        op: kind,
        batch: batch.ordinal,
        attempts: outcome.attempts,
        error: outcome.cause.message,
      });
    }
    this.emit(kind, batch, outcome);
    return outcome;
  }
}
