/**
 * Insert Pipeline
 *
 * Drives chunk files through: read → batch → cache lookup → embed misses →
 * dual-sink write.
 *
 * Concurrency model:
 * - up to `maxParallelFiles` files are InFlight at once
 * - writes to each sink stay in batch order within a file (one chain per
 *   sink); the two chains never wait on each other
 * - a batch's document write is queued as soon as the batch is read; reading
 *   pauses while `maxPendingBatches` document writes of the file are unsettled
 * - batches are embedded in order; embedding pauses while `maxPendingBatches`
 *   vector writes of the file are unsettled, so a slow vector store throttles
 *   embedding and nothing else
 * - embedding requests are capped per file by `maxConcurrencyPerFile` and
 *   process-wide by the EmbeddingClient's global limit
 *
 * It doesn't know HOW to display progress or where outcomes are persisted;
 * it fires callbacks and returns an InsertRunResult.
 */

import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger, withContext } from '../utils/logger.js';
import { EmbeddingCache, InFlightEmbeddings, type EmbeddingSlot } from './cache.js';
import { createFileLimit, type EmbeddingClient } from './embedder/index.js';
import { fingerprint } from './identity.js';
import { batchRecords, readChunkRecords, type ChunkFile, type SourceStats } from './source.js';
import type {
  Batch,
  BatchOutcome,
  DeferredCommitOutcome,
  FileReport,
  FinalWriteOutcome,
  InsertRunResult,
  RunTotals,
} from './types.js';
import type { DualSinkWriter } from './writer.js';

export interface InsertPipelineOptions {
  files: readonly ChunkFile[];
  client: EmbeddingClient;
  writer: DualSinkWriter;
  /** Shared by every file of the run */
  cache: EmbeddingCache;
  /** Shared single-flight map (default: a fresh one per run) */
  inFlight?: InFlightEmbeddings;

  batchSize: number;
  maxParallelFiles: number;
  /** Per file and per sink: unsettled writes before reading (documents) or embedding (vectors) pauses */
  maxPendingBatches: number;
  /** Per-file cap on in-flight embedding requests */
  maxConcurrencyPerFile: number;

  /**
   * Operator stop signal. Halts admission of new files and new batches;
   * batches already admitted finish their writes.
   */
  signal?: AbortSignal;
  logger?: Logger;
  /** Monotonic clock in ms (default: performance.now) */
  now?: () => number;

  /** Callbacks that throw make runInsertPipeline reject once the run drains */
  onFileStart?: (file: ChunkFile) => void;
  /** Fired once both sinks settled for a batch */
  onBatchComplete?: (outcome: BatchOutcome, report: FileReport) => void;
  onBatchAbandoned?: (outcome: BatchOutcome) => void;
  onFileComplete?: (report: FileReport) => void;
}

interface EmbeddedBatch {
  /** One vector per record, or the first embedding error of the batch */
  result: { ok: true; vectors: Array<readonly number[]> } | { ok: false; error: Error };
  fromCache: number;
  computed: number;
}

interface RunContext {
  options: InsertPipelineOptions;
  inFlight: InFlightEmbeddings;
  logger: Logger;
  now: () => number;
  stopped: boolean;
}

function newReport(file: ChunkFile): FileReport {
  return {
    file: file.file,
    path: file.path,
    state: 'pending',
    recordsRead: 0,
    recordsSkipped: 0,
    embeddedFromCache: 0,
    embeddedComputed: 0,
    committedVectors: 0,
    committedDocuments: 0,
    batchesCompleted: 0,
    batchesAbandoned: 0,
    abandonedChunkIds: [],
    durationMs: 0,
  };
}

// ============================================================================
// EMBEDDING
// ============================================================================

/**
 * Resolve a vector for every record of the batch.
 *
 * 1. Cache hit → use it
 * 2. Same fingerprint already in flight (any file) → wait for that request
 * 3. Otherwise claim the fingerprint and embed it with this batch's request
 */
async function embedBatch(
  batch: Batch,
  ctx: RunContext,
  fileLimit: LimitFunction,
  logger: Logger
): Promise<EmbeddedBatch> {
  const { cache, client } = ctx.options;
  const slots: Array<Promise<EmbeddingSlot>> = [];
  // whether this batch's request computes the slot, or it is reused
  const computes: boolean[] = [];
  const owned: Array<{ key: string; text: string }> = [];

  for (const record of batch.records) {
    const key = fingerprint(record.text, client.model);
    const cached = cache.lookup(key);
    if (cached) {
      slots.push(Promise.resolve({ ok: true, vector: cached }));
      computes.push(false);
      continue;
    }

    const pending = ctx.inFlight.get(key);
    if (pending) {
      slots.push(pending);
      computes.push(false);
      continue;
    }

    slots.push(ctx.inFlight.claim(key));
    computes.push(true);
    owned.push({ key, text: record.text });
  }

  if (owned.length > 0) {
    let results: EmbeddingSlot[] = [];
    try {
      results = await client.embed(
        owned.map((entry) => entry.text),
        { fileLimit, logger }
      );
    } catch (thrown) {
      const error = toError(thrown);
      results = owned.map(() => ({ ok: false, error }));
    } finally {
      owned.forEach(({ key }, i) => {
        const slot: EmbeddingSlot = results[i] ?? {
          ok: false,
          error: new Error('embedding client returned fewer vectors than requested'),
        };
        if (slot.ok) {
          cache.insert(key, slot.vector);
        }
        ctx.inFlight.settle(key, slot);
      });
    }
  }

  const resolved = await Promise.all(slots);
  const vectors: Array<readonly number[]> = [];
  let fromCache = 0;
  let computed = 0;
  const errors: Error[] = [];
  for (const [i, slot] of resolved.entries()) {
    if (!slot.ok) {
      errors.push(slot.error);
      continue;
    }
    if (computes[i]) computed++;
    else fromCache++;
    vectors.push(slot.vector);
  }

  const [error] = errors;
  if (error) {
    return { result: { ok: false, error }, fromCache, computed };
  }
  return { result: { ok: true, vectors }, fromCache, computed };
}

// ============================================================================
// FILES
// ============================================================================

/**
 * Never rejects: an unexpected throw from a write becomes a fatal outcome.
 */
function settleWrite(write: () => Promise<FinalWriteOutcome> | FinalWriteOutcome): Promise<FinalWriteOutcome> {
  return Promise.resolve()
    .then(write)
    .catch((thrown: unknown): FinalWriteOutcome => ({ status: 'fatal', attempts: 0, cause: toError(thrown) }));
}

async function processFile(file: ChunkFile, ctx: RunContext): Promise<FileReport> {
  const { options } = ctx;
  const { writer, signal } = options;
  const started = ctx.now();
  const report = newReport(file);
  report.state = 'in-flight';

  const logger = withContext(ctx.logger, { file: file.file });
  const fileLimit = createFileLimit(options.maxConcurrencyPerFile);
  const stats: SourceStats = { recordsRead: 0, recordsSkipped: 0 };
  const pendingDocuments = new Set<Promise<void>>();
  const pendingVectors = new Set<Promise<void>>();
  const completions: Array<Promise<void>> = [];
  let vectorTail: Promise<unknown> = Promise.resolve();
  let documentTail: Promise<unknown> = Promise.resolve();
  let embedTail: Promise<unknown> = Promise.resolve();
  let interrupted = false;
  let readError: Error | undefined;
  const callbackErrors: Error[] = [];

  const finishBatch = (batch: Batch, vectors: FinalWriteOutcome, documents: FinalWriteOutcome): void => {
    const count = batch.records.length;
    const outcome: BatchOutcome = {
      file: batch.file,
      path: batch.path,
      ordinal: batch.ordinal,
      chunkIds: batch.records.map((record) => record.id),
      vectors,
      documents,
    };

    if (vectors.status === 'committed') report.committedVectors += count;
    if (documents.status === 'committed') report.committedDocuments += count;

    if (vectors.status === 'committed' && documents.status === 'committed') {
      report.batchesCompleted++;
    } else {
      report.batchesAbandoned++;
      report.abandonedChunkIds.push(...outcome.chunkIds);
      logger.error('batch abandoned', {
        batch: batch.ordinal,
        vectors: vectors.status,
        documents: documents.status,
        chunk_ids: outcome.chunkIds.join(','),
      });
      options.onBatchAbandoned?.(outcome);
    }
    options.onBatchComplete?.(outcome, report);
  };

  /** Keep `write` in `pending` until it settles */
  const track = (pending: Set<Promise<void>>, write: Promise<FinalWriteOutcome>): void => {
    const settled: Promise<void> = write.then(() => {
      pending.delete(settled);
    });
    pending.add(settled);
  };

  /** Resolves once the batch is embedded and its vector write is queued */
  const startVectors = async (batch: Batch): Promise<{ write: Promise<FinalWriteOutcome> }> => {
    while (pendingVectors.size >= options.maxPendingBatches) {
      await Promise.race(pendingVectors);
    }

    let embedded: EmbeddedBatch;
    try {
      embedded = await embedBatch(batch, ctx, fileLimit, logger);
    } catch (thrown) {
      embedded = { result: { ok: false, error: toError(thrown) }, fromCache: 0, computed: 0 };
    }
    report.embeddedFromCache += embedded.fromCache;
    report.embeddedComputed += embedded.computed;

    const result = embedded.result;
    const write = vectorTail.then(() =>
      settleWrite(() =>
        result.ok
          ? writer.writeVectors(batch, result.vectors, logger)
          : writer.skipVectors(batch, result.error, logger)
      )
    );
    vectorTail = write;
    track(pendingVectors, write);
    return { write };
  };

  try {
    const records = readChunkRecords(file, { logger, stats });
    for await (const batch of batchRecords(records, options.batchSize, file)) {
      if (signal?.aborted) {
        ctx.stopped = true;
        interrupted = true;
        break;
      }

      while (pendingDocuments.size >= options.maxPendingBatches) {
        await Promise.race(pendingDocuments);
      }

      const documentWrite = documentTail.then(() => settleWrite(() => writer.writeDocuments(batch, logger)));
      documentTail = documentWrite;
      track(pendingDocuments, documentWrite);

      const vectorsStarted = embedTail.then(() => startVectors(batch));
      embedTail = vectorsStarted;
      const vectorWrite = vectorsStarted.then(({ write }) => write);

      completions.push(
        Promise.all([vectorWrite, documentWrite]).then(([vectors, documents]) => {
          try {
            finishBatch(batch, vectors, documents);
          } catch (thrown) {
            callbackErrors.push(toError(thrown));
          }
        })
      );
    }
  } catch (thrown) {
    readError = toError(thrown);
    logger.error('failed to read chunk file', { error: readError.message });
  }

  await Promise.all(completions);

  report.recordsRead = stats.recordsRead;
  report.recordsSkipped = stats.recordsSkipped;
  report.durationMs = ctx.now() - started;
  if (readError || report.batchesAbandoned > 0) {
    report.state = 'abandoned';
  } else if (!interrupted) {
    report.state = 'completed';
  }

  logger.info(report.state === 'in-flight' ? 'file interrupted' : `file ${report.state}`, {
    records: report.recordsRead,
    skipped: report.recordsSkipped,
    cached: report.embeddedFromCache,
    computed: report.embeddedComputed,
    batches: report.batchesCompleted + report.batchesAbandoned,
    abandoned: report.batchesAbandoned,
  });

  const [callbackError] = callbackErrors;
  if (callbackError) {
    throw callbackError;
  }
  return report;
}

// ============================================================================
// RUN
// ============================================================================

export function summarize(reports: readonly FileReport[]): RunTotals {
  const totals: RunTotals = {
    files: reports.length,
    filesCompleted: 0,
    filesAbandoned: 0,
    recordsRead: 0,
    recordsSkipped: 0,
    embeddedFromCache: 0,
    embeddedComputed: 0,
    committedVectors: 0,
    committedDocuments: 0,
    batchesCompleted: 0,
    batchesAbandoned: 0,
    chunksAbandoned: 0,
  };

  for (const report of reports) {
    if (report.state === 'completed') totals.filesCompleted++;
    if (report.state === 'abandoned') totals.filesAbandoned++;
    totals.recordsRead += report.recordsRead;
    totals.recordsSkipped += report.recordsSkipped;
    totals.embeddedFromCache += report.embeddedFromCache;
    totals.embeddedComputed += report.embeddedComputed;
    totals.committedVectors += report.committedVectors;
    totals.committedDocuments += report.committedDocuments;
    totals.batchesCompleted += report.batchesCompleted;
    totals.batchesAbandoned += report.batchesAbandoned;
    totals.chunksAbandoned += report.abandonedChunkIds.length;
  }
  return totals;
}

/**
 * Run the insert pipeline over `files`.
 *
 * Per-file failures never halt other files: they end up as Abandoned batches
 * in the result. The returned promise rejects only when preparing the sinks
 * fails or a callback throws; after a callback error the other files still
 * run to the end first.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * process.once('SIGINT', () => controller.abort());
 *
 * const result = await runInsertPipeline({
 *   files: await discoverChunkFiles([config.paths.chunk_root], config.paths.chunk_root),
 *   client,
 *   writer,
 *   cache: new EmbeddingCache(50_000),
 *   batchSize: 64,
 *   maxParallelFiles: 4,
 *   maxPendingBatches: 4,
 *   maxConcurrencyPerFile: 4,
 *   signal: controller.signal,
 *   onFileComplete: (report) => ledger.recordFile(run.id, report),
 * });
 * ```
 */
export async function runInsertPipeline(options: InsertPipelineOptions): Promise<InsertRunResult> {
  const now = options.now ?? (() => performance.now());
  const started = now();
  const ctx: RunContext = {
    options,
    inFlight: options.inFlight ?? new InFlightEmbeddings(),
    logger: options.logger ?? silentLogger,
    now,
    stopped: false,
  };

  await options.writer.prepare();

  const reports = options.files.map(newReport);
  const admit = pLimit(options.maxParallelFiles);

  const settled = await Promise.allSettled(
    options.files.map((file, i) =>
      admit(async () => {
        if (options.signal?.aborted) {
          ctx.stopped = true;
          return;
        }
        options.onFileStart?.(file);
        const report = await processFile(file, ctx);
        reports[i] = report;
        options.onFileComplete?.(report);
      })
    )
  );

  let deferredCommit: DeferredCommitOutcome = { status: 'not-needed' };
  if (options.writer.documentsCommitMode === 'deferred') {
    const outcome = await options.writer.commitDocuments(ctx.logger);
    deferredCommit =
      outcome.status === 'committed' ? { status: 'committed' } : { status: 'failed', error: outcome.cause.message };
  }

  const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (failure) {
    throw toError(failure.reason);
  }

  const totals = summarize(reports);
  ctx.logger.info('insert run finished', {
    files: totals.files,
    completed: totals.filesCompleted,
    abandoned: totals.filesAbandoned,
    stopped: ctx.stopped,
  });

  return {
    files: reports,
    totals,
    deferredCommit,
    stopped: ctx.stopped,
    durationMs: now() - started,
  };
}
