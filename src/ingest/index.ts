/**
 * Ingest Module
 *
 * Chunk files in, vectors and documents out:
 * source → cache/embedding client → dual-sink writer, driven by the pipeline.
 */

export { runInsertPipeline, summarize, type InsertPipelineOptions } from './pipeline.js';
export { createIngestComponents, retryPolicy, type IngestComponents, type IngestComponentOptions } from './setup.js';

export { EmbeddingCache, InFlightEmbeddings, type CacheEntry, type CacheStats, type EmbeddingSlot } from './cache.js';
export { DualSinkWriter, selectMetadata, toVectorPoint, toSearchDocument, validateVectors } from './writer.js';
export type { DualSinkWriterOptions } from './writer.js';

export {
  discoverChunkFiles,
  parseChunkLine,
  readChunkRecords,
  batchRecords,
  CHUNK_FILE_PATTERN,
  RawChunkRecordSchema,
  type ChunkFile,
  type ParseResult,
  type SourceStats,
} from './source.js';

export { normalizeText, fingerprint, chunkId, truncateText, CHUNK_ID_NAMESPACE } from './identity.js';
export { decideRetry, backoffDelay, withRetry, systemScheduler } from './retry.js';
export type { RetryPolicy, RetryDecision, RetryResult, Scheduler } from './retry.js';

export * from './embedder/index.js';
export * from './sinks/index.js';
export * from './types.js';
