/**
 * corpus-ingest
 *
 * Library entry point. The CLI (`corpus-ingest`) is a thin layer over these
 * exports; programs can drive an insert run directly:
 *
 * @example
 * ```typescript
 * import { loadConfig, createIngestComponents, discoverChunkFiles, runInsertPipeline } from 'corpus-ingest';
 *
 * const config = loadConfig();
 * const components = createIngestComponents(config.insert);
 * try {
 *   const result = await runInsertPipeline({
 *     ...components,
 *     files: await discoverChunkFiles([config.paths.chunk_root], config.paths.chunk_root),
 *     batchSize: config.insert.batch_size,
 *     maxParallelFiles: config.insert.max_parallel_files,
 *     maxPendingBatches: config.insert.max_pending_batches,
 *     maxConcurrencyPerFile: config.insert.embeddings.max_concurrency,
 *   });
 *   console.log(result.totals);
 * } finally {
 *   components.close();
 * }
 * ```
 */

export * from './ingest/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export { RunLedger, type Run, type RunStatus, type FileRun, type AbandonedBatch } from './database/index.js';
export { createConsoleLogger, withContext, silentLogger, type Logger, type LogLevel, type LogContext } from './utils/logger.js';
