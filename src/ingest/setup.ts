/**
 * Ingest Setup
 *
 * Builds the run's components from `[insert]`: transport, embedding client,
 * sinks, writer and the shared cache. Everything is constructed here and
 * handed to the pipeline explicitly; nothing is a module-level singleton.
 */

import type { Dispatcher } from 'undici';
import type { InsertConfig } from '../config/schema.js';
import type { EndpointProbe } from '../config/startup-validation.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { EmbeddingCache, InFlightEmbeddings } from './cache.js';
import { EmbeddingClient, createEmbeddingTransport } from './embedder/index.js';
import type { RetryPolicy, Scheduler } from './retry.js';
import { createSinks, type Sinks } from './sinks/index.js';
import { toMetadataPolicy, type Batch, type SinkKind, type WriteOutcome } from './types.js';
import { DualSinkWriter } from './writer.js';

export interface IngestComponentOptions {
  logger?: Logger;
  /** undici dispatcher for every HTTP backend (tests pass a MockAgent) */
  dispatcher?: Dispatcher;
  scheduler?: Scheduler;
  vectorStoreApiKey?: string;
  embeddingApiKey?: string;
  onOutcome?: (kind: SinkKind, batch: Batch, outcome: WriteOutcome) => void;
}

export interface IngestComponents {
  client: EmbeddingClient;
  writer: DualSinkWriter;
  sinks: Sinks;
  cache: EmbeddingCache;
  inFlight: InFlightEmbeddings;
  /** One probe per configured backend, for startup validation */
  probes: EndpointProbe[];
  close(): void;
}

export function retryPolicy(config: InsertConfig): RetryPolicy {
  return {
    retryMax: config.retry_max,
    backoffMs: config.retry_backoff_ms,
    backoffMaxMs: config.retry_backoff_max_ms,
  };
}

/**
 * Wire up everything an insert run needs.
 *
 * @example
 * ```typescript
 * const components = createIngestComponents(config.insert, { logger });
 * try {
 *   await assertStartupConfig(config, components.probes, logger);
 *   await runInsertPipeline({ ...components, files, batchSize: config.insert.batch_size, ... });
 * } finally {
 *   components.close();
 * }
 * ```
 */
export function createIngestComponents(
  config: InsertConfig,
  options: IngestComponentOptions = {}
): IngestComponents {
  const logger = options.logger ?? silentLogger;
  const retry = retryPolicy(config);
  const { embeddings, vector_store, search_index } = config;

  const transport = createEmbeddingTransport(embeddings, {
    apiKey: options.embeddingApiKey,
    dispatcher: options.dispatcher,
  });
  const client = new EmbeddingClient({
    transport,
    requestBatchSize: embeddings.request_batch_size,
    maxInputChars: embeddings.max_input_chars,
    requestTimeoutMs: embeddings.request_timeout_seconds * 1000,
    globalMaxConcurrency: embeddings.global_max_concurrency,
    retry,
    scheduler: options.scheduler,
    logger,
  });

  const sinks = createSinks(config, {
    vectorStoreApiKey: options.vectorStoreApiKey,
    dispatcher: options.dispatcher,
  });
  const writer = new DualSinkWriter({
    vectors: sinks.vectors,
    documents: sinks.documents,
    metadata: toMetadataPolicy(config.metadata),
    retry,
    scheduler: options.scheduler,
    logger,
    onOutcome: options.onOutcome,
  });

  const probes: EndpointProbe[] = [
    { name: transport.provider, target: transport.endpoint, probe: () => client.probe() },
    {
      name: sinks.vectors.name,
      target: vector_store.backend === 'sqlite' ? vector_store.path : vector_store.url,
      probe: () => sinks.vectors.probe(),
    },
    {
      name: sinks.documents.name,
      target: search_index.backend === 'sqlite' ? search_index.path : search_index.url,
      probe: () => sinks.documents.probe(),
    },
  ];

  return {
    client,
    writer,
    sinks,
    cache: new EmbeddingCache(embeddings.cache_max_entries),
    inFlight: new InFlightEmbeddings(),
    probes,
    close: () => sinks.close(),
  };
}
