/**
 * Embedder Module
 *
 * @example
 * ```typescript
 * const transport = createEmbeddingTransport(config.insert.embeddings);
 * const client = new EmbeddingClient({
 *   transport,
 *   requestBatchSize: 16,
 *   maxInputChars: 8000,
 *   requestTimeoutMs: 120_000,
 *   globalMaxConcurrency: 8,
 *   retry: { retryMax: 5, backoffMs: 500, backoffMaxMs: 30_000 },
 * });
 *
 * const slots = await client.embed(['first chunk', 'second chunk']);
 * ```
 */

export { EmbeddingClient, createFileLimit } from './client.js';
export type { EmbeddingClientOptions, EmbedCallOptions, EmbeddingClientStats } from './client.js';

export {
  OllamaTransport,
  OpenAICompatibleTransport,
  createEmbeddingTransport,
  PROBE_TIMEOUT_MS,
} from './transport.js';
export type { EmbeddingTransport, TransportOptions } from './transport.js';
