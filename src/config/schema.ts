/**
 * Configuration Schema
 *
 * Defines the shape of config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.describe('Minimum log level (debug, info, warn, error)'),
});

export const PathsConfigSchema = z.object({
  chunk_root: z.string().min(1).describe('Directory scanned for *.jsonl chunk files'),
  state_dir: z.string().min(1).describe('Directory holding the run ledger database'),
});

/**
 * Metadata inclusion policy.
 * Controls which optional record metadata reaches the sinks.
 */
export const MetadataConfigSchema = z.object({
  include_source_path: z.boolean(),
  include_title: z.boolean(),
  include_authors: z.boolean(),
  include_language: z.boolean(),
  include_published: z.boolean(),
});

export const DistanceSchema = z.enum(['Cosine', 'Dot', 'Euclid', 'Manhattan']);

/**
 * Vector store: Qdrant over HTTP, or a local SQLite file
 */
export const VectorStoreConfigSchema = z.object({
  backend: z.enum(['qdrant', 'sqlite']).describe('qdrant (HTTP) or sqlite (local file)'),
  url: z.string().url().describe('Qdrant base URL'),
  path: z.string().min(1).describe('SQLite file for the sqlite backend'),
  collection: z.string().min(1).describe('Collection receiving the points'),
  vector_size: z.number().int().positive().describe('Embedding dimensionality'),
  distance: DistanceSchema.describe('Distance metric of the collection'),
  create_collection: z.boolean().describe('Create the collection before the first write if absent'),
  api_key: z.string().optional().describe('Qdrant api-key header (or VECTOR_STORE_API_KEY)'),
});

/**
 * Keyword index: Quickwit over HTTP, or a local SQLite FTS5 file
 */
export const SearchIndexConfigSchema = z.object({
  backend: z.enum(['quickwit', 'sqlite']).describe('quickwit (HTTP) or sqlite (local FTS5 file)'),
  url: z.string().url().describe('Quickwit base URL'),
  path: z.string().min(1).describe('SQLite file for the sqlite backend'),
  index_id: z.string().min(1).describe('Index receiving the documents'),
  commit_mode: z
    .enum(['immediate', 'deferred'])
    .describe('Commit every batch, or once at the end of the run'),
  commit_timeout_seconds: z.number().int().positive().max(3600),
  replace_existing: z
    .boolean()
    .describe('Quickwit: delete earlier copies of a batch by id before ingesting it'),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['ollama', 'openai']).describe('ollama, or any OpenAI-compatible /v1/embeddings API'),
  base_url: z.string().url(),
  model: z.string().min(1),
  request_timeout_seconds: z.number().positive().max(3600),
  max_concurrency: z
    .number()
    .int()
    .min(1)
    .max(256)
    .describe('In-flight embedding requests allowed per file'),
  max_input_chars: z.number().int().positive().describe('Longer texts are truncated before sending'),
  global_max_concurrency: z
    .number()
    .int()
    .min(1)
    .max(1024)
    .describe('In-flight embedding requests allowed across the whole process'),
  request_batch_size: z.number().int().min(1).max(2048).describe('Texts sent per embedding request'),
  cache_max_entries: z.number().int().min(1).describe('Capacity of the in-memory embedding cache'),
});

export const InsertConfigSchema = z.object({
  batch_size: z.number().int().min(1).max(10000),
  retry_max: z.number().int().min(0).max(100).describe('Retries after the first attempt'),
  retry_backoff_ms: z.number().int().min(0).describe('First backoff delay, doubled per retry'),
  retry_backoff_max_ms: z.number().int().min(0).describe('Ceiling for a single backoff delay'),
  max_parallel_files: z.number().int().min(1).max(256),
  max_pending_batches: z
    .number()
    .int()
    .min(1)
    .max(256)
    .describe('Per file and per sink: batches whose write to that sink may still be running'),
  metadata: MetadataConfigSchema,
  vector_store: VectorStoreConfigSchema,
  search_index: SearchIndexConfigSchema,
  embeddings: EmbeddingsConfigSchema,
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  logging: LoggingConfigSchema,
  paths: PathsConfigSchema,
  insert: InsertConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type InsertConfig = z.infer<typeof InsertConfigSchema>;
export type MetadataConfig = z.infer<typeof MetadataConfigSchema>;
export type VectorStoreConfig = z.infer<typeof VectorStoreConfigSchema>;
export type SearchIndexConfig = z.infer<typeof SearchIndexConfigSchema>;
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;
export type Distance = z.infer<typeof DistanceSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
