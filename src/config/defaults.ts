/**
 * Default Configuration Values
 *
 * Used when no config.toml exists yet, or when it omits fields.
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';
import { STATE_DIR } from './paths.js';
import { join } from 'node:path';

/**
 * Default configuration
 * Local Ollama + Qdrant + Quickwit on their stock ports
 */
export const DEFAULT_CONFIG: Config = {
  logging: {
    level: 'info',
  },

  paths: {
    chunk_root: './chunked',
    state_dir: STATE_DIR,
  },

  insert: {
    batch_size: 64,
    retry_max: 5,
    retry_backoff_ms: 500,
    retry_backoff_max_ms: 30000,
    max_parallel_files: 4,
    max_pending_batches: 4,

    metadata: {
      include_source_path: true,
      include_title: true,
      include_authors: true,
      include_language: true,
      include_published: true,
    },

    vector_store: {
      backend: 'qdrant',
      url: 'http://localhost:6333',
      path: join(STATE_DIR, 'vectors.db'),
      collection: 'chunks',
      vector_size: 768, // nomic-embed-text
      distance: 'Cosine',
      create_collection: true,
    },

    search_index: {
      backend: 'quickwit',
      url: 'http://localhost:7280',
      path: join(STATE_DIR, 'documents.db'),
      index_id: 'chunks',
      commit_mode: 'immediate',
      commit_timeout_seconds: 30,
      replace_existing: true,
    },

    embeddings: {
      provider: 'ollama',
      base_url: 'http://localhost:11434',
      model: 'nomic-embed-text',
      request_timeout_seconds: 120,
      max_concurrency: 4,
      max_input_chars: 8000,
      global_max_concurrency: 8,
      request_batch_size: 16,
      cache_max_entries: 50000,
    },
  },
};

/**
 * Config file template (TOML format)
 * Written to the default config path on first run
 */
export const CONFIG_TEMPLATE = `# corpus-ingest configuration

[logging]
level = "${DEFAULT_CONFIG.logging.level}"   # debug | info | warn | error

[paths]
chunk_root = "${DEFAULT_CONFIG.paths.chunk_root}"   # scanned for *.jsonl chunk files
state_dir = "${DEFAULT_CONFIG.paths.state_dir}"

[insert]
batch_size = ${DEFAULT_CONFIG.insert.batch_size}
retry_max = ${DEFAULT_CONFIG.insert.retry_max}              # retries after the first attempt
retry_backoff_ms = ${DEFAULT_CONFIG.insert.retry_backoff_ms}       # doubled on every retry
retry_backoff_max_ms = ${DEFAULT_CONFIG.insert.retry_backoff_max_ms}
max_parallel_files = ${DEFAULT_CONFIG.insert.max_parallel_files}
max_pending_batches = ${DEFAULT_CONFIG.insert.max_pending_batches}

[insert.metadata]
include_source_path = ${DEFAULT_CONFIG.insert.metadata.include_source_path}
include_title = ${DEFAULT_CONFIG.insert.metadata.include_title}
include_authors = ${DEFAULT_CONFIG.insert.metadata.include_authors}
include_language = ${DEFAULT_CONFIG.insert.metadata.include_language}
include_published = ${DEFAULT_CONFIG.insert.metadata.include_published}

# backend = "sqlite" keeps vectors in a local file instead of Qdrant
[insert.vector_store]
backend = "${DEFAULT_CONFIG.insert.vector_store.backend}"
url = "${DEFAULT_CONFIG.insert.vector_store.url}"
path = "${DEFAULT_CONFIG.insert.vector_store.path}"
collection = "${DEFAULT_CONFIG.insert.vector_store.collection}"
vector_size = ${DEFAULT_CONFIG.insert.vector_store.vector_size}
distance = "${DEFAULT_CONFIG.insert.vector_store.distance}"   # Cosine | Dot | Euclid | Manhattan
create_collection = ${DEFAULT_CONFIG.insert.vector_store.create_collection}
# api_key = "..."   # or set VECTOR_STORE_API_KEY

# backend = "sqlite" keeps documents in a local FTS5 file instead of Quickwit
[insert.search_index]
backend = "${DEFAULT_CONFIG.insert.search_index.backend}"
url = "${DEFAULT_CONFIG.insert.search_index.url}"
path = "${DEFAULT_CONFIG.insert.search_index.path}"
index_id = "${DEFAULT_CONFIG.insert.search_index.index_id}"
commit_mode = "${DEFAULT_CONFIG.insert.search_index.commit_mode}"   # immediate | deferred
commit_timeout_seconds = ${DEFAULT_CONFIG.insert.search_index.commit_timeout_seconds}
# Quickwit only appends; this deletes a batch's ids before ingesting it so reruns don't duplicate
replace_existing = ${DEFAULT_CONFIG.insert.search_index.replace_existing}

[insert.embeddings]
provider = "${DEFAULT_CONFIG.insert.embeddings.provider}"   # ollama | openai
base_url = "${DEFAULT_CONFIG.insert.embeddings.base_url}"
model = "${DEFAULT_CONFIG.insert.embeddings.model}"
request_timeout_seconds = ${DEFAULT_CONFIG.insert.embeddings.request_timeout_seconds}
max_concurrency = ${DEFAULT_CONFIG.insert.embeddings.max_concurrency}          # per file
global_max_concurrency = ${DEFAULT_CONFIG.insert.embeddings.global_max_concurrency}   # whole process
max_input_chars = ${DEFAULT_CONFIG.insert.embeddings.max_input_chars}
request_batch_size = ${DEFAULT_CONFIG.insert.embeddings.request_batch_size}
cache_max_entries = ${DEFAULT_CONFIG.insert.embeddings.cache_max_entries}
`;
