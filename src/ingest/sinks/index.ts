/**
 * Sinks Module
 *
 * Builds the configured vector store and search index.
 */

import type { Dispatcher } from 'undici';
import type { InsertConfig } from '../../config/schema.js';
import { QdrantVectorStore } from './qdrant.js';
import { QuickwitIndex } from './quickwit.js';
import { SqliteVectorStore } from './sqlite-vector-store.js';
import { SqliteSearchIndex } from './sqlite-search-index.js';
import type { SearchSink, VectorSink } from './types.js';

export interface SinkOptions {
  /** Qdrant api-key (VECTOR_STORE_API_KEY) */
  vectorStoreApiKey?: string;
  dispatcher?: Dispatcher;
}

export interface Sinks {
  vectors: VectorSink;
  documents: SearchSink;
  close(): void;
}

export function createVectorSink(config: InsertConfig['vector_store'], options: SinkOptions = {}): VectorSink {
  switch (config.backend) {
    case 'qdrant':
      return new QdrantVectorStore(config, { apiKey: options.vectorStoreApiKey, dispatcher: options.dispatcher });
    case 'sqlite':
      return SqliteVectorStore.open(config);
  }
}

export function createSearchSink(config: InsertConfig['search_index'], options: SinkOptions = {}): SearchSink {
  switch (config.backend) {
    case 'quickwit':
      return new QuickwitIndex(config, { dispatcher: options.dispatcher });
    case 'sqlite':
      return SqliteSearchIndex.open(config);
  }
}

/**
 * Create both sinks from `[insert]`.
 */
export function createSinks(config: InsertConfig, options: SinkOptions = {}): Sinks {
  const vectors = createVectorSink(config.vector_store, options);
  const documents = createSearchSink(config.search_index, options);
  return {
    vectors,
    documents,
    close: () => {
      vectors.close();
      documents.close();
    },
  };
}

export { QdrantVectorStore, type QdrantOptions } from './qdrant.js';
export { QuickwitIndex, type QuickwitOptions } from './quickwit.js';
export { SqliteVectorStore, mapSqliteError, type StoredPoint } from './sqlite-vector-store.js';
export { SqliteSearchIndex, type SearchHit } from './sqlite-search-index.js';
export type { VectorSink, SearchSink, VectorPoint, SearchDocument, CommitMode } from './types.js';
