/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, _clearEnvCache } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('VECTOR_STORE_API_KEY', '');
    vi.stubEnv('EMBEDDING_API_KEY', '');
    vi.stubEnv('CORPUS_INGEST_LOG_LEVEL', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('loads the vector store key', () => {
    vi.stubEnv('VECTOR_STORE_API_KEY', 'test-secret');

    expect(loadEnv().VECTOR_STORE_API_KEY).toBe('test-secret');
  });

  it('loads the embedding key through getEnv', () => {
    vi.stubEnv('EMBEDDING_API_KEY', '  test-secret  ');

    expect(getEnv('EMBEDDING_API_KEY')).toBe('test-secret');
  });

  it('treats empty values as unset', () => {
    const env = loadEnv();

    expect(env.VECTOR_STORE_API_KEY).toBeUndefined();
    expect(env.EMBEDDING_API_KEY).toBeUndefined();
    expect(env.CORPUS_INGEST_LOG_LEVEL).toBeUndefined();
  });

  it('accepts a log level in any case', () => {
    vi.stubEnv('CORPUS_INGEST_LOG_LEVEL', 'DEBUG');

    expect(loadEnv().CORPUS_INGEST_LOG_LEVEL).toBe('debug');
  });

  it('ignores an unknown log level but keeps the keys', () => {
    vi.stubEnv('CORPUS_INGEST_LOG_LEVEL', 'verbose');
    vi.stubEnv('VECTOR_STORE_API_KEY', 'test-secret');

    const env = loadEnv();

    expect(env.CORPUS_INGEST_LOG_LEVEL).toBeUndefined();
    expect(env.VECTOR_STORE_API_KEY).toBe('test-secret');
  });

  it('caches values after the first load', () => {
    vi.stubEnv('VECTOR_STORE_API_KEY', 'first');
    loadEnv();
    vi.stubEnv('VECTOR_STORE_API_KEY', 'second');

    expect(loadEnv().VECTOR_STORE_API_KEY).toBe('first');

    _clearEnvCache();
    expect(loadEnv().VECTOR_STORE_API_KEY).toBe('second');
  });
});
