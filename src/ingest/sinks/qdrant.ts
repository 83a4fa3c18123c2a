/**
 * Qdrant vector store over its REST API.
 *
 * - create collection: PUT /collections/{name}  {vectors: {size, distance}}
 * - upsert:            PUT /collections/{name}/points?wait=true  {points}
 * - probe:             GET /
 */

import type { Dispatcher } from 'undici';
import type { Distance, VectorStoreConfig } from '../../config/schema.js';
import { DEFAULT_SINK_TIMEOUT_MS, assertOk, joinUrl, requestOk, sendRequest } from '../http.js';
import { PROBE_TIMEOUT_MS } from '../embedder/transport.js';
import type { VectorPoint, VectorSink } from './types.js';

export interface QdrantOptions {
  /** Overrides `api_key` from the config */
  apiKey?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

export class QdrantVectorStore implements VectorSink {
  readonly name = 'qdrant';
  readonly collection: string;
  readonly dimension: number;
  readonly distance: Distance;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private collectionReady: Promise<void> | null = null;

  constructor(
    private readonly config: VectorStoreConfig,
    private readonly options: QdrantOptions = {}
  ) {
    this.collection = config.collection;
    this.dimension = config.vector_size;
    this.distance = config.distance;
    this.apiKey = options.apiKey ?? config.api_key;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SINK_TIMEOUT_MS;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.apiKey) {
      headers['api-key'] = this.apiKey;
    }
    return headers;
  }

  private collectionUrl(suffix = ''): string {
    return joinUrl(this.config.url, `/collections/${encodeURIComponent(this.collection)}${suffix}`);
  }

  /**
   * Create the collection once per process; an existing collection is fine.
   */
  ensureCollection(): Promise<void> {
    if (!this.config.create_collection) {
      return Promise.resolve();
    }
    if (!this.collectionReady) {
      this.collectionReady = this.createCollection().catch((error: unknown) => {
        this.collectionReady = null;
        throw error;
      });
    }
    return this.collectionReady;
  }

  private async createCollection(): Promise<void> {
    const response = await sendRequest(this.name, this.collectionUrl(), {
      method: 'PUT',
      headers: this.headers(),
      body: JSON.stringify({ vectors: { size: this.dimension, distance: this.distance } }),
      timeoutMs: this.timeoutMs,
      dispatcher: this.options.dispatcher,
    });

    const alreadyExists =
      response.status === 409 || (response.status === 400 && /already exists/i.test(response.body));
    if (!alreadyExists) {
      assertOk(this.name, response, 'sink');
    }
  }

  async upsert(points: readonly VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    await requestOk(this.name, this.collectionUrl('/points?wait=true'), {
      method: 'PUT',
      headers: this.headers(),
      body: JSON.stringify({ points }),
      timeoutMs: this.timeoutMs,
      dispatcher: this.options.dispatcher,
    });
  }

  async probe(): Promise<void> {
    await requestOk(this.name, joinUrl(this.config.url, '/'), {
      method: 'GET',
      headers: this.headers(),
      timeoutMs: PROBE_TIMEOUT_MS,
      dispatcher: this.options.dispatcher,
    });
  }

  close(): void {
    // stateless HTTP client
  }
}
