/**
 * Embedding Transports
 *
 * One HTTP round trip per call: an ordered list of texts in, an ordered list of
 * vectors out. Retrying, batching and concurrency limits live in the
 * EmbeddingClient; a transport only knows its provider's wire format.
 */

import type { Dispatcher } from 'undici';
import { z } from 'zod';
import type { EmbeddingsConfig } from '../../config/schema.js';
import { TransientIOError } from '../../errors/index.js';
import { joinUrl, parseJsonBody, requestOk } from '../http.js';

/** Timeout for reachability probes */
export const PROBE_TIMEOUT_MS = 5_000;

export interface EmbeddingTransport {
  /** Provider name used in logs and errors */
  readonly provider: string;
  readonly model: string;
  /** Base URL, for startup error messages */
  readonly endpoint: string;
  embed(texts: readonly string[], timeoutMs: number): Promise<number[][]>;
  /** Resolve when the provider answers; throw otherwise */
  probe(): Promise<void>;
}

export interface TransportOptions {
  /** Bearer token for OpenAI-compatible APIs */
  apiKey?: string;
  dispatcher?: Dispatcher;
}

const VectorSchema = z.array(z.number());

function requireCount(provider: string, vectors: number[][], expected: number): number[][] {
  if (vectors.length !== expected) {
    throw new TransientIOError(
      `${provider} returned ${vectors.length} embeddings for ${expected} inputs`
    );
  }
  return vectors;
}

// ============================================================================
// OLLAMA
// ============================================================================

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(VectorSchema),
});

/**
 * Ollama `/api/embed` (batch endpoint, Ollama 0.3+).
 */
export class OllamaTransport implements EmbeddingTransport {
  readonly provider = 'ollama';

  constructor(
    readonly endpoint: string,
    readonly model: string,
    private readonly options: TransportOptions = {}
  ) {}

  async embed(texts: readonly string[], timeoutMs: number): Promise<number[][]> {
    const response = await requestOk(
      this.provider,
      joinUrl(this.endpoint, '/api/embed'),
      {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: texts }),
        timeoutMs,
        dispatcher: this.options.dispatcher,
      },
      'embedding'
    );
    const parsed = parseJsonBody(this.provider, response.body, OllamaEmbedResponseSchema);
    return requireCount(this.provider, parsed.embeddings, texts.length);
  }

  async probe(): Promise<void> {
    await requestOk(
      this.provider,
      joinUrl(this.endpoint, '/api/tags'),
      { method: 'GET', timeoutMs: PROBE_TIMEOUT_MS, dispatcher: this.options.dispatcher },
      'embedding'
    );
  }
}

// ============================================================================
// OPENAI-COMPATIBLE
// ============================================================================

const OpenAIEmbedResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: VectorSchema,
    })
  ),
});

/**
 * Any server exposing OpenAI's `/v1/embeddings` (OpenAI, vLLM, LM Studio,
 * llama.cpp server, ...). Results are reordered by their `index` field.
 */
export class OpenAICompatibleTransport implements EmbeddingTransport {
  readonly provider = 'openai';

  constructor(
    readonly endpoint: string,
    readonly model: string,
    private readonly options: TransportOptions = {}
  ) {}

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (this.options.apiKey) {
      headers.authorization = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }

  async embed(texts: readonly string[], timeoutMs: number): Promise<number[][]> {
    const response = await requestOk(
      this.provider,
      joinUrl(this.endpoint, '/v1/embeddings'),
      {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ model: this.model, input: texts }),
        timeoutMs,
        dispatcher: this.options.dispatcher,
      },
      'embedding'
    );
    const parsed = parseJsonBody(this.provider, response.body, OpenAIEmbedResponseSchema);

    const ordered = new Array<number[] | undefined>(texts.length).fill(undefined);
    for (const item of parsed.data) {
      if (item.index >= texts.length || ordered[item.index] !== undefined) {
        throw new TransientIOError(`${this.provider} returned an unexpected embedding index ${item.index}`);
      }
      ordered[item.index] = item.embedding;
    }

    const vectors = ordered.filter((vector): vector is number[] => vector !== undefined);
    return requireCount(this.provider, vectors, texts.length);
  }

  async probe(): Promise<void> {
    await requestOk(
      this.provider,
      joinUrl(this.endpoint, '/v1/models'),
      { method: 'GET', headers: this.headers(), timeoutMs: PROBE_TIMEOUT_MS, dispatcher: this.options.dispatcher },
      'embedding'
    );
  }
}

/**
 * Create the transport named by `[insert.embeddings] provider`.
 */
export function createEmbeddingTransport(
  config: EmbeddingsConfig,
  options: TransportOptions = {}
): EmbeddingTransport {
  switch (config.provider) {
    case 'ollama':
      return new OllamaTransport(config.base_url, config.model, options);
    case 'openai':
      return new OpenAICompatibleTransport(config.base_url, config.model, options);
  }
}
