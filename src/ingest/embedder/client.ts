/**
 * Embedding Client
 *
 * Turns an ordered list of texts into an ordered list of result slots of the
 * same length. Internally:
 * 1. Over-long texts are truncated to `max_input_chars` (logged)
 * 2. Texts are split into requests of `request_batch_size`
 * 3. Each request runs under the caller's per-file limit AND the process-wide
 *    limit, so in-flight requests never exceed `global_max_concurrency`
 * 4. A failed request is retried with backoff; when retries run out only the
 *    slots of that request fail, other requests are unaffected
 *
 * The client never caches. The orchestrator owns the cache because only it
 * knows which records share a fingerprint.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import type { EmbeddingSlot } from '../cache.js';
import { truncateText } from '../identity.js';
import { withRetry, systemScheduler, type RetryPolicy, type Scheduler } from '../retry.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import type { EmbeddingTransport } from './transport.js';

export interface EmbeddingClientOptions {
  transport: EmbeddingTransport;
  /** Texts per request */
  requestBatchSize: number;
  /** Longer texts are cut to this many characters */
  maxInputChars: number;
  /** Timeout of a single request */
  requestTimeoutMs: number;
  /** Process-wide cap on in-flight requests */
  globalMaxConcurrency: number;
  retry: RetryPolicy;
  scheduler?: Scheduler;
  logger?: Logger;
}

export interface EmbedCallOptions {
  /** Per-file cap on in-flight requests (see createFileLimit) */
  fileLimit?: LimitFunction;
  /** Logger carrying the caller's file context */
  logger?: Logger;
}

export interface EmbeddingClientStats {
  /** Requests sent, retries included */
  requests: number;
  /** Requests that failed (each failed attempt counts) */
  failedRequests: number;
  /** Requests that failed for good after exhausting retries */
  abandonedRequests: number;
  /** Texts embedded successfully */
  texts: number;
  truncatedTexts: number;
  /** Highest number of requests observed in flight at once */
  peakInFlight: number;
}

export class EmbeddingClient {
  private readonly transport: EmbeddingTransport;
  private readonly globalLimit: LimitFunction;
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private inFlight = 0;
  private readonly counters: EmbeddingClientStats = {
    requests: 0,
    failedRequests: 0,
    abandonedRequests: 0,
    texts: 0,
    truncatedTexts: 0,
    peakInFlight: 0,
  };

  constructor(private readonly options: EmbeddingClientOptions) {
    if (options.requestBatchSize < 1) {
      throw new RangeError('requestBatchSize must be at least 1');
    }
    this.transport = options.transport;
    this.globalLimit = pLimit(options.globalMaxConcurrency);
    this.scheduler = options.scheduler ?? systemScheduler;
    this.logger = options.logger ?? silentLogger;
  }

  get model(): string {
    return this.transport.model;
  }

  /**
   * Embed `texts`, returning one slot per text in the same order.
   */
  async embed(texts: readonly string[], options: EmbedCallOptions = {}): Promise<EmbeddingSlot[]> {
    if (texts.length === 0) {
      return [];
    }
    const logger = options.logger ?? this.logger;

    const prepared = texts.map((text) => {
      const result = truncateText(text, this.options.maxInputChars);
      if (result.truncated) {
        this.counters.truncatedTexts++;
        logger.warn('truncating embedding input', {
          op: 'embed',
          chars: Array.from(text).length,
          max_input_chars: this.options.maxInputChars,
        });
      }
      return result.text;
    });

    const groups: string[][] = [];
    for (let i = 0; i < prepared.length; i += this.options.requestBatchSize) {
      groups.push(prepared.slice(i, i + this.options.requestBatchSize));
    }

    const results = await Promise.all(
      groups.map((group) => this.embedGroup(group, options.fileLimit, logger))
    );
    return results.flat();
  }

  /**
   * Reachability check used at startup.
   */
  probe(): Promise<void> {
    return this.transport.probe();
  }

  stats(): EmbeddingClientStats {
    return { ...this.counters };
  }

  private async embedGroup(
    texts: string[],
    fileLimit: LimitFunction | undefined,
    logger: Logger
  ): Promise<EmbeddingSlot[]> {
    const send = (): Promise<number[][]> => this.globalLimit(() => this.send(texts));

    const result = await withRetry(() => (fileLimit ? fileLimit(send) : send()), {
      policy: this.options.retry,
      scheduler: this.scheduler,
      onRetry: (attempt, cause, delayMs) => {
        logger.warn('embedding request failed, retrying', {
          op: 'embed',
          attempt,
          texts: texts.length,
          delay_ms: delayMs,
          error: cause.message,
        });
      },
    });

    if (result.ok) {
      this.counters.texts += texts.length;
      return result.value.map((vector) => ({ ok: true, vector }));
    }

    this.counters.abandonedRequests++;
    logger.error('embedding request abandoned', {
      op: 'embed',
      attempts: result.attempts,
      texts: texts.length,
      error: result.error.message,
    });
    const error = result.error;
    return texts.map(() => ({ ok: false, error }));
  }

  private async send(texts: string[]): Promise<number[][]> {
    this.inFlight++;
    this.counters.requests++;
    this.counters.peakInFlight = Math.max(this.counters.peakInFlight, this.inFlight);
    try {
      return await this.transport.embed(texts, this.options.requestTimeoutMs);
    } catch (error) {
      this.counters.failedRequests++;
      throw error;
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Limit for the embedding requests of one file (`max_concurrency`).
 */
export function createFileLimit(maxConcurrency: number): LimitFunction {
  return pLimit(maxConcurrency);
}
