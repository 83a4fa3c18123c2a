/**
 * Embedding Cache
 *
 * In-memory, content-addressed store mapping a text fingerprint to its vector.
 * One instance is shared by every file of a run and threaded through the
 * pipeline explicitly.
 *
 * Recency is tracked by Map insertion order: a hit moves the entry to the
 * end, so the first key is always the least recently used. Entries with equal
 * `lastUsed` timestamps therefore evict in insertion order.
 */

export interface CacheEntry {
  readonly key: string;
  readonly vector: readonly number[];
  lastUsed: number;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  inserts: number;
  evictions: number;
}

export class EmbeddingCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private inserts = 0;
  private evictions = 0;

  constructor(
    private readonly capacity: number,
    private readonly clock: () => number = Date.now
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Return the cached vector for `key`, marking it most recently used.
   */
  lookup(key: string): readonly number[] | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    entry.lastUsed = this.clock();
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.vector;
  }

  /**
   * Store a vector for `key`. A key that is already present keeps its
   * first value; the call is a no-op and returns false.
   */
  insert(key: string, vector: readonly number[]): boolean {
    if (this.entries.has(key)) {
      return false;
    }

    this.entries.set(key, { key, vector, lastUsed: this.clock() });
    this.inserts++;

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    return true;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Keys from least to most recently used */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      inserts: this.inserts,
      evictions: this.evictions,
    };
  }
}

// ============================================================================
// SINGLE-FLIGHT
// ============================================================================

/**
 * Result slot of one text handed to the embedding client.
 */
export type EmbeddingSlot =
  | { readonly ok: true; readonly vector: readonly number[] }
  | { readonly ok: false; readonly error: Error };

interface PendingEmbedding {
  readonly promise: Promise<EmbeddingSlot>;
  readonly settle: (slot: EmbeddingSlot) => void;
}

/**
 * Tracks fingerprints whose embedding request is already in flight, so that a
 * concurrent miss for the same text waits for that request instead of
 * issuing its own. Promises here resolve with a slot and never reject.
 */
export class InFlightEmbeddings {
  private readonly pending = new Map<string, PendingEmbedding>();

  /** Promise of the in-flight embedding for `key`, if one exists */
  get(key: string): Promise<EmbeddingSlot> | undefined {
    return this.pending.get(key)?.promise;
  }

  /**
   * Register the caller as the owner of `key` and return the promise other
   * callers will wait on. The owner must call `settle(key, slot)` exactly once.
   */
  claim(key: string): Promise<EmbeddingSlot> {
    if (this.pending.has(key)) {
      throw new Error(`Embedding for ${key} is already in flight`);
    }
    let settle: (slot: EmbeddingSlot) => void = () => {};
    const promise = new Promise<EmbeddingSlot>((resolve) => {
      settle = resolve;
    });
    this.pending.set(key, { promise, settle });
    return promise;
  }

  settle(key: string, slot: EmbeddingSlot): void {
    const entry = this.pending.get(key);
    if (!entry) return;
    this.pending.delete(key);
    entry.settle(slot);
  }

  get size(): number {
    return this.pending.size;
  }
}
