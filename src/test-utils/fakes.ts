/**
 * Test Utilities - In-Process Fakes
 *
 * Stand-ins for the embedding provider, the two sinks and the clock, so the
 * client, writer and pipeline run in tests without a network or a timer.
 */

import type { Scheduler } from '../ingest/retry.js';
import type { EmbeddingTransport } from '../ingest/embedder/transport.js';
import type { CommitMode, SearchDocument, SearchSink, VectorPoint, VectorSink } from '../ingest/sinks/types.js';
import type { Distance } from '../config/schema.js';
import type { LogContext, Logger, LogLevel } from '../utils/logger.js';

// ============================================================================
// SCHEDULER
// ============================================================================

export interface FakeScheduler extends Scheduler {
  /** Every requested delay, in call order */
  readonly sleeps: number[];
}

/**
 * Scheduler whose sleep resolves at once and only records the delay.
 */
export function createFakeScheduler(): FakeScheduler {
  const sleeps: number[] = [];
  let clock = 0;
  return {
    sleeps,
    now: () => clock,
    sleep: (ms) => {
      sleeps.push(ms);
      clock += ms;
      return Promise.resolve();
    },
  };
}

/**
 * Let pending promise callbacks and short timers run.
 */
export function tick(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// LOGGER
// ============================================================================

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
}

export interface RecordingLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, context: LogContext = {}): void => {
      entries.push({ level, message, context });
    };
  return {
    entries,
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.message),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

// ============================================================================
// EMBEDDING TRANSPORT
// ============================================================================

export interface FakeTransportOptions {
  dimension?: number;
  model?: string;
  /** Real delay per request, so concurrent requests overlap */
  delayMs?: number;
}

/**
 * Deterministic vector for a text: its length, then its first code unit,
 * then ones.
 */
export function fakeVector(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(1);
  vector[0] = text.length;
  if (dimension > 1) vector[1] = text.charCodeAt(0);
  return vector;
}

export class FakeTransport implements EmbeddingTransport {
  readonly provider = 'fake';
  readonly endpoint = 'http://embeddings.test';
  readonly model: string;
  readonly dimension: number;
  /** Texts of every request, in send order */
  readonly calls: string[][] = [];
  peakInFlight = 0;
  probeError: Error | undefined;

  private inFlight = 0;
  private readonly delayMs: number;
  private readonly failures: Error[] = [];
  private failWhen: ((texts: readonly string[]) => Error | undefined) | undefined;

  constructor(options: FakeTransportOptions = {}) {
    this.dimension = options.dimension ?? 4;
    this.model = options.model ?? 'fake-model';
    this.delayMs = options.delayMs ?? 0;
  }

  /** Fail the next requests, one error per request */
  failNext(...errors: Error[]): this {
    this.failures.push(...errors);
    return this;
  }

  /** Fail every request for which `rule` returns an error */
  failIf(rule: (texts: readonly string[]) => Error | undefined): this {
    this.failWhen = rule;
    return this;
  }

  get texts(): string[] {
    return this.calls.flat();
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      await tick(this.delayMs);
      const failure = this.failures.shift() ?? this.failWhen?.(texts);
      if (failure) {
        throw failure;
      }
      return texts.map((text) => fakeVector(text, this.dimension));
    } finally {
      this.inFlight--;
    }
  }

  async probe(): Promise<void> {
    if (this.probeError) throw this.probeError;
  }
}

// ============================================================================
// SINKS
// ============================================================================

export class FakeVectorSink implements VectorSink {
  readonly name = 'fake-vectors';
  readonly collection = 'test-collection';
  readonly distance: Distance = 'Cosine';
  readonly points = new Map<string, VectorPoint>();
  /** Points of every acknowledged upsert, in order */
  readonly upserts: VectorPoint[][] = [];
  attempts = 0;
  ensureCalls = 0;
  closed = false;

  private readonly failures: Error[] = [];
  private failWhen: ((points: readonly VectorPoint[]) => Error | undefined) | undefined;
  private gate: Promise<void> | undefined;

  constructor(readonly dimension = 4) {}

  /** Hold every upsert until the returned function is called */
  hold(): () => void {
    let release = (): void => {};
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = undefined;
      release();
    };
  }

  failNext(...errors: Error[]): this {
    this.failures.push(...errors);
    return this;
  }

  failIf(rule: (points: readonly VectorPoint[]) => Error | undefined): this {
    this.failWhen = rule;
    return this;
  }

  async ensureCollection(): Promise<void> {
    this.ensureCalls++;
  }

  async upsert(points: readonly VectorPoint[]): Promise<void> {
    this.attempts++;
    if (this.gate) {
      await this.gate;
    }
    const failure = this.failures.shift() ?? this.failWhen?.(points);
    if (failure) {
      throw failure;
    }
    this.upserts.push([...points]);
    for (const point of points) {
      this.points.set(point.id, point);
    }
  }

  async probe(): Promise<void> {}

  close(): void {
    this.closed = true;
  }
}

export class FakeSearchSink implements SearchSink {
  readonly name = 'fake-documents';
  readonly indexId = 'test-index';
  /** Visible documents */
  readonly documents = new Map<string, SearchDocument>();
  /** Documents waiting for commit() in deferred mode */
  readonly staged = new Map<string, SearchDocument>();
  readonly ingests: SearchDocument[][] = [];
  attempts = 0;
  commits = 0;
  closed = false;

  private readonly failures: Error[] = [];
  private readonly commitFailures: Error[] = [];

  constructor(readonly commitMode: CommitMode = 'immediate') {}

  failNext(...errors: Error[]): this {
    this.failures.push(...errors);
    return this;
  }

  failNextCommit(...errors: Error[]): this {
    this.commitFailures.push(...errors);
    return this;
  }

  async ingest(documents: readonly SearchDocument[]): Promise<void> {
    this.attempts++;
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    this.ingests.push([...documents]);
    const target = this.commitMode === 'immediate' ? this.documents : this.staged;
    for (const document of documents) {
      target.set(document.id, document);
    }
  }

  async commit(): Promise<void> {
    this.commits++;
    const failure = this.commitFailures.shift();
    if (failure) {
      throw failure;
    }
    for (const [id, document] of this.staged) {
      this.documents.set(id, document);
    }
    this.staged.clear();
  }

  async probe(): Promise<void> {}

  close(): void {
    this.closed = true;
  }
}
