import { describe, it, expect } from 'vitest';
import { EmbeddingClient, createFileLimit, type EmbeddingClientOptions } from '../client.js';
import { TransientIOError } from '../../../errors/index.js';
import {
  FakeTransport,
  createFakeScheduler,
  createRecordingLogger,
  fakeVector,
} from '../../../test-utils/index.js';

function createClient(transport: FakeTransport, overrides: Partial<EmbeddingClientOptions> = {}): EmbeddingClient {
  return new EmbeddingClient({
    transport,
    requestBatchSize: 2,
    maxInputChars: 1000,
    requestTimeoutMs: 1000,
    globalMaxConcurrency: 8,
    retry: { retryMax: 3, backoffMs: 100, backoffMaxMs: 1000 },
    scheduler: createFakeScheduler(),
    ...overrides,
  });
}

describe('EmbeddingClient', () => {
  it('returns one slot per text, in input order, across sub-batches', async () => {
    const transport = new FakeTransport();
    const client = createClient(transport);

    const slots = await client.embed(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

    expect(transport.calls).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
    expect(slots).toEqual(['a', 'bb', 'ccc', 'dddd', 'eeeee'].map((text) => ({ ok: true, vector: fakeVector(text, 4) })));
    expect(client.stats()).toMatchObject({ requests: 3, texts: 5, failedRequests: 0 });
  });

  it('sends nothing for an empty input', async () => {
    const transport = new FakeTransport();

    expect(await createClient(transport).embed([])).toEqual([]);
    expect(transport.calls).toEqual([]);
  });

  it('truncates over-long texts and logs a warning', async () => {
    const transport = new FakeTransport();
    const logger = createRecordingLogger();
    const client = createClient(transport, { maxInputChars: 3, logger });

    await client.embed(['abcdef', 'xy']);

    expect(transport.calls).toEqual([['abc', 'xy']]);
    expect(client.stats().truncatedTexts).toBe(1);
    expect(logger.messages('warn')).toEqual(['truncating embedding input']);
    expect(logger.entries[0]?.context).toMatchObject({ chars: 6, max_input_chars: 3 });
  });

  it('never exceeds the global concurrency limit', async () => {
    const transport = new FakeTransport({ delayMs: 5 });
    const client = createClient(transport, { requestBatchSize: 1, globalMaxConcurrency: 2 });

    await Promise.all([client.embed(['a', 'b', 'c']), client.embed(['d', 'e', 'f'])]);

    expect(transport.calls).toHaveLength(6);
    expect(transport.peakInFlight).toBe(2);
    expect(client.stats().peakInFlight).toBe(2);
  });

  it('applies the per-file limit on top of the global one', async () => {
    const transport = new FakeTransport({ delayMs: 5 });
    const client = createClient(transport, { requestBatchSize: 1, globalMaxConcurrency: 8 });

    await client.embed(['a', 'b', 'c', 'd'], { fileLimit: createFileLimit(1) });

    expect(transport.peakInFlight).toBe(1);
  });

  it('retries a transient failure with backoff', async () => {
    const transport = new FakeTransport().failNext(new TransientIOError('503'));
    const scheduler = createFakeScheduler();
    const logger = createRecordingLogger();
    const client = createClient(transport, { scheduler, logger });

    const slots = await client.embed(['a']);

    expect(slots).toEqual([{ ok: true, vector: fakeVector('a', 4) }]);
    expect(scheduler.sleeps).toEqual([100]);
    expect(client.stats()).toMatchObject({ requests: 2, failedRequests: 1, abandonedRequests: 0 });
    expect(logger.messages('warn')).toEqual(['embedding request failed, retrying']);
  });

  it('fails only the slots of a request that exhausted its retries', async () => {
    const failure = new TransientIOError('model crashed');
    const transport = new FakeTransport().failIf((texts) => (texts.includes('bad') ? failure : undefined));
    const client = createClient(transport, {
      requestBatchSize: 1,
      retry: { retryMax: 1, backoffMs: 0, backoffMaxMs: 0 },
    });

    const slots = await client.embed(['good', 'bad', 'fine']);

    expect(slots).toEqual([
      { ok: true, vector: fakeVector('good', 4) },
      { ok: false, error: failure },
      { ok: true, vector: fakeVector('fine', 4) },
    ]);
    expect(client.stats()).toMatchObject({ requests: 4, failedRequests: 2, abandonedRequests: 1, texts: 2 });
  });

  it('does not retry errors that are not transient', async () => {
    const transport = new FakeTransport().failNext(new Error('bug'));
    const client = createClient(transport);

    const slots = await client.embed(['a']);

    expect(slots[0]?.ok).toBe(false);
    expect(transport.calls).toHaveLength(1);
  });

  it('exposes the transport model', () => {
    expect(createClient(new FakeTransport({ model: 'nomic-embed-text' })).model).toBe('nomic-embed-text');
  });

  it('rejects a request batch size below one', () => {
    expect(() => createClient(new FakeTransport(), { requestBatchSize: 0 })).toThrow(RangeError);
  });
});
