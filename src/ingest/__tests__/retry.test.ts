import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, decideRetry, withRetry, type RetryPolicy } from '../retry.js';
import { SinkRejectedError, TransientIOError, ValidationError } from '../../errors/index.js';
import { createFakeScheduler } from '../../test-utils/index.js';

const policy: RetryPolicy = { retryMax: 5, backoffMs: 500, backoffMaxMs: 30_000 };

describe('backoffDelay', () => {
  it('doubles per retry starting at backoffMs', () => {
    expect([1, 2, 3, 4].map((n) => backoffDelay(policy, n))).toEqual([500, 1000, 2000, 4000]);
  });

  it('is capped at backoffMaxMs', () => {
    expect(backoffDelay({ retryMax: 20, backoffMs: 500, backoffMaxMs: 3000 }, 4)).toBe(3000);
    expect(backoffDelay({ retryMax: 20, backoffMs: 500, backoffMaxMs: 3000 }, 10)).toBe(3000);
  });
});

describe('decideRetry', () => {
  it('retries transient failures with backoff', () => {
    expect(decideRetry(policy, 3, new TransientIOError('503'))).toEqual({ action: 'retry', delayMs: 2000 });
  });

  it('gives up after retryMax retries', () => {
    expect(decideRetry(policy, 5, new TransientIOError('503'))).toEqual({ action: 'retry', delayMs: 8000 });
    expect(decideRetry(policy, 6, new TransientIOError('503'))).toEqual({ action: 'give-up', reason: 'exhausted' });
  });

  it('never retries validation errors or sink rejections', () => {
    expect(decideRetry(policy, 1, new ValidationError('dimension'))).toEqual({
      action: 'give-up',
      reason: 'not-retryable',
    });
    expect(decideRetry(policy, 1, new SinkRejectedError('qdrant', 400, ''))).toEqual({
      action: 'give-up',
      reason: 'not-retryable',
    });
  });

  it('gives up at once when retryMax is 0', () => {
    expect(decideRetry({ ...policy, retryMax: 0 }, 1, new TransientIOError('x'))).toEqual({
      action: 'give-up',
      reason: 'exhausted',
    });
  });
});

describe('withRetry', () => {
  it('returns the value and attempt count on success', async () => {
    const scheduler = createFakeScheduler();
    const result = await withRetry(async () => 'done', { policy, scheduler });

    expect(result).toEqual({ ok: true, value: 'done', attempts: 1 });
    expect(scheduler.sleeps).toEqual([]);
  });

  it('succeeds on the third attempt after two transient failures', async () => {
    const scheduler = createFakeScheduler();
    const onRetry = vi.fn();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientIOError('reset'))
      .mockRejectedValueOnce(new TransientIOError('reset'))
      .mockResolvedValue('ok');

    const result = await withRetry(operation, { policy, scheduler, onRetry });

    expect(result).toEqual({ ok: true, value: 'ok', attempts: 3 });
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(scheduler.sleeps).toEqual([500, 1000]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(TransientIOError), 1000);
  });

  it('stops after retryMax + 1 attempts', async () => {
    const scheduler = createFakeScheduler();
    const failure = new TransientIOError('always down');

    const result = await withRetry(() => Promise.reject(failure), {
      policy: { retryMax: 2, backoffMs: 10, backoffMaxMs: 100 },
      scheduler,
    });

    expect(result).toEqual({ ok: false, error: failure, attempts: 3, reason: 'exhausted' });
    expect(scheduler.sleeps).toEqual([10, 20]);
  });

  it('does not retry non-retryable failures', async () => {
    const scheduler = createFakeScheduler();
    const failure = new SinkRejectedError('quickwit', 400, 'bad doc');

    const result = await withRetry(() => Promise.reject(failure), { policy, scheduler });

    expect(result).toEqual({ ok: false, error: failure, attempts: 1, reason: 'not-retryable' });
    expect(scheduler.sleeps).toEqual([]);
  });

  it('wraps thrown non-Error values', async () => {
    const result = await withRetry(() => Promise.reject('nope'), { policy, scheduler: createFakeScheduler() });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('nope');
    }
  });
});
