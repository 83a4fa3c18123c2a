/**
 * Retry with exponential backoff.
 *
 * The decision is a pure function of (attempt, cause) so the policy can be
 * tested without sleeping; waiting goes through an injected Scheduler.
 */

import { isRetryable, toError } from '../errors/index.js';

export interface RetryPolicy {
  /** Retries after the first attempt (at most retryMax + 1 attempts) */
  retryMax: number;
  /** Delay before the first retry; doubled for every further retry */
  backoffMs: number;
  /** Ceiling for a single delay */
  backoffMaxMs: number;
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'give-up'; reason: 'exhausted' | 'not-retryable' };

/**
 * Decide what to do after `attempt` (1-based) failed with `cause`.
 *
 * @example
 * ```ts
 * decideRetry({ retryMax: 5, backoffMs: 500, backoffMaxMs: 30000 }, 3, new TransientIOError('503'));
 * // => { action: 'retry', delayMs: 2000 }
 * ```
 */
export function decideRetry(policy: RetryPolicy, attempt: number, cause: Error): RetryDecision {
  if (!isRetryable(cause)) {
    return { action: 'give-up', reason: 'not-retryable' };
  }
  if (attempt > policy.retryMax) {
    return { action: 'give-up', reason: 'exhausted' };
  }
  return { action: 'retry', delayMs: backoffDelay(policy, attempt) };
}

/**
 * Delay before retry number `retry` (1-based).
 */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const exponent = Math.max(0, retry - 1);
  return Math.min(policy.backoffMs * 2 ** exponent, policy.backoffMaxMs);
}

/**
 * Clock and sleep, injectable for tests.
 */
export interface Scheduler {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemScheduler: Scheduler = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number; reason: 'exhausted' | 'not-retryable' };

export interface RetryOptions {
  policy: RetryPolicy;
  scheduler: Scheduler;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, cause: Error, delayMs: number) => void;
}

/**
 * Run `operation` until it succeeds or the policy gives up.
 * Never throws: the final failure is returned as a result.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const { policy, scheduler, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (thrown) {
      const error = toError(thrown);
      const decision = decideRetry(policy, attempt, error);
      if (decision.action === 'give-up') {
        return { ok: false, error, attempts: attempt, reason: decision.reason };
      }
      onRetry?.(attempt, error, decision.delayMs);
      await scheduler.sleep(decision.delayMs);
    }
  }
}
