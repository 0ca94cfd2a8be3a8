import { setTimeout as sleep } from 'timers/promises';
import { NetworkError } from './errors';
import type { RetryPolicy } from './types';

const assertAttempts = (maxAttempts: number) => {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 0) {
    throw new RangeError(`maxAttempts must be a non-negative integer, got ${maxAttempts}`);
  }
};

const assertDelay = (delayMs: number) => {
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new RangeError(`delay must be a non-negative number of milliseconds, got ${delayMs}`);
  }
};

export const retryPolicies = {
  none(): RetryPolicy {
    return { kind: 'none' };
  },
  exponential(maxAttempts: number, baseDelayMs: number): RetryPolicy {
    assertAttempts(maxAttempts);
    assertDelay(baseDelayMs);
    return { kind: 'exponential', maxAttempts, baseDelayMs };
  },
  fixed(maxAttempts: number, delayMs: number): RetryPolicy {
    assertAttempts(maxAttempts);
    assertDelay(delayMs);
    return { kind: 'fixed', maxAttempts, delayMs };
  },
};

/** Number of retries (not counting the first try) a policy allows. */
export function maxRetries(policy: RetryPolicy): number {
  return policy.kind === 'none' ? 0 : policy.maxAttempts;
}

/** Delay before the retry that follows failed attempt `attempt` (0-indexed). */
export function retryDelay(policy: RetryPolicy, attempt: number): number {
  switch (policy.kind) {
    case 'none':
      return 0;
    case 'exponential':
      return policy.baseDelayMs * 2 ** attempt;
    case 'fixed':
      return policy.delayMs;
  }
}

/** The full backoff schedule of a policy, one entry per retry. */
export function retryDelays(policy: RetryPolicy): number[] {
  return Array.from({ length: maxRetries(policy) }, (_, attempt) => retryDelay(policy, attempt));
}

/** Default retry predicate: timeouts, offline, exhausted retries and 5xx faults. */
export function isRetryableError(error: unknown): boolean {
  return error instanceof NetworkError && error.isRetryable;
}

export interface RetryEvent {
  /** Index of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryExecuteOptions {
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryExecutorOptions {
  shouldRetry?: (error: unknown) => boolean;
  /** Injected for tests; must reject when `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await sleep(ms, undefined, { signal });
};

/**
 * Runs a fallible async operation under a {@link RetryPolicy}.
 *
 * Attempts run for indices `0..maxAttempts` inclusive. A non-retryable failure
 * is rethrown unchanged. When the budget runs out on a retryable failure the
 * caller receives `retryExhausted(maxAttempts)` with the last failure as its
 * cause. Backoff sleeps honor `signal`; aborting one rejects with `cancelled`.
 */
export class RetryExecutor {
  private readonly shouldRetry: (error: unknown) => boolean;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RetryExecutorOptions = {}) {
    this.shouldRetry = options.shouldRetry ?? isRetryableError;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute<T>(
    policy: RetryPolicy,
    operation: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions = {},
  ): Promise<T> {
    if (policy.kind === 'none') {
      return operation(0);
    }

    const budget = policy.maxAttempts;
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (!this.shouldRetry(error)) {
          throw error;
        }
        if (attempt >= budget) {
          if (budget === 0) throw error;
          throw NetworkError.retryExhausted(budget, error);
        }

        const delayMs = retryDelay(policy, attempt);
        options.onRetry?.({ attempt, delayMs, error });
        await this.pause(delayMs, options.signal);
      }
    }
  }

  private async pause(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw NetworkError.cancelled(signal.reason);
    }
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw NetworkError.cancelled(error);
      }
      throw error;
    }
  }
}
