/**
 * Bounded retry with exponential backoff, and timeouts for awaited work.
 *
 * Both honour an AbortSignal: a cancelled run stops waiting at the next
 * suspension point (backoff delay or the awaited call itself).
 */

import { CancelledError, ProviderError, TimeoutError } from '@conclave/agent-contracts';
import type { RetryPolicy } from '@conclave/agent-contracts';

export interface RetryAttemptInfo {
  /** Attempt that just failed (1-based) */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions extends RetryPolicy {
  signal?: AbortSignal;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Delay before the attempt following `attempt`: base * 2^(attempt-1), capped.
 */
export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Rate limits, 5xx, connection failures and timeouts are worth another attempt.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.retryable;
  }
  return error instanceof TimeoutError;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || options.signal?.aborted || !options.shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
    }
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  /** Used in the TimeoutError message */
  label: string;
  /** Parent cancellation, forwarded to `run` */
  signal?: AbortSignal;
}

/**
 * Run `run` with a signal that aborts on timeout or parent cancellation.
 * Rejects with TimeoutError when the deadline passes first.
 */
export async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, options: TimeoutOptions): Promise<T> {
  const controller = new AbortController();
  const parent = options.signal;
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(options.label, options.timeoutMs);
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
