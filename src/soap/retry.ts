import { setTimeout as delay } from 'node:timers/promises';
import { AppError, CancelledError, TransportError, isRetryable } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

export interface RetryPolicy {
  maxRetries: number;
  retryBaseMs: number;
  signal?: AbortSignal;
  /** Bound into retry log lines. */
  context?: Record<string, unknown>;
}

/**
 * Runs `op` up to `maxRetries + 1` times. Only errors for which
 * `isRetryable` holds are retried, with backoff `retryBaseMs * 2^(attempt-1)`.
 */
export async function withRetry<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  log: Logger,
): Promise<T> {
  let lastErr: unknown;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (attempt > 0) {
      const backoff = policy.retryBaseMs * 2 ** (attempt - 1);
      log.warn({ ...policy.context, attempt, backoff, err: errorMessage(lastErr) }, 'retrying request');
      await sleep(backoff, policy.signal);
    }

    try {
      return await op(attempt);
    } catch (err) {
      lastErr = err;
      if (!isRetryable(err)) throw err;
    }
  }

  if (lastErr instanceof AppError) throw lastErr;
  throw new TransportError(`request failed after ${policy.maxRetries} retries`, { cause: lastErr });
}

async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    if (signal?.aborted) throw new CancelledError();
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new CancelledError();
    throw err;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
