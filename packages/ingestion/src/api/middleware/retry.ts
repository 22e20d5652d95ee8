import { CancelledError, DbError, HttpError, RetryExhaustedError } from '../../types.js';
import type { Logger } from '../../logger.js';
import { MAX_SLEEP_MS, sleep as defaultSleep, throwIfCancelled, type Sleep } from '../../core/cancellation.js';

export interface RetryPolicy {
  readonly maxAttempts: number; // total attempts, including the first
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterRatio: number;
}

export interface RetryDecision {
  readonly retryable: boolean;
  readonly retryAfterMs: number | null;
}

export interface RetryContext {
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly error: unknown;
}

export interface RetryOptions {
  readonly operationName: string;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
  readonly onRetry?: (ctx: RetryContext) => void;
  readonly classify?: (err: unknown) => RetryDecision;
  readonly random?: () => number;
  readonly sleep?: Sleep;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500 || status === 0;
}

export function classifyError(err: unknown): RetryDecision {
  if (err instanceof HttpError) {
    return { retryable: isRetryableStatus(err.status), retryAfterMs: err.retryAfterMs };
  }
  if (err instanceof DbError) {
    return { retryable: err.transient, retryAfterMs: null };
  }
  return { retryable: false, retryAfterMs: null };
}

export function parseRetryAfter(raw: string | null, nowMs: number = Date.now()): number | null {
  if (raw === null || raw.trim() === '') return null;

  // Delta seconds (e.g. "5")
  const seconds = Number(raw);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : null;
  }

  // HTTP-date (e.g. "Thu, 01 Dec 2025 16:00:00 GMT")
  const date = Date.parse(raw);
  if (Number.isFinite(date)) {
    const delayMs = date - nowMs;
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

export function computeBackoffMs(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const backoff = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  const ratio = Math.min(1, Math.max(0, policy.jitterRatio));
  const r = Math.min(1, Math.max(0, random()));
  return backoff + Math.floor(backoff * ratio * r);
}

/**
 * Runs `operation` up to `policy.maxAttempts` times. Non-retryable errors are
 * rethrown as-is; exhausting the attempts throws RetryExhaustedError.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const {
    operationName,
    signal,
    logger,
    onRetry,
    classify = classifyError,
    random = Math.random,
    sleep = defaultSleep,
  } = options;

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    throwIfCancelled(signal);

    try {
      return await operation(attempt);
    } catch (err) {
      if (err instanceof CancelledError) throw err;

      const decision = classify(err);
      if (!decision.retryable) throw err;

      lastError = err;
      if (attempt === policy.maxAttempts) break;

      const backoffMs = computeBackoffMs(policy, attempt, random);
      const hintedMs = decision.retryAfterMs !== null ? Math.max(backoffMs, decision.retryAfterMs) : backoffMs;
      const delayMs = Math.min(hintedMs, MAX_SLEEP_MS);

      logger?.warn(
        {
          operationName,
          attempt,
          maxAttempts: policy.maxAttempts,
          delayMs,
          reason: err instanceof Error ? err.message : String(err),
        },
        'Retrying operation',
      );
      onRetry?.({ attempt, maxAttempts: policy.maxAttempts, delayMs, error: err });

      await sleep(delayMs, signal);
    }
  }

  throw new RetryExhaustedError(operationName, policy.maxAttempts, lastError);
}
