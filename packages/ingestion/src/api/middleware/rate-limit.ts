import { sleep as defaultSleep, throwIfCancelled, type Sleep } from '../../core/cancellation.js';

export interface RateLimiterOptions {
  readonly requestsPerSecond: number;
  /** Bucket capacity; 1 spaces every request evenly. */
  readonly burst?: number;
  readonly now?: () => number;
  readonly sleep?: Sleep;
}

export interface RateLimiter {
  readonly acquire: (signal?: AbortSignal) => Promise<void>;
}

/**
 * Token bucket refilled continuously at `requestsPerSecond`, starting full.
 * Callers queue on a promise chain, so they are served in arrival order and
 * the refill-and-take step never interleaves.
 */
export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const { requestsPerSecond, now = Date.now, sleep = defaultSleep } = options;
  const capacity = options.burst ?? 1;

  if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
    throw new Error(`requestsPerSecond must be a positive number, got: ${requestsPerSecond}`);
  }
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`burst must be an integer >= 1, got: ${capacity}`);
  }

  let tokens = capacity;
  let lastRefillMs = now();
  let tail: Promise<void> = Promise.resolve();

  function refill(): void {
    const current = now();
    const elapsedMs = Math.max(0, current - lastRefillMs);
    tokens = Math.min(capacity, tokens + (elapsedMs * requestsPerSecond) / 1000);
    lastRefillMs = current;
  }

  async function take(signal: AbortSignal | undefined): Promise<void> {
    throwIfCancelled(signal);
    refill();

    while (tokens < 1) {
      const waitMs = Math.max(1, Math.ceil(((1 - tokens) * 1000) / requestsPerSecond));
      await sleep(waitMs, signal);
      refill();
    }

    tokens -= 1;
  }

  function acquire(signal?: AbortSignal): Promise<void> {
    const turn = tail.then(() => take(signal));
    // A cancelled waiter must not stall the ones queued behind it; its own
    // rejection reaches the caller through `turn`.
    tail = turn.then(noop, noop);
    return turn;
  }

  return { acquire };
}

function noop(): void {
  // chain continuation only
}
