import pino from 'pino';
import { CancelledError } from '../src/types.js';
import type { Batch, Page, SourceRecord } from '../src/types.js';
import type { RetryPolicy } from '../src/api/middleware/retry.js';
import type { RateLimiter } from '../src/api/middleware/rate-limit.js';
import { sealBatch } from '../src/core/batch-accumulator.js';

export const logger = pino({ level: 'silent' });

/** Virtual clock: sleeping advances time instantly. */
export function createFakeClock(startMs = 0): {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  sleeps: number[];
} {
  let current = startMs;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: async (ms, signal) => {
      if (signal?.aborted) throw new CancelledError();
      sleeps.push(ms);
      current += ms;
    },
    sleeps,
  };
}

export const noDelayPolicy: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 10,
  maxDelayMs: 1000,
  jitterRatio: 0,
};

export const instantRetry = {
  sleep: async (): Promise<void> => {},
  random: (): number => 0,
};

export const unlimited: RateLimiter = {
  acquire: async () => {},
};

export function customers(from: number, count: number): SourceRecord[] {
  return Array.from({ length: count }, (_, i) => ({ id: from + i, email: `customer${from + i}@example.test` }));
}

export function page(cursor: string | null, records: SourceRecord[], nextCursor: string | null): Page {
  return { cursor, records, nextCursor };
}

export function batchOf(id: number, size: number): Batch {
  return sealBatch(id, customers(id * 100, size), 1_700_000_000_000);
}
