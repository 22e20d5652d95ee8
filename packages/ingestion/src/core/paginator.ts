import type { Page, SourceRecord } from '../types.js';
import type { LoyaltySource } from '../api/loyalty-source.js';
import type { RateLimiter } from '../api/middleware/rate-limit.js';
import { retry, type RetryOptions, type RetryPolicy } from '../api/middleware/retry.js';
import { throwIfCancelled } from './cancellation.js';
import type { Logger } from '../logger.js';

export interface PaginatorDeps {
  readonly source: LoyaltySource;
  readonly limiter: RateLimiter;
  readonly retryPolicy: RetryPolicy;
  readonly logger: Logger;
}

export interface PaginateOptions {
  readonly startCursor?: string | null;
  readonly signal?: AbortSignal;
  readonly retryOptions?: Omit<RetryOptions, 'operationName' | 'signal' | 'logger'>;
}

/**
 * Lazily fetches pages, one request at a time, following each page's next
 * cursor. Ends at the end marker or when a cursor repeats; a terminal fetch
 * failure ends the sequence by throwing. Not restartable.
 */
export async function* paginate(deps: PaginatorDeps, options: PaginateOptions = {}): AsyncGenerator<Page> {
  const { source, limiter, retryPolicy, logger } = deps;
  const { signal, retryOptions } = options;

  let cursor: string | null = options.startCursor ?? null;
  let pageNumber = 0;

  while (true) {
    throwIfCancelled(signal);

    pageNumber++;
    const requested = cursor;
    // Every attempt, retries included, takes its own token
    const page = await retry(async () => {
      await limiter.acquire(signal);
      return source.fetchPage(requested);
    }, retryPolicy, {
      ...retryOptions,
      operationName: `fetch-page-${pageNumber}`,
      signal,
      logger,
    });

    logger.debug({ page: pageNumber, records: page.records.length, hasNext: page.nextCursor !== null }, 'Page fetched');
    yield page;

    if (page.nextCursor === null || page.nextCursor === '') {
      logger.info({ pages: pageNumber }, 'Reached end of stream');
      return;
    }

    if (page.nextCursor === cursor) {
      logger.warn({ page: pageNumber, cursor }, 'Next cursor repeats current cursor, stopping pagination');
      return;
    }

    cursor = page.nextCursor;
  }
}

/** Flattens pages into records, preserving page and in-page order. */
export async function* flattenRecords(
  pages: AsyncIterable<Page>,
  onPage?: (page: Page) => void,
): AsyncGenerator<SourceRecord> {
  for await (const page of pages) {
    onPage?.(page);
    yield* page.records;
  }
}
