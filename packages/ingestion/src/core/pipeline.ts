import type { PipelineResult } from '../types.js';
import { CancelledError, PipelineError } from '../types.js';
import type { LoyaltySource } from '../api/loyalty-source.js';
import type { DestinationStore } from '../destination.js';
import type { RateLimiter } from '../api/middleware/rate-limit.js';
import type { RetryOptions, RetryPolicy } from '../api/middleware/retry.js';
import type { Logger } from '../logger.js';
import { flattenRecords, paginate } from './paginator.js';
import { accumulateBatches } from './batch-accumulator.js';
import { createUploadPool } from './upload-pool.js';
import { createMetrics, type Metrics } from './metrics.js';

export interface PipelineDeps {
  readonly source: LoyaltySource;
  readonly store: DestinationStore;
  readonly sourceLimiter: RateLimiter;
  readonly destLimiter?: RateLimiter;
  readonly retryPolicy: RetryPolicy;
  readonly logger: Logger;
  readonly metrics?: Metrics;
  readonly now?: () => number;
  readonly retryOptions?: Omit<RetryOptions, 'operationName' | 'signal' | 'logger'>;
}

export interface PipelineOptions {
  readonly startCursor?: string | null;
  readonly batchSize: number;
  readonly workers: number;
  readonly queueCapacity: number;
  /** 0 disables periodic progress lines. */
  readonly progressLogIntervalMs?: number;
  readonly signal?: AbortSignal;
}

/**
 * Streams pages into batches and batches into the upload pool, then waits for
 * every admitted batch. Upload failures come back in the result; a fetch-path
 * failure is thrown as PipelineError after the fetched records are flushed.
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<PipelineResult> {
  const { source, store, sourceLimiter, destLimiter, retryPolicy, logger, retryOptions, now = Date.now } = deps;
  const { batchSize, workers, queueCapacity, signal, progressLogIntervalMs = 0 } = options;

  const startedAt = now();
  const metrics = deps.metrics ?? createMetrics(now);
  // Cursor that fetched the most recent page; null = beginning of stream
  let lastCursor: string | null = options.startCursor ?? null;

  logger.info({ batchSize, workers, queueCapacity, startCursor: lastCursor }, 'Pipeline starting');

  const pool = createUploadPool(
    {
      store,
      retryPolicy,
      logger,
      limiter: destLimiter,
      signal,
      retryOptions,
      onUploaded: (_batch, rows) => metrics.addUploaded(rows),
      onFailed: () => metrics.addFailed(),
    },
    { workers, queueCapacity },
  );

  const pages = paginate(
    { source, limiter: sourceLimiter, retryPolicy, logger },
    { startCursor: options.startCursor, signal, retryOptions },
  );
  const records = flattenRecords(pages, (page) => {
    metrics.addPage(page.records.length);
    lastCursor = page.cursor;
  });
  const batches = accumulateBatches(records, { maxSize: batchSize, now });

  const progressInterval = progressLogIntervalMs > 0
    ? setInterval(() => {
      const snapshot = metrics.getSnapshot();
      logger.info({
        pagesFetched: snapshot.pagesFetched,
        recordsFetched: snapshot.recordsFetched,
        batchesUploaded: snapshot.batchesUploaded,
        batchesFailed: snapshot.batchesFailed,
        throughputRps: Math.round(snapshot.throughputRps),
        pendingUploads: pool.pendingCount(),
      }, 'Progress');
    }, progressLogIntervalMs)
    : null;

  let fetchError: unknown = null;
  let cancelled = false;

  try {
    try {
      for await (const batch of batches) {
        metrics.addSealed();
        logger.debug({ batchId: batch.id, records: batch.records.length }, 'Batch sealed');
        await pool.submit(batch);
      }
    } catch (err) {
      if (err instanceof CancelledError) {
        cancelled = true;
        logger.warn('Fetching cancelled, draining uploads');
      } else {
        fetchError = err;
        logger.error({ err }, 'Fetch path failed, draining uploads');
      }
    }

    // Drain even when fetching failed: sealed batches still get their attempt
    const failures = await pool.wait();
    const snapshot = metrics.getSnapshot();
    const stats = pool.stats();

    const result: PipelineResult = {
      recordsFetched: snapshot.recordsFetched,
      pagesFetched: snapshot.pagesFetched,
      batchesSealed: snapshot.batchesSealed,
      batchesUploaded: stats.uploaded,
      rowsWritten: stats.rowsWritten,
      failures,
      lastCursor,
      cancelled: cancelled || signal?.aborted === true,
      durationMs: now() - startedAt,
    };

    if (fetchError !== null) {
      const reason = fetchError instanceof Error ? fetchError.message : String(fetchError);
      throw new PipelineError(`Fetch path failed: ${reason}`, result, fetchError);
    }

    logger.info({
      recordsFetched: result.recordsFetched,
      pagesFetched: result.pagesFetched,
      batchesUploaded: result.batchesUploaded,
      batchesFailed: failures.length,
      cancelled: result.cancelled,
      durationMs: result.durationMs,
    }, 'Pipeline finished');

    return result;
  } finally {
    if (progressInterval !== null) clearInterval(progressInterval);
  }
}
