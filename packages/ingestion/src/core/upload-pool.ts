import pLimit from 'p-limit';
import type { Batch, BatchFailure } from '../types.js';
import { CancelledError } from '../types.js';
import type { DestinationStore } from '../destination.js';
import type { RateLimiter } from '../api/middleware/rate-limit.js';
import { retry, type RetryOptions, type RetryPolicy } from '../api/middleware/retry.js';
import type { Logger } from '../logger.js';

export interface UploadPoolDeps {
  readonly store: DestinationStore;
  readonly retryPolicy: RetryPolicy;
  readonly logger: Logger;
  readonly limiter?: RateLimiter;
  readonly signal?: AbortSignal;
  readonly retryOptions?: Omit<RetryOptions, 'operationName' | 'signal' | 'logger'>;
  readonly onUploaded?: (batch: Batch, rowsWritten: number) => void;
  readonly onFailed?: (failure: BatchFailure) => void;
}

export interface UploadPoolOptions {
  readonly workers: number;
  /** Sealed batches allowed to wait for a free worker. */
  readonly queueCapacity: number;
}

export interface UploadPoolStats {
  readonly uploaded: number;
  readonly rowsWritten: number;
  readonly failed: number;
}

export interface UploadPool {
  /** Resolves once the batch is admitted; waits while the queue is full. */
  readonly submit: (batch: Batch) => Promise<void>;
  /** Waits for every admitted batch and returns failures ordered by batch id. */
  readonly wait: () => Promise<BatchFailure[]>;
  readonly pendingCount: () => number;
  readonly stats: () => UploadPoolStats;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createUploadPool(deps: UploadPoolDeps, options: UploadPoolOptions): UploadPool {
  const { store, retryPolicy, logger, limiter, signal, retryOptions, onUploaded, onFailed } = deps;

  if (!Number.isInteger(options.workers) || options.workers < 1) {
    throw new Error(`workers must be an integer >= 1, got: ${options.workers}`);
  }
  if (!Number.isInteger(options.queueCapacity) || options.queueCapacity < 0) {
    throw new Error(`queueCapacity must be an integer >= 0, got: ${options.queueCapacity}`);
  }

  const limit = pLimit(options.workers);
  const maxPending = options.workers + options.queueCapacity;
  const pending = new Set<Promise<void>>();
  const failures: BatchFailure[] = [];
  let uploaded = 0;
  let rowsWritten = 0;

  function recordFailure(batch: Batch, error: Error): void {
    const failure: BatchFailure = { batchId: batch.id, recordCount: batch.records.length, error };
    failures.push(failure);
    onFailed?.(failure);
  }

  // Never rejects: every outcome lands in the counters or in `failures`.
  async function uploadBatch(batch: Batch): Promise<void> {
    if (signal?.aborted) {
      logger.warn({ batchId: batch.id, records: batch.records.length }, 'Cancelled before upload started');
      recordFailure(batch, new CancelledError(`Batch ${batch.id} not uploaded: pipeline cancelled`));
      return;
    }

    logger.info({ batchId: batch.id, records: batch.records.length }, 'Uploading batch');

    try {
      const written = await retry(
        async () => {
          await limiter?.acquire(signal);
          return store.importBatch(batch);
        },
        retryPolicy,
        { ...retryOptions, operationName: `upload-batch-${batch.id}`, signal, logger },
      );
      uploaded++;
      rowsWritten += written;
      logger.info({ batchId: batch.id, rowsWritten: written }, 'Batch uploaded');
      onUploaded?.(batch, written);
    } catch (err) {
      const error = toError(err);
      logger.error({ batchId: batch.id, records: batch.records.length, err: error }, 'Batch upload failed');
      recordFailure(batch, error);
    }
  }

  async function submit(batch: Batch): Promise<void> {
    // Backpressure: wait for a slot before admitting another batch
    while (pending.size >= maxPending) {
      await Promise.race(pending);
    }

    const promise = limit(() => uploadBatch(batch));
    pending.add(promise);
    void promise.finally(() => pending.delete(promise));
  }

  async function wait(): Promise<BatchFailure[]> {
    while (pending.size > 0) {
      await Promise.allSettled(Array.from(pending));
    }
    return [...failures].sort((a, b) => a.batchId - b.batchId);
  }

  return {
    submit,
    wait,
    pendingCount: () => pending.size,
    stats: () => ({ uploaded, rowsWritten, failed: failures.length }),
  };
}
