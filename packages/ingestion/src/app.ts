import type { AppConfig } from './types.js';
import type { Logger } from './logger.js';
import { createHttpClient, type HttpClient, type HttpClientOptions } from './api/http-client.js';
import { createAccessTokenProvider } from './api/access-token.js';
import { createLoyaltySource } from './api/loyalty-source.js';
import { createRateLimiter } from './api/middleware/rate-limit.js';
import type { RetryPolicy } from './api/middleware/retry.js';
import { createDestinationStore, type DestinationStore } from './destination.js';
import { createMetrics } from './core/metrics.js';
import { runPipeline } from './core/pipeline.js';
import { reportResult, type ExitCode } from './core/report.js';

export interface SyncFactories {
  readonly createHttpClient: (options: HttpClientOptions) => HttpClient;
  readonly createDestinationStore: (config: AppConfig, logger: Logger) => Promise<DestinationStore>;
}

const defaultFactories: SyncFactories = { createHttpClient, createDestinationStore };

/** Wires the collaborators from config, runs one sync and returns the exit code. */
export async function runSync(
  config: AppConfig,
  logger: Logger,
  signal: AbortSignal,
  factories: SyncFactories = defaultFactories,
): Promise<ExitCode> {
  const retryPolicy: RetryPolicy = {
    maxAttempts: config.maxAttempts,
    baseDelayMs: config.retryBaseMs,
    maxDelayMs: config.retryMaxMs,
    jitterRatio: 0.1,
  };

  const sourceHttp = factories.createHttpClient({ timeoutMs: config.requestTimeoutMs, connections: 2 });
  const tokens = createAccessTokenProvider(sourceHttp, config, logger);
  const source = createLoyaltySource(sourceHttp, tokens, config, logger);
  let store: DestinationStore | null = null;

  try {
    store = await factories.createDestinationStore(config, logger);
    const result = await runPipeline(
      {
        source,
        store,
        sourceLimiter: createRateLimiter({ requestsPerSecond: config.requestsPerSecond }),
        destLimiter: config.destRequestsPerSecond > 0
          ? createRateLimiter({ requestsPerSecond: config.destRequestsPerSecond })
          : undefined,
        retryPolicy,
        logger,
        metrics: createMetrics(),
      },
      {
        startCursor: config.startCursor,
        batchSize: config.batchSize,
        workers: config.uploadWorkers,
        queueCapacity: config.uploadQueueCapacity,
        progressLogIntervalMs: config.progressLogIntervalMs,
        signal,
      },
    );
    return reportResult(result, logger);
  } finally {
    await store?.close();
    await sourceHttp.close();
  }
}
