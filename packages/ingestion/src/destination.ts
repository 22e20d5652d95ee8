import type { AppConfig, Batch } from './types.js';
import { Destination } from './types.js';
import { createHttpClient } from './api/http-client.js';
import { createIngestStore } from './api/ingest-store.js';
import { createPool } from './db/pool.js';
import { ensureSchema } from './db/schema.js';
import { createPostgresStore } from './db/postgres-store.js';
import type { Logger } from './logger.js';

export interface DestinationStore {
  /** Writes the whole batch or throws; returns the number of rows written. */
  readonly importBatch: (batch: Batch) => Promise<number>;
  readonly close: () => Promise<void>;
}

export async function createDestinationStore(config: AppConfig, logger: Logger): Promise<DestinationStore> {
  switch (config.destination) {
    case Destination.POSTGRES: {
      const pool = createPool(config.databaseUrl, config.uploadWorkers + 1, logger);
      try {
        await ensureSchema(pool, config.analyticsTable);
      } catch (err) {
        await pool.end();
        throw err;
      }
      logger.info({ table: config.analyticsTable }, 'Destination table ensured');
      return createPostgresStore(pool, config.analyticsTable);
    }
    case Destination.INGEST_API: {
      const httpClient = createHttpClient({
        timeoutMs: config.requestTimeoutMs,
        connections: config.uploadWorkers,
      });
      return createIngestStore(httpClient, {
        endpoint: config.analyticsEndpoint,
        database: config.analyticsDatabase,
        table: config.analyticsTable,
        apiKey: config.analyticsApiKey,
      });
    }
  }
}
