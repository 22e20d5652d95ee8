import type { Batch } from '../types.js';
import type { HttpClient } from './http-client.js';
import type { DestinationStore } from '../destination.js';
import { getIngestAuthHeaders } from './middleware/auth.js';
import { toDestinationRows } from '../mappers.js';

const INGEST_CONTENT_TYPE = 'application/vnd.treasuredata.v1+json';

export interface IngestStoreConfig {
  readonly endpoint: string;
  readonly database: string;
  readonly table: string;
  readonly apiKey: string;
}

export function buildIngestUrl(config: IngestStoreConfig): string {
  return `${config.endpoint}/${encodeURIComponent(config.database)}/${encodeURIComponent(config.table)}`;
}

/** Appends each batch to the analytics table through the record ingest endpoint. */
export function createIngestStore(httpClient: HttpClient, config: IngestStoreConfig): DestinationStore {
  const url = buildIngestUrl(config);

  async function importBatch(batch: Batch): Promise<number> {
    if (batch.records.length === 0) return 0;

    await httpClient.post(url, { records: toDestinationRows(batch) }, {
      ...getIngestAuthHeaders(config.apiKey),
      'Content-Type': INGEST_CONTENT_TYPE,
    });
    return batch.records.length;
  }

  return {
    importBatch,
    close: () => httpClient.close(),
  };
}
