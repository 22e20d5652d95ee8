import type { Batch } from '../types.js';
import type { DestinationStore } from '../destination.js';
import type { Pool } from './pool.js';
import { insertRows } from './records-repo.js';
import { toDestinationRows } from '../mappers.js';

export function createPostgresStore(pool: Pool, table: string): DestinationStore {
  return {
    importBatch: (batch: Batch) => insertRows(pool, table, toDestinationRows(batch)),
    close: () => pool.end(),
  };
}
