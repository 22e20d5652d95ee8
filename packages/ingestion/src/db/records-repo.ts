import type { DestinationRow } from '../types.js';
import { DbError } from '../types.js';
import { quoteIdentifier } from './schema.js';

export interface Queryable {
  readonly query: (text: string, values?: unknown[]) => Promise<{ rowCount: number | null }>;
}

// Connection exceptions, serialization/deadlock, shutdown and resource exhaustion
const TRANSIENT_SQLSTATE_PREFIXES = ['08', '40', '53', '57P'];
const TRANSIENT_NODE_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE'];

export function isTransientDbError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  const code = err.code;
  if (typeof code !== 'string') return false;
  return TRANSIENT_NODE_CODES.includes(code)
    || TRANSIENT_SQLSTATE_PREFIXES.some((prefix) => code.startsWith(prefix));
}

/**
 * Bulk insert rows with a single UNNEST statement. Appends only; the table
 * has no key, so a batch written twice is stored twice.
 */
export async function insertRows(
  db: Queryable,
  table: string,
  rows: readonly DestinationRow[],
): Promise<number> {
  if (rows.length === 0) return 0;

  const payloads: string[] = [];
  const times: string[] = [];

  for (const row of rows) {
    payloads.push(row.json_response);
    times.push(String(row.time));
  }

  try {
    const result = await db.query(
      `INSERT INTO ${quoteIdentifier(table)} (json_response, time)
       SELECT t.json_response::jsonb, t.time
       FROM unnest($1::text[], $2::bigint[]) AS t(json_response, time)`,
      [payloads, times],
    );
    return result.rowCount ?? 0;
  } catch (err) {
    throw new DbError(
      `Failed to insert ${rows.length} rows`,
      'insertRows',
      err,
      isTransientDbError(err),
    );
  }
}
