import type { Queryable } from './records-repo.js';
import { DbError } from '../types.js';

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export async function ensureSchema(db: Queryable, table: string): Promise<void> {
  try {
    await db.query(`
      CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (
        json_response JSONB NOT NULL,
        time BIGINT NOT NULL
      )
    `);
  } catch (err) {
    throw new DbError(`Failed to create table ${table}`, 'ensureSchema', err);
  }
}
