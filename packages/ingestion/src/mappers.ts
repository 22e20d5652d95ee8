import type { Batch, DestinationRow, Page, SourceRecord } from './types.js';
import { ParseError } from './types.js';

// ── Page parsing ──

interface CustomersPageShape {
  customers: unknown;
  pagination?: unknown;
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

function describeValue(val: unknown): string {
  if (val === null) return 'null';
  if (Array.isArray(val)) return 'array';
  if (typeof val === 'string') return `string (${val.slice(0, 40)})`;
  return typeof val;
}

/**
 * Parses a customers response into a Page. The body must be an object with a
 * `customers` array of objects; `pagination.next_page_info` carries the next
 * cursor, and its absence (or an empty string) marks the end of the stream.
 */
export function parseCustomersPage(raw: unknown, cursor: string | null): Page {
  if (!isRecord(raw)) {
    throw new ParseError(`Expected a JSON object page, got ${describeValue(raw)}`);
  }

  const shape: CustomersPageShape = { customers: raw['customers'], pagination: raw['pagination'] };
  if (!Array.isArray(shape.customers)) {
    throw new ParseError(`Page is missing a customers array (got ${describeValue(shape.customers)})`);
  }

  const records: SourceRecord[] = [];
  for (const [index, item] of shape.customers.entries()) {
    if (!isRecord(item)) {
      throw new ParseError(`Customer at index ${index} is ${describeValue(item)}, expected an object`);
    }
    records.push(item);
  }

  let nextCursor: string | null = null;
  if (isRecord(shape.pagination)) {
    const next = shape.pagination['next_page_info'];
    if (typeof next === 'string' && next !== '') {
      nextCursor = next;
    } else if (next !== undefined && next !== null && next !== '') {
      throw new ParseError(`pagination.next_page_info must be a string, got ${describeValue(next)}`);
    }
  }

  return { cursor, records, nextCursor };
}

export function emptyFinalPage(cursor: string | null): Page {
  return { cursor, records: [], nextCursor: null };
}

// ── Destination rows ──

export function toDestinationRow(payload: SourceRecord, ingestedAt: number): DestinationRow {
  return {
    json_response: JSON.stringify(payload),
    time: ingestedAt,
  };
}

export function toDestinationRows(batch: Batch): DestinationRow[] {
  return batch.records.map((record) => toDestinationRow(record.payload, record.ingestedAt));
}
