import type { Batch, IngestedRecord, SourceRecord } from '../types.js';

export interface AccumulatorOptions {
  readonly maxSize: number;
  /** Milliseconds since epoch; read once per sealed batch. */
  readonly now?: () => number;
}

export function sealBatch(id: number, payloads: readonly SourceRecord[], nowMs: number): Batch {
  const ingestedAt = Math.floor(nowMs / 1000);
  const records: IngestedRecord[] = payloads.map((payload) => Object.freeze({ payload, ingestedAt }));
  return Object.freeze({ id, records: Object.freeze(records), ingestedAt });
}

/**
 * Groups records into batches of at most `maxSize`, in arrival order. The
 * trailing partial batch is always emitted, including when the upstream
 * iterator throws: it is yielded first and the error rethrown afterwards.
 */
export async function* accumulateBatches(
  records: AsyncIterable<SourceRecord>,
  options: AccumulatorOptions,
): AsyncGenerator<Batch> {
  const { maxSize, now = Date.now } = options;
  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new Error(`maxSize must be an integer >= 1, got: ${maxSize}`);
  }

  let nextId = 1;
  let open: SourceRecord[] = [];

  const seal = (): Batch => {
    const batch = sealBatch(nextId++, open, now());
    open = [];
    return batch;
  };

  try {
    for await (const record of records) {
      open.push(record);
      if (open.length >= maxSize) {
        yield seal();
      }
    }
  } catch (err) {
    if (open.length > 0) {
      yield seal();
    }
    throw err;
  }

  if (open.length > 0) {
    yield seal();
  }
}
