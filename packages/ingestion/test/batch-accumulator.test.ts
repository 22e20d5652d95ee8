import { describe, it, expect } from 'vitest';
import { accumulateBatches, sealBatch } from '../src/core/batch-accumulator.js';
import type { Batch, SourceRecord } from '../src/types.js';
import { ParseError } from '../src/types.js';
import { customers } from './helpers.js';

async function* fromArray(records: SourceRecord[]): AsyncGenerator<SourceRecord> {
  yield* records;
}

async function collect(batches: AsyncIterable<Batch>): Promise<Batch[]> {
  const out: Batch[] = [];
  for await (const batch of batches) out.push(batch);
  return out;
}

describe('accumulateBatches', () => {
  it('splits 10 records into batches of [4, 4, 2] in order', async () => {
    const batches = await collect(accumulateBatches(fromArray(customers(0, 10)), { maxSize: 4, now: () => 0 }));

    expect(batches.map((b) => b.records.length)).toEqual([4, 4, 2]);
    expect(batches.map((b) => b.id)).toEqual([1, 2, 3]);
    expect(batches.flatMap((b) => b.records.map((r) => r.payload['id']))).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(batches.every((b) => Object.isFrozen(b) && Object.isFrozen(b.records))).toBe(true);
  });

  it('produces no batches for an empty stream', async () => {
    const batches = await collect(accumulateBatches(fromArray([]), { maxSize: 4 }));
    expect(batches).toEqual([]);
  });

  it('does not emit an empty trailing batch on an exact multiple', async () => {
    const batches = await collect(accumulateBatches(fromArray(customers(0, 8)), { maxSize: 4 }));
    expect(batches.map((b) => b.records.length)).toEqual([4, 4]);
  });

  it('stamps every record of a batch with one seal-time timestamp', async () => {
    let clock = 1_700_000_000_000;
    const now = (): number => {
      clock += 5000;
      return clock;
    };

    const batches = await collect(accumulateBatches(fromArray(customers(0, 5)), { maxSize: 3, now }));

    expect(batches.map((b) => b.ingestedAt)).toEqual([1_700_000_005, 1_700_000_010]);
    for (const batch of batches) {
      expect(new Set(batch.records.map((r) => r.ingestedAt))).toEqual(new Set([batch.ingestedAt]));
    }
  });

  it('flushes the open batch before rethrowing an upstream failure', async () => {
    async function* failing(): AsyncGenerator<SourceRecord> {
      yield* customers(0, 5);
      throw new ParseError('bad page');
    }

    const seen: Batch[] = [];
    const run = async (): Promise<void> => {
      for await (const batch of accumulateBatches(failing(), { maxSize: 4 })) seen.push(batch);
    };

    await expect(run()).rejects.toBeInstanceOf(ParseError);
    expect(seen.map((b) => b.records.length)).toEqual([4, 1]);
  });

  it('rejects a non-positive max size', async () => {
    await expect(collect(accumulateBatches(fromArray([]), { maxSize: 0 }))).rejects.toThrow('maxSize');
  });
});

describe('sealBatch', () => {
  it('floors the timestamp to unix seconds', () => {
    const batch = sealBatch(7, [{ id: 1 }], 1_700_000_000_999);
    expect(batch.id).toBe(7);
    expect(batch.ingestedAt).toBe(1_700_000_000);
    expect(batch.records).toEqual([{ payload: { id: 1 }, ingestedAt: 1_700_000_000 }]);
  });
});
