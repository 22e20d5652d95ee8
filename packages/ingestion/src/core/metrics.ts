import type { MetricsSnapshot } from '../types.js';

export interface Metrics {
  readonly addPage: (records: number) => void;
  readonly addSealed: () => void;
  readonly addUploaded: (rows: number) => void;
  readonly addFailed: () => void;
  readonly getSnapshot: () => MetricsSnapshot;
}

export function createMetrics(now: () => number = Date.now): Metrics {
  const startTime = now();
  let pagesFetched = 0;
  let recordsFetched = 0;
  let batchesSealed = 0;
  let batchesUploaded = 0;
  let batchesFailed = 0;
  let rowsWritten = 0;

  let lastThroughputCalcMs = startTime;
  let lastRecordsAtCalc = 0;
  let throughputEma: number | null = null;

  function ema(prev: number | null, value: number, alpha = 0.2): number {
    return prev === null ? value : prev + alpha * (value - prev);
  }

  // Records fetched per second, smoothed across snapshots
  function recalcThroughput(current: number): number {
    const elapsedMs = current - lastThroughputCalcMs;
    if (elapsedMs < 1000) return throughputEma ?? 0;

    const instantRps = (recordsFetched - lastRecordsAtCalc) / (elapsedMs / 1000);
    lastThroughputCalcMs = current;
    lastRecordsAtCalc = recordsFetched;

    throughputEma = ema(throughputEma, instantRps);
    return throughputEma;
  }

  function getSnapshot(): MetricsSnapshot {
    const current = now();
    return {
      pagesFetched,
      recordsFetched,
      batchesSealed,
      batchesUploaded,
      batchesFailed,
      rowsWritten,
      throughputRps: recalcThroughput(current),
      uptimeSeconds: (current - startTime) / 1000,
    };
  }

  return {
    addPage: (records) => {
      pagesFetched++;
      recordsFetched += records;
    },
    addSealed: () => {
      batchesSealed++;
    },
    addUploaded: (rows) => {
      batchesUploaded++;
      rowsWritten += rows;
    },
    addFailed: () => {
      batchesFailed++;
    },
    getSnapshot,
  };
}
