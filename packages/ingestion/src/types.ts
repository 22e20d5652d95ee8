// ── Record types ──

export type SourceRecord = Readonly<Record<string, unknown>>;

export interface IngestedRecord {
  readonly payload: SourceRecord;
  readonly ingestedAt: number; // unix seconds
}

export interface Page {
  readonly cursor: string | null; // cursor used to fetch this page, null = beginning
  readonly records: readonly SourceRecord[];
  readonly nextCursor: string | null; // null = end of stream
}

export interface Batch {
  readonly id: number;
  readonly records: readonly IngestedRecord[];
  readonly ingestedAt: number;
}

/** One row as the destination table stores it. */
export interface DestinationRow {
  readonly json_response: string;
  readonly time: number;
}

// ── Pipeline types ──

export interface BatchFailure {
  readonly batchId: number;
  readonly recordCount: number;
  readonly error: Error;
}

export interface PipelineResult {
  readonly recordsFetched: number;
  readonly pagesFetched: number;
  readonly batchesSealed: number;
  readonly batchesUploaded: number;
  readonly rowsWritten: number;
  readonly failures: readonly BatchFailure[];
  readonly lastCursor: string | null;
  readonly cancelled: boolean;
  readonly durationMs: number;
}

export interface MetricsSnapshot {
  readonly pagesFetched: number;
  readonly recordsFetched: number;
  readonly batchesSealed: number;
  readonly batchesUploaded: number;
  readonly batchesFailed: number;
  readonly rowsWritten: number;
  readonly throughputRps: number;
  readonly uptimeSeconds: number;
}

// ── Error types ──

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number, // 0 = timeout or network failure
    readonly method: string,
    readonly url: string,
    readonly retryAfterMs: number | null = null,
    readonly body: string = '',
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export class DbError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    readonly cause?: unknown,
    readonly transient: boolean = false,
  ) {
    super(message);
    this.name = 'DbError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly variable: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${operation} failed after ${attempts} attempts: ${reason}`);
    this.name = 'RetryExhaustedError';
  }
}

export class PipelineError extends Error {
  constructor(
    message: string,
    readonly result: PipelineResult,
    readonly cause: unknown,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

// ── Config type ──

export const Destination = {
  INGEST_API: 'ingest-api',
  POSTGRES: 'postgres',
} as const;

export type Destination = (typeof Destination)[keyof typeof Destination];

export interface AppConfig {
  readonly apiBaseUrl: string;
  readonly storeId: string;
  readonly clientSecret: string;
  readonly startCursor: string | null;
  readonly requestsPerSecond: number;
  readonly destRequestsPerSecond: number;
  readonly destination: Destination;
  readonly analyticsApiKey: string;
  readonly analyticsEndpoint: string;
  readonly analyticsDatabase: string;
  readonly analyticsTable: string;
  readonly databaseUrl: string;
  readonly batchSize: number;
  readonly uploadWorkers: number;
  readonly uploadQueueCapacity: number;
  readonly maxAttempts: number;
  readonly retryBaseMs: number;
  readonly retryMaxMs: number;
  readonly requestTimeoutMs: number;
  readonly progressLogIntervalMs: number;
}
