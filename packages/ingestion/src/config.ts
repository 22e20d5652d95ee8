import type { AppConfig } from './types.js';
import { ConfigError, Destination } from './types.js';

type Env = NodeJS.ProcessEnv;

function mustGetEnv(env: Env, key: string): string {
  const value = env[key];
  if (value === undefined || value === '') {
    throw new ConfigError(`Required environment variable ${key} is not set`, key);
  }
  return value;
}

function getEnv(env: Env, key: string, fallback: string): string {
  const value = env[key];
  return value !== undefined && value !== '' ? value : fallback;
}

function getIntEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${raw}`, key);
  }
  return parsed;
}

function getNumberEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a valid number, got: ${raw}`, key);
  }
  return parsed;
}

function parseDestination(raw: string): Destination {
  for (const value of Object.values(Destination)) {
    if (value === raw) return value;
  }
  throw new ConfigError(
    `DESTINATION must be one of ${Object.values(Destination).join(', ')}, got: ${raw}`,
    'DESTINATION',
  );
}

export function loadConfig(env: Env = process.env): AppConfig {
  const requestsPerSecond = getNumberEnv(env, 'REQUESTS_PER_SECOND', 4.5);
  if (requestsPerSecond <= 0) {
    throw new ConfigError(`REQUESTS_PER_SECOND must be greater than 0, got: ${requestsPerSecond}`, 'REQUESTS_PER_SECOND');
  }

  const destRequestsPerSecond = getNumberEnv(env, 'DEST_REQUESTS_PER_SECOND', 0);
  if (destRequestsPerSecond < 0) {
    throw new ConfigError(
      `DEST_REQUESTS_PER_SECOND must be 0 (unlimited) or positive, got: ${destRequestsPerSecond}`,
      'DEST_REQUESTS_PER_SECOND',
    );
  }

  const destination = parseDestination(getEnv(env, 'DESTINATION', Destination.INGEST_API));

  const retryBaseMs = Math.max(0, getIntEnv(env, 'RETRY_BASE_MS', 2000));
  const retryMaxMs = getIntEnv(env, 'RETRY_MAX_MS', 30000);
  if (retryMaxMs < retryBaseMs) {
    throw new ConfigError(`RETRY_MAX_MS (${retryMaxMs}) must be at least RETRY_BASE_MS (${retryBaseMs})`, 'RETRY_MAX_MS');
  }

  const requestTimeoutMs = getIntEnv(env, 'REQUEST_TIMEOUT_MS', 30000);
  if (requestTimeoutMs < 1) {
    throw new ConfigError(`REQUEST_TIMEOUT_MS must be at least 1, got: ${requestTimeoutMs}`, 'REQUEST_TIMEOUT_MS');
  }

  const progressLogIntervalMs = getIntEnv(env, 'PROGRESS_LOG_INTERVAL_MS', 15000);
  if (progressLogIntervalMs < 0) {
    throw new ConfigError(
      `PROGRESS_LOG_INTERVAL_MS must be 0 (disabled) or positive, got: ${progressLogIntervalMs}`,
      'PROGRESS_LOG_INTERVAL_MS',
    );
  }

  return {
    apiBaseUrl: normalizeBaseUrl('LOYALTY_API_BASE_URL', getEnv(env, 'LOYALTY_API_BASE_URL', 'https://api.yotpo.com/core/v3')),
    storeId: mustGetEnv(env, 'LOYALTY_STORE_ID'),
    clientSecret: mustGetEnv(env, 'LOYALTY_CLIENT_SECRET'),
    startCursor: getEnv(env, 'START_CURSOR', '') || null,
    requestsPerSecond,
    destRequestsPerSecond,
    destination,
    analyticsApiKey: destination === Destination.INGEST_API
      ? mustGetEnv(env, 'ANALYTICS_API_KEY')
      : getEnv(env, 'ANALYTICS_API_KEY', ''),
    analyticsEndpoint: normalizeBaseUrl('ANALYTICS_ENDPOINT', getEnv(env, 'ANALYTICS_ENDPOINT', 'https://us01.records.in.treasuredata.com')),
    analyticsDatabase: getEnv(env, 'ANALYTICS_DATABASE', 'loyalty_raw'),
    analyticsTable: getEnv(env, 'ANALYTICS_TABLE', 'loyalty_customers'),
    databaseUrl: destination === Destination.POSTGRES
      ? mustGetEnv(env, 'DATABASE_URL')
      : getEnv(env, 'DATABASE_URL', ''),
    batchSize: Math.min(500_000, Math.max(1, getIntEnv(env, 'BATCH_SIZE', 100_000))),
    uploadWorkers: Math.max(1, getIntEnv(env, 'UPLOAD_WORKERS', 2)),
    uploadQueueCapacity: Math.max(0, getIntEnv(env, 'UPLOAD_QUEUE_CAPACITY', 1)),
    maxAttempts: Math.max(1, getIntEnv(env, 'MAX_ATTEMPTS', 3)),
    retryBaseMs,
    retryMaxMs,
    requestTimeoutMs,
    progressLogIntervalMs,
  };
}

function normalizeBaseUrl(key: string, url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`${key} must be a valid absolute URL, got: ${url}`, key);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`${key} must use http or https, got: ${url}`, key);
  }
  return url.replace(/\/+$/, '');
}
