import { HttpError, ParseError } from '../types.js';
import type { HttpClient } from './http-client.js';
import type { Logger } from '../logger.js';

export interface AccessTokenConfig {
  readonly apiBaseUrl: string;
  readonly storeId: string;
  readonly clientSecret: string;
}

export interface AccessTokenProvider {
  readonly get: () => Promise<string>;
  readonly invalidate: () => void;
}

export function createAccessTokenProvider(
  httpClient: HttpClient,
  config: AccessTokenConfig,
  logger: Logger,
): AccessTokenProvider {
  let cached: string | null = null;
  let refreshInFlight: Promise<string> | null = null;

  async function requestToken(): Promise<string> {
    const url = `${config.apiBaseUrl}/stores/${encodeURIComponent(config.storeId)}/access_tokens`;

    logger.info({ storeId: config.storeId }, 'Requesting access token');

    const response = await httpClient.post(url, { secret: config.clientSecret });
    const body = response.body;
    if (typeof body !== 'object' || body === null || !('access_token' in body)) {
      throw new ParseError('Access token not found in response');
    }
    const token: unknown = body.access_token;
    if (typeof token !== 'string' || token === '') {
      throw new ParseError('Access token in response is not a non-empty string');
    }
    return token;
  }

  async function get(): Promise<string> {
    if (cached !== null) {
      return cached;
    }

    // Deduplicate concurrent refresh requests
    if (refreshInFlight) {
      return refreshInFlight;
    }

    refreshInFlight = requestToken().then((token) => {
      cached = token;
      logger.info('Access token acquired');
      return token;
    }).catch((err: unknown) => {
      if (err instanceof HttpError) {
        logger.error({ status: err.status }, 'Access token request failed');
      }
      throw err;
    }).finally(() => {
      refreshInFlight = null;
    });

    return refreshInFlight;
  }

  function invalidate(): void {
    cached = null;
  }

  return { get, invalidate };
}
