import type { Page } from '../types.js';
import { HttpError } from '../types.js';
import type { HttpClient, HttpResponse } from './http-client.js';
import type { AccessTokenProvider } from './access-token.js';
import { getSourceAuthHeaders } from './middleware/auth.js';
import { emptyFinalPage, parseCustomersPage } from '../mappers.js';
import type { Logger } from '../logger.js';

const PAGE_LIMIT = 100;
const NO_RESULTS_MARKER = 'no results found';

export interface LoyaltySourceConfig {
  readonly apiBaseUrl: string;
  readonly storeId: string;
}

/** One page per call; `cursor` null requests the first page. */
export interface LoyaltySource {
  readonly fetchPage: (cursor: string | null) => Promise<Page>;
}

export function buildCustomersUrl(config: LoyaltySourceConfig, cursor: string | null): string {
  const url = new URL(`${config.apiBaseUrl}/stores/${encodeURIComponent(config.storeId)}/customers`);
  if (cursor !== null) {
    url.searchParams.set('page_info', cursor);
  } else {
    url.searchParams.set('limit', String(PAGE_LIMIT));
  }
  url.searchParams.set('include_custom_properties', 'true');
  url.searchParams.set('expand', 'loyalty');
  return url.toString();
}

export function createLoyaltySource(
  httpClient: HttpClient,
  tokens: AccessTokenProvider,
  config: LoyaltySourceConfig,
  logger: Logger,
): LoyaltySource {
  async function request(cursor: string | null): Promise<HttpResponse> {
    const token = await tokens.get();
    return httpClient.get(buildCustomersUrl(config, cursor), getSourceAuthHeaders(token));
  }

  async function fetchPage(cursor: string | null): Promise<Page> {
    let response: HttpResponse;

    try {
      try {
        response = await request(cursor);
      } catch (err) {
        if (!(err instanceof HttpError) || err.status !== 401) throw err;
        // Token expired or revoked: refresh once before giving up
        logger.warn({ cursor }, 'Access token rejected, refreshing');
        tokens.invalidate();
        response = await request(cursor);
      }
    } catch (err) {
      if (err instanceof HttpError && err.status === 400 && err.body.toLowerCase().includes(NO_RESULTS_MARKER)) {
        logger.info({ cursor }, 'Source reported no results, treating as end of stream');
        return emptyFinalPage(cursor);
      }
      throw err;
    }

    return parseCustomersPage(response.body, cursor);
  }

  return { fetchPage };
}
