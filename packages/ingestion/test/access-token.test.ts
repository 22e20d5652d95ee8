import { describe, it, expect, vi } from 'vitest';
import { createAccessTokenProvider } from '../src/api/access-token.js';
import type { HttpClient } from '../src/api/http-client.js';
import { ParseError } from '../src/types.js';
import { logger } from './helpers.js';

const config = { apiBaseUrl: 'http://source.test/core/v3', storeId: 'store-1', clientSecret: 'test-secret' };

function createMockHttp(body: unknown): HttpClient {
  return {
    get: vi.fn(),
    post: vi.fn().mockResolvedValue({ status: 200, headers: {}, body }),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe('createAccessTokenProvider', () => {
  it('exchanges the store secret for a token', async () => {
    const http = createMockHttp({ access_token: 'token-1' });
    const tokens = createAccessTokenProvider(http, config, logger);

    await expect(tokens.get()).resolves.toBe('token-1');
    expect(http.post).toHaveBeenCalledWith(
      'http://source.test/core/v3/stores/store-1/access_tokens',
      { secret: 'test-secret' },
    );
  });

  it('caches the token and deduplicates concurrent requests', async () => {
    const http = createMockHttp({ access_token: 'token-1' });
    const tokens = createAccessTokenProvider(http, config, logger);

    const [a, b] = await Promise.all([tokens.get(), tokens.get()]);
    const c = await tokens.get();

    expect([a, b, c]).toEqual(['token-1', 'token-1', 'token-1']);
    expect(http.post).toHaveBeenCalledTimes(1);
  });

  it('requests a new token after invalidate', async () => {
    const http = createMockHttp({ access_token: 'token-1' });
    const tokens = createAccessTokenProvider(http, config, logger);

    await tokens.get();
    tokens.invalidate();
    await tokens.get();

    expect(http.post).toHaveBeenCalledTimes(2);
  });

  it('rejects a response without a token', async () => {
    const tokens = createAccessTokenProvider(createMockHttp({ error: 'nope' }), config, logger);
    await expect(tokens.get()).rejects.toBeInstanceOf(ParseError);
  });
});
