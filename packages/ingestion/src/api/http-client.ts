import { Agent, fetch } from 'undici';
import { HttpError } from '../types.js';
import { parseRetryAfter } from './middleware/retry.js';

export interface HttpResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
}

export interface HttpClient {
  readonly get: (url: string, headers?: Record<string, string>) => Promise<HttpResponse>;
  readonly post: (url: string, body: unknown, headers?: Record<string, string>) => Promise<HttpResponse>;
  readonly close: () => Promise<void>;
}

export interface HttpClientOptions {
  readonly timeoutMs: number;
  readonly connections?: number;
}

const MAX_ERROR_BODY_CHARS = 500;

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const dispatcher = new Agent({
    keepAliveTimeout: 30_000,
    keepAliveMaxTimeout: 60_000,
    connections: options.connections ?? 8,
  });

  async function request(
    method: string,
    url: string,
    body: unknown | undefined,
    extraHeaders: Record<string, string> | undefined,
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'Accept-Encoding': 'gzip, deflate',
      ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...extraHeaders,
    };

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
        signal: controller.signal,
        dispatcher,
      });

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      const text = await response.text();
      const contentType = responseHeaders['content-type'] ?? '';

      if (!response.ok) {
        throw new HttpError(
          `HTTP ${response.status} ${method} ${url}`,
          response.status,
          method,
          url,
          parseRetryAfter(responseHeaders['retry-after'] ?? null),
          text.slice(0, MAX_ERROR_BODY_CHARS),
        );
      }

      return {
        status: response.status,
        headers: responseHeaders,
        body: contentType.includes('json') && text !== '' ? parseJson(text) : text,
      };
    } catch (err) {
      if (err instanceof HttpError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new HttpError(`Request timeout after ${options.timeoutMs}ms`, 0, method, url);
      }
      throw new HttpError(
        `Network error: ${err instanceof Error ? err.message : String(err)}`,
        0,
        method,
        url,
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    get: (url, headers) => request('GET', url, undefined, headers),
    post: (url, body, headers) => request('POST', url, body, headers),
    close: () => dispatcher.close(),
  };
}

// Malformed JSON is surfaced as the raw text so the caller's parser rejects it.
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}
