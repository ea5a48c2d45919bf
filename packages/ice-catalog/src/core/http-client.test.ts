import { describe, it, expect, vi, afterEach } from 'vitest';
import { HTTPClient, HTTPError, HTTPNetworkError, HTTPTimeoutError } from './http-client.js';

const LISTING_URL = 'https://archive.test/SIGRID3/2024/';

describe('HTTPClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the configured user agent', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('listing'));
    vi.stubGlobal('fetch', fetchMock);

    const text = await new HTTPClient({ userAgent: 'ice-catalog-test' }).fetchText(LISTING_URL);

    expect(text).toBe('listing');
    expect(fetchMock).toHaveBeenCalledWith(
      LISTING_URL,
      expect.objectContaining({ method: 'GET', headers: { 'User-Agent': 'ice-catalog-test' } })
    );
  });

  it('throws HTTPError with the status for non-2xx responses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 503, statusText: 'Service Unavailable' })));

    const error = await new HTTPClient().fetchText(LISTING_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPError);
    if (error instanceof HTTPError) {
      expect(error.statusCode).toBe(503);
      expect(error.url).toBe(LISTING_URL);
      expect(error.message).toBe('HTTP 503: Service Unavailable');
    }
  });

  it('returns non-2xx responses from fetch without throwing', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 404 })));

    const response = await new HTTPClient().fetch(LISTING_URL);

    expect(response.status).toBe(404);
  });

  it('wraps connection failures in HTTPNetworkError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(new HTTPClient().fetchText(LISTING_URL)).rejects.toThrow('Network error: fetch failed');
    await expect(new HTTPClient().fetchText(LISTING_URL)).rejects.toBeInstanceOf(HTTPNetworkError);
  });

  it('aborts requests that exceed the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );

    const error = await new HTTPClient({ timeoutMs: 20 }).fetchText(LISTING_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPTimeoutError);
    if (error instanceof HTTPTimeoutError) {
      expect(error.message).toBe(`Request timeout after 20ms: ${LISTING_URL}`);
    }
  });
});
