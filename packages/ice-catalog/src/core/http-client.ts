/**
 * HTTP Client for the release archive
 *
 * Thin wrapper over native fetch with:
 * - Configurable timeouts via AbortController
 * - Typed errors (status, timeout, network)
 *
 * One request per call. There is no retry or backoff: a failed download
 * fails its folder, and the next scheduled run picks the folder up again
 * because it never reached the zip catalog.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 30000 });
 * const listing = await client.fetchText('https://archive.example.com/2024/');
 * const part = await client.fetch('https://archive.example.com/2024/20240101_A/20240101_A.shp');
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'ice-catalog/0.1') */
  readonly userAgent: string;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection failed, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 30000,
      userAgent: 'ice-catalog/0.1',
      ...config,
    };
  }

  /**
   * Fetch a response body as text (directory listings)
   *
   * @throws {HTTPError} For non-2xx responses
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   */
  async fetchText(url: string, options?: FetchOptions): Promise<string> {
    const response = await this.fetchOk(url, options);
    return response.text();
  }

  /**
   * Raw response without status check. Callers that treat 404 as "part not
   * published" use this and inspect the status themselves.
   */
  async fetch(url: string, options?: FetchOptions): Promise<Response> {
    return this.fetchWithTimeout(url, options);
  }

  private async fetchOk(url: string, options?: FetchOptions): Promise<Response> {
    const response = await this.fetchWithTimeout(url, options);
    if (!response.ok) {
      logger.debug('HTTPClient non-success status', { url, statusCode: response.status });
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url);
    }
    return response;
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
