/**
 * HTTP Client for Scoutbook feed providers
 *
 * One place for feed fetches:
 * - Configurable timeouts via AbortController
 * - Query parameter encoding
 * - Typed errors the providers translate into UpstreamFetchError
 *
 * No retries: a failed feed call surfaces to the caller, who decides whether
 * to prompt the user again.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 10_000 });
 * const body = await client.fetchJSON('https://example.test/api/players.xml', {
 *   query: { toJson: 1 },
 * });
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 10000) */
  readonly timeoutMs: number;

  /** User-Agent header (default: 'Scoutbook/0.1') */
  readonly userAgent: string;

  /** Fetch implementation (default: global fetch) */
  readonly fetch: FetchFunction;
}

export type QueryValue = string | number | boolean | null | undefined;

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  /** Override request timeout */
  readonly timeoutMs?: number;

  /** Query parameters; null and undefined values are dropped */
  readonly query?: Readonly<Record<string, QueryValue>>;

  /** Additional HTTP headers */
  readonly headers?: Record<string, string>;

  /** AbortSignal for caller-driven cancellation */
  readonly signal?: AbortSignal;
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

/**
 * JSON parse error
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 10_000,
      userAgent: 'Scoutbook/0.1',
      fetch: (input, init) => fetch(input, init),
      ...config,
    };
  }

  /**
   * Build the request URL with encoded query parameters
   */
  buildUrl(url: string, query?: FetchOptions['query']): string {
    if (!query) {
      return url;
    }
    const target = new URL(url);
    for (const [key, value] of Object.entries(query)) {
      if (value !== null && value !== undefined) {
        target.searchParams.set(key, String(value));
      }
    }
    return target.toString();
  }

  /**
   * Fetch and parse a JSON response. The body is returned unvalidated;
   * providers run it through their schemas.
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If response is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const target = this.buildUrl(url, options?.query);
    const response = await this.fetchWithTimeout(target, options);

    if (!response.ok) {
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, target);
    }

    const text = await response.text();

    try {
      return JSON.parse(text) as unknown;
    } catch (error) {
      throw new HTTPJSONParseError(
        target,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch with timeout using AbortController
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onExternalAbort = (): void => controller.abort();
    options?.signal?.addEventListener('abort', onExternalAbort, { once: true });

    const startTime = Date.now();
    try {
      const response = await this.config.fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
          ...options?.headers,
        },
        signal: controller.signal,
      });

      logger.debug('HTTP request completed', {
        url,
        status: response.status,
        durationMs: Date.now() - startTime,
      });

      return response;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (options?.signal?.aborted) {
          // Caller cancelled; not a timeout
          throw error;
        }
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
      options?.signal?.removeEventListener('abort', onExternalAbort);
    }
  }
}
