/**
 * Shared request path for feed providers: HTTP failures become
 * UpstreamFetchError, unparseable bodies become MalformedInputError.
 */

import { HTTPClient, HTTPJSONParseError, type FetchOptions } from '../core/http-client.js';
import { MalformedInputError, UpstreamFetchError } from '../core/errors.js';
import { logger } from '../core/utils/logger.js';

export async function requestFeed(
  client: HTTPClient,
  feed: string,
  url: string,
  options?: FetchOptions
): Promise<unknown> {
  try {
    return await client.fetchJSON(url, options);
  } catch (error) {
    if (error instanceof HTTPJSONParseError) {
      throw new MalformedInputError(`${feed} response`, [error.message]);
    }
    if (options?.signal?.aborted) {
      throw error;
    }

    const cause = error instanceof Error ? error : new Error(String(error));
    logger.warn('Feed request failed', { feed, url, error: cause.message });
    throw new UpstreamFetchError(feed, client.buildUrl(url, options?.query), cause);
  }
}
