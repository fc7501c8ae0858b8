/**
 * HTTP client tests (injected fetch, no network)
 */

import { describe, it, expect, vi } from 'vitest';
import {
  HTTPClient,
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
  type FetchFunction,
} from '../../../core/http-client.js';

function respondWith(body: string, init?: ResponseInit): FetchFunction {
  return vi.fn(async () => new Response(body, init));
}

describe('HTTPClient', () => {
  it('builds query strings and drops empty values', () => {
    const client = new HTTPClient();
    expect(client.buildUrl('https://game.test/api/playerData.xml', { id: 7, toJson: 1, skip: null, gone: undefined })).toBe(
      'https://game.test/api/playerData.xml?id=7&toJson=1'
    );
  });

  it('returns parsed JSON and sends the user agent', async () => {
    const fetch = vi.fn<FetchFunction>(async () => new Response('{"ok":true}'));
    const client = new HTTPClient({ fetch, userAgent: 'Scoutbook/test' });

    await expect(client.fetchJSON('https://game.test/api/x')).resolves.toEqual({ ok: true });
    const init = fetch.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ 'User-Agent': 'Scoutbook/test', Accept: 'application/json' });
  });

  it('raises HTTPError for non-2xx responses', async () => {
    const client = new HTTPClient({ fetch: respondWith('gone', { status: 404, statusText: 'Not Found' }) });
    const error = await client.fetchJSON('https://game.test/api/x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HTTPError);
    expect(error instanceof HTTPError && error.statusCode).toBe(404);
    expect(error instanceof HTTPError && error.message).toBe('HTTP 404: Not Found');
  });

  it('raises HTTPJSONParseError for a non-JSON body', async () => {
    const client = new HTTPClient({ fetch: respondWith('<xml/>') });
    await expect(client.fetchJSON('https://game.test/api/x')).rejects.toBeInstanceOf(HTTPJSONParseError);
  });

  it('wraps transport failures', async () => {
    const client = new HTTPClient({
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });
    await expect(client.fetchJSON('https://game.test/api/x')).rejects.toThrow(HTTPNetworkError);
  });

  it('times out through AbortController', async () => {
    const hanging: FetchFunction = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(new DOMException('The operation was aborted.', 'AbortError'));
        });
      });
    const client = new HTTPClient({ fetch: hanging, timeoutMs: 10 });

    await expect(client.fetchJSON('https://game.test/api/x')).rejects.toBeInstanceOf(HTTPTimeoutError);
  });

  it('rethrows a caller abort as-is', async () => {
    const hanging: FetchFunction = (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          reject(new DOMException('The operation was aborted.', 'AbortError'));
        });
      });
    const client = new HTTPClient({ fetch: hanging, timeoutMs: 5_000 });
    const controller = new AbortController();

    const pending = client.fetchJSON('https://game.test/api/x', { signal: controller.signal });
    controller.abort();

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DOMException);
    expect(error instanceof DOMException && error.name).toBe('AbortError');
  });
});
