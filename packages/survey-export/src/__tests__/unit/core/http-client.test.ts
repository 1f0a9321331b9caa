/**
 * HTTPClient Tests
 *
 * Retry classification and credential handling with fetch mocked.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { HTTPClient, buildUrl } from '../../../core/http-client.js';
import { StaticCredentialProvider } from '../../../core/credentials.js';
import {
  AuthorizationError,
  HTTPError,
  HTTPJSONParseError,
  RunCancelledError,
  TransientFetchError,
} from '../../../core/errors.js';

const URL_UNDER_TEST = 'https://api.test/v2/network/search';

describe('HTTPClient', () => {
  let fetchMock: Mock<typeof fetch>;
  let originalFetch: typeof fetch;

  beforeEach(() => {
    originalFetch = global.fetch;
    fetchMock = vi.fn<typeof fetch>();
    global.fetch = fetchMock;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  function client(maxRetries = 2): HTTPClient {
    return new HTTPClient(
      { maxRetries, initialDelayMs: 1, maxDelayMs: 5 },
      new StaticCredentialProvider('AIDtest', 'test-secret')
    );
  }

  it('should send basic credentials and parse the body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"success":true}', { status: 200 }));

    const body = await client().fetchJSON(URL_UNDER_TEST, { query: { ssid: 'cafe' } });

    expect(body).toEqual({ success: true });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.test/v2/network/search?ssid=cafe');
    expect(init?.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from('AIDtest:test-secret').toString('base64')}`,
      Accept: 'application/json',
    });
  });

  it('should omit the authorization header without credentials', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{}', { status: 200 }));

    await new HTTPClient().fetchJSON(URL_UNDER_TEST);

    expect(fetchMock.mock.calls[0][1]?.headers).not.toHaveProperty('Authorization');
  });

  it('should fail fast on 401 without retrying', async () => {
    fetchMock.mockResolvedValue(new Response('bad token', { status: 401, statusText: 'Unauthorized' }));

    const error = await client().fetchJSON(URL_UNDER_TEST).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toMatchObject({ statusCode: 401, message: 'Authorization failed (HTTP 401): bad token' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should retry 503 and give up with TransientFetchError', async () => {
    fetchMock.mockImplementation(async () => new Response('', { status: 503, statusText: 'Service Unavailable' }));

    const error = await client(2).fetchJSON(URL_UNDER_TEST).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransientFetchError);
    expect(error).toMatchObject({ attempts: 3 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should recover when a retry succeeds', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('', { status: 429, statusText: 'Too Many Requests' }))
      .mockResolvedValueOnce(new Response('{"ok":1}', { status: 200 }));

    await expect(client().fetchJSON(URL_UNDER_TEST)).resolves.toEqual({ ok: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should retry network failures', async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response('[]', { status: 200 }));

    await expect(client().fetchJSON(URL_UNDER_TEST)).resolves.toEqual([]);
  });

  it('should not retry a 404', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 404, statusText: 'Not Found' }));

    const error = await client().fetchJSON(URL_UNDER_TEST).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HTTPError);
    expect(error).toMatchObject({ statusCode: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should raise HTTPJSONParseError for a non-JSON body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));

    await expect(client().fetchJSON(URL_UNDER_TEST)).rejects.toBeInstanceOf(HTTPJSONParseError);
  });

  it('should not start a request once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(client().fetchJSON(URL_UNDER_TEST, { signal: controller.signal })).rejects.toBeInstanceOf(
      RunCancelledError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('buildUrl', () => {
  it('should encode query values', () => {
    expect(buildUrl('https://api.test/v2/cell/search', { ssidlike: 'cafe %' })).toBe(
      'https://api.test/v2/cell/search?ssidlike=cafe+%25'
    );
  });
});
