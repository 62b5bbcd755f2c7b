import { afterEach, describe, expect, it, vi } from 'vitest';
import { fetchWithRetry } from '../../../../src/services/http/fetch-with-retry.js';
import { createFetchHttpClient } from '../../../../src/domains/tracker/providers/fetch-client.js';

const NO_DELAY = { retryDelaysMs: [0, 0], timeoutMs: 1000 };

function stubFetch(...results: Array<Response | Error>) {
  const fetchMock = vi.fn(async () => {
    const next = results.shift();
    if (!next) throw new Error('unexpected fetch');
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('fetchWithRetry', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('retries transient HTTP statuses', async () => {
    const fetchMock = stubFetch(new Response('busy', { status: 503 }), new Response('ok', { status: 200 }));

    const response = await fetchWithRetry('https://tracker.test/', {}, 'test_get', NO_DELAY);

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('returns client errors without retrying', async () => {
    const fetchMock = stubFetch(new Response('missing', { status: 404 }));

    const response = await fetchWithRetry('https://tracker.test/', {}, 'test_get', NO_DELAY);

    expect(response.status).toBe(404);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries network failures', async () => {
    const fetchMock = stubFetch(new TypeError('fetch failed'), new Response('ok', { status: 200 }));

    const response = await fetchWithRetry('https://tracker.test/', {}, 'test_get', NO_DELAY);

    expect(response.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after the last attempt', async () => {
    const fetchMock = stubFetch(
      new Response('busy', { status: 503 }),
      new Response('busy', { status: 503 }),
      new Response('still busy', { status: 503 })
    );

    const response = await fetchWithRetry('https://tracker.test/', {}, 'test_get', NO_DELAY);

    expect(response.status).toBe(503);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('rethrows errors that are not transient', async () => {
    stubFetch(new Error('boom'));

    await expect(fetchWithRetry('https://tracker.test/', {}, 'test_get', NO_DELAY)).rejects.toThrow('boom');
  });

  it('backs the tracker HTTP client', async () => {
    stubFetch(new Response('<html></html>', { status: 200 }));

    const client = createFetchHttpClient(NO_DELAY);

    await expect(client.get('https://tracker.test/data/flights/lo135')).resolves.toEqual({
      status: 200,
      body: '<html></html>',
    });
  });
});
