import { fetchWithRetry, type FetchRetryOptions } from '../../../services/http/fetch-with-retry.js';
import type { HttpClient, HttpResponse } from '../types.js';

const DEFAULT_HEADERS = {
  Accept: 'text/html,application/xhtml+xml',
  'User-Agent': 'Mozilla/5.0 (compatible; roster-calendar/1.0)',
};

export function createFetchHttpClient(options: FetchRetryOptions = {}): HttpClient {
  return {
    async get(url: string): Promise<HttpResponse> {
      const response = await fetchWithRetry(url, { headers: DEFAULT_HEADERS }, 'tracker_get', options);
      return { status: response.status, body: await response.text() };
    },
  };
}
