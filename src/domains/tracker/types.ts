/**
 * Flight-tracker domain types.
 */

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * The one request the tracker lookup makes. Tests swap in a fake; the
 * default implementation wraps fetch.
 */
export interface HttpClient {
  get(url: string): Promise<HttpResponse>;
}

export interface PlaybackLink {
  flightNumber: string;
  url: string;
}

export interface PlaybackLookupOptions {
  client: HttpClient;
  /** Tracker site root, e.g. https://www.flightradar24.com */
  baseUrl: string;
}
