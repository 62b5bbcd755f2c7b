/**
 * @fileoverview Playback links from a flight tracker's flight history page.
 *
 * The history page lists one table row per past flight; rows with a
 * recorded track carry a playback button:
 *
 *   <tr class="live data-row">
 *     ...<a class="btn-playback" href="/data/flights/lo135/#3adec76e">Play</a>
 *   </tr>
 */

import * as cheerio from 'cheerio';
import { AppError } from '../../../utils/errors.js';
import { createLogger } from '../../../utils/observability/index.js';
import { FLIGHT_DESIGNATOR_START, normalizeFlightNumber } from '../../roster/service/text.js';
import type { PlaybackLink, PlaybackLookupOptions } from '../types.js';

const log = createLogger({ domain: 'tracker' });

const PLAYBACK_SELECTOR = 'tr.live.data-row a.btn-playback';

/**
 * Canonical designator ("lo 135" -> "LO135"), or null when the input is
 * not a flight number.
 */
export function parseFlightNumber(input: string): string | null {
  const trimmed = input.trim().toUpperCase();
  const match = trimmed.match(FLIGHT_DESIGNATOR_START);
  if (!match || match[0].length !== trimmed.length) return null;
  return normalizeFlightNumber(match[1], match[2]);
}

/** The tracker's history page for a flight. */
export function trackerFlightUrl(flightNumber: string, baseUrl: string): string {
  return new URL(`/data/flights/${flightNumber.toLowerCase()}`, baseUrl).toString();
}

/**
 * Absolute playback URLs found in a flight history page, in page order,
 * without duplicates.
 */
export function parsePlaybackLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];

  $(PLAYBACK_SELECTOR).each((_index, element) => {
    const href = $(element).attr('href')?.trim();
    if (!href) return;

    let absolute: string;
    try {
      absolute = new URL(href, pageUrl).toString();
    } catch {
      log.debug('playback_link_skipped', { reason: 'unparseable_href' });
      return;
    }
    if (!links.includes(absolute)) {
      links.push(absolute);
    }
  });

  return links;
}

export async function getPlaybackLinks(
  flightNumber: string,
  options: PlaybackLookupOptions
): Promise<PlaybackLink[]> {
  const canonical = parseFlightNumber(flightNumber);
  if (!canonical) {
    throw new AppError(`Not a flight number: "${flightNumber}"`, 'INVALID_FLIGHT_NUMBER', false, {
      flightNumber,
    });
  }

  const pageUrl = trackerFlightUrl(canonical, options.baseUrl);
  const response = await options.client.get(pageUrl);
  if (response.status !== 200) {
    throw new AppError(
      `Flight tracker returned HTTP ${response.status} for ${canonical}`,
      'TRACKER_HTTP_ERROR',
      true,
      { flightNumber: canonical, status: response.status }
    );
  }

  const links = parsePlaybackLinks(response.body, pageUrl);
  log.info('playback_links_found', { flightNumber: canonical, count: links.length });
  return links.map((url) => ({ flightNumber: canonical, url }));
}
