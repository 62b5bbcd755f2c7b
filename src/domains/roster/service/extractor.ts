/**
 * @fileoverview Roster extractor: raw roster text in, duty records out.
 *
 * The layout is detected from the text: dated check-in lines or a NetLine
 * period header mark a NetLine crew plan, everything else is read as the
 * compact layout. Lines
 * that start no known record are skipped; a line that starts one but does
 * not complete it fails the whole extraction with a ParseError.
 */

import config from '../../../config.js';
import { createLogger } from '../../../utils/observability/index.js';
import { requireTimezone } from '../../../services/date/index.js';
import type { ExtractOptions, RosterDocument, RosterLayout } from '../types.js';
import { parseCompactRoster } from './compact.js';
import { isNetLineRoster, parseNetLineRoster } from './netline.js';
import { normalizeRosterText, type RosterLine } from './text.js';

const log = createLogger({ domain: 'roster-extractor' });

export function detectLayout(lines: RosterLine[]): RosterLayout {
  return isNetLineRoster(lines) ? 'netline' : 'compact';
}

/**
 * Extract duty records from roster text.
 *
 * @throws ParseError when a recognised record has missing or malformed fields
 * @throws TimezoneError when `options.timezone` is not an IANA zone
 */
export function extractRoster(text: string, options: ExtractOptions = {}): RosterDocument {
  const timezone = options.timezone ?? config.roster.timezone;
  requireTimezone(timezone);

  const lines = normalizeRosterText(text);
  const layout = detectLayout(lines);
  const document = layout === 'netline'
    ? parseNetLineRoster(lines)
    : parseCompactRoster(lines, timezone);

  log.debug('roster_extracted', {
    layout,
    lineCount: lines.length,
    recordCount: document.records.length,
  });

  return document;
}
