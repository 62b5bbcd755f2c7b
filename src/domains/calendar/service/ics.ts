/**
 * @fileoverview iCalendar (RFC 5545) serializer.
 *
 * Output depends only on the events, their order and the options: DTSTAMP
 * is the single field tied to the generation time, and it comes from
 * `options.generatedAt` when given.
 */

import { DateTime } from 'luxon';
import { CalendarGenerationError } from '../../../utils/errors.js';
import type { CalendarEvent, CalendarOptions } from '../types.js';

const CRLF = '\r\n';

/** RFC 5545 3.1: content lines are folded after 75 octets. */
const MAX_LINE_OCTETS = 75;

export const ICS_MIME_TYPE = 'text/calendar; charset=utf-8';

/**
 * Escape a TEXT value (RFC 5545 3.3.11).
 */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n');
}

/**
 * Fold a content line into chunks of at most 75 octets. Continuation
 * lines start with a single space, which counts towards their 75.
 * Multi-byte UTF-8 characters are never split.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) {
    return line;
  }

  const chunks: string[] = [];
  let current = '';
  let currentOctets = 0;
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf-8');
    if (currentOctets + octets > limit) {
      chunks.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  chunks.push(current);

  return chunks.join(`${CRLF} `);
}

/**
 * ISO instant -> "20240320T070000Z".
 */
export function formatUtcTimestamp(iso: string): string {
  const instant = DateTime.fromISO(iso, { zone: 'utc' });
  if (!instant.isValid) {
    throw new CalendarGenerationError(`Invalid event time "${iso}"`, { value: iso });
  }
  return instant.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'");
}

function eventLines(event: CalendarEvent, dtstamp: string): string[] {
  const start = formatUtcTimestamp(event.start);
  const end = formatUtcTimestamp(event.end);
  if (DateTime.fromISO(event.end).toMillis() < DateTime.fromISO(event.start).toMillis()) {
    throw new CalendarGenerationError(`Event ${event.uid} ends before it starts`, { uid: event.uid });
  }

  const lines = [
    'BEGIN:VEVENT',
    `UID:${event.uid}`,
    `DTSTAMP:${dtstamp}`,
    `DTSTART:${start}`,
    `DTEND:${end}`,
    `SUMMARY:${escapeText(event.summary)}`,
  ];
  if (event.location) {
    lines.push(`LOCATION:${escapeText(event.location)}`);
  }
  lines.push(`DESCRIPTION:${escapeText(event.description)}`);
  if (event.categories.length > 0) {
    lines.push(`CATEGORIES:${event.categories.map(escapeText).join(',')}`);
  }
  if (event.url) {
    lines.push(`URL:${event.url}`);
  }
  lines.push('END:VEVENT');
  return lines;
}

/**
 * Serialize events into one VCALENDAR, one VEVENT per event in input order.
 *
 * @throws CalendarGenerationError on duplicate UIDs, bad times, or an event ending before it starts
 */
export function serializeCalendar(events: CalendarEvent[], options: CalendarOptions): string {
  const uids = new Set<string>();
  for (const event of events) {
    if (uids.has(event.uid)) {
      throw new CalendarGenerationError(`Duplicate event UID ${event.uid}`, { uid: event.uid });
    }
    uids.add(event.uid);
  }

  const dtstamp = formatUtcTimestamp((options.generatedAt ?? new Date()).toISOString());

  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${options.prodId}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    ...(options.calendarName ? [`X-WR-CALNAME:${escapeText(options.calendarName)}`] : []),
    ...events.flatMap((event) => eventLines(event, dtstamp)),
    'END:VCALENDAR',
  ];

  return lines.map(foldLine).join(CRLF) + CRLF;
}

/** UTF-8 bytes of {@link serializeCalendar}. */
export function toIcsBytes(events: CalendarEvent[], options: CalendarOptions): Buffer {
  return Buffer.from(serializeCalendar(events, options), 'utf-8');
}
