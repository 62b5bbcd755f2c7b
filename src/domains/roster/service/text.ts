/**
 * Helpers shared by the roster layouts: text cleanup after PDF extraction,
 * clock times and flight designators.
 */

import { DateTime } from 'luxon';

export interface RosterLine {
  /** 1-based line number in the text handed to the extractor */
  number: number;
  text: string;
}

/** Spaces PDF text layers emit besides U+0020. */
const WIDE_SPACES = /[\u00A0\u1680\u2000-\u200A\u202F\u205F\u3000\t\f\v]/g;
const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF]/g;

/**
 * Airline part of a flight designator: two characters, at least one a letter
 * ("LO", "W6", "3U"). Digit-only prefixes would match page numbers.
 */
export const AIRLINE_DESIGNATOR = '(?:[A-Z]{2}|[A-Z]\\d|\\d[A-Z])';

/** "LO135", "LO 135", "LO 3915", "BA117A" at the start of a line. */
export const FLIGHT_DESIGNATOR_START = new RegExp(
  `^(${AIRLINE_DESIGNATOR})\\s?(\\d{1,5}[A-Z]?)(?=\\s|$)`
);

/**
 * Split extracted text into trimmed, whitespace-collapsed lines.
 * Blank lines are dropped but keep their place in the numbering.
 */
export function normalizeRosterText(raw: string): RosterLine[] {
  const lines: RosterLine[] = [];
  raw.split(/\r\n|\r|\n/).forEach((line, index) => {
    const text = line
      .replace(ZERO_WIDTH, '')
      .replace(WIDE_SPACES, ' ')
      .replace(/ {2,}/g, ' ')
      .trim();
    if (text) {
      lines.push({ number: index + 1, text });
    }
  });
  return lines;
}

/**
 * Parse "08:00", "8:00", "0800", "08 : 00" into "HH:mm".
 * Returns null when the digits do not form a time of day.
 */
export function parseClockTime(raw: string): string | null {
  const match = raw.replace(/\s+/g, '').match(/^(\d{1,2}):?(\d{2})$/);
  if (!match) return null;

  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return null;

  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

export function minutesOfDay(time: string): number {
  const [hour, minute] = time.split(':').map((part) => parseInt(part, 10));
  return hour * 60 + minute;
}

/** yyyy-MM-dd that names a real calendar day. */
export function isCalendarDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

export function normalizeFlightNumber(airline: string, number: string): string {
  return `${airline}${number}`.toUpperCase();
}

/** Compact yyyyMMdd form of an ISO date, used in UIDs and file names. */
export function compactDate(isoDate: string): string {
  return isoDate.replace(/-/g, '');
}
