/**
 * @fileoverview NetLine/Crew "Individual plan" layout.
 *
 * The export starts with a print stamp and the roster period:
 *
 *   Individual plan NetLine/Crew(LOT) printedbyCREWLINK 17Aug25 09:13Page1
 *   Period 01Jun25 31Jul25
 *
 * Each work day opens with a check-in line and closes with a check-out
 * line; flights in between carry UTC times and no date of their own:
 *
 *   12. Thu C/I WAW 0515
 *   LO 3915 WAW 0615 0800 BCN
 *   LO 3916 BCN 0850 1045 WAW
 *   C/O 1115 WAW
 *
 * Day numbers are resolved against the period start month. When the day
 * of month goes down, the roster has moved into the following month.
 */

import { DateTime } from 'luxon';
import { ParseError } from '../../../utils/errors.js';
import type { FlightDutyRecord, RosterDocument, RosterPeriod } from '../types.js';
import {
  FLIGHT_DESIGNATOR_START,
  minutesOfDay,
  normalizeFlightNumber,
  parseClockTime,
  type RosterLine,
} from './text.js';

/** Times in this export are UTC. */
export const NETLINE_TIMEZONE = 'UTC';

const SHORT_DATE = /\b(\d{1,2}[A-Za-z]{3}\d{2})\b/;
const PERIOD = /\b(\d{1,2}[A-Za-z]{3}\d{2})\s*-?\s*(\d{1,2}[A-Za-z]{3}\d{2})\b/;
const DAY_PREFIX = /^(\d{1,2})\.\s?([A-Za-z]{2,3})\s+(.*)$/;
const CHECK_IN = /\bC\/I\b/;
const CHECK_OUT = /\bC\/O\b/;
/** "12. Tue C/I WAW 0515" */
const WORKDAY_LINE = /^\d{1,2}\.\s?[A-Za-z]{2,3}\s+C\/I\b/;
const PERIOD_HEADER = /^Period\s+\d{1,2}[A-Za-z]{3}\d{2}\s*-?\s*\d{1,2}[A-Za-z]{3}\d{2}\b/i;
const FLIGHT_BODY = /^([A-Za-z]{3})\s+(\d{4})\s+(\d{4})\s+([A-Za-z]{3})(?=\s|$)/;

/** Header lines searched for the period. */
const HEADER_LINES = 5;

/**
 * A NetLine plan opens work days with a dated check-in line, or carries a
 * "Period 01Jun25 31Jul25" header. A stray "C/I" in a note is neither.
 */
export function isNetLineRoster(lines: RosterLine[]): boolean {
  return (
    lines.slice(0, HEADER_LINES).some((line) => PERIOD_HEADER.test(line.text)) ||
    lines.some((line) => WORKDAY_LINE.test(line.text))
  );
}

/**
 * Parse "17Aug25" into yyyy-MM-dd. Two-digit years fall in 2000-2059.
 */
export function parseShortDate(value: string): string | null {
  const parsed = DateTime.fromFormat(value, 'dMMMyy', { locale: 'en-US', zone: 'utc' });
  return parsed.isValid ? parsed.toISODate() : null;
}

function parsePrintedOn(lines: RosterLine[]): string | undefined {
  const first = lines[0];
  if (!first) return undefined;
  const match = first.text.match(SHORT_DATE);
  return match ? parseShortDate(match[1]) ?? undefined : undefined;
}

function parsePeriod(lines: RosterLine[]): RosterPeriod {
  for (const line of lines.slice(0, HEADER_LINES)) {
    const match = line.text.match(PERIOD);
    if (!match) continue;

    const start = parseShortDate(match[1]);
    const end = parseShortDate(match[2]);
    if (!start || !end) {
      throw new ParseError(`Cannot read roster period on line ${line.number}`, line.number, 'period', line.text);
    }
    return { start, end };
  }

  const header = lines[1] ?? lines[0];
  throw new ParseError(
    'Cannot find the roster period in the header (expected e.g. "Period 01Jun25 31Jul25")',
    header?.number ?? 1,
    'period',
    header?.text ?? ''
  );
}

/**
 * Tracks which calendar month day numbers belong to.
 */
class DayResolver {
  private month: DateTime;
  private previousDay: number | null = null;

  constructor(periodStart: string) {
    this.month = DateTime.fromISO(periodStart, { zone: 'utc' }).startOf('month');
  }

  resolve(day: number, line: RosterLine): string {
    if (this.previousDay !== null && day < this.previousDay) {
      this.month = this.month.plus({ months: 1 });
    }
    this.previousDay = day;

    const date = DateTime.fromObject(
      { year: this.month.year, month: this.month.month, day },
      { zone: 'utc' }
    );
    const iso = date.isValid ? date.toISODate() : null;
    if (!iso) {
      throw new ParseError(
        `Day ${day} does not exist in ${this.month.toFormat('yyyy-MM')} (line ${line.number})`,
        line.number,
        'date',
        line.text
      );
    }
    return iso;
  }
}

function requireTime(raw: string, field: string, line: RosterLine): string {
  const time = parseClockTime(raw);
  if (!time) {
    throw new ParseError(`Invalid ${field} "${raw}" on line ${line.number}`, line.number, field, line.text);
  }
  return time;
}

function parseFlightLine(body: string, date: string, line: RosterLine): FlightDutyRecord | null {
  const designator = body.match(FLIGHT_DESIGNATOR_START);
  if (!designator) return null;

  const flightNumber = normalizeFlightNumber(designator[1], designator[2]);
  const match = body.slice(designator[0].length).trim().match(FLIGHT_BODY);
  if (!match) {
    throw new ParseError(
      `Flight ${flightNumber} on line ${line.number} does not read "<from> <dep> <arr> <to>"`,
      line.number,
      'route',
      line.text
    );
  }

  const departureTime = requireTime(match[2], 'departureTime', line);
  const arrivalTime = requireTime(match[3], 'arrivalTime', line);
  if (departureTime === arrivalTime) {
    throw new ParseError(
      `arrivalTime equals departureTime on line ${line.number}`,
      line.number,
      'arrivalTime',
      line.text
    );
  }

  return {
    dutyType: 'flight',
    date,
    sourceTimezone: NETLINE_TIMEZONE,
    flightNumber,
    departureAirport: match[1].toUpperCase(),
    arrivalAirport: match[4].toUpperCase(),
    departureTime,
    arrivalTime,
    arrivalDayOffset: minutesOfDay(arrivalTime) < minutesOfDay(departureTime) ? 1 : 0,
  };
}

export function parseNetLineRoster(lines: RosterLine[]): RosterDocument {
  const period = parsePeriod(lines);
  const printedOn = parsePrintedOn(lines);
  const days = new DayResolver(period.start);
  const records: FlightDutyRecord[] = [];

  let inWorkDay = false;
  let currentDate: string | undefined;

  for (const line of lines) {
    let body = line.text;

    const dayPrefix = body.match(DAY_PREFIX);
    if (dayPrefix) {
      currentDate = days.resolve(parseInt(dayPrefix[1], 10), line);
      body = dayPrefix[3];
    }

    if (CHECK_IN.test(body)) {
      inWorkDay = true;
      continue;
    }
    if (CHECK_OUT.test(body)) {
      inWorkDay = false;
      continue;
    }
    if (!inWorkDay || !currentDate) continue;

    const record = parseFlightLine(body, currentDate, line);
    if (record) {
      records.push(record);
    }
  }

  return {
    layout: 'netline',
    period,
    ...(printedOn ? { printedOn } : {}),
    records,
  };
}
