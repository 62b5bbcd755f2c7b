/**
 * @fileoverview Compact roster layout: one duty per line, wall-clock times
 * in the roster's home timezone.
 *
 *   PERIOD 2024-03-01 2024-03-31
 *   2024-03-20 Wed
 *   LO135 WAW-LHR 08:00-10:30
 *   LO136 LHR-WAW 11:30-14:45
 *   2024-03-21 SBY WAW 06:00-14:00
 *   2024-03-22 OFF
 *
 * A duty takes the date of the closest date line above it unless it
 * carries its own. PDF text extraction sometimes wraps a duty over several
 * lines; an incomplete duty line is retried joined with the lines after it.
 */

import { ParseError } from '../../../utils/errors.js';
import { isExistingLocalTime } from '../../../services/date/index.js';
import type { FlightDutyRecord, RosterDocument, RosterPeriod } from '../types.js';
import {
  FLIGHT_DESIGNATOR_START,
  isCalendarDate,
  minutesOfDay,
  normalizeFlightNumber,
  parseClockTime,
  type RosterLine,
} from './text.js';

const DATE_LINE = /^(\d{4}-\d{2}-\d{2})(?:\s+[A-Za-z]{2,9}\.?)?$/;
const INLINE_DATE = /^(\d{4}-\d{2}-\d{2})\s+(.+)$/;
const PERIOD_LINE = /^PERIOD:?\s+(\d{4}-\d{2}-\d{2})\s*(?:-|TO)?\s*(\d{4}-\d{2}-\d{2})(?=\s|$)/i;
const ROUTE = /^([A-Z]{3})\s*-\s*([A-Z]{3})(?=\s|$)/;
const TIME_RANGE = /^(\d{1,2}\s*:?\s*\d{2})\s*-\s*(\d{1,2}\s*:?\s*\d{2})(?:\s*\+\s*(\d))?(?=\s|$)/;
const STANDBY_START = /^(?:SBY|STBY|RSV|RES)(?=\s|$)/;
const STANDBY_AIRPORT = /^([A-Z]{3})(?=\s)/;
const OFF_LINE = /^(?:DAY OFF|OFF|DO)$/;

/** Continuation lines joined onto a wrapped duty. */
const MAX_WRAPPED_LINES = 3;

/** Keyword written for standby duties by {@link formatDutyRecord}. */
const STANDBY_KEYWORD = 'SBY';

type TimeSpan = {
  start: string;
  end: string;
  dayOffset: number;
};

/**
 * Result of reading one duty body. `incomplete` means the line started a
 * duty but a structural part is missing, so joining a wrapped line may help.
 */
type DutyParse =
  | { kind: 'duty'; build: (date: string) => FlightDutyRecord }
  | { kind: 'incomplete'; field: string; message: string }
  | { kind: 'none' };

function isDutyStart(text: string): boolean {
  return FLIGHT_DESIGNATOR_START.test(text) || STANDBY_START.test(text) || OFF_LINE.test(text);
}

function startsRecordOrDate(text: string): boolean {
  const inline = text.match(INLINE_DATE);
  return (
    DATE_LINE.test(text) ||
    PERIOD_LINE.test(text) ||
    isDutyStart(text) ||
    (inline !== null && isDutyStart(inline[2]))
  );
}

/**
 * Read "08:00-10:30[+1]" off the front of `rest`. Values are validated here;
 * a missing range is reported to the caller as null.
 */
function readTimeSpan(
  rest: string,
  fields: { start: string; end: string },
  line: RosterLine
): TimeSpan | null {
  const match = rest.match(TIME_RANGE);
  if (!match) return null;

  const start = parseClockTime(match[1]);
  if (!start) {
    throw new ParseError(
      `Invalid ${fields.start} "${match[1].replace(/\s+/g, '')}" on line ${line.number}`,
      line.number,
      fields.start,
      line.text
    );
  }
  const end = parseClockTime(match[2]);
  if (!end) {
    throw new ParseError(
      `Invalid ${fields.end} "${match[2].replace(/\s+/g, '')}" on line ${line.number}`,
      line.number,
      fields.end,
      line.text
    );
  }

  const dayOffset = match[3] ? parseInt(match[3], 10) : 0;
  if (minutesOfDay(end) + dayOffset * 1440 <= minutesOfDay(start)) {
    throw new ParseError(
      `${fields.end} ${end} is not after ${fields.start} ${start} on line ${line.number} (use +1 for the next day)`,
      line.number,
      fields.end,
      line.text
    );
  }

  return { start, end, dayOffset };
}

function parseFlight(body: string, line: RosterLine, timezone: string): DutyParse {
  const designator = body.match(FLIGHT_DESIGNATOR_START);
  if (!designator) return { kind: 'none' };

  const flightNumber = normalizeFlightNumber(designator[1], designator[2]);
  const afterDesignator = body.slice(designator[0].length).trim();

  const route = afterDesignator.match(ROUTE);
  // "ID 12345 Jan Kowalski" is a header, not a flight
  if (!route && afterDesignator && !TIME_RANGE.test(afterDesignator)) {
    return { kind: 'none' };
  }
  if (!route) {
    return {
      kind: 'incomplete',
      field: 'route',
      message: `Flight ${flightNumber} on line ${line.number} has no route (expected e.g. WAW-LHR)`,
    };
  }

  const afterRoute = afterDesignator.slice(route[0].length).trim();
  const span = readTimeSpan(afterRoute, { start: 'departureTime', end: 'arrivalTime' }, line);
  if (!span) {
    return {
      kind: 'incomplete',
      field: 'times',
      message: `Flight ${flightNumber} on line ${line.number} has no times (expected e.g. 08:00-10:30)`,
    };
  }

  return {
    kind: 'duty',
    build: (date) => ({
      dutyType: 'flight',
      date,
      sourceTimezone: timezone,
      flightNumber,
      departureAirport: route[1],
      arrivalAirport: route[2],
      departureTime: span.start,
      arrivalTime: span.end,
      arrivalDayOffset: span.dayOffset,
    }),
  };
}

function parseStandby(body: string, line: RosterLine, timezone: string): DutyParse {
  const keyword = body.match(STANDBY_START);
  if (!keyword) return { kind: 'none' };

  let rest = body.slice(keyword[0].length).trim();
  const airportMatch = rest.match(STANDBY_AIRPORT);
  const airport = airportMatch ? airportMatch[1] : undefined;
  if (airportMatch) {
    rest = rest.slice(airportMatch[0].length).trim();
  }

  const span = readTimeSpan(rest, { start: 'startTime', end: 'endTime' }, line);
  if (!span) {
    return {
      kind: 'incomplete',
      field: 'times',
      message: `Standby on line ${line.number} has no times (expected e.g. 06:00-14:00)`,
    };
  }

  return {
    kind: 'duty',
    build: (date) => ({
      dutyType: 'standby',
      date,
      sourceTimezone: timezone,
      ...(airport ? { airport } : {}),
      startTime: span.start,
      endTime: span.end,
      endDayOffset: span.dayOffset,
    }),
  };
}

function parseDutyBody(body: string, line: RosterLine, timezone: string): DutyParse {
  if (OFF_LINE.test(body)) {
    return {
      kind: 'duty',
      build: (date) => ({ dutyType: 'off', date, sourceTimezone: timezone }),
    };
  }
  if (STANDBY_START.test(body)) {
    return parseStandby(body, line, timezone);
  }
  return parseFlight(body, line, timezone);
}

function requireDate(value: string, line: RosterLine): string {
  if (!isCalendarDate(value)) {
    throw new ParseError(`Invalid date "${value}" on line ${line.number}`, line.number, 'date', line.text);
  }
  return value;
}

/**
 * Split a line into its inline date (if any) and the duty text after it.
 */
function splitInlineDate(line: RosterLine): { date?: string; body: string } {
  const inline = line.text.match(INLINE_DATE);
  if (inline && isDutyStart(inline[2])) {
    return { date: requireDate(inline[1], line), body: inline[2] };
  }
  return { body: line.text };
}

/**
 * A start time skipped by a spring-forward change cannot be placed on the
 * timeline. End times in the gap are fine: they move forward with it.
 */
function requireExistingStart(record: FlightDutyRecord, line: RosterLine): void {
  if (record.dutyType === 'off') return;

  const field = record.dutyType === 'flight' ? 'departureTime' : 'startTime';
  const time = record.dutyType === 'flight' ? record.departureTime : record.startTime;
  if (!isExistingLocalTime(record.date, time, record.sourceTimezone)) {
    throw new ParseError(
      `${field} ${time} on ${record.date} does not exist in ${record.sourceTimezone} (clocks go forward) on line ${line.number}`,
      line.number,
      field,
      line.text
    );
  }
}

export function parseCompactRoster(lines: RosterLine[], timezone: string): RosterDocument {
  const records: FlightDutyRecord[] = [];
  let period: RosterPeriod | undefined;
  let currentDate: string | undefined;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];

    const periodMatch = line.text.match(PERIOD_LINE);
    if (periodMatch) {
      period = { start: requireDate(periodMatch[1], line), end: requireDate(periodMatch[2], line) };
      continue;
    }

    // Inline duties first: "2024-03-20 OFF" would also pass as a date line.
    const { date: inlineDate, body } = splitInlineDate(line);
    if (!inlineDate) {
      const dateMatch = line.text.match(DATE_LINE);
      if (dateMatch) {
        currentDate = requireDate(dateMatch[1], line);
        continue;
      }
    }

    let parsed = parseDutyBody(body, line, timezone);

    let joinedBody = body;
    for (let wrapped = 1; parsed.kind === 'incomplete' && wrapped <= MAX_WRAPPED_LINES; wrapped++) {
      const next = lines[index + wrapped];
      if (!next || startsRecordOrDate(next.text)) break;

      joinedBody = `${joinedBody} ${next.text}`;
      const joined = parseDutyBody(joinedBody, line, timezone);
      if (joined.kind === 'none') break;
      parsed = joined;
      if (joined.kind === 'duty') {
        index += wrapped;
      }
    }

    if (parsed.kind === 'none') continue;
    if (parsed.kind === 'incomplete') {
      throw new ParseError(parsed.message, line.number, parsed.field, line.text);
    }

    const date = inlineDate ?? currentDate;
    if (!date) {
      throw new ParseError(
        `Duty on line ${line.number} appears before any date line`,
        line.number,
        'date',
        line.text
      );
    }
    if (inlineDate) {
      currentDate = inlineDate;
    }

    const record = parsed.build(date);
    requireExistingStart(record, line);
    records.push(record);
  }

  return { layout: 'compact', ...(period ? { period } : {}), records };
}

function formatSpan(start: string, end: string, dayOffset: number): string {
  return `${start}-${end}${dayOffset > 0 ? `+${dayOffset}` : ''}`;
}

/**
 * Write a record as one compact-layout line with an inline date.
 * Parsing the line in the record's timezone gives the record back.
 */
export function formatDutyRecord(record: FlightDutyRecord): string {
  switch (record.dutyType) {
    case 'flight':
      return [
        record.date,
        record.flightNumber,
        `${record.departureAirport}-${record.arrivalAirport}`,
        formatSpan(record.departureTime, record.arrivalTime, record.arrivalDayOffset),
      ].join(' ');
    case 'standby':
      return [
        record.date,
        STANDBY_KEYWORD,
        ...(record.airport ? [record.airport] : []),
        formatSpan(record.startTime, record.endTime, record.endDayOffset),
      ].join(' ');
    case 'off':
      return `${record.date} OFF`;
  }
}
