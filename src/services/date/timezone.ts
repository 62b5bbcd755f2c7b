/**
 * @fileoverview Timezone helpers on top of Luxon.
 *
 * Roster times are wall-clock times in a named zone; calendars want UTC
 * instants. Everything here goes through IANA zone rules, so daylight-saving
 * changes apply for the date in question.
 */

import { DateTime } from 'luxon';
import { TimezoneError } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';

const log = createLogger({ domain: 'timezone' });

export type LocalTime = {
  /** yyyy-MM-dd */
  date: string;
  /** HH:mm */
  time: string;
  /** Offset from UTC in minutes at that instant */
  offsetMinutes: number;
};

/** Luxon aliases for the host's zone; output would depend on the server. */
const HOST_ZONE_ALIASES = new Set(['local', 'system', 'default']);

/**
 * True for IANA zone ids and fixed offsets such as "UTC" or "UTC+2".
 */
export function isValidTimezone(timezone: string): boolean {
  const name = timezone.trim().toLowerCase();
  if (!name || HOST_ZONE_ALIASES.has(name)) return false;
  return DateTime.now().setZone(timezone).isValid;
}

export function requireTimezone(timezone: string): void {
  if (!isValidTimezone(timezone)) {
    log.warn('invalid_timezone', { timezone });
    throw new TimezoneError(`Unknown timezone: "${timezone}"`, timezone);
  }
}

/**
 * Place a wall-clock time on the UTC timeline.
 *
 * `dayOffset` moves the calendar date before the time is applied, so
 * "23:00 +1" on the eve of a DST change gets the next day's offset. A time
 * inside a spring-forward gap moves forward by the length of the gap.
 */
export function toUtcInstant(date: string, time: string, dayOffset: number, timezone: string): DateTime {
  requireTimezone(timezone);

  const day = DateTime.fromISO(date, { zone: 'utc' }).plus({ days: dayOffset });
  if (!day.isValid) {
    throw new TimezoneError(
      `Cannot place ${date} ${time} in ${timezone}: ${day.invalidExplanation ?? 'invalid date'}`,
      timezone
    );
  }

  const clock = time.match(/^(\d{1,2}):(\d{2})$/);
  if (!clock) {
    throw new TimezoneError(`Cannot place ${date} "${time}" in ${timezone}: not an HH:mm time`, timezone);
  }

  const local = DateTime.fromObject(
    {
      year: day.year,
      month: day.month,
      day: day.day,
      hour: parseInt(clock[1], 10),
      minute: parseInt(clock[2], 10),
    },
    { zone: timezone }
  );
  if (!local.isValid) {
    throw new TimezoneError(
      `Cannot place ${date} ${time} (+${dayOffset}d) in ${timezone}: ${local.invalidExplanation ?? 'invalid time'}`,
      timezone
    );
  }

  return local.toUTC();
}

/**
 * False when `time` on `date` is skipped by a spring-forward change in
 * `timezone`, e.g. 02:30 on 2024-03-31 in Europe/Warsaw.
 */
export function isExistingLocalTime(date: string, time: string, timezone: string): boolean {
  const placed = toUtcInstant(date, time, 0, timezone).setZone(timezone);
  return placed.toFormat('yyyy-MM-dd') === date && placed.toFormat('HH:mm') === time;
}

/**
 * Reverse of {@link toUtcInstant}: the wall-clock date and time of an
 * instant in `timezone`.
 */
export function toLocalTime(instant: DateTime, timezone: string): LocalTime {
  requireTimezone(timezone);
  const local = instant.setZone(timezone);
  return {
    date: local.toFormat('yyyy-MM-dd'),
    time: local.toFormat('HH:mm'),
    offsetMinutes: local.offset,
  };
}
