/**
 * @fileoverview Builds calendar events from normalized duties.
 *
 * UIDs are derived from what the duty is and when it starts, so importing a
 * newer roster over an older one updates events in place instead of
 * duplicating them.
 */

import type { DateTime } from 'luxon';
import { toLocalTime } from '../../../services/date/index.js';
import { compactDate } from '../../roster/service/text.js';
import type { NormalizedDuty } from '../../roster/types.js';
import { trackerFlightUrl } from '../../tracker/service/playback.js';
import type { CalendarEvent, EventBuildOptions } from '../types.js';

function describeInstant(instant: DateTime, displayTimezone: string): string {
  const local = toLocalTime(instant, displayTimezone);
  const utc = instant.toUTC().toFormat('HH:mm');
  return `${local.date} ${local.time} ${displayTimezone} (${utc} UTC)`;
}

/**
 * Local part of the UID (before the "@").
 */
export function uidStem(duty: NormalizedDuty): string {
  const { record } = duty;
  const day = compactDate(record.date);
  switch (record.dutyType) {
    case 'flight':
      return `${record.flightNumber}-${day}`;
    case 'standby':
      return `SBY-${day}-${record.startTime.replace(':', '')}`;
    case 'off':
      return `OFF-${day}`;
  }
}

function toIso(instant: DateTime): string {
  return instant.toUTC().toISO({ suppressMilliseconds: true }) ?? '';
}

export function buildCalendarEvent(
  duty: NormalizedDuty,
  options: EventBuildOptions,
  uid = `${uidStem(duty)}@${options.uidDomain}`
): CalendarEvent {
  const { record } = duty;
  const start = toIso(duty.start);
  const end = toIso(duty.end);

  switch (record.dutyType) {
    case 'flight': {
      const route = `${record.departureAirport} → ${record.arrivalAirport}`;
      const url = options.trackerBaseUrl
        ? trackerFlightUrl(record.flightNumber, options.trackerBaseUrl)
        : undefined;
      const description = [
        `Flight: ${record.flightNumber}`,
        `Route: ${route}`,
        `Departure: ${describeInstant(duty.start, options.displayTimezone)}`,
        `Arrival: ${describeInstant(duty.end, options.displayTimezone)}`,
        ...(url ? [`Tracker: ${url}`] : []),
      ].join('\n');

      return {
        uid,
        summary: `${record.flightNumber} ${route}`,
        description,
        start,
        end,
        location: `${record.departureAirport}-${record.arrivalAirport}`,
        ...(url ? { url } : {}),
        categories: ['FLIGHT'],
      };
    }
    case 'standby': {
      const description = [
        `Standby${record.airport ? ` at ${record.airport}` : ''}`,
        `From: ${describeInstant(duty.start, options.displayTimezone)}`,
        `To: ${describeInstant(duty.end, options.displayTimezone)}`,
      ].join('\n');

      return {
        uid,
        summary: record.airport ? `Standby ${record.airport}` : 'Standby',
        description,
        start,
        end,
        ...(record.airport ? { location: record.airport } : {}),
        categories: ['STANDBY'],
      };
    }
    case 'off':
      return {
        uid,
        summary: 'Day off',
        description: `Day off (${record.date}, ${duty.timezone})`,
        start,
        end,
        categories: ['OFF'],
      };
  }
}

/**
 * Build events in duty order. A UID already used in this batch gets
 * "-2", "-3", ... appended to its stem.
 */
export function buildCalendarEvents(duties: NormalizedDuty[], options: EventBuildOptions): CalendarEvent[] {
  const seen = new Map<string, number>();

  return duties.map((duty) => {
    const stem = uidStem(duty);
    const count = (seen.get(stem) ?? 0) + 1;
    seen.set(stem, count);

    const uniqueStem = count === 1 ? stem : `${stem}-${count}`;
    return buildCalendarEvent(duty, options, `${uniqueStem}@${options.uidDomain}`);
  });
}
