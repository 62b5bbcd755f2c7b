/**
 * @fileoverview Timezone normalizer: duty records to UTC start/end instants.
 */

import type { DateTime } from 'luxon';
import { TimezoneError } from '../../../utils/errors.js';
import { toUtcInstant } from '../../../services/date/index.js';
import type { FlightDutyRecord, NormalizedDuty } from '../types.js';

function placeDuty(record: FlightDutyRecord, timezone: string): { start: DateTime; end: DateTime } {
  switch (record.dutyType) {
    case 'flight':
      return {
        start: toUtcInstant(record.date, record.departureTime, 0, timezone),
        end: toUtcInstant(record.date, record.arrivalTime, record.arrivalDayOffset, timezone),
      };
    case 'standby':
      return {
        start: toUtcInstant(record.date, record.startTime, 0, timezone),
        end: toUtcInstant(record.date, record.endTime, record.endDayOffset, timezone),
      };
    case 'off':
      return {
        start: toUtcInstant(record.date, '00:00', 0, timezone),
        end: toUtcInstant(record.date, '00:00', 1, timezone),
      };
  }
}

/**
 * Convert a duty's wall-clock times into UTC instants.
 *
 * `timezone` defaults to the zone the record was read in. A day off spans
 * local midnight to the next local midnight, so it is 23 or 25 hours long
 * across a DST change.
 *
 * @throws TimezoneError for an unknown zone, or when the end lands before the start
 */
export function normalizeDuty(
  record: FlightDutyRecord,
  timezone: string = record.sourceTimezone
): NormalizedDuty {
  const { start, end } = placeDuty(record, timezone);

  if (end.toMillis() < start.toMillis()) {
    throw new TimezoneError(
      `Duty on ${record.date} ends before it starts once placed in ${timezone}`,
      timezone
    );
  }

  return { record, timezone, start, end };
}

export function normalizeDuties(records: FlightDutyRecord[], timezone?: string): NormalizedDuty[] {
  return records.map((record) => normalizeDuty(record, timezone));
}
