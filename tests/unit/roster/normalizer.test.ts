import { describe, expect, it } from 'vitest';
import { normalizeDuty, normalizeDuties } from '../../../src/domains/roster/service/normalizer.js';
import type { FlightDuty, OffDuty } from '../../../src/domains/roster/types.js';
import { toLocalTime } from '../../../src/services/date/index.js';
import { TimezoneError } from '../../../src/utils/errors.js';

const ZONE = 'Europe/Warsaw';

function flight(overrides: Partial<FlightDuty> = {}): FlightDuty {
  return {
    dutyType: 'flight',
    date: '2024-03-20',
    sourceTimezone: ZONE,
    flightNumber: 'LO135',
    departureAirport: 'WAW',
    arrivalAirport: 'LHR',
    departureTime: '08:00',
    arrivalTime: '10:30',
    arrivalDayOffset: 0,
    ...overrides,
  };
}

function off(date: string): OffDuty {
  return { dutyType: 'off', date, sourceTimezone: ZONE };
}

describe('normalizeDuty', () => {
  it('places winter Warsaw times one hour ahead of UTC', () => {
    const duty = normalizeDuty(flight());

    expect(duty.start.toISO()).toBe('2024-03-20T07:00:00.000Z');
    expect(duty.end.toISO()).toBe('2024-03-20T09:30:00.000Z');
    expect(duty.timezone).toBe(ZONE);
  });

  it('applies the summer offset from the last Sunday of March', () => {
    const duty = normalizeDuty(flight({ date: '2024-03-31', departureTime: '01:30', arrivalTime: '03:30' }));

    expect(duty.start.toISO()).toBe('2024-03-31T00:30:00.000Z');
    expect(duty.end.toISO()).toBe('2024-03-31T01:30:00.000Z');
  });

  it('applies the winter offset again after the last Sunday of October', () => {
    const duty = normalizeDuty(flight({ date: '2024-10-27', departureTime: '01:00', arrivalTime: '04:00' }));

    expect(duty.start.toISO()).toBe('2024-10-26T23:00:00.000Z');
    expect(duty.end.toISO()).toBe('2024-10-27T03:00:00.000Z');
  });

  it('moves a time inside the spring-forward gap forward', () => {
    const duty = normalizeDuty(flight({ date: '2024-03-31', departureTime: '02:30', arrivalTime: '05:00' }));

    expect(duty.start.toISO()).toBe('2024-03-31T01:30:00.000Z');
  });

  it('uses the arrival day offset for overnight flights', () => {
    const duty = normalizeDuty(flight({ departureTime: '22:15', arrivalTime: '14:05', arrivalDayOffset: 1 }));

    expect(duty.start.toISO()).toBe('2024-03-20T21:15:00.000Z');
    expect(duty.end.toISO()).toBe('2024-03-21T13:05:00.000Z');
  });

  it('spans a day off from local midnight to local midnight', () => {
    const regular = normalizeDuty(off('2024-03-22'));
    const shortDay = normalizeDuty(off('2024-03-31'));

    expect(regular.start.toISO()).toBe('2024-03-21T23:00:00.000Z');
    expect(regular.end.toISO()).toBe('2024-03-22T23:00:00.000Z');
    expect(shortDay.end.diff(shortDay.start, 'hours').hours).toBe(23);
  });

  it('reads UTC records as UTC', () => {
    const duty = normalizeDuty(flight({ sourceTimezone: 'UTC', departureTime: '06:15', arrivalTime: '08:00' }));

    expect(duty.start.toISO()).toBe('2024-03-20T06:15:00.000Z');
  });

  it('takes an explicit timezone over the record zone', () => {
    const duty = normalizeDuty(flight(), 'Europe/London');

    expect(duty.start.toISO()).toBe('2024-03-20T08:00:00.000Z');
    expect(duty.timezone).toBe('Europe/London');
  });

  it('gives the original wall-clock time back when converted to the source zone', () => {
    const duty = normalizeDuty(flight());

    expect(toLocalTime(duty.start, ZONE)).toEqual({ date: '2024-03-20', time: '08:00', offsetMinutes: 60 });
    expect(toLocalTime(duty.end, ZONE)).toEqual({ date: '2024-03-20', time: '10:30', offsetMinutes: 60 });
  });

  it('rejects an unknown timezone', () => {
    expect(() => normalizeDuty(flight(), 'Mars/Olympus')).toThrow(TimezoneError);
  });

  it('normalizes a list in order', () => {
    const duties = normalizeDuties([flight(), off('2024-03-22')]);

    expect(duties.map((duty) => duty.record.dutyType)).toEqual(['flight', 'off']);
  });
});
