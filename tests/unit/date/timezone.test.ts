import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';
import {
  isExistingLocalTime,
  isValidTimezone,
  requireTimezone,
  toLocalTime,
  toUtcInstant,
} from '../../../src/services/date/index.js';
import { TimezoneError } from '../../../src/utils/errors.js';

describe('timezone helpers', () => {
  it('recognises IANA zones', () => {
    expect(isValidTimezone('Europe/Warsaw')).toBe(true);
    expect(isValidTimezone('UTC')).toBe(true);
    expect(isValidTimezone('Mars/Olympus')).toBe(false);
    expect(isValidTimezone('  ')).toBe(false);
  });

  it('rejects aliases for the host zone', () => {
    expect(isValidTimezone('local')).toBe(false);
    expect(isValidTimezone('System')).toBe(false);
    expect(isValidTimezone('default')).toBe(false);
    expect(isValidTimezone('UTC+2')).toBe(true);
  });

  it('spots wall-clock times skipped by the spring-forward change', () => {
    expect(isExistingLocalTime('2024-03-31', '02:30', 'Europe/Warsaw')).toBe(false);
    expect(isExistingLocalTime('2024-03-31', '03:00', 'Europe/Warsaw')).toBe(true);
    expect(isExistingLocalTime('2024-03-30', '02:30', 'Europe/Warsaw')).toBe(true);
  });

  it('throws a TimezoneError naming the zone', () => {
    expect(() => requireTimezone('Mars/Olympus')).toThrow('Unknown timezone: "Mars/Olympus"');
  });

  it('moves the date before applying the time', () => {
    // Europe/Warsaw switches to summer time overnight into 2024-03-31
    const instant = toUtcInstant('2024-03-30', '06:00', 1, 'Europe/Warsaw');

    expect(instant.toISO()).toBe('2024-03-31T04:00:00.000Z');
  });

  it('rejects an invalid calendar date', () => {
    expect(() => toUtcInstant('2024-13-01', '06:00', 0, 'Europe/Warsaw')).toThrow(TimezoneError);
  });

  it('reads an instant back as wall-clock time', () => {
    const instant = DateTime.fromISO('2024-07-01T06:00:00Z', { zone: 'utc' });

    expect(toLocalTime(instant, 'Europe/Warsaw')).toEqual({
      date: '2024-07-01',
      time: '08:00',
      offsetMinutes: 120,
    });
  });
});
