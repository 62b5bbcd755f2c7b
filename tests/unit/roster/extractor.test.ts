import { describe, expect, it } from 'vitest';
import { extractRoster } from '../../../src/domains/roster/service/extractor.js';
import { TimezoneError } from '../../../src/utils/errors.js';
import { readFixture } from '../../helpers/fixtures.js';

describe('extractRoster', () => {
  it('reads compact rosters in the configured roster timezone', () => {
    const document = extractRoster(readFixture('compact-roster.txt'));

    expect(document.layout).toBe('compact');
    expect(document.records).toHaveLength(5);
    expect(document.records[0].sourceTimezone).toBe('Europe/Warsaw');
  });

  it('reads compact rosters in an explicit timezone', () => {
    const document = extractRoster('2024-03-22 OFF', { timezone: 'Europe/London' });

    expect(document.records).toEqual([
      { dutyType: 'off', date: '2024-03-22', sourceTimezone: 'Europe/London' },
    ]);
  });

  it('detects NetLine rosters', () => {
    const document = extractRoster(readFixture('netline-roster.txt'));

    expect(document.layout).toBe('netline');
    expect(document.records).toHaveLength(4);
  });

  it('reads a compact roster that mentions check-in in a note', () => {
    const document = extractRoster('Notes: C/I at 05:15\n2024-03-20 LO135 WAW-LHR 08:00-10:30');

    expect(document.layout).toBe('compact');
    expect(document.records).toHaveLength(1);
    expect(document.records[0]).toMatchObject({ flightNumber: 'LO135', departureTime: '08:00' });
  });

  it('skips crew header lines that look like designators', () => {
    const document = extractRoster('ID 12345 Jan Kowalski\nRank FO\nCA 1 Crew list\n2024-03-20 LO135 WAW-LHR 08:00-10:30');

    expect(document.records).toHaveLength(1);
    expect(document.records[0]).toMatchObject({ flightNumber: 'LO135' });
  });

  it('rejects an unknown timezone', () => {
    expect(() => extractRoster('2024-03-22 OFF', { timezone: 'Mars/Olympus' })).toThrow(TimezoneError);
  });

  it('returns an empty document for empty text', () => {
    expect(extractRoster('').records).toEqual([]);
  });
});
