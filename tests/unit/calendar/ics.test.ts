import { describe, expect, it } from 'vitest';
import {
  escapeText,
  foldLine,
  serializeCalendar,
  toIcsBytes,
} from '../../../src/domains/calendar/service/ics.js';
import type { CalendarEvent } from '../../../src/domains/calendar/types.js';
import { CalendarGenerationError } from '../../../src/utils/errors.js';

const GENERATED_AT = new Date('2024-03-01T12:00:00Z');
const OPTIONS = { prodId: '-//test//EN', generatedAt: GENERATED_AT };

function event(overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return {
    uid: 'e1@roster.test',
    summary: 'Test, one',
    description: 'Line 1\nLine 2',
    start: '2024-03-20T07:00:00Z',
    end: '2024-03-20T09:30:00Z',
    location: 'WAW-LHR',
    categories: ['FLIGHT'],
    ...overrides,
  };
}

describe('iCalendar serializer', () => {
  it('writes an empty calendar when there are no events', () => {
    expect(serializeCalendar([], OPTIONS)).toBe(
      'BEGIN:VCALENDAR\r\n' +
        'VERSION:2.0\r\n' +
        'PRODID:-//test//EN\r\n' +
        'CALSCALE:GREGORIAN\r\n' +
        'METHOD:PUBLISH\r\n' +
        'END:VCALENDAR\r\n'
    );
  });

  it('writes one VEVENT per event with UTC times', () => {
    const ics = serializeCalendar([event()], { ...OPTIONS, calendarName: 'Crew roster' });

    expect(ics.split('\r\n')).toEqual([
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//test//EN',
      'CALSCALE:GREGORIAN',
      'METHOD:PUBLISH',
      'X-WR-CALNAME:Crew roster',
      'BEGIN:VEVENT',
      'UID:e1@roster.test',
      'DTSTAMP:20240301T120000Z',
      'DTSTART:20240320T070000Z',
      'DTEND:20240320T093000Z',
      'SUMMARY:Test\\, one',
      'LOCATION:WAW-LHR',
      'DESCRIPTION:Line 1\\nLine 2',
      'CATEGORIES:FLIGHT',
      'END:VEVENT',
      'END:VCALENDAR',
      '',
    ]);
  });

  it('adds URL when the event has one', () => {
    const ics = serializeCalendar([event({ url: 'https://tracker.test/data/flights/lo135' })], OPTIONS);

    expect(ics).toContain('CATEGORIES:FLIGHT\r\nURL:https://tracker.test/data/flights/lo135\r\nEND:VEVENT');
  });

  it('keeps events in input order', () => {
    const ics = serializeCalendar(
      [event({ uid: 'b@roster.test' }), event({ uid: 'a@roster.test' })],
      OPTIONS
    );

    expect(ics.indexOf('UID:b@roster.test')).toBeLessThan(ics.indexOf('UID:a@roster.test'));
  });

  it('produces identical bytes for identical input', () => {
    const events = [event(), event({ uid: 'e2@roster.test' })];

    expect(toIcsBytes(events, OPTIONS).equals(toIcsBytes(events, OPTIONS))).toBe(true);
  });

  it('rejects an event that ends before it starts', () => {
    const backwards = event({ start: '2024-03-20T09:30:00Z', end: '2024-03-20T07:00:00Z' });

    expect(() => serializeCalendar([backwards], OPTIONS)).toThrow(CalendarGenerationError);
  });

  it('rejects an unreadable event time', () => {
    expect(() => serializeCalendar([event({ start: 'not a time' })], OPTIONS)).toThrow(CalendarGenerationError);
  });

  it('rejects duplicate UIDs', () => {
    expect(() => serializeCalendar([event(), event()], OPTIONS)).toThrow('Duplicate event UID e1@roster.test');
  });

  describe('escapeText', () => {
    it('escapes backslashes, separators and newlines', () => {
      expect(escapeText('a,b;c\\d\ne\r\nf')).toBe('a\\,b\\;c\\\\d\\ne\\nf');
    });
  });

  describe('foldLine', () => {
    it('leaves lines of up to 75 octets alone', () => {
      const line = `DESCRIPTION:${'x'.repeat(63)}`;

      expect(foldLine(line)).toBe(line);
    });

    it('folds long lines with a leading space on each continuation', () => {
      const line = `DESCRIPTION:${'x'.repeat(100)}`;

      expect(foldLine(line)).toBe(`${line.slice(0, 75)}\r\n ${line.slice(75)}`);
    });

    it('never splits a multi-byte character', () => {
      const folded = foldLine(`SUMMARY:${'\u017C'.repeat(40)}`);

      expect(folded.split('\r\n ')).toEqual([`SUMMARY:${'\u017C'.repeat(33)}`, '\u017C'.repeat(7)]);
    });

    it('keeps continuation lines within 75 octets including the space', () => {
      const folded = foldLine(`DESCRIPTION:${'y'.repeat(300)}`);
      const physical = folded.split('\r\n');

      expect(physical.map((part) => Buffer.byteLength(part, 'utf-8'))).toEqual([75, 75, 75, 75, 16]);
    });
  });
});
