/**
 * @fileoverview Roster conversion pipeline.
 *
 * text -> duty records -> UTC duties -> calendar events -> iCalendar.
 * Any error aborts the whole run; there is no partial calendar.
 */

import config from '../../config.js';
import { buildCalendarEvents } from '../../domains/calendar/service/events.js';
import { serializeCalendar } from '../../domains/calendar/service/ics.js';
import type { CalendarEvent } from '../../domains/calendar/types.js';
import { selectTextExtractor } from '../../domains/roster/providers/index.js';
import { extractRoster } from '../../domains/roster/service/extractor.js';
import { normalizeDuties } from '../../domains/roster/service/normalizer.js';
import { compactDate, isCalendarDate } from '../../domains/roster/service/text.js';
import {
  DUTY_TYPES,
  type DutyType,
  type NormalizedDuty,
  type RosterDocument,
  type RosterFile,
  type TextExtractor,
} from '../../domains/roster/types.js';
import { requireTimezone, toLocalTime } from '../date/index.js';
import { InputError } from '../../utils/errors.js';
import { createLogger, createRunId, withLogContext } from '../../utils/observability/index.js';

const log = createLogger({ domain: 'roster-conversion' });

export interface ConversionOptions {
  /** Zone compact-layout times are written in */
  timezone?: string;
  /** Zone for descriptions and the cutoff. Defaults to `timezone`. */
  displayTimezone?: string;
  /** yyyy-MM-dd; duties starting earlier are dropped */
  cutoff?: string;
  /** Duty types to export */
  include?: readonly DutyType[];
  calendarName?: string;
  generatedAt?: Date;
}

export interface ConversionResult {
  document: RosterDocument;
  /** Exported duties, after cutoff and type filters */
  duties: NormalizedDuty[];
  events: CalendarEvent[];
  ics: string;
  filename: string;
  /** Effective cutoff, if any */
  cutoff?: string;
}

function defaultInclude(): readonly DutyType[] {
  return config.calendar.includeOffDays
    ? DUTY_TYPES
    : DUTY_TYPES.filter((type) => type !== 'off');
}

/**
 * The later of the requested cutoff and the print date: a roster says
 * nothing reliable about days before it was printed.
 */
export function effectiveCutoff(requested: string | undefined, printedOn: string | undefined): string | undefined {
  if (requested && printedOn) {
    return requested > printedOn ? requested : printedOn;
  }
  return requested ?? printedOn;
}

export function calendarFilename(document: RosterDocument, duties: NormalizedDuty[]): string {
  if (document.period) {
    return `${compactDate(document.period.start)}_${compactDate(document.period.end)}_roster.ics`;
  }
  const first = duties[0];
  const last = duties[duties.length - 1];
  if (first && last) {
    return `${compactDate(first.record.date)}_${compactDate(last.record.date)}_roster.ics`;
  }
  return 'roster.ics';
}

/**
 * Convert roster text into an iCalendar document.
 *
 * @throws ParseError | TimezoneError | InputError | CalendarGenerationError
 */
export function convertRosterText(text: string, options: ConversionOptions = {}): ConversionResult {
  const timezone = options.timezone ?? config.roster.timezone;
  const displayTimezone = options.displayTimezone ?? timezone;
  requireTimezone(displayTimezone);

  if (options.cutoff !== undefined && !isCalendarDate(options.cutoff)) {
    throw new InputError(`Cutoff must be a yyyy-MM-dd date, got "${options.cutoff}"`, {
      cutoff: options.cutoff,
    });
  }

  const document = extractRoster(text, { timezone });
  const cutoff = effectiveCutoff(options.cutoff, document.printedOn);
  const include = new Set(options.include ?? defaultInclude());

  const duties = normalizeDuties(document.records.filter((record) => include.has(record.dutyType)))
    .filter((duty) => !cutoff || toLocalTime(duty.start, displayTimezone).date >= cutoff);

  const events = buildCalendarEvents(duties, {
    uidDomain: config.calendar.uidDomain,
    displayTimezone,
    trackerBaseUrl: config.tracker.baseUrl,
  });

  const ics = serializeCalendar(events, {
    prodId: config.calendar.prodId,
    calendarName: options.calendarName ?? config.calendar.name,
    ...(options.generatedAt ? { generatedAt: options.generatedAt } : {}),
  });

  log.info('roster_converted', {
    layout: document.layout,
    recordCount: document.records.length,
    dutyCount: duties.length,
    eventCount: events.length,
    skippedCount: document.records.length - duties.length,
    cutoff,
    timezone,
  });

  return {
    document,
    duties,
    events,
    ics,
    filename: calendarFilename(document, duties),
    ...(cutoff ? { cutoff } : {}),
  };
}

/**
 * Read a roster file (PDF or text) and convert it.
 *
 * @throws InputError when the file is too large, of an unknown type or unreadable
 */
export async function convertRosterFile(
  file: RosterFile,
  extractors: TextExtractor[],
  options: ConversionOptions = {}
): Promise<ConversionResult> {
  return withLogContext({ runId: createRunId() }, async () => {
    const maxBytes = config.upload.maxBytes;
    if (file.data.byteLength > maxBytes) {
      log.warn('roster_too_large', { size: file.data.byteLength, maxBytes });
      throw new InputError(`Roster file is too large (${file.data.byteLength} bytes, limit ${maxBytes})`, {
        size: file.data.byteLength,
        maxBytes,
      });
    }

    const extractor = selectTextExtractor(file, extractors);
    log.info('roster_received', {
      size: file.data.byteLength,
      mimeType: file.mimeType,
      extractor: extractor.id,
    });

    const text = await extractor.extractText(file.data);
    return convertRosterText(text, options);
  });
}
