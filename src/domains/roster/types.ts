/**
 * Roster domain types.
 */

import type { DateTime } from 'luxon';

export type DutyType = 'flight' | 'standby' | 'off';

export const DUTY_TYPES: readonly DutyType[] = ['flight', 'standby', 'off'];

/** Which export the text came from. */
export type RosterLayout = 'compact' | 'netline';

interface DutyBase {
  /** Local date the duty starts on, yyyy-MM-dd */
  date: string;
  /** IANA zone the wall-clock times are written in */
  sourceTimezone: string;
}

export interface FlightDuty extends DutyBase {
  dutyType: 'flight';
  /** Designator without spaces, e.g. "LO135" */
  flightNumber: string;
  departureAirport: string;
  arrivalAirport: string;
  /** HH:mm */
  departureTime: string;
  /** HH:mm */
  arrivalTime: string;
  /** Days between `date` and the arrival date */
  arrivalDayOffset: number;
}

export interface StandbyDuty extends DutyBase {
  dutyType: 'standby';
  airport?: string;
  startTime: string;
  endTime: string;
  endDayOffset: number;
}

export interface OffDuty extends DutyBase {
  dutyType: 'off';
}

export type FlightDutyRecord = FlightDuty | StandbyDuty | OffDuty;

/**
 * A duty placed on the UTC timeline.
 */
export interface NormalizedDuty {
  record: FlightDutyRecord;
  /** Zone the record's times were read in */
  timezone: string;
  /** UTC */
  start: DateTime;
  /** UTC */
  end: DateTime;
}

export interface RosterPeriod {
  start: string;
  end: string;
}

export interface RosterDocument {
  layout: RosterLayout;
  period?: RosterPeriod;
  /** Date the roster was printed; nothing before it is worth exporting */
  printedOn?: string;
  records: FlightDutyRecord[];
}

export interface ExtractOptions {
  /** Zone for compact-layout times. Defaults to the configured roster zone. */
  timezone?: string;
}

/**
 * Uploaded roster bytes plus whatever the transport told us about them.
 */
export interface RosterFile {
  data: Uint8Array;
  mimeType?: string;
  name?: string;
}

/**
 * Turns a roster file into plain text. PDF parsing lives behind this so the
 * extractor can be tested on text alone.
 */
export interface TextExtractor {
  readonly id: string;
  supports(file: RosterFile): boolean;
  extractText(data: Uint8Array): Promise<string>;
}
