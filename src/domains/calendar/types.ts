/**
 * Calendar domain types.
 */

/**
 * One VEVENT, ready to serialize.
 */
export interface CalendarEvent {
  uid: string;
  summary: string;
  description: string;
  start: string; // ISO string, UTC
  end: string; // ISO string, UTC
  location?: string;
  url?: string;
  categories: string[];
}

export interface EventBuildOptions {
  /** Right-hand side of every UID */
  uidDomain: string;
  /** Zone local times are shown in inside descriptions */
  displayTimezone: string;
  /** Flight tracker root for per-flight links; no links when absent */
  trackerBaseUrl?: string;
}

export interface CalendarOptions {
  prodId: string;
  calendarName?: string;
  /** DTSTAMP of every event. Defaults to now. */
  generatedAt?: Date;
}
