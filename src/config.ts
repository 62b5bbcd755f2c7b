/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the application requires.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';
import { isValidTimezone } from './services/date/index.js';
import { createLogger } from './utils/observability/index.js';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Read an optional boolean env var (defaults to `defaultValue`). */
function optionalBool(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  return raw !== (defaultValue ? 'false' : 'true') ? defaultValue : !defaultValue;
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const config = {
  port: optionalInt('PORT', 3000),
  nodeEnv: optional('NODE_ENV', 'development'),

  /** How roster text is read */
  roster: {
    /** Zone the compact layout's wall-clock times are written in */
    timezone: optional('ROSTER_TIMEZONE', 'Europe/Warsaw'),
  },

  /** Upload limits (HTTP and CLI) */
  upload: {
    maxBytes: optionalInt('UPLOAD_MAX_BYTES', 50 * 1024 * 1024),
  },

  /** iCalendar output */
  calendar: {
    prodId: optional('CALENDAR_PRODID', '-//roster-calendar//Roster Calendar 1.0//EN'),
    uidDomain: optional('CALENDAR_UID_DOMAIN', 'roster-calendar.local'),
    name: optional('CALENDAR_NAME', 'Crew roster'),
    includeOffDays: optionalBool('CALENDAR_INCLUDE_OFF_DAYS', true),
  },

  /** Flight tracker used for event links and playback lookups */
  tracker: {
    baseUrl: optional('TRACKER_BASE_URL', 'https://www.flightradar24.com'),
  },
};

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Validate configuration at startup.
 * Throws if values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (Number.isNaN(config.port) || config.port < 1 || config.port > 65535) {
    errors.push(`PORT must be 1-65535, got ${config.port}`);
  }
  if (!isValidTimezone(config.roster.timezone)) {
    errors.push(`ROSTER_TIMEZONE must be an IANA timezone, got "${config.roster.timezone}"`);
  }
  if (Number.isNaN(config.upload.maxBytes) || config.upload.maxBytes < 1) {
    errors.push(`UPLOAD_MAX_BYTES must be >= 1, got ${config.upload.maxBytes}`);
  }
  if (!/^[A-Za-z0-9.-]+$/.test(config.calendar.uidDomain)) {
    errors.push(`CALENDAR_UID_DOMAIN must be a host name, got "${config.calendar.uidDomain}"`);
  }
  if (!isHttpUrl(config.tracker.baseUrl)) {
    errors.push(`TRACKER_BASE_URL must be an http(s) URL, got "${config.tracker.baseUrl}"`);
  }

  if (errors.length > 0) {
    createLogger({ domain: 'config' }).error('config_validation_failed', { errors });
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
