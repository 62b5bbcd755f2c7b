/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - ParseError / TimezoneError / InputError / CalendarGenerationError: one per pipeline failure
 * - withErrorContext: Wraps operations with consistent error logging
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * A roster line matched a known record shape but a field is missing or malformed.
 * `line` is 1-based and refers to the normalized text the extractor saw.
 */
export class ParseError extends AppError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly field: string,
    public readonly text: string
  ) {
    super(message, 'ROSTER_PARSE_ERROR', false, { line, field, text });
    this.name = 'ParseError';
  }
}

/**
 * Unknown IANA timezone, or a duty that cannot be placed on the UTC timeline.
 */
export class TimezoneError extends AppError {
  constructor(message: string, public readonly timezone: string) {
    super(message, 'TIMEZONE_ERROR', false, { timezone });
    this.name = 'TimezoneError';
  }
}

/**
 * The roster input itself is unusable: unreadable, empty, too large or not a document we can open.
 */
export class InputError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', false, context);
    this.name = 'InputError';
  }
}

export class CalendarGenerationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CALENDAR_ERROR', false, context);
    this.name = 'CalendarGenerationError';
  }
}

/**
 * Execute an async function with consistent error logging.
 * Errors are logged and re-thrown for the caller to handle.
 */
export async function withErrorContext<T>(
  fn: () => Promise<T>,
  context: string
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    log.error('operation_failed', {
      operation: context,
      code: error instanceof AppError ? error.code : undefined,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
