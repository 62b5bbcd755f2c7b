/**
 * @fileoverview Maps errors to JSON responses.
 *
 * Body: { error: <code>, message, ...details }. Only ParseError adds
 * details (line, field, text) so the user can find the offending line.
 */

import type { ErrorRequestHandler } from 'express';
import multer from 'multer';
import config from '../config.js';
import {
  AppError,
  CalendarGenerationError,
  InputError,
  ParseError,
  TimezoneError,
} from '../utils/errors.js';
import { createLogger, safeSnippet } from '../utils/observability/index.js';

const log = createLogger({ domain: 'http' });

type ErrorBody = {
  error: string;
  message: string;
  [detail: string]: unknown;
};

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return {
        status: 413,
        body: {
          error: 'FILE_TOO_LARGE',
          message: `Roster file is larger than ${config.upload.maxBytes} bytes`,
        },
      };
    }
    return { status: 400, body: { error: 'INPUT_ERROR', message: error.message } };
  }

  if (error instanceof ParseError) {
    return {
      status: 422,
      body: {
        error: error.code,
        message: error.message,
        line: error.line,
        field: error.field,
        text: safeSnippet(error.text),
      },
    };
  }

  if (error instanceof TimezoneError || error instanceof InputError) {
    const tooLarge = error instanceof InputError && error.context?.maxBytes !== undefined;
    return { status: tooLarge ? 413 : 400, body: { error: error.code, message: error.message } };
  }

  if (error instanceof CalendarGenerationError) {
    return { status: 500, body: { error: error.code, message: error.message } };
  }

  if (error instanceof AppError) {
    switch (error.code) {
      case 'INVALID_FLIGHT_NUMBER':
        return { status: 400, body: { error: error.code, message: error.message } };
      case 'TRACKER_HTTP_ERROR':
        return { status: 502, body: { error: error.code, message: error.message } };
    }
  }

  return { status: 500, body: { error: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

/**
 * Express error middleware. The four-argument signature is what marks it
 * as an error handler.
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const { status, body } = toErrorResponse(error);

  const data = {
    method: req.method,
    path: req.path,
    status,
    code: body.error,
    error: error instanceof Error ? error.message : String(error),
  };
  if (status >= 500) {
    log.error('request_failed', data);
  } else {
    log.warn('request_rejected', data);
  }

  res.status(status).json(body);
};
