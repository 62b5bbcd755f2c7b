/**
 * @fileoverview Roster conversion endpoints.
 *
 * POST /api/convert - multipart upload, responds with the .ics attachment
 * POST /api/preview - same input, responds with the events as JSON
 *
 * Form fields: `roster` (file), optional `cutoff`, `timezone`, `calendarName`.
 * The upload is kept in memory and never written to disk.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import config from '../config.js';
import { ICS_MIME_TYPE } from '../domains/calendar/service/ics.js';
import type { TextExtractor } from '../domains/roster/types.js';
import {
  convertRosterFile,
  type ConversionOptions,
  type ConversionResult,
} from '../services/conversion/index.js';
import { InputError } from '../utils/errors.js';
import { createLogger } from '../utils/observability/index.js';

const log = createLogger({ domain: 'roster-upload' });

/** Reads one optional text field of a multipart body. */
function formField(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(name in body)) return undefined;
  const value: unknown = Reflect.get(body, name);
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function conversionOptions(body: unknown): ConversionOptions {
  const cutoff = formField(body, 'cutoff');
  const timezone = formField(body, 'timezone');
  const calendarName = formField(body, 'calendarName');
  return {
    ...(cutoff ? { cutoff } : {}),
    ...(timezone ? { timezone, displayTimezone: timezone } : {}),
    ...(calendarName ? { calendarName } : {}),
  };
}

/** Content-Disposition with an ASCII-only file name. */
function attachmentHeader(filename: string): string {
  const safe = filename.replace(/[^A-Za-z0-9._-]/g, '_');
  return `attachment; filename="${safe}"`;
}

export function createConvertRouter(extractors: TextExtractor[]): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.upload.maxBytes, files: 1 },
  });

  async function convertUpload(req: Request): Promise<ConversionResult> {
    const file = req.file;
    if (!file) {
      throw new InputError('No roster uploaded (expected a file in the "roster" field)');
    }

    log.info('roster_upload_received', {
      size: file.size,
      mimeType: file.mimetype,
    });

    return convertRosterFile(
      { data: file.buffer, mimeType: file.mimetype, name: file.originalname },
      extractors,
      conversionOptions(req.body)
    );
  }

  router.post('/api/convert', upload.single('roster'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await convertUpload(req);
      res.setHeader('Content-Type', ICS_MIME_TYPE);
      res.setHeader('Content-Disposition', attachmentHeader(result.filename));
      res.send(Buffer.from(result.ics, 'utf-8'));
    } catch (error) {
      next(error);
    }
  });

  router.post('/api/preview', upload.single('roster'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await convertUpload(req);
      res.json({
        layout: result.document.layout,
        period: result.document.period ?? null,
        cutoff: result.cutoff ?? null,
        filename: result.filename,
        events: result.events,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
