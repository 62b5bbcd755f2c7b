/**
 * @fileoverview Express application factory.
 *
 * Kept apart from the server entry point so tests can drive the app with
 * supertest and in-process fakes, without a listening port.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { defaultTextExtractors } from './domains/roster/providers/index.js';
import type { TextExtractor } from './domains/roster/types.js';
import { createFetchHttpClient } from './domains/tracker/providers/fetch-client.js';
import type { HttpClient } from './domains/tracker/types.js';
import { createConvertRouter } from './routes/convert.js';
import { errorHandler } from './routes/errors.js';
import { healthHandler } from './routes/health.js';
import pagesRouter from './routes/pages.js';
import { createTrackerRouter } from './routes/tracker.js';
import { createLogger, createRequestId, withLogContext } from './utils/observability/index.js';

const log = createLogger({ domain: 'http' });

export interface AppDependencies {
  httpClient?: HttpClient;
  textExtractors?: TextExtractor[];
}

function requestContext(req: Request, res: Response, next: NextFunction): void {
  const requestId = createRequestId();
  const startedAt = Date.now();
  res.setHeader('X-Request-Id', requestId);

  withLogContext({ requestId }, () => {
    res.on('finish', () => {
      log.info('request_completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  });
}

export function createApp(deps: AppDependencies = {}): express.Application {
  const app = express();
  app.disable('x-powered-by');

  app.use(requestContext);

  // Health check endpoint
  app.get('/health', healthHandler);

  // Upload form
  app.use(pagesRouter);

  // Conversion API
  app.use(createConvertRouter(deps.textExtractors ?? defaultTextExtractors()));

  // Flight tracker lookups
  app.use(createTrackerRouter(deps.httpClient ?? createFetchHttpClient()));

  app.use(errorHandler);

  return app;
}
