/**
 * @fileoverview GET /api/flights/:flightNumber/playback
 *
 * Looks up recorded tracks of a flight on the configured flight tracker.
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import config from '../config.js';
import { getPlaybackLinks, parseFlightNumber } from '../domains/tracker/service/playback.js';
import type { HttpClient } from '../domains/tracker/types.js';

export function createTrackerRouter(client: HttpClient): Router {
  const router = Router();

  router.get(
    '/api/flights/:flightNumber/playback',
    async (req: Request<{ flightNumber: string }>, res: Response, next: NextFunction) => {
      try {
        const links = await getPlaybackLinks(req.params.flightNumber, {
          client,
          baseUrl: config.tracker.baseUrl,
        });
        res.json({
          flightNumber: parseFlightNumber(req.params.flightNumber),
          links: links.map((link) => link.url),
        });
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
