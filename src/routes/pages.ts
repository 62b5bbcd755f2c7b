/**
 * @fileoverview Upload form.
 *
 * GET / - a plain HTML form posting to /api/convert. No scripts, so the
 * page works with the browser's own file upload.
 */

import { Router, type Request, type Response } from 'express';
import config from '../config.js';

const router = Router();

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderUploadPage(defaults: { timezone: string; calendarName: string }): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Roster to calendar</title>
</head>
<body>
  <h1>Roster to calendar</h1>
  <form method="post" action="/api/convert" enctype="multipart/form-data">
    <p><label>Roster (PDF or text) <input type="file" name="roster" accept=".pdf,.txt,application/pdf,text/plain" required></label></p>
    <p><label>Skip duties before <input type="date" name="cutoff"></label></p>
    <p><label>Roster timezone <input type="text" name="timezone" value="${escapeHtml(defaults.timezone)}"></label></p>
    <p><label>Calendar name <input type="text" name="calendarName" value="${escapeHtml(defaults.calendarName)}"></label></p>
    <p><button type="submit">Download .ics</button></p>
  </form>
</body>
</html>
`;
}

router.get('/', (_req: Request, res: Response) => {
  res.setHeader('Content-Security-Policy', "default-src 'none'; form-action 'self'");
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('Cache-Control', 'no-cache');
  res.type('html').send(renderUploadPage({
    timezone: config.roster.timezone,
    calendarName: config.calendar.name,
  }));
});

export default router;
