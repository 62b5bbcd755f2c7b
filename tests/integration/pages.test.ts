import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createTestApp } from '../helpers/app.js';

describe('pages', () => {
  const app = createTestApp();

  it('GET /health reports ok', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(typeof response.body.timestamp).toBe('string');
  });

  it('GET / serves the upload form', async () => {
    const response = await request(app).get('/');

    expect(response.status).toBe(200);
    expect(response.type).toBe('text/html');
    expect(response.text).toContain('<form method="post" action="/api/convert" enctype="multipart/form-data">');
    expect(response.text).toContain('name="timezone" value="Europe/Warsaw"');
    expect(response.headers['content-security-policy']).toBe("default-src 'none'; form-action 'self'");
  });
});
