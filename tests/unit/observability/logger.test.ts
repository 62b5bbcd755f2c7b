import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, withLogContext } from '../../../src/utils/observability/index.js';

const envSnapshot = { ...process.env };

afterEach(() => {
  process.env = { ...envSnapshot };
  vi.restoreAllMocks();
});

function captureStdout(): string[] {
  const lines: string[] = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    lines.push(String(chunk).trim());
    return true;
  });
  return lines;
}

describe('observability logger', () => {
  it('writes redacted JSON logs to local file in development', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'roster-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'development';
    process.env.APP_LOG_LEVEL = 'debug';
    process.env.APP_LOG_FILE = logFile;

    const logger = createLogger({ domain: 'unit-test' });
    captureStdout();

    await withLogContext({ requestId: 'req_test_123' }, async () => {
      const rosterText = 'this should not be stored in clear text';
      logger.info('test_event', {
        crewName: 'Jan Kowalski',
        token: 'test-secret',
        rosterText,
      });
    });

    await vi.waitFor(() => {
      expect(fs.existsSync(logFile)).toBe(true);
      const content = fs.readFileSync(logFile, 'utf-8');
      expect(content.trim().length).toBeGreaterThan(0);
    }, { timeout: 1000 });

    const lines = fs.readFileSync(logFile, 'utf-8').trim().split('\n');
    const payload = JSON.parse(lines[0]) as Record<string, unknown>;

    expect(payload.event).toBe('test_event');
    expect(payload.level).toBe('info');
    expect(payload.domain).toBe('unit-test');
    expect(payload.requestId).toBe('req_test_123');
    expect(payload.crewName).toBe('J***i');
    expect(payload.token).toBe('[REDACTED]');
    expect(payload.rosterText).toBe('[REDACTED_TEXT len=39]');
  });

  it('does not write local file sink in production by default', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'roster-obs-log-'));
    const logFile = path.join(tempDir, 'app.ndjson');

    process.env.NODE_ENV = 'production';
    process.env.APP_LOG_LEVEL = 'debug';
    process.env.APP_LOG_FILE = logFile;
    captureStdout();

    const logger = createLogger({ domain: 'unit-test' });
    logger.info('prod_event', { ok: true });

    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('keeps only operational fields in roster domains', () => {
    process.env.APP_LOG_LEVEL = 'debug';
    const lines = captureStdout();

    createLogger({ domain: 'roster-conversion' }).info('roster_converted', {
      recordCount: 5,
      layout: 'compact',
      crewId: 'placeholder-id',
      firstLine: 'LO135 WAW-LHR 08:00-10:30',
    });

    const payload = JSON.parse(lines[0]) as Record<string, unknown>;
    expect(payload.recordCount).toBe(5);
    expect(payload.layout).toBe('compact');
    expect(payload).not.toHaveProperty('crewId');
    expect(payload).not.toHaveProperty('firstLine');
  });

  it('skips records below APP_LOG_LEVEL', () => {
    process.env.APP_LOG_LEVEL = 'warn';
    const lines = captureStdout();

    const logger = createLogger({ domain: 'unit-test' });
    logger.info('quiet_event');
    logger.debug('quieter_event');

    expect(lines).toEqual([]);
  });
});
