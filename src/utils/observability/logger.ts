import { WriteStream, createWriteStream, existsSync, mkdirSync } from 'fs';
import { dirname, join } from 'path';
import { getLogContext } from './context.js';
import { redactSecrets } from './redaction.js';
import type { AppLogger, AppLogRecord, LogContext, LogData, LogLevel } from './types.js';

let sinkHooksInstalled = false;
let fileSink: { path: string; stream: WriteStream } | null = null;

/**
 * Domains that see uploaded roster content. Only operational fields leave
 * these domains; anything else (names, crew ids, raw lines) is dropped.
 */
const HIGH_RISK_DOMAINS = new Set(['roster-upload', 'roster-conversion']);
const HIGH_RISK_ALLOWED_FIELDS = new Set([
  'message',
  'method',
  'path',
  'status',
  'durationMs',
  'size',
  'maxBytes',
  'mimeType',
  'extractor',
  'layout',
  'pageCount',
  'lineCount',
  'recordCount',
  'dutyCount',
  'eventCount',
  'skippedCount',
  'cutoff',
  'timezone',
  'code',
  'field',
  'line',
  'error',
]);

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/** Minimum level written anywhere; `APP_LOG_LEVEL`, default debug. */
function minimumLevel(): LogLevel {
  const raw = process.env.APP_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'debug';
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

function shouldWriteFileSink(): boolean {
  if (!isDevelopment()) return false;
  return process.env.APP_LOG_FILE !== 'off';
}

function resolveLogFilePath(): string {
  if (process.env.APP_LOG_FILE) return process.env.APP_LOG_FILE;

  const baseDir = process.env.APP_LOG_DIR || './logs';
  const dateDir = new Date().toISOString().slice(0, 10);
  return join(baseDir, dateDir, 'app.ndjson');
}

function closeFileSink(): void {
  if (!fileSink) return;
  fileSink.stream.end();
  fileSink = null;
}

function ensureFileSink(): WriteStream | null {
  if (!shouldWriteFileSink()) return null;

  const filePath = resolveLogFilePath();
  if (fileSink?.path === filePath) {
    return fileSink.stream;
  }

  closeFileSink();

  const dir = dirname(filePath);
  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const stream = createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', () => {
      // Never break app behavior due to logging issues.
    });
    fileSink = { path: filePath, stream };
    return stream;
  } catch {
    return null;
  }
}

function writeLineToFile(line: string): void {
  const sink = ensureFileSink();
  if (!sink) return;
  sink.write(`${line}\n`);
}

function writeToStd(level: LogLevel, line: string): void {
  if (level === 'error' || level === 'warn') {
    process.stderr.write(`${line}\n`);
    return;
  }
  process.stdout.write(`${line}\n`);
}

function normalizeData(data?: LogData): LogData {
  if (!data) return {};
  return redactSecrets(data);
}

function isAllowedHighRiskField(key: string): boolean {
  if (HIGH_RISK_ALLOWED_FIELDS.has(key)) return true;
  if (/^has[A-Z]/.test(key)) return true;
  return key === 'requestId' || key === 'runId';
}

function applyHighRiskFieldPolicy(context: LogContext, payload: LogData): LogData {
  const domain = typeof context.domain === 'string' ? context.domain : '';
  if (!HIGH_RISK_DOMAINS.has(domain)) {
    return payload;
  }

  const filtered: LogData = {};
  for (const [key, value] of Object.entries(payload)) {
    if (isAllowedHighRiskField(key)) {
      filtered[key] = value;
    }
  }
  return filtered;
}

function toRecord(
  level: LogLevel,
  event: string,
  baseContext: LogContext,
  data?: LogData,
): AppLogRecord {
  const context = getLogContext();
  const mergedContext = { ...context, ...baseContext };
  const payload = applyHighRiskFieldPolicy(mergedContext, normalizeData(data));
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...mergedContext,
    ...payload,
  };
}

function emitRecord(record: AppLogRecord): void {
  const line = JSON.stringify(record);
  writeToStd(record.level, line);
  writeLineToFile(line);
}

export function createLogger(baseContext: LogContext = {}): AppLogger {
  const log = (level: LogLevel, event: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;
    emitRecord(toRecord(level, event, baseContext, data));
  };

  return {
    debug: (event: string, data?: LogData) => log('debug', event, data),
    info: (event: string, data?: LogData) => log('info', event, data),
    warn: (event: string, data?: LogData) => log('warn', event, data),
    error: (event: string, data?: LogData) => log('error', event, data),
  };
}

/**
 * Install process hooks that flush the development file sink on exit.
 * Safe to call more than once.
 */
export function initObservability(): void {
  if (sinkHooksInstalled) return;
  sinkHooksInstalled = true;
  process.once('exit', closeFileSink);
  process.once('SIGINT', closeFileSink);
  process.once('SIGTERM', closeFileSink);
}
