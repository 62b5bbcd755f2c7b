import { randomUUID } from 'crypto';
import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types.js';

const logContextStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run `fn` with `context` merged over the surrounding log context.
 * Every logger call made inside (sync or async) picks the fields up.
 */
export function withLogContext<T>(context: LogContext, fn: () => T): T {
  const parent = logContextStorage.getStore() ?? {};
  return logContextStorage.run({ ...parent, ...context }, fn);
}

export function getLogContext(): LogContext {
  return logContextStorage.getStore() ?? {};
}

function shortId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

/** Id for one HTTP request. */
export function createRequestId(prefix = 'req'): string {
  return shortId(prefix);
}

/** Id for one roster conversion run (CLI or HTTP). */
export function createRunId(prefix = 'conv'): string {
  return shortId(prefix);
}
