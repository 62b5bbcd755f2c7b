/**
 * @fileoverview Retry wrapper for outbound fetch calls.
 *
 * Handles transient network failures, retryable HTTP statuses and
 * per-attempt timeouts.
 */

import { createLogger } from '../../utils/observability/index.js';

const log = createLogger({ domain: 'http' });

/** Retryable network error codes commonly surfaced by undici/fetch. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_HEADERS_TIMEOUT',
]);

/** Retryable HTTP statuses for transient upstream issues. */
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * Extract network error code from a fetch error's cause when available.
 */
function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }

  const cause = error.cause;
  if (!cause || typeof cause !== 'object' || !('code' in cause)) {
    return undefined;
  }

  return typeof cause.code === 'string' ? cause.code : undefined;
}

/**
 * Detect transient fetch errors that are worth retrying.
 */
function isRetryableFetchError(error: unknown): boolean {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }
  if (!(error instanceof TypeError)) {
    return false;
  }

  const code = getErrorCode(error);
  if (code && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes('fetch failed') || message.includes('network');
}

function delayMs(attempt: number, retryDelaysMs: number[]): number {
  return retryDelaysMs[Math.min(attempt - 1, retryDelaysMs.length - 1)];
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export type FetchRetryOptions = {
  /** Delays between retries in milliseconds (attempts = delays + 1) */
  retryDelaysMs?: number[];
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number;
};

/**
 * Fetch with retries for transient failures.
 *
 * @param operation Human-readable operation label for logs
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  operation: string,
  options: FetchRetryOptions = {}
): Promise<Response> {
  const retryDelaysMs = options.retryDelaysMs ?? [250, 750];
  const timeoutMs = options.timeoutMs ?? 10_000;
  const totalAttempts = retryDelaysMs.length + 1;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      const response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      if (response.ok) {
        return response;
      }

      const canRetry = attempt < totalAttempts && isRetryableStatus(response.status);
      if (!canRetry) {
        return response;
      }

      const waitMs = delayMs(attempt, retryDelaysMs);
      log.warn('fetch_retry_status', {
        operation,
        status: response.status,
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    } catch (error) {
      const canRetry = attempt < totalAttempts && isRetryableFetchError(error);
      if (!canRetry) {
        throw error;
      }

      const waitMs = delayMs(attempt, retryDelaysMs);
      log.warn('fetch_retry_network', {
        operation,
        error: error instanceof Error ? error.message : String(error),
        errorCode: getErrorCode(error),
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    }
  }

  throw new Error(`${operation} failed after retries`);
}
