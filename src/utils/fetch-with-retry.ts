/**
 * @fileoverview Retry wrapper for outbound HTTP calls (ledger API, exchange rates).
 *
 * Handles transient network failures and retryable HTTP statuses. Each
 * attempt gets its own timeout so a hung upstream cannot stall a job.
 */

import { createLogger } from './observability/index.js';
import { errorMessage } from './errors.js';

const logger = createLogger({ domain: 'http' });

/** Retryable network error codes commonly surfaced by undici/fetch. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

export interface FetchRetryOptions {
  /** Delays between retries in milliseconds (attempts = delays + 1) */
  retryDelaysMs?: number[];
  /** Per-attempt timeout */
  timeoutMs?: number;
}

/** Retryable HTTP statuses for transient upstream issues. */
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * Extract network error code from a fetch error's cause when available.
 */
function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const cause = error.cause;
  if (typeof cause !== 'object' || cause === null || !('code' in cause)) {
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
  return retryDelaysMs[Math.min(attempt - 1, retryDelaysMs.length - 1)] ?? 0;
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch with retries for transient failures.
 *
 * Non-retryable responses (including 4xx) are returned as-is; the caller
 * decides what a non-2xx status means.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  operation: string,
  options: FetchRetryOptions = {}
): Promise<Response> {
  const retryDelaysMs = options.retryDelaysMs ?? [250, 750];
  const totalAttempts = retryDelaysMs.length + 1;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      const signal = options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : init.signal;
      const response = await fetch(url, { ...init, signal });
      if (response.ok) {
        return response;
      }

      const canRetry = attempt < totalAttempts && isRetryableStatus(response.status);
      if (!canRetry) {
        return response;
      }

      const waitMs = delayMs(attempt, retryDelaysMs);
      logger.warn('http_retryable_status', {
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
      logger.warn('http_transient_error', {
        operation,
        error: errorMessage(error),
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
