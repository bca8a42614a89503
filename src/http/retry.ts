/**
 * axios-retry configuration: which failures are worth another attempt and how long to wait.
 */

import type { AxiosError } from "axios";
import axiosRetry, { type IAxiosRetryConfig } from "axios-retry";
import { noopLogger, type Logger } from "../logging/logger.js";

export interface RetryPolicy {
  /** Attempts allowed after the first one for transient faults */
  maxRetries: number;
  baseDelayMs: number;
  /** Wait used for 429 responses without a usable Retry-After */
  rateLimitFallbackMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  rateLimitFallbackMs: 5000,
};

/** Transient retries spent by one request; 429 waits are not counted */
export interface RetryBudget {
  transientRetries: number;
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "EPIPE",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ERR_SOCKET_CONNECTION_TIMEOUT",
  "HPE_INVALID_CHUNK_SIZE",
  "ERR_STREAM_PREMATURE_CLOSE",
  "Z_DATA_ERROR",
  "Z_BUF_ERROR",
]);

/** Connection resets, timeouts, truncated chunked bodies and 5xx */
export function isTransientFault(error: AxiosError): boolean {
  const status = error.response?.status;
  if (status !== undefined) return status >= 500 && status < 600;
  return axiosRetry.isNetworkError(error) || (error.code !== undefined && TRANSIENT_CODES.has(error.code));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds.
 * Returns null when the header is absent or unusable.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

function retryAfterHeader(error: AxiosError): string | undefined {
  const headers = error.response?.headers;
  if (!headers) return undefined;
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== "retry-after") continue;
    if (typeof value === "string") return value;
    if (typeof value === "number") return String(value);
  }
  return undefined;
}

/**
 * Per-request retry config. 429 retries are unbounded and wait for Retry-After;
 * transient faults back off exponentially until `budget` reaches maxRetries.
 */
export function createRetriesConfig(
  policy: RetryPolicy,
  budget: RetryBudget,
  logger: Logger = noopLogger
): IAxiosRetryConfig {
  return {
    retries: Number.MAX_SAFE_INTEGER,
    shouldResetTimeout: true,
    retryCondition: (error) => {
      if (error.response?.status === 429) return true;
      return isTransientFault(error) && budget.transientRetries < policy.maxRetries;
    },
    retryDelay: (_retryCount, error) => {
      if (error.response?.status === 429) {
        return parseRetryAfter(retryAfterHeader(error)) ?? policy.rateLimitFallbackMs;
      }
      budget.transientRetries++;
      return axiosRetry.exponentialDelay(budget.transientRetries - 1, error, policy.baseDelayMs);
    },
    onRetry: (retryCount, error, requestConfig) => {
      const status = error.response?.status ?? error.code ?? "network error";
      logger.debug(`Retrying ${requestConfig.url ?? "request"} after ${status}`, {
        attempt: retryCount,
        transientRetries: budget.transientRetries,
      });
    },
  };
}
