/**
 * HttpTransport backed by axios, with axios-retry handling transient faults and 429s.
 * Any status that survives retry is returned to the fetcher as-is, bodies as raw text.
 */

import axios, { isAxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from "axios";
import axiosRetry from "axios-retry";
import { RetryExhaustedError, TransportError, type TransportErrorKind } from "../errors/http.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { DEFAULT_RETRY_POLICY, createRetriesConfig, isTransientFault, type RetryBudget, type RetryPolicy } from "./retry.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "./transport.js";

export interface AxiosTransportOptions {
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  logger?: Logger;
  /** Replaces the network adapter; used by tests to answer in process */
  adapter?: AxiosAdapter;
}

const CONNECTION_RESET_CODES = new Set(["ECONNRESET", "EPIPE", "ECONNREFUSED", "ERR_SOCKET_CONNECTION_TIMEOUT"]);
const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);
const MALFORMED_CHUNK_CODES = new Set(["HPE_INVALID_CHUNK_SIZE", "ERR_STREAM_PREMATURE_CLOSE", "Z_DATA_ERROR", "Z_BUF_ERROR"]);

/** Map an axios error code to a transport fault kind */
export function classifyErrorCode(code: string | undefined): TransportErrorKind {
  if (!code) return "other";
  if (CONNECTION_RESET_CODES.has(code)) return "connection-reset";
  if (TIMEOUT_CODES.has(code)) return "timeout";
  if (MALFORMED_CHUNK_CODES.has(code)) return "malformed-chunk";
  return "other";
}

function flattenHeaders(raw: object): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === "string") headers[name.toLowerCase()] = value;
    else if (typeof value === "number" || typeof value === "boolean") headers[name.toLowerCase()] = String(value);
    else if (Array.isArray(value)) headers[name.toLowerCase()] = value.join(", ");
  }
  return headers;
}

function toHttpResponse(response: AxiosResponse<unknown>): HttpResponse {
  const data = response.data;
  return {
    status: response.status,
    headers: flattenHeaders(response.headers),
    body: typeof data === "string" ? data : data == null ? "" : JSON.stringify(data),
  };
}

/** 429 and 5xx reject so axios-retry sees them; everything else resolves */
export function retryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class AxiosTransport implements HttpTransport {
  private readonly http: AxiosInstance;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;

  constructor(opts: AxiosTransportOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...opts.retry };
    this.logger = opts.logger ?? noopLogger;
    this.http = axios.create({
      timeout: opts.timeoutMs ?? 30000,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: (status) => !retryableStatus(status),
      ...(opts.adapter ? { adapter: opts.adapter } : {}),
    });
    // The policy and its budget are supplied per request in send()
    axiosRetry(this.http, { retries: 0 });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const budget: RetryBudget = { transientRetries: 0 };
    try {
      const response = await this.http.request<unknown>({
        method: request.method,
        url: request.url,
        params: request.params,
        headers: request.headers,
        data: request.body,
        "axios-retry": createRetriesConfig(this.policy, budget, this.logger),
      });
      return toHttpResponse(response);
    } catch (err) {
      if (!isAxiosError(err)) throw err;
      // a 5xx that outlived its retries is still an answer
      if (err.response) return toHttpResponse(err.response);

      const failure = new TransportError(classifyErrorCode(err.code), request.url, err.message);
      if (isTransientFault(err)) {
        throw new RetryExhaustedError(request.url, budget.transientRetries + 1, failure);
      }
      throw failure;
    }
  }
}
