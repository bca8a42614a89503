export type TransportErrorKind = "connection-reset" | "timeout" | "malformed-chunk" | "other";

export class TransportError extends Error {
  readonly kind: TransportErrorKind;
  readonly url: string;

  constructor(kind: TransportErrorKind, url: string, detail?: string) {
    super(`Transport failure (${kind}) for ${url}${detail ? `: ${detail}` : ""}`);
    this.name = "TransportError";
    this.kind = kind;
    this.url = url;
  }
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string) {
    super(`Unexpected HTTP ${status} from ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

export class RetryExhaustedError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly lastError: Error;

  constructor(url: string, attempts: number, lastError: Error) {
    super(`Gave up on ${url} after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetryExhaustedError";
    this.url = url;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class MalformedResponseError extends Error {
  readonly url: string;

  constructor(url: string, detail: string) {
    super(`Malformed response from ${url}: ${detail}`);
    this.name = "MalformedResponseError";
    this.url = url;
  }
}
