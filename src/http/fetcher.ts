/**
 * Paginated, versioned catalog acquisition.
 *
 * Retry lives in the transport. `send` attaches the shared headers,
 * `collect` walks every page of a listing across an ordered list of API versions,
 * `fetchOne` applies the same version fallback to a single resource.
 */

import { HttpStatusError, MalformedResponseError } from "../errors/http.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "./transport.js";

// ── Types ──

export type QueryParams = Record<string, string | number | boolean>;

export type PaginationStyle =
  /** Follow `links.next` in the JSON body */
  | { kind: "links" }
  /** Follow a response header into a query param */
  | { kind: "page-header"; header?: string; param?: string }
  | { kind: "none" };

export interface CollectPlan<T> {
  /** Absolute URL, or a path under the fetcher's base URL */
  path: string;
  params?: QueryParams;
  /** Ordered API versions; omitted for unversioned APIs */
  versions?: readonly string[];
  pagination: PaginationStyle;
  /** Pull the page's items out of a decoded body; null when the shape is unexpected */
  items: (body: unknown) => T[] | null;
}

export interface FetchOnePlan<T> {
  path: string;
  params?: QueryParams;
  versions?: readonly string[];
  parse: (body: unknown) => T | null;
}

export interface VersionAttempt {
  version?: string;
  status: number;
}

export type FetchOutcome<T> =
  | { kind: "complete"; items: T[]; version?: string; pages: number }
  | { kind: "partial"; items: T[]; version?: string; pages: number; error: Error }
  | { kind: "inaccessible"; attempts: VersionAttempt[] };

export type FetchOneOutcome<T> =
  | { kind: "found"; value: T; version?: string }
  | { kind: "inaccessible"; attempts: VersionAttempt[] }
  | { kind: "failed"; error: Error };

export interface CatalogFetcherOptions {
  transport: HttpTransport;
  baseUrl: string;
  /** Sent with every request (auth, accept) */
  headers?: Record<string, string>;
  logger?: Logger;
}

/** Statuses that mean "this version is unavailable to you", triggering fallback */
export const VERSION_FALLBACK_STATUSES: ReadonlySet<number> = new Set([401, 403, 404]);

// ── Helpers ──

function isOk(status: number): boolean {
  return status >= 200 && status < 300;
}

function decodeJson(response: HttpResponse, url: string): unknown {
  try {
    return JSON.parse(response.body);
  } catch {
    throw new MalformedResponseError(url, "body is not valid JSON");
  }
}

function readNextLink(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("links" in body)) return null;
  const links = body.links;
  if (typeof links !== "object" || links === null || !("next" in links)) return null;
  return typeof links.next === "string" && links.next.length > 0 ? links.next : null;
}

// ── Fetcher ──

export class CatalogFetcher {
  readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(opts: CatalogFetcherOptions) {
    this.transport = opts.transport;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.headers = opts.headers ?? {};
    this.logger = opts.logger ?? noopLogger;
  }

  /** Absolute URL for a path under the base, or the path itself when already absolute */
  resolveUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    return `${this.baseUrl}/${path.replace(/^\/+/, "")}`;
  }

  /**
   * Normalize a `links.next` value to an absolute URL.
   * Accepts absolute links, host-relative links that already carry the API base path,
   * and links relative to the API base.
   */
  resolveNextLink(link: string): string {
    if (/^https?:\/\//i.test(link)) return link;
    const base = new URL(this.baseUrl);
    const basePath = base.pathname.replace(/\/+$/, "");
    if (link.startsWith("/")) {
      if (basePath && (link === basePath || link.startsWith(`${basePath}/`) || link.startsWith(`${basePath}?`))) {
        return `${base.origin}${link}`;
      }
      return `${base.origin}${basePath}${link}`;
    }
    return `${base.origin}${basePath}/${link}`;
  }

  /** Perform one request with the fetcher's headers; the transport retries */
  async send(request: HttpRequest): Promise<HttpResponse> {
    return this.transport.send({ ...request, headers: { ...this.headers, ...request.headers } });
  }

  /** Acquire every page of a listing, falling back through the plan's versions */
  async collect<T>(plan: CollectPlan<T>): Promise<FetchOutcome<T>> {
    const versions: readonly (string | undefined)[] = plan.versions?.length ? plan.versions : [undefined];
    const attempts: VersionAttempt[] = [];

    for (const version of versions) {
      const params: QueryParams = { ...plan.params };
      if (version) params.version = version;
      const url = this.resolveUrl(plan.path);

      let first: HttpResponse;
      try {
        first = await this.send({ method: "GET", url, params });
      } catch (err) {
        return { kind: "partial", items: [], version, pages: 0, error: toError(err) };
      }

      if (VERSION_FALLBACK_STATUSES.has(first.status)) {
        attempts.push({ version, status: first.status });
        this.logger.debug(`Version ${version ?? "<none>"} unavailable for ${url}`, { status: first.status });
        continue;
      }

      return this.walk(plan, url, params, first, version);
    }

    this.logger.warn(`No accessible version for ${this.resolveUrl(plan.path)}`, {
      attempts: attempts.map((a) => `${a.version ?? "<none>"}:${a.status}`),
    });
    return { kind: "inaccessible", attempts };
  }

  /** Fetch a single resource with version fallback */
  async fetchOne<T>(plan: FetchOnePlan<T>): Promise<FetchOneOutcome<T>> {
    const versions: readonly (string | undefined)[] = plan.versions?.length ? plan.versions : [undefined];
    const attempts: VersionAttempt[] = [];

    for (const version of versions) {
      const params: QueryParams = { ...plan.params };
      if (version) params.version = version;
      const url = this.resolveUrl(plan.path);

      try {
        const response = await this.send({ method: "GET", url, params });
        if (VERSION_FALLBACK_STATUSES.has(response.status)) {
          attempts.push({ version, status: response.status });
          continue;
        }
        if (!isOk(response.status)) {
          return { kind: "failed", error: new HttpStatusError(response.status, url) };
        }
        const value = plan.parse(decodeJson(response, url));
        if (value === null) {
          return { kind: "failed", error: new MalformedResponseError(url, "unexpected resource shape") };
        }
        return { kind: "found", value, version };
      } catch (err) {
        return { kind: "failed", error: toError(err) };
      }
    }

    return { kind: "inaccessible", attempts };
  }

  // ── Internal ──

  private async walk<T>(
    plan: CollectPlan<T>,
    firstUrl: string,
    firstParams: QueryParams,
    first: HttpResponse,
    version: string | undefined
  ): Promise<FetchOutcome<T>> {
    const items: T[] = [];
    let pages = 0;
    let response = first;
    let url = firstUrl;

    for (;;) {
      if (!isOk(response.status)) {
        return { kind: "partial", items, version, pages, error: new HttpStatusError(response.status, url) };
      }

      let body: unknown;
      let pageItems: T[] | null;
      try {
        body = decodeJson(response, url);
        pageItems = plan.items(body);
      } catch (err) {
        return { kind: "partial", items, version, pages, error: toError(err) };
      }
      if (pageItems === null) {
        const error = new MalformedResponseError(url, "unexpected page shape");
        this.logger.warn(error.message);
        return { kind: "partial", items, version, pages, error };
      }
      if (pageItems.length === 0) break;

      items.push(...pageItems);
      pages++;

      const next = this.nextRequest(plan.pagination, body, response, url, firstParams);
      if (!next) break;
      url = next.url;

      try {
        response = await this.send({ method: "GET", url: next.url, params: next.params });
      } catch (err) {
        return { kind: "partial", items, version, pages, error: toError(err) };
      }
    }

    return { kind: "complete", items, version, pages };
  }

  private nextRequest(
    style: PaginationStyle,
    body: unknown,
    response: HttpResponse,
    url: string,
    params: QueryParams
  ): { url: string; params?: QueryParams } | null {
    switch (style.kind) {
      case "links": {
        const link = readNextLink(body);
        // next links carry their own query string, version included
        return link ? { url: this.resolveNextLink(link) } : null;
      }
      case "page-header": {
        const value = response.headers[(style.header ?? "x-next-page").toLowerCase()]?.trim();
        if (!value) return null;
        return { url, params: { ...params, [style.param ?? "page"]: value } };
      }
      case "none":
        return null;
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
