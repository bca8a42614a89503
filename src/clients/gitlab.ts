/**
 * Hosting-platform client for the GitLab v4 REST API.
 * Listings page on the `X-Next-Page` header.
 */

import { HttpStatusError } from "../errors/http.errors.js";
import type { CatalogFetcher, FetchOutcome } from "../http/fetcher.js";
import { DEFAULT_BRANCH } from "../identity/resolver.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { hostProject, treeEntry, type HostProject, type TreeEntry } from "../schema/responses.js";
import type { HostRepositoryApi } from "./types.js";

export interface GitLabClientOptions {
  fetcher: CatalogFetcher;
  /** Instance root, e.g. https://gitlab.com */
  webUrl: string;
  pageSize?: number;
  logger?: Logger;
}

/** API base for an instance root */
export function gitlabApiUrl(webUrl: string): string {
  return `${webUrl.replace(/\/+$/, "")}/api/v4`;
}

function projectPath(fullPath: string): string {
  return `/projects/${encodeURIComponent(fullPath)}`;
}

export class GitLabClient implements HostRepositoryApi {
  readonly webUrl: string;
  private readonly fetcher: CatalogFetcher;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(opts: GitLabClientOptions) {
    this.fetcher = opts.fetcher;
    this.webUrl = opts.webUrl.replace(/\/+$/, "");
    this.pageSize = opts.pageSize ?? 100;
    this.logger = opts.logger ?? noopLogger;
  }

  listRepositories(): Promise<FetchOutcome<HostProject>> {
    return this.fetcher.collect({
      path: "/projects",
      params: {
        membership: true,
        simple: true,
        archived: false,
        per_page: this.pageSize,
        order_by: "path",
      },
      pagination: { kind: "page-header", header: "x-next-page", param: "page" },
      items: (body) => {
        const parsed = hostProject.array().safeParse(body);
        return parsed.success ? parsed.data : null;
      },
    });
  }

  async getDefaultBranch(fullPath: string): Promise<string> {
    const outcome = await this.fetcher.fetchOne({
      path: projectPath(fullPath),
      parse: (body) => {
        const parsed = hostProject.safeParse(body);
        return parsed.success ? parsed.data : null;
      },
    });
    if (outcome.kind === "found") {
      return outcome.value.default_branch ?? DEFAULT_BRANCH;
    }
    this.logger.debug(`Default branch unavailable for ${fullPath}`, { outcome: outcome.kind });
    return DEFAULT_BRANCH;
  }

  async fileExists(fullPath: string, path: string, ref: string): Promise<boolean> {
    const url = this.fetcher.resolveUrl(`${projectPath(fullPath)}/repository/files/${encodeURIComponent(path)}`);
    const response = await this.fetcher.send({ method: "GET", url, params: { ref } });
    if (response.status >= 200 && response.status < 300) return true;
    if (response.status === 404) return false;
    throw new HttpStatusError(response.status, url);
  }

  listTree(fullPath: string, ref: string): Promise<FetchOutcome<TreeEntry>> {
    return this.fetcher.collect({
      path: `${projectPath(fullPath)}/repository/tree`,
      params: { ref, recursive: true, per_page: this.pageSize },
      pagination: { kind: "page-header", header: "x-next-page", param: "page" },
      items: (body) => {
        const parsed = treeEntry.array().safeParse(body);
        return parsed.success ? parsed.data : null;
      },
    });
  }
}
