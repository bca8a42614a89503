/**
 * Host catalog: every repository the caller can reach on the hosting platform.
 */

import type { HostRepositoryApi } from "../clients/types.js";
import { canonicalKey, DEFAULT_BRANCH, normalizeWebUrl, type ResolverOptions } from "../identity/resolver.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { CanonicalKey, HostCatalog, HostCatalogEntry, ReconcileError } from "../schema/types.js";

export interface HostCatalogResult {
  catalog: HostCatalog;
  errors: ReconcileError[];
}

export interface BuildHostCatalogOptions {
  resolver?: ResolverOptions;
  logger?: Logger;
}

export async function buildHostCatalog(
  api: HostRepositoryApi,
  opts: BuildHostCatalogOptions = {}
): Promise<HostCatalogResult> {
  const logger = opts.logger ?? noopLogger;
  const host = new URL(api.webUrl).host.toLowerCase();
  const catalog = new Map<CanonicalKey, HostCatalogEntry>();
  const errors: ReconcileError[] = [];

  const outcome = await api.listRepositories();
  if (outcome.kind === "inaccessible") {
    const message = `Repository listing is not accessible (HTTP ${outcome.attempts.map((a) => a.status).join(", ")})`;
    logger.error(message, { host });
    errors.push({ scope: host, message });
    return { catalog, errors };
  }
  if (outcome.kind === "partial") {
    logger.warn(`Repository listing incomplete after ${outcome.pages} pages`, { host, error: outcome.error.message });
    errors.push({ scope: host, message: outcome.error.message });
  }

  for (const project of outcome.items) {
    if (project.archived) continue;
    const key = canonicalKey(host, project.path_with_namespace);
    if (catalog.has(key)) {
      logger.warn(`Duplicate repository key ${key}; keeping the first entry`, { id: project.id });
      continue;
    }
    catalog.set(key, {
      id: project.id,
      defaultBranch: project.default_branch || DEFAULT_BRANCH,
      fullPath: project.path_with_namespace,
      webUrl: project.web_url,
      normalizedWebUrl: normalizeWebUrl(project.web_url, opts.resolver),
    });
  }

  logger.info(`Host catalog holds ${catalog.size} repositories`, { host });
  return { catalog, errors };
}
