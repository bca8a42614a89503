/**
 * scan-drift: reconcile scanning-tool coverage against the repository host.
 * Public API facade.
 */

import { buildHostCatalog } from "./catalog/host.js";
import { resolveOrganizationIds } from "./catalog/organizations.js";
import { buildTargetCatalog, type AccessFailure } from "./catalog/targets.js";
import { GitLabClient, gitlabApiUrl } from "./clients/gitlab.js";
import { SnykClient } from "./clients/snyk.js";
import type { HostRepositoryApi, ScanningApi } from "./clients/types.js";
import { snykApiUrl, snykAppUrl, type ScanDriftConfig } from "./config/schema.js";
import { GitLabRepositoryHost } from "./coverage/hosts.js";
import { FileCoverageValidator } from "./coverage/validator.js";
import { DuplicateEntryDetector } from "./duplicates/detector.js";
import { AxiosTransport } from "./http/axiosTransport.js";
import { CatalogFetcher } from "./http/fetcher.js";
import type { HttpTransport } from "./http/transport.js";
import type { ResolverOptions } from "./identity/resolver.js";
import { createConsoleLogger, type Logger } from "./logging/logger.js";
import { ReconciliationEngine } from "./reconcile/engine.js";
import type { ReconcileError, ReconcileResult } from "./schema/types.js";

// Re-export types
export type * from "./schema/types.js";
export type { ScanDriftConfig, ScanDriftConfigInput, SnykRegion } from "./config/schema.js";
export type { HostRepositoryApi, ProjectsForTargetOptions, ScanningApi } from "./clients/types.js";
export type { HttpRequest, HttpResponse, HttpTransport } from "./http/transport.js";
export type { FetchOutcome, FetchOneOutcome, CollectPlan, FetchOnePlan, PaginationStyle } from "./http/fetcher.js";
export type { RetryPolicy } from "./http/retry.js";
export type { Logger, LogLevel } from "./logging/logger.js";
export type { RepositoryHost } from "./coverage/hosts.js";
export type { AccessFailure } from "./catalog/targets.js";
export type { DuplicatePolicy } from "./duplicates/detector.js";

export { defineConfig, parseConfig, SNYK_REGIONS } from "./config/schema.js";
export { loadConfig } from "./config/load.js";
export { createConsoleLogger, noopLogger } from "./logging/logger.js";
export {
  resolveRepoIdentity,
  identityFromFullPath,
  canonicalKey,
  identityKey,
  normalizeWebUrl,
} from "./identity/resolver.js";
export { CatalogFetcher } from "./http/fetcher.js";
export { AxiosTransport } from "./http/axiosTransport.js";
export { SnykClient } from "./clients/snyk.js";
export { GitLabClient } from "./clients/gitlab.js";
export { CatalogBuilder, UNRESOLVABLE } from "./catalog/builder.js";
export { buildHostCatalog } from "./catalog/host.js";
export { buildTargetCatalog } from "./catalog/targets.js";
export { resolveOrganizationIds } from "./catalog/organizations.js";
export { classifyKeys } from "./reconcile/classify.js";
export { ReconciliationEngine } from "./reconcile/engine.js";
export { FileCoverageValidator, computeCoverage } from "./coverage/validator.js";
export { GitLabRepositoryHost, LocalRepositoryHost } from "./coverage/hosts.js";
export { joinRepoPath } from "./coverage/paths.js";
export { loadTaxonomy, matchSupportedFile } from "./coverage/taxonomy.js";
export { DuplicateEntryDetector, normalizeIdentifier } from "./duplicates/detector.js";
export * from "./errors/http.errors.js";
export * from "./errors/config.errors.js";
export * from "./errors/audit.errors.js";

export interface AuditReport extends ReconcileResult {
  organizations: string[];
  accessFailures: AccessFailure[];
  /** Failures while building the catalogs, before reconciliation */
  catalogErrors: ReconcileError[];
  counts: {
    matched: number;
    targetOnly: number;
    hostOnly: number;
    unresolvable: number;
    tracked: number;
    stale: number;
    untracked: number;
    duplicates: number;
    errors: number;
  };
}

export interface DriftAuditOptions {
  /** Defaults to an axios transport */
  transport?: HttpTransport;
  logger?: Logger;
  /** Replace the API clients outright, e.g. with fakes */
  scanning?: ScanningApi;
  hosting?: HostRepositoryApi;
}

/** Main scan-drift class. Wires clients from config and runs one audit */
export class DriftAudit {
  readonly scanning: ScanningApi;
  readonly hosting: HostRepositoryApi;
  readonly logger: Logger;
  private readonly config: ScanDriftConfig;
  private readonly resolver: ResolverOptions;

  constructor(config: ScanDriftConfig, opts: DriftAuditOptions = {}) {
    this.config = config;
    this.logger = opts.logger ?? createConsoleLogger({ level: config.logLevel });
    const transport =
      opts.transport ??
      new AxiosTransport({
        timeoutMs: config.http.timeoutMs,
        retry: {
          maxRetries: config.http.maxRetries,
          baseDelayMs: config.http.baseDelayMs,
          rateLimitFallbackMs: config.http.rateLimitFallbackMs,
        },
        logger: this.logger,
      });

    this.scanning =
      opts.scanning ??
      new SnykClient({
        fetcher: new CatalogFetcher({
          transport,
          baseUrl: snykApiUrl(config),
          headers: { Authorization: `token ${config.snyk.token}`, Accept: "application/vnd.api+json" },
          logger: this.logger,
        }),
        versions: config.snyk.versions,
        appUrl: snykAppUrl(config),
        pageSize: config.http.pageSize,
        logger: this.logger,
      });

    this.hosting =
      opts.hosting ??
      new GitLabClient({
        fetcher: new CatalogFetcher({
          transport,
          baseUrl: gitlabApiUrl(config.gitlab.url),
          headers: config.gitlab.token ? { Authorization: `Bearer ${config.gitlab.token}` } : {},
          logger: this.logger,
        }),
        webUrl: config.gitlab.url,
        pageSize: config.http.pageSize,
        logger: this.logger,
      });

    this.resolver = { gitlabHosts: [this.hosting.webUrl, ...config.gitlab.hosts] };
  }

  /** Resolve organizations, build both catalogs and reconcile them */
  async run(scope: { orgId?: string; groupId?: string } = {}): Promise<AuditReport> {
    const organizations = await resolveOrganizationIds(
      this.scanning,
      {
        groupId: scope.groupId ?? this.config.snyk.groupId,
        orgId: scope.orgId ?? this.config.snyk.orgId,
      },
      this.logger
    );

    const hostCatalog = await buildHostCatalog(this.hosting, { resolver: this.resolver, logger: this.logger });
    const targetCatalog = await buildTargetCatalog(this.scanning, organizations, {
      integrationTypes: this.config.snyk.integrationTypes,
      resolver: this.resolver,
      logger: this.logger,
    });

    const engine = new ReconciliationEngine({
      projects: this.scanning,
      validator: new FileCoverageValidator({
        hosts: [new GitLabRepositoryHost(this.hosting)],
        logger: this.logger,
      }),
      detector: this.config.duplicates.enabled
        ? new DuplicateEntryDetector({ separator: this.config.duplicates.separator })
        : undefined,
      resolver: this.resolver,
      logger: this.logger,
    });
    const result = await engine.evaluate(hostCatalog.catalog, targetCatalog.catalog);

    return {
      ...result,
      organizations,
      accessFailures: targetCatalog.accessFailures,
      catalogErrors: [...hostCatalog.errors, ...targetCatalog.errors],
      counts: {
        matched: result.matched.length,
        targetOnly: result.targetOnly.length,
        hostOnly: result.hostOnly.length,
        unresolvable: result.unresolvable.length,
        tracked: result.matched.reduce((n, m) => n + m.tracked.length, 0),
        stale: result.matched.reduce((n, m) => n + m.stale.length, 0),
        untracked: result.matched.reduce((n, m) => n + m.untracked.length, 0),
        duplicates: result.duplicates.reduce((n, g) => n + g.stale.length, 0),
        errors: result.errors.length,
      },
    };
  }
}
