/**
 * Scanning-tool REST client (JSON:API, versioned endpoints, `links.next` paging).
 */

import type { CatalogFetcher, FetchOneOutcome, FetchOutcome } from "../http/fetcher.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import {
  listBody,
  organizationResource,
  projectResource,
  singleBody,
  targetResource,
  toScanProject,
  type OrganizationResource,
  type TargetResource,
} from "../schema/responses.js";
import type { ScanProject } from "../schema/types.js";
import type { ProjectsForTargetOptions, ScanningApi } from "./types.js";

export interface ApiVersions {
  organizations: readonly string[];
  groups: readonly string[];
  targets: readonly string[];
  projects: readonly string[];
}

export interface SnykClientOptions {
  fetcher: CatalogFetcher;
  versions: ApiVersions;
  /** Web app base used for project links */
  appUrl?: string;
  pageSize?: number;
  logger?: Logger;
}

const orgList = listBody(organizationResource);
const orgSingle = singleBody(organizationResource);
const targetList = listBody(targetResource);
const targetSingle = singleBody(targetResource);
const projectList = listBody(projectResource);
const projectSingle = singleBody(projectResource);

/** Org name to the slug the web app uses in URLs */
export function orgSlug(name: string): string {
  return name.toLowerCase().replace(/[\s_]+/g, "-");
}

function withTarget(project: ScanProject, targetId: string): ScanProject {
  return project.targetId ? project : { ...project, targetId };
}

export class SnykClient implements ScanningApi {
  private readonly fetcher: CatalogFetcher;
  private readonly versions: ApiVersions;
  private readonly appUrl: string;
  private readonly pageSize: number;
  private readonly logger: Logger;
  private readonly slugs = new Map<string, string>();

  constructor(opts: SnykClientOptions) {
    this.fetcher = opts.fetcher;
    this.versions = opts.versions;
    this.appUrl = (opts.appUrl ?? "https://app.snyk.io").replace(/\/+$/, "");
    this.pageSize = opts.pageSize ?? 100;
    this.logger = opts.logger ?? noopLogger;
  }

  // ── Organizations ──

  listOrganizations(): Promise<FetchOutcome<OrganizationResource>> {
    return this.fetcher.collect({
      path: "/orgs",
      params: { limit: this.pageSize },
      versions: this.versions.organizations,
      pagination: { kind: "links" },
      items: (body) => {
        const parsed = orgList.safeParse(body);
        return parsed.success ? parsed.data.data : null;
      },
    });
  }

  listGroupOrganizations(groupId: string): Promise<FetchOutcome<OrganizationResource>> {
    return this.fetcher.collect({
      path: `/groups/${encodeURIComponent(groupId)}/orgs`,
      params: { limit: this.pageSize },
      versions: this.versions.groups,
      pagination: { kind: "links" },
      items: (body) => {
        const parsed = orgList.safeParse(body);
        return parsed.success ? parsed.data.data : null;
      },
    });
  }

  getOrganization(orgId: string): Promise<FetchOneOutcome<OrganizationResource>> {
    return this.fetcher.fetchOne({
      path: `/orgs/${encodeURIComponent(orgId)}`,
      versions: this.versions.organizations,
      parse: (body) => {
        const parsed = orgSingle.safeParse(body);
        return parsed.success ? parsed.data.data : null;
      },
    });
  }

  // ── Targets ──

  listTargets(orgId: string, integrationTypes: readonly string[]): Promise<FetchOutcome<TargetResource>> {
    return this.fetcher.collect({
      path: `/orgs/${encodeURIComponent(orgId)}/targets`,
      params: { limit: this.pageSize, source_types: integrationTypes.join(",") },
      versions: this.versions.targets,
      pagination: { kind: "links" },
      items: (body) => {
        const parsed = targetList.safeParse(body);
        return parsed.success ? parsed.data.data : null;
      },
    });
  }

  async getTargetUrl(orgId: string, targetId: string): Promise<string | null> {
    const outcome = await this.fetcher.fetchOne({
      path: `/orgs/${encodeURIComponent(orgId)}/targets/${encodeURIComponent(targetId)}`,
      versions: this.versions.targets,
      parse: (body) => {
        const parsed = targetSingle.safeParse(body);
        return parsed.success ? parsed.data.data : null;
      },
    });
    if (outcome.kind !== "found") {
      this.logger.debug(`No URL for target ${targetId}`, { orgId, outcome: outcome.kind });
      return null;
    }
    return outcome.value.attributes.url ?? null;
  }

  // ── Projects ──

  listProjects(orgId: string): Promise<FetchOutcome<ScanProject>> {
    return this.fetcher.collect({
      path: `/orgs/${encodeURIComponent(orgId)}/projects`,
      params: { limit: this.pageSize },
      versions: this.versions.projects,
      pagination: { kind: "links" },
      items: (body) => {
        const parsed = projectList.safeParse(body);
        return parsed.success ? parsed.data.data.map((p) => toScanProject(p, orgId)) : null;
      },
    });
  }

  async listProjectsForTarget(
    orgId: string,
    targetId: string,
    opts: ProjectsForTargetOptions = {}
  ): Promise<FetchOutcome<ScanProject>> {
    const direct = await this.fetcher.collect({
      path: `/orgs/${encodeURIComponent(orgId)}/targets/${encodeURIComponent(targetId)}/projects`,
      params: { limit: this.pageSize },
      versions: this.versions.projects,
      pagination: { kind: "links" },
      items: (body) => {
        const parsed = projectList.safeParse(body);
        return parsed.success ? parsed.data.data.map((p) => withTarget(toScanProject(p, orgId), targetId)) : null;
      },
    });

    const missing = direct.kind === "inaccessible" && direct.attempts.some((a) => a.status === 404);
    if (!missing) return direct;

    this.logger.debug(`Target projects endpoint missing; filtering org projects`, { orgId, targetId });
    const all = await this.listProjects(orgId);
    if (all.kind === "inaccessible") return all;
    const belongs = (p: ScanProject): boolean =>
      p.targetId !== undefined
        ? p.targetId === targetId
        : p.targetReference !== undefined && opts.matchesRepository?.(p.targetReference) === true;
    return { ...all, items: all.items.filter(belongs) };
  }

  getProject(orgId: string, projectId: string): Promise<FetchOneOutcome<ScanProject>> {
    return this.fetcher.fetchOne({
      path: `/orgs/${encodeURIComponent(orgId)}/projects/${encodeURIComponent(projectId)}`,
      versions: this.versions.projects,
      parse: (body) => {
        const parsed = projectSingle.safeParse(body);
        return parsed.success ? toScanProject(parsed.data.data, orgId) : null;
      },
    });
  }

  /** Link to the project in the web app; the org segment falls back to the id when the org cannot be read */
  async projectWebUrl(orgId: string, projectId: string): Promise<string> {
    let slug = this.slugs.get(orgId);
    if (slug === undefined) {
      const org = await this.getOrganization(orgId);
      slug =
        org.kind === "found"
          ? org.value.attributes.slug ?? orgSlug(org.value.attributes.name ?? orgId)
          : orgId;
      this.slugs.set(orgId, slug);
    }
    return `${this.appUrl}/org/${slug}/project/${projectId}`;
  }
}
