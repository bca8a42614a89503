/**
 * Collaborator interfaces for the two inventories.
 * Catalog builders and the engine depend on these, never on a concrete client.
 */

import type { FetchOneOutcome, FetchOutcome } from "../http/fetcher.js";
import type { ScanProject } from "../schema/types.js";
import type { HostProject, OrganizationResource, TargetResource, TreeEntry } from "../schema/responses.js";

export interface ProjectsForTargetOptions {
  matchesRepository?: (targetReference: string) => boolean;
}

export interface ScanningApi {
  listOrganizations(): Promise<FetchOutcome<OrganizationResource>>;
  listGroupOrganizations(groupId: string): Promise<FetchOutcome<OrganizationResource>>;
  getOrganization(orgId: string): Promise<FetchOneOutcome<OrganizationResource>>;
  listTargets(orgId: string, integrationTypes: readonly string[]): Promise<FetchOutcome<TargetResource>>;
  getTargetUrl(orgId: string, targetId: string): Promise<string | null>;
  listProjects(orgId: string): Promise<FetchOutcome<ScanProject>>;
  /**
   * Projects of one target. When the target endpoint is missing, the org's projects
   * are filtered by target id, and projects listed without one are kept when
   * `matchesRepository` accepts their target reference.
   */
  listProjectsForTarget(
    orgId: string,
    targetId: string,
    opts?: ProjectsForTargetOptions
  ): Promise<FetchOutcome<ScanProject>>;
  getProject(orgId: string, projectId: string): Promise<FetchOneOutcome<ScanProject>>;
  projectWebUrl(orgId: string, projectId: string): Promise<string>;
}

export interface HostRepositoryApi {
  /** Base URL of the host, e.g. https://gitlab.com */
  readonly webUrl: string;
  listRepositories(): Promise<FetchOutcome<HostProject>>;
  getDefaultBranch(fullPath: string): Promise<string>;
  /** true on 200, false on 404; any other outcome throws */
  fileExists(fullPath: string, path: string, ref: string): Promise<boolean>;
  listTree(fullPath: string, ref: string): Promise<FetchOutcome<TreeEntry>>;
}
