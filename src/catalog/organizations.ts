import type { ScanningApi } from "../clients/types.js";
import { NoOrganizationsError } from "../errors/audit.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";

export interface OrganizationScope {
  groupId?: string;
  orgId?: string;
}

/**
 * Organizations to audit: a group's organizations, else the single configured
 * organization, else everything the token can see.
 */
export async function resolveOrganizationIds(
  api: ScanningApi,
  scope: OrganizationScope,
  logger: Logger = noopLogger
): Promise<string[]> {
  if (!scope.groupId && scope.orgId) {
    return [scope.orgId];
  }

  const label = scope.groupId ? `group ${scope.groupId}` : "token";
  const outcome = scope.groupId
    ? await api.listGroupOrganizations(scope.groupId)
    : await api.listOrganizations();

  if (outcome.kind === "inaccessible") {
    throw new NoOrganizationsError(
      `${label} organizations not accessible (tried ${outcome.attempts.map((a) => `${a.version ?? "<none>"}:${a.status}`).join(", ")})`
    );
  }
  if (outcome.kind === "partial") {
    logger.warn(`Organization listing incomplete for ${label}`, { error: outcome.error.message });
  }

  const ids = [...new Set(outcome.items.map((org) => org.id))];
  if (ids.length === 0) {
    throw new NoOrganizationsError(`${label} has no organizations`);
  }
  logger.info(`Auditing ${ids.length} organizations`, { source: label });
  return ids;
}
