/**
 * Target catalog: every scan target across the audited organizations,
 * grouped by the repository it points at.
 */

import type { ScanningApi } from "../clients/types.js";
import { identityKey, resolveRepoIdentity, type ResolverOptions } from "../identity/resolver.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { UNKNOWN_INTEGRATION, integrationTypeOf } from "../schema/responses.js";
import type { ReconcileError, ScanTarget, TargetCatalog } from "../schema/types.js";
import { CatalogBuilder, UNRESOLVABLE } from "./builder.js";

export interface AccessFailure {
  orgId: string;
  attempts: { version?: string; status: number }[];
}

export interface TargetCatalogResult {
  catalog: TargetCatalog;
  accessFailures: AccessFailure[];
  errors: ReconcileError[];
}

export interface BuildTargetCatalogOptions {
  integrationTypes: readonly string[];
  resolver?: ResolverOptions;
  logger?: Logger;
}

export async function buildTargetCatalog(
  api: ScanningApi,
  orgIds: readonly string[],
  opts: BuildTargetCatalogOptions
): Promise<TargetCatalogResult> {
  const logger = opts.logger ?? noopLogger;
  const builder = new CatalogBuilder<ScanTarget>();
  const accessFailures: AccessFailure[] = [];
  const errors: ReconcileError[] = [];
  const wanted = new Set(opts.integrationTypes);

  for (const orgId of orgIds) {
    const outcome = await api.listTargets(orgId, opts.integrationTypes);

    if (outcome.kind === "inaccessible") {
      logger.warn(`Skipping organization ${orgId}: targets not accessible`, {
        attempts: outcome.attempts.map((a) => `${a.version ?? "<none>"}:${a.status}`),
      });
      accessFailures.push({ orgId, attempts: outcome.attempts });
      continue;
    }
    if (outcome.kind === "partial") {
      logger.warn(`Target listing incomplete for ${orgId}`, { error: outcome.error.message });
      errors.push({ scope: orgId, message: outcome.error.message });
    }

    for (const resource of outcome.items) {
      const integrationType = integrationTypeOf(resource);
      // untyped targets are kept: their URL decides where they land
      if (!wanted.has(integrationType) && integrationType !== UNKNOWN_INTEGRATION) {
        logger.debug(`Skipping target ${resource.id} of type ${integrationType}`);
        continue;
      }

      const sourceUrl = resource.attributes.url ?? (await api.getTargetUrl(orgId, resource.id)) ?? undefined;
      const identity = sourceUrl ? resolveRepoIdentity(sourceUrl, opts.resolver) : null;
      const target: ScanTarget = {
        orgId,
        targetId: resource.id,
        displayName: resource.attributes.display_name ?? resource.id,
        ...(sourceUrl ? { sourceUrl } : {}),
        integrationType,
        identity,
      };

      if (identity) {
        builder.add(identityKey(identity), target);
      } else {
        logger.debug(`Target ${resource.id} has no resolvable repository`, { sourceUrl });
        builder.add(UNRESOLVABLE, target);
      }
    }
  }

  return { catalog: builder.freeze(), accessFailures, errors };
}
