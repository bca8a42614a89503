/**
 * Reconciliation engine.
 * Joins the target and host catalogs, then for every repository present in both
 * checks declared files, scans for untracked ones and flags duplicate projects.
 * Failures scoped to one file or repository are recorded and the run moves on.
 */

import { UNRESOLVABLE } from "../catalog/builder.js";
import type { ScanningApi } from "../clients/types.js";
import { joinRepoPath } from "../coverage/paths.js";
import { computeCoverage, type FileCoverageValidator } from "../coverage/validator.js";
import type { DuplicateEntryDetector } from "../duplicates/detector.js";
import { identityFromFullPath, normalizeWebUrl, type ResolverOptions } from "../identity/resolver.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type {
  CanonicalKey,
  DuplicateGroup,
  FileCheck,
  FileDetail,
  HostCatalog,
  HostCatalogEntry,
  MatchedRepository,
  ReconcileError,
  ReconcileResult,
  ScanTarget,
  SupportedFile,
  TargetCatalog,
} from "../schema/types.js";
import { compare } from "../util/compare.js";
import { classifyKeys } from "./classify.js";

export type ProjectSource = Pick<ScanningApi, "listProjectsForTarget" | "listProjects" | "projectWebUrl">;

export interface ReconciliationEngineOptions {
  projects: ProjectSource;
  validator: FileCoverageValidator;
  /** Omit to skip duplicate detection */
  detector?: DuplicateEntryDetector;
  resolver?: ResolverOptions;
  logger?: Logger;
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function byPathThenProject(a: FileDetail, b: FileDetail): number {
  return compare(a.path, b.path) || compare(a.projectId, b.projectId);
}

export class ReconciliationEngine {
  private readonly projects: ProjectSource;
  private readonly validator: FileCoverageValidator;
  private readonly detector: DuplicateEntryDetector | undefined;
  private readonly resolver: ResolverOptions | undefined;
  private readonly logger: Logger;

  constructor(opts: ReconciliationEngineOptions) {
    this.projects = opts.projects;
    this.validator = opts.validator;
    this.detector = opts.detector;
    this.resolver = opts.resolver;
    this.logger = opts.logger ?? noopLogger;
  }

  async evaluate(hostCatalog: HostCatalog, targetCatalog: TargetCatalog): Promise<ReconcileResult> {
    const targetKeys = [...targetCatalog.keys()].filter((k) => k !== UNRESOLVABLE);
    const { matched, leftOnly, rightOnly } = classifyKeys(targetKeys, hostCatalog.keys());
    this.logger.info(
      `Classified ${matched.length} matched, ${leftOnly.length} target-only, ${rightOnly.length} host-only repositories`
    );

    const errors: ReconcileError[] = [];
    const duplicates: DuplicateGroup[] = [];
    const orgDuplicates = new Map<string, DuplicateGroup[] | null>();
    const result: ReconcileResult = {
      matched: [],
      targetOnly: leftOnly.map((key) => ({ key, targets: [...(targetCatalog.get(key) ?? [])] })),
      hostOnly: [],
      unresolvable: [...(targetCatalog.get(UNRESOLVABLE) ?? [])],
      duplicates,
      errors,
    };

    for (const key of rightOnly) {
      const hostEntry = hostCatalog.get(key);
      if (hostEntry) result.hostOnly.push({ key, hostEntry });
    }

    for (const key of matched) {
      const hostEntry = hostCatalog.get(key);
      const targets = targetCatalog.get(key) ?? [];
      if (!hostEntry) continue;

      const repository = await this.reconcileRepository(key, hostEntry, targets, errors);
      if (repository) result.matched.push(repository);

      if (this.detector) {
        duplicates.push(...(await this.duplicatesFor(key, targets, orgDuplicates, errors)));
      }
    }

    return result;
  }

  // ── Per repository ──

  private async reconcileRepository(
    key: CanonicalKey,
    hostEntry: HostCatalogEntry,
    targets: readonly ScanTarget[],
    errors: ReconcileError[]
  ): Promise<MatchedRepository | null> {
    const host = key.slice(0, key.indexOf("/"));
    const identity = identityFromFullPath(host, hostEntry.fullPath, hostEntry.defaultBranch, this.resolver);
    if (!identity) {
      errors.push({ scope: key, message: `Cannot derive repository identity from ${hostEntry.fullPath}` });
      return null;
    }

    const checks: FileCheck[] = [];
    const unchecked = new Set<string>();
    const details: FileDetail[] = [];
    const detailExists = new Map<string, boolean>();

    const matchesRepository = (reference: string): boolean =>
      normalizeWebUrl(reference, this.resolver) === hostEntry.normalizedWebUrl;

    for (const target of targets) {
      const outcome = await this.projects.listProjectsForTarget(target.orgId, target.targetId, { matchesRepository });
      if (outcome.kind === "inaccessible") {
        errors.push({ scope: key, message: `Projects for target ${target.targetId} are not accessible` });
        continue;
      }
      if (outcome.kind === "partial") {
        errors.push({ scope: key, message: `Projects for target ${target.targetId} incomplete: ${outcome.error.message}` });
      }

      for (const project of outcome.items) {
        if (project.declaredFiles.length === 0) continue;
        const projectUrl = await this.projects.projectWebUrl(target.orgId, project.id);

        for (const file of project.declaredFiles) {
          try {
            const check = await this.validator.validateFile(identity, file, project.root);
            checks.push(check);
            detailExists.set(check.path, (detailExists.get(check.path) ?? false) || check.exists);
            details.push({
              path: check.path,
              projectId: project.id,
              projectName: project.name,
              orgId: target.orgId,
              targetId: target.targetId,
              projectUrl,
            });
          } catch (err) {
            unchecked.add(joinRepoPath(project.root, file));
            this.logger.warn(`File check failed in ${key}`, { file, error: message(err) });
            errors.push({ scope: key, message: message(err) });
          }
        }
      }
    }

    let supported: SupportedFile[] = [];
    try {
      supported = await this.validator.scanRepositoryForSupportedFiles(identity);
    } catch (err) {
      this.logger.warn(`Repository scan failed for ${key}`, { error: message(err) });
      errors.push({ scope: key, message: message(err) });
    }

    const coverage = computeCoverage(checks, supported, unchecked);
    return {
      key,
      hostEntry,
      targets: [...targets],
      ...coverage,
      details: {
        tracked: details.filter((d) => detailExists.get(d.path) === true).sort(byPathThenProject),
        stale: details.filter((d) => detailExists.get(d.path) === false).sort(byPathThenProject),
      },
    };
  }

  // ── Duplicates ──

  private async duplicatesFor(
    key: CanonicalKey,
    targets: readonly ScanTarget[],
    cache: Map<string, DuplicateGroup[] | null>,
    errors: ReconcileError[]
  ): Promise<DuplicateGroup[]> {
    const detector = this.detector;
    if (!detector) return [];
    const targetIds = new Set(targets.map((t) => t.targetId));
    const groups: DuplicateGroup[] = [];

    for (const orgId of new Set(targets.map((t) => t.orgId))) {
      if (!cache.has(orgId)) {
        const outcome = await this.projects.listProjects(orgId);
        if (outcome.kind === "inaccessible") {
          errors.push({ scope: orgId, message: `Projects for organization ${orgId} are not accessible` });
          cache.set(orgId, null);
        } else {
          if (outcome.kind === "partial") {
            errors.push({ scope: orgId, message: `Project listing incomplete: ${outcome.error.message}` });
          }
          cache.set(orgId, detector.detect(outcome.items));
        }
      }
      for (const group of cache.get(orgId) ?? []) {
        if (targetIds.has(group.targetId)) groups.push(group);
      }
    }

    if (groups.length > 0) {
      this.logger.info(`Found ${groups.length} duplicate project groups in ${key}`);
    }
    return groups;
  }
}
