/**
 * Core types for scan-drift.
 * Everything downstream of the resolver and catalog builders speaks in these shapes.
 */

// ── Repository identity ──

export type Platform = "gitlab" | "github" | "bitbucket" | "local" | "unknown";

/** Normalized reference to one repository. Produced only by the identity resolver. */
export interface RepoIdentity {
  readonly platform: Platform;
  /** Lowercased host, or "local" for checkouts on disk */
  readonly host: string;
  /** Everything before the repository segment; may contain nested groups */
  readonly owner: string;
  readonly repo: string;
  readonly branch: string;
  readonly isSsh: boolean;
  readonly isLocal: boolean;
}

/** `host/owner[/subgroup...]/repo` */
export type CanonicalKey = string;

// ── Host catalog ──

export interface HostCatalogEntry {
  id: number;
  defaultBranch: string;
  /** `path_with_namespace` as reported by the host */
  fullPath: string;
  webUrl: string;
  normalizedWebUrl: string;
}

export type HostCatalog = ReadonlyMap<CanonicalKey, HostCatalogEntry>;

// ── Scan targets and projects ──

export interface ScanTarget {
  orgId: string;
  targetId: string;
  displayName: string;
  sourceUrl?: string;
  integrationType: string;
  identity: RepoIdentity | null;
}

export type TargetCatalog = ReadonlyMap<CanonicalKey, readonly ScanTarget[]>;

export interface ScanProject {
  id: string;
  name: string;
  orgId: string;
  targetId?: string;
  /** Repository URL the project was imported from, for projects listed without a target */
  targetReference?: string;
  type: string;
  /** ISO timestamp; absent when the API omits it */
  created?: string;
  /** Repository-relative paths the project claims to track */
  declaredFiles: string[];
  /** Sub-directory the declared files are relative to; "" for the repository root */
  root: string;
}

// ── File coverage ──

export type SupportedFileCategory = "manifest" | "container" | "iac";

export interface SupportedFilePattern {
  /** Exact basename, or `*suffix` */
  pattern: string;
  category: SupportedFileCategory;
  tag: string;
}

export interface SupportedFile {
  path: string;
  category: SupportedFileCategory;
  tag: string;
}

export interface FileCheck {
  path: string;
  exists: boolean;
  root: string;
}

export interface CoverageSets {
  /** Declared paths that exist on the branch */
  tracked: string[];
  /** Declared paths that do not */
  stale: string[];
  /** Supported paths no project declares */
  untracked: SupportedFile[];
}

// ── Duplicates ──

export interface DuplicateMember {
  id: string;
  name: string;
  created?: string;
}

export interface StaleDuplicate extends DuplicateMember {
  reason: "newer version exists";
  duplicateOf: string;
  duplicateOfName: string;
}

export interface DuplicateGroup {
  orgId: string;
  targetId: string;
  identifier: string;
  canonical: DuplicateMember;
  stale: StaleDuplicate[];
}

// ── Reconciliation output ──

export interface ReconcileError {
  /** Canonical key, org id, or file path the failure belongs to */
  scope: string;
  message: string;
}

export interface FileDetail {
  path: string;
  projectId: string;
  projectName: string;
  orgId: string;
  targetId: string;
  projectUrl: string;
}

export interface MatchedRepository {
  key: CanonicalKey;
  hostEntry: HostCatalogEntry;
  targets: ScanTarget[];
  tracked: string[];
  stale: string[];
  untracked: SupportedFile[];
  details: {
    tracked: FileDetail[];
    stale: FileDetail[];
  };
}

export interface TargetOnlyEntry {
  key: CanonicalKey;
  targets: ScanTarget[];
}

export interface HostOnlyEntry {
  key: CanonicalKey;
  hostEntry: HostCatalogEntry;
}

export interface ReconcileResult {
  matched: MatchedRepository[];
  targetOnly: TargetOnlyEntry[];
  hostOnly: HostOnlyEntry[];
  unresolvable: ScanTarget[];
  duplicates: DuplicateGroup[];
  errors: ReconcileError[];
}
