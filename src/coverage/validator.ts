/**
 * File coverage validation.
 * Compares what projects declare against what the repository actually holds,
 * keeping tracked, stale and untracked apart.
 */

import { FileCheckError } from "../errors/audit.errors.js";
import { identityKey } from "../identity/resolver.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { compare } from "../util/compare.js";
import type {
  CoverageSets,
  FileCheck,
  RepoIdentity,
  SupportedFile,
  SupportedFilePattern,
} from "../schema/types.js";
import type { RepositoryHost } from "./hosts.js";
import { joinRepoPath } from "./paths.js";
import { loadTaxonomy, matchSupportedFile } from "./taxonomy.js";

export interface FileCoverageValidatorOptions {
  hosts: readonly RepositoryHost[];
  patterns?: readonly SupportedFilePattern[];
  logger?: Logger;
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class FileCoverageValidator {
  private readonly hosts: readonly RepositoryHost[];
  private readonly patterns: readonly SupportedFilePattern[];
  private readonly logger: Logger;

  constructor(opts: FileCoverageValidatorOptions) {
    this.hosts = opts.hosts;
    this.patterns = opts.patterns ?? loadTaxonomy();
    this.logger = opts.logger ?? noopLogger;
  }

  private hostFor(identity: RepoIdentity, path: string): RepositoryHost {
    const host = this.hosts.find((h) => h.supports(identity));
    if (!host) {
      throw new FileCheckError(identityKey(identity), path, `no repository host for ${identity.platform} ${identity.host}`);
    }
    return host;
  }

  /** Check one declared file on the identity's branch. A failed check throws; it never reads as missing. */
  async validateFile(identity: RepoIdentity, filePath: string, root = ""): Promise<FileCheck> {
    const path = joinRepoPath(root, filePath);
    const host = this.hostFor(identity, path);
    try {
      const exists = await host.fileExists(identity, path);
      this.logger.debug(`Checked ${path}`, { repository: identityKey(identity), exists });
      return { path, exists, root };
    } catch (err) {
      throw new FileCheckError(identityKey(identity), path, message(err));
    }
  }

  /** Every supported file on the identity's branch, sorted by path */
  async scanRepositoryForSupportedFiles(identity: RepoIdentity): Promise<SupportedFile[]> {
    const host = this.hostFor(identity, "");
    let files: string[];
    try {
      files = await host.listFiles(identity);
    } catch (err) {
      throw new FileCheckError(identityKey(identity), "", message(err));
    }

    const supported: SupportedFile[] = [];
    for (const file of files) {
      const match = matchSupportedFile(file, this.patterns);
      if (match) supported.push(match);
    }
    supported.sort((a, b) => compare(a.path, b.path));
    this.logger.debug(`Found ${supported.length} supported files`, { repository: identityKey(identity) });
    return supported;
  }
}

/**
 * Split declared-file checks and supported files into the three coverage sets.
 * A path checked more than once counts as tracked if any check found it.
 * `unchecked` holds declared paths whose check failed: they are neither stale
 * nor untracked.
 */
export function computeCoverage(
  checks: readonly FileCheck[],
  supported: readonly SupportedFile[],
  unchecked: Iterable<string> = []
): CoverageSets {
  const checked = new Set<string>();
  const found = new Set<string>();
  for (const check of checks) {
    checked.add(check.path);
    if (check.exists) found.add(check.path);
  }
  const declared = new Set<string>([...checked, ...unchecked]);

  const tracked = [...found].sort(compare);
  const stale = [...checked].filter((p) => !found.has(p)).sort(compare);

  const seen = new Set<string>();
  const untracked: SupportedFile[] = [];
  for (const file of supported) {
    if (declared.has(file.path) || seen.has(file.path)) continue;
    seen.add(file.path);
    untracked.push(file);
  }
  untracked.sort((a, b) => compare(a.path, b.path));

  return { tracked, stale, untracked };
}
