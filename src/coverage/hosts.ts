/**
 * Where file checks are answered: a remote GitLab instance or a checkout on disk.
 */

import { existsSync } from "node:fs";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { glob } from "glob";
import type { HostRepositoryApi } from "../clients/types.js";
import { localPath } from "../identity/resolver.js";
import type { RepoIdentity } from "../schema/types.js";

export interface RepositoryHost {
  supports(identity: RepoIdentity): boolean;
  /** true when the path exists on the identity's branch; throws on anything but a clean miss */
  fileExists(identity: RepoIdentity, path: string): Promise<boolean>;
  /** Every file path in the repository, relative to its root */
  listFiles(identity: RepoIdentity): Promise<string[]>;
}

// ── Remote ──

export class GitLabRepositoryHost implements RepositoryHost {
  private readonly host: string;

  constructor(private readonly api: HostRepositoryApi) {
    this.host = new URL(api.webUrl).host.toLowerCase();
  }

  supports(identity: RepoIdentity): boolean {
    return !identity.isLocal && identity.host === this.host;
  }

  fileExists(identity: RepoIdentity, path: string): Promise<boolean> {
    return this.api.fileExists(`${identity.owner}/${identity.repo}`, path, identity.branch);
  }

  async listFiles(identity: RepoIdentity): Promise<string[]> {
    const outcome = await this.api.listTree(`${identity.owner}/${identity.repo}`, identity.branch);
    switch (outcome.kind) {
      case "inaccessible":
        throw new Error(
          `repository tree is not accessible (HTTP ${outcome.attempts.map((a) => a.status).join(", ")})`
        );
      case "partial":
        throw outcome.error;
      case "complete":
        return outcome.items.filter((e) => e.type === "blob").map((e) => e.path);
    }
  }
}

// ── Local checkout ──

const LOCAL_IGNORE = ["**/.git/**", "**/node_modules/**"];

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/**
 * Answers checks for `local` identities from the working tree; the branch is whatever is checked out.
 * Catalog reconciliation only yields hosted identities, so this host is for callers
 * that drive FileCoverageValidator against a checkout themselves.
 */
export class LocalRepositoryHost implements RepositoryHost {
  supports(identity: RepoIdentity): boolean {
    return identity.isLocal;
  }

  async fileExists(identity: RepoIdentity, path: string): Promise<boolean> {
    try {
      const info = await stat(join(localPath(identity), path));
      return info.isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async listFiles(identity: RepoIdentity): Promise<string[]> {
    const root = localPath(identity);
    if (!existsSync(root)) {
      throw new Error(`checkout not found at ${root}`);
    }
    const files = await glob("**/*", {
      cwd: root,
      nodir: true,
      dot: true,
      posix: true,
      ignore: LOCAL_IGNORE,
    });
    return files.sort();
  }
}
