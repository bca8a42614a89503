/**
 * Repository identity resolution.
 * Turns the URL shapes found in scan targets and host listings into one
 * normalized RepoIdentity, so both sources agree on a CanonicalKey.
 */

import { posix } from "node:path";
import type { CanonicalKey, Platform, RepoIdentity } from "../schema/types.js";

// ── Types ──

export interface ResolverOptions {
  /** Hosts (or base URLs) of self-managed GitLab instances */
  gitlabHosts?: readonly string[];
}

interface Strategy {
  name: string;
  match: (input: string, hosts: ReadonlySet<string>) => RepoIdentity | null;
}

export const DEFAULT_BRANCH = "main";

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);
const BITBUCKET_HOSTS = new Set(["bitbucket.org", "www.bitbucket.org"]);

// ── Normalization helpers ──

/** Trim trailing slashes and a `.git` suffix, in either order */
function stripRepoSuffix(value: string): string {
  let out = value;
  for (;;) {
    const next = out.replace(/\/+$/, "").replace(/\.git$/i, "");
    if (next === out) return out;
    out = next;
  }
}

function segmentsOf(path: string): string[] {
  return path.split("/").filter((s) => s.length > 0);
}

function hostOf(value: string): string {
  const trimmed = value.trim().toLowerCase();
  try {
    return /^[a-z][a-z0-9+.-]*:\/\//.test(trimmed) ? new URL(trimmed).host : trimmed.replace(/\/.*$/, "");
  } catch {
    return trimmed;
  }
}

function platformFor(host: string, gitlabHosts: ReadonlySet<string>): Platform {
  if (GITHUB_HOSTS.has(host)) return "github";
  if (BITBUCKET_HOSTS.has(host)) return "bitbucket";
  if (host.includes("gitlab") || gitlabHosts.has(host)) return "gitlab";
  return "unknown";
}

function identity(fields: RepoIdentity): RepoIdentity {
  return Object.freeze({ ...fields });
}

/** Split `owner[/sub...]/repo` into identity parts; null with fewer than two segments */
function splitFullPath(path: string): { owner: string; repo: string } | null {
  const segments = segmentsOf(stripRepoSuffix(path));
  if (segments.length < 2) return null;
  const repo = stripRepoSuffix(segments[segments.length - 1] ?? "");
  if (!repo) return null;
  return { owner: segments.slice(0, -1).join("/"), repo };
}

function parseHttpUrl(input: string): URL | null {
  if (!/^https?:\/\//i.test(input)) return null;
  try {
    return new URL(input);
  } catch {
    return null;
  }
}

// ── Strategies ──

const localStrategy: Strategy = {
  name: "local",
  match(input) {
    let path: string;
    if (/^file:\/\//i.test(input)) {
      path = decodeURIComponent(input.replace(/^file:\/\//i, ""));
      // file:///C:/x
      if (/^\/[A-Za-z]:\//.test(path)) path = path.slice(1);
    } else if (input.startsWith("/") || /^[A-Za-z]:[\\/]/.test(input)) {
      path = input;
    } else {
      return null;
    }

    const normalized = stripRepoSuffix(posix.normalize(path.replace(/\\/g, "/")));
    const repo = posix.basename(normalized);
    if (!repo || repo === "/" || /^[A-Za-z]:$/.test(repo)) return null;

    return identity({
      platform: "local",
      host: "local",
      owner: posix.dirname(normalized),
      repo,
      branch: DEFAULT_BRANCH,
      isSsh: false,
      isLocal: true,
    });
  },
};

const sshStrategy: Strategy = {
  name: "ssh",
  match(input, gitlabHosts) {
    let host: string;
    let path: string;

    if (/^ssh:\/\//i.test(input)) {
      let url: URL;
      try {
        url = new URL(input);
      } catch {
        return null;
      }
      host = url.hostname.toLowerCase();
      path = url.pathname;
    } else {
      const scp = /^([^@\s/]+)@([^:\s/]+):(.+)$/.exec(input);
      if (!scp) return null;
      host = (scp[2] ?? "").toLowerCase();
      path = scp[3] ?? "";
    }

    const parts = splitFullPath(path);
    if (!host || !parts) return null;
    const normalizedHost = GITHUB_HOSTS.has(host) ? "github.com" : BITBUCKET_HOSTS.has(host) ? "bitbucket.org" : host;

    return identity({
      platform: platformFor(normalizedHost, gitlabHosts),
      host: normalizedHost,
      ...parts,
      branch: DEFAULT_BRANCH,
      isSsh: true,
      isLocal: false,
    });
  },
};

/** Hosts with a fixed `owner/repo` layout and their own branch markers */
function fixedLayoutStrategy(
  name: string,
  hosts: ReadonlySet<string>,
  canonicalHost: string,
  platform: Platform,
  branchMarkers: readonly string[]
): Strategy {
  return {
    name,
    match(input) {
      const url = parseHttpUrl(input);
      if (!url || !hosts.has(url.host.toLowerCase())) return null;

      const segments = segmentsOf(url.pathname);
      if (segments.length < 2) return null;
      const owner = segments[0] ?? "";
      const repo = stripRepoSuffix(segments[1] ?? "");
      if (!owner || !repo) return null;

      const marker = segments[2];
      const branch = marker && branchMarkers.includes(marker) && segments[3] ? segments[3] : DEFAULT_BRANCH;

      return identity({
        platform,
        host: canonicalHost,
        owner,
        repo,
        branch,
        isSsh: false,
        isLocal: false,
      });
    },
  };
}

const githubStrategy = fixedLayoutStrategy("github", GITHUB_HOSTS, "github.com", "github", ["tree", "blob"]);
const bitbucketStrategy = fixedLayoutStrategy("bitbucket", BITBUCKET_HOSTS, "bitbucket.org", "bitbucket", ["src"]);

/**
 * GitLab and other hosts with nested groups.
 * The owner is every segment before the repository; branch markers are
 * `/-/tree/<b>`, `/-/blob/<b>/...` and a bare `/tree/<b>` after owner and repo.
 */
const nestedGroupStrategy: Strategy = {
  name: "nested-group",
  match(input, gitlabHosts) {
    const url = parseHttpUrl(input);
    if (!url) return null;
    const host = url.host.toLowerCase();
    if (GITHUB_HOSTS.has(host) || BITBUCKET_HOSTS.has(host)) return null;

    let segments = segmentsOf(url.pathname);
    let branch = DEFAULT_BRANCH;

    const dash = segments.indexOf("-");
    if (dash >= 0) {
      const marker = segments[dash + 1];
      const ref = segments[dash + 2];
      if ((marker === "tree" || marker === "blob") && ref) branch = ref;
      segments = segments.slice(0, dash);
    } else {
      const tree = segments.indexOf("tree", 2);
      const ref = tree >= 0 ? segments[tree + 1] : undefined;
      if (tree >= 0 && ref) {
        branch = ref;
        segments = segments.slice(0, tree);
      }
    }

    const parts = splitFullPath(segments.join("/"));
    if (!parts) return null;

    return identity({
      platform: platformFor(host, gitlabHosts),
      host,
      ...parts,
      branch,
      isSsh: false,
      isLocal: false,
    });
  },
};

/** Evaluated in order; the first strategy to return an identity wins */
export const STRATEGIES: readonly Strategy[] = [
  localStrategy,
  sshStrategy,
  githubStrategy,
  bitbucketStrategy,
  nestedGroupStrategy,
];

// ── Public API ──

export function gitlabHostSet(opts?: ResolverOptions): ReadonlySet<string> {
  return new Set((opts?.gitlabHosts ?? []).map(hostOf).filter((h) => h.length > 0));
}

/** Resolve a repository reference; null when no strategy recognizes it */
export function resolveRepoIdentity(input: string, opts?: ResolverOptions): RepoIdentity | null {
  const trimmed = input.trim();
  if (!trimmed) return null;
  const hosts = gitlabHostSet(opts);
  for (const strategy of STRATEGIES) {
    const resolved = strategy.match(trimmed, hosts);
    if (resolved) return resolved;
  }
  return null;
}

/** Identity for a host catalog entry whose full path and default branch are already known */
export function identityFromFullPath(
  host: string,
  fullPath: string,
  branch: string,
  opts?: ResolverOptions
): RepoIdentity | null {
  const parts = splitFullPath(fullPath);
  if (!parts) return null;
  const normalizedHost = hostOf(host);
  return identity({
    platform: platformFor(normalizedHost, gitlabHostSet(opts)),
    host: normalizedHost,
    ...parts,
    branch: branch || DEFAULT_BRANCH,
    isSsh: false,
    isLocal: false,
  });
}

export function canonicalKey(host: string, fullPath: string): CanonicalKey {
  return `${hostOf(host)}/${fullPath.replace(/^\/+|\/+$/g, "")}`;
}

export function identityKey(id: RepoIdentity): CanonicalKey {
  return canonicalKey(id.host, `${id.owner}/${id.repo}`);
}

/** Absolute directory of a local identity */
export function localPath(id: RepoIdentity): string {
  return posix.join(id.owner, id.repo);
}

/**
 * Normalize a repository web URL for comparison.
 * Scheme, host case, credentials, query, fragment, branch markers,
 * trailing slashes and `.git` do not affect the result.
 */
export function normalizeWebUrl(url: string, opts?: ResolverOptions): string {
  const id = resolveRepoIdentity(url, opts);
  if (!id) return stripRepoSuffix(url.trim());
  if (id.isLocal) return `file://${localPath(id)}`;
  return `https://${id.host}/${id.owner}/${id.repo}`;
}
