/**
 * Duplicate project detection.
 * Projects under the same target whose names point at the same file
 * (after the separator, path-normalized) are one logical entry; the newest wins.
 */

import { posix } from "node:path";
import type { DuplicateGroup, ScanProject, StaleDuplicate } from "../schema/types.js";
import { compare } from "../util/compare.js";

export interface DuplicatePolicy {
  /** Splits a project name into prefix and file identifier at its first occurrence */
  separator: string;
  normalize: (identifier: string) => string;
}

/** POSIX-normalize, then drop leading `./` and `../` segments */
export function normalizeIdentifier(identifier: string): string {
  let out = posix.normalize(identifier.replace(/\\/g, "/"));
  for (;;) {
    const next = out.replace(/^\.\.?\//, "");
    if (next === out) break;
    out = next;
  }
  return out === "." || out === ".." ? "" : out;
}

export const DEFAULT_DUPLICATE_POLICY: DuplicatePolicy = {
  separator: ":",
  normalize: normalizeIdentifier,
};

function createdAt(project: ScanProject): number {
  const at = project.created ? Date.parse(project.created) : NaN;
  return Number.isNaN(at) ? Number.NEGATIVE_INFINITY : at;
}

export class DuplicateEntryDetector {
  private readonly policy: DuplicatePolicy;

  constructor(policy: Partial<DuplicatePolicy> = {}) {
    this.policy = { ...DEFAULT_DUPLICATE_POLICY, ...policy };
  }

  /** Identifier a project name groups under (trimmed, then normalized), or null when it has none */
  identifierOf(name: string): string | null {
    const at = name.indexOf(this.policy.separator);
    if (at < 0) return null;
    const identifier = this.policy.normalize(name.slice(at + this.policy.separator.length).trim());
    return identifier.length > 0 ? identifier : null;
  }

  detect(projects: readonly ScanProject[]): DuplicateGroup[] {
    const buckets = new Map<string, { targetId: string; identifier: string; members: ScanProject[] }>();

    for (const project of projects) {
      if (!project.targetId) continue;
      const identifier = this.identifierOf(project.name);
      if (identifier === null) continue;
      const key = `${project.targetId}\u0000${identifier}`;
      const bucket = buckets.get(key);
      if (bucket) bucket.members.push(project);
      else buckets.set(key, { targetId: project.targetId, identifier, members: [project] });
    }

    const groups: DuplicateGroup[] = [];
    for (const { targetId, identifier, members } of buckets.values()) {
      if (members.length < 2) continue;
      const ordered = [...members].sort((a, b) => createdAt(b) - createdAt(a) || 0);
      const [newest, ...rest] = ordered;
      if (!newest) continue;

      const stale: StaleDuplicate[] = rest.map((p) => ({
        id: p.id,
        name: p.name,
        ...(p.created ? { created: p.created } : {}),
        reason: "newer version exists",
        duplicateOf: newest.id,
        duplicateOfName: newest.name,
      }));

      groups.push({
        orgId: newest.orgId,
        targetId,
        identifier,
        canonical: {
          id: newest.id,
          name: newest.name,
          ...(newest.created ? { created: newest.created } : {}),
        },
        stale,
      });
    }

    return groups.sort((a, b) => compare(a.targetId, b.targetId) || compare(a.identifier, b.identifier));
  }
}
