/**
 * Set-based join of two keyed catalogs.
 */

import type { CanonicalKey } from "../schema/types.js";
import { compare } from "../util/compare.js";

export interface KeyClassification {
  matched: CanonicalKey[];
  leftOnly: CanonicalKey[];
  rightOnly: CanonicalKey[];
}

/**
 * Partition the union of both key sets into matched, left-only and right-only.
 * Each list is sorted; no key appears in more than one.
 */
export function classifyKeys(left: Iterable<CanonicalKey>, right: Iterable<CanonicalKey>): KeyClassification {
  const l = new Set(left);
  const r = new Set(right);
  const matched: CanonicalKey[] = [];
  const leftOnly: CanonicalKey[] = [];
  const rightOnly: CanonicalKey[] = [];

  for (const key of l) {
    if (r.has(key)) matched.push(key);
    else leftOnly.push(key);
  }
  for (const key of r) {
    if (!l.has(key)) rightOnly.push(key);
  }

  return {
    matched: matched.sort(compare),
    leftOnly: leftOnly.sort(compare),
    rightOnly: rightOnly.sort(compare),
  };
}
