/**
 * Append-only catalog assembly.
 * Entries sharing a key accumulate in discovery order; nothing is ever replaced.
 */

import type { CanonicalKey } from "../schema/types.js";

/** Bucket for targets whose repository reference could not be resolved */
export const UNRESOLVABLE = "__unresolvable__";

export class CatalogBuilder<T> {
  private readonly entries = new Map<CanonicalKey, T[]>();
  private frozen = false;

  add(key: CanonicalKey, entry: T): this {
    if (this.frozen) throw new Error("Catalog is frozen");
    const list = this.entries.get(key);
    if (list) list.push(entry);
    else this.entries.set(key, [entry]);
    return this;
  }

  has(key: CanonicalKey): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Immutable view; further `add` calls throw */
  freeze(): ReadonlyMap<CanonicalKey, readonly T[]> {
    this.frozen = true;
    const out = new Map<CanonicalKey, readonly T[]>();
    for (const [key, list] of this.entries) {
      out.set(key, Object.freeze([...list]));
    }
    return out;
  }
}
