/**
 * Supported-file taxonomy: which basenames the scanning tool can track.
 * The table lives in data/supported-files.json.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { SupportedFile, SupportedFilePattern } from "../schema/types.js";

const patternSchema = z
  .object({
    pattern: z.string().min(1),
    category: z.enum(["manifest", "container", "iac"]),
    tag: z.string().min(1),
  })
  .strict();

export const TAXONOMY_PATH = fileURLToPath(new URL("../../data/supported-files.json", import.meta.url));

let cached: SupportedFilePattern[] | undefined;

/** Parse and validate a taxonomy table */
export function parseTaxonomy(raw: unknown): SupportedFilePattern[] {
  return z.array(patternSchema).parse(raw);
}

export function loadTaxonomy(path: string = TAXONOMY_PATH): SupportedFilePattern[] {
  if (path === TAXONOMY_PATH && cached) return cached;
  const patterns = parseTaxonomy(JSON.parse(readFileSync(path, "utf-8")));
  if (path === TAXONOMY_PATH) cached = patterns;
  return patterns;
}

/** Classify a repository path by its basename, case-insensitively; first matching pattern wins */
export function matchSupportedFile(
  path: string,
  patterns: readonly SupportedFilePattern[]
): SupportedFile | null {
  const base = (path.split("/").pop() ?? path).toLowerCase();
  for (const entry of patterns) {
    const pattern = entry.pattern.toLowerCase();
    const hit = pattern.startsWith("*") ? base.endsWith(pattern.slice(1)) : base === pattern;
    if (hit) return { path, category: entry.category, tag: entry.tag };
  }
  return null;
}
