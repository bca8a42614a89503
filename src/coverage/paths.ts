import { posix } from "node:path";

function clean(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/")).replace(/^\/+|\/+$/g, "");
  return normalized === "." ? "" : normalized;
}

/**
 * Join a project root and a declared file into one repository-relative path.
 * A file that already starts with the root is returned as-is.
 */
export function joinRepoPath(root: string, filePath: string): string {
  const r = clean(root);
  const f = clean(filePath);
  if (!r) return f;
  if (f === r || f.startsWith(`${r}/`)) return f;
  return clean(`${r}/${f}`);
}
