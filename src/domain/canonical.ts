import { posix } from "node:path";
import type { ModuleContext } from "./types.js";

export function isRelativeImport(rawPath: string): boolean {
  return rawPath.startsWith(".");
}

/**
 * Lexically clean a slash-separated path: "." segments dropped, ".."
 * resolved against the preceding segment, no trailing slash.
 */
export function cleanPath(p: string): string {
  const normalized = posix.normalize(p);
  if (normalized.length > 1 && normalized.endsWith("/")) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Canonical dependency identifier for an import path seen in a file of
 * `mod`. Relative paths are joined onto the module root; everything else is
 * already a package path and comes back unchanged. A relative path that
 * climbs above the module root is kept as the cleaned join.
 */
export function canonicalImportPath(rawPath: string, mod: ModuleContext): string {
  if (isRelativeImport(rawPath)) {
    return cleanPath(posix.join(mod.path(), rawPath));
  }
  return rawPath;
}
