// src/tmx/paths.ts
import path from "node:path";

/**
 * Resolve `relative` against the directory of `basePath`. Both `/` and `\`
 * separate segments; the result always uses `/`.
 */
export function resolveRelativePath(basePath: string, relative: string): string {
  const base = basePath.replace(/\\/g, "/");
  const segments = relative.split(/[\\/]+/).filter((s) => s.length > 0 && s !== ".");
  return path.posix.join(path.posix.dirname(base), ...segments);
}
