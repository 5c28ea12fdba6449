/**
 * Path string primitives for slash-delimited tree paths
 */

export const SEP = "/";

/**
 * Length of a path, ignoring a single trailing separator
 * @example pathLength("/a/b/") === 4
 */
export function pathLength(path: string): number {
  const len = path.length;
  if (len > 0 && path[len - 1] === SEP) {
    return len - 1;
  }
  return len;
}

/**
 * Hierarchical prefix test: `path` equals `prefix` or is nested under it.
 * A trailing separator on `prefix` is ignored.
 *
 * @example
 * isPathPrefix("/a", "/a/b") === true
 * isPathPrefix("/a", "/ab") === false
 */
export function isPathPrefix(prefix: string, path: string): boolean {
  const len = pathLength(prefix);
  if (!path.startsWith(prefix.slice(0, len))) {
    return false;
  }
  return path.length === len || path[len] === SEP;
}

/**
 * Strip one trailing separator. The root path "/" is returned unchanged.
 */
export function normalizePath(path: string): string {
  if (path.length > 1 && path.endsWith(SEP)) {
    return path.slice(0, -1);
  }
  return path;
}

/**
 * Directory part of a path: everything before the last separator.
 * Returns null when the path has no separator at all.
 */
export function parentDir(path: string): string | null {
  const idx = path.lastIndexOf(SEP);
  return idx === -1 ? null : path.slice(0, idx);
}

/**
 * Last segment of a path
 */
export function baseName(path: string): string {
  return path.slice(path.lastIndexOf(SEP) + 1);
}

/**
 * Every proper ancestor of a path, shortest first
 * @example ancestorsOf("/a/b/c") → ["/a", "/a/b"]
 */
export function ancestorsOf(path: string): string[] {
  const ancestors: string[] = [];
  for (let pos = path.indexOf(SEP, 1); pos !== -1; pos = path.indexOf(SEP, pos + 1)) {
    ancestors.push(path.slice(0, pos));
  }
  return ancestors;
}

/**
 * Join a base path and relative segments with single separators
 * @example joinPath("/files", "etc/hosts") === "/files/etc/hosts"
 */
export function joinPath(base: string, ...segments: string[]): string {
  let result = normalizePath(base);
  for (const segment of segments) {
    const trimmed = segment.replace(/^\/+|\/+$/g, "");
    if (!trimmed) continue;
    result = result === SEP ? `${SEP}${trimmed}` : `${result}${SEP}${trimmed}`;
  }
  return result;
}
