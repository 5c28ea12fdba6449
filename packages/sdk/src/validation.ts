/**
 * Validation utilities for tree paths and provider input
 */

import { InvalidPathError } from "./errors.js";
import { SEP, normalizePath } from "./path.js";

/**
 * Characters that can never appear in a path
 */
const FORBIDDEN_PATH_CHARS = /[\0\n]/;

/**
 * Validate and normalize a path that will name a node.
 * The root "/" itself is rejected: it is never stored.
 *
 * @returns The path with one trailing separator removed
 * @throws InvalidPathError if the path is not a usable absolute path
 */
export function validatePath(path: string): string {
  if (typeof path !== "string" || path.length === 0) {
    throw new InvalidPathError(String(path), "path must be a non-empty string");
  }

  if (!path.startsWith(SEP)) {
    throw new InvalidPathError(path, `path must start with "${SEP}"`);
  }

  const normalized = normalizePath(path);
  if (normalized === SEP) {
    throw new InvalidPathError(path, "the root path cannot hold a node");
  }

  if (normalized.includes(`${SEP}${SEP}`)) {
    throw new InvalidPathError(path, "path cannot contain empty segments");
  }

  if (FORBIDDEN_PATH_CHARS.test(normalized)) {
    throw new InvalidPathError(path, "path cannot contain NUL or newline characters");
  }

  return normalized;
}

/**
 * Validate a path used as a removal scope. Unlike {@link validatePath},
 * the root "/" is allowed and addresses every removable node.
 */
export function validateScope(path: string): string {
  if (path === SEP) {
    return path;
  }
  return validatePath(path);
}

/**
 * Validate a single segment (a key or file name) before it becomes part of a path
 * @returns An error reason, or null when the segment is usable
 */
export function checkSegment(segment: string): string | null {
  if (segment.length === 0) {
    return "segment is empty";
  }
  if (segment.includes(SEP)) {
    return `segment contains "${SEP}"`;
  }
  if (FORBIDDEN_PATH_CHARS.test(segment)) {
    return "segment contains NUL or newline characters";
  }
  return null;
}
