/**
 * Shell-style glob matching over whole tree paths
 *
 * Semantics follow POSIX fnmatch() without FNM_PATHNAME and with FNM_NOESCAPE:
 * - `*` and `?` match any character, the separator included
 * - `[...]` classes support `!`/`^` negation and POSIX classes such as `[:digit:]`
 * - a backslash is an ordinary character
 * - braces, extglobs, leading `!` and leading `#` have no special meaning
 *
 * minimatch splits patterns on "/" and treats "\" as an escape, so both are
 * folded to private-use code points before matching.
 */

import { Minimatch, type MinimatchOptions } from "minimatch";

const SEP_STANDIN = "\uE000";
const BACKSLASH_STANDIN = "\uE001";

const MATCH_OPTIONS: MinimatchOptions = {
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true,
  noglobstar: true,
};

function fold(input: string): string {
  return input.replaceAll("\\", BACKSLASH_STANDIN).replaceAll("/", SEP_STANDIN);
}

/**
 * A compiled glob pattern
 */
export interface GlobMatcher {
  readonly pattern: string;
  test(path: string): boolean;
}

/**
 * Compile a pattern once for repeated matching
 */
export function compileGlob(pattern: string): GlobMatcher {
  const mm = new Minimatch(fold(pattern), MATCH_OPTIONS);
  return {
    pattern,
    test: (path: string) => mm.match(fold(path)),
  };
}

/**
 * Match a single path against a pattern
 */
export function globMatch(pattern: string, path: string): boolean {
  return compileGlob(pattern).test(path);
}
