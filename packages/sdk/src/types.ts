/**
 * Core types for cfgtree
 */

import type { PathTree } from "./tree.js";

/**
 * A node's path and value, copied out of the tree
 */
export interface TreeEntry {
  /** Absolute, slash-delimited path */
  path: string;
  /** Value, or null when the node has none */
  value: string | null;
}

/**
 * Result of a glob match
 */
export interface MatchResult {
  /** Number of paths that matched, regardless of capacity */
  total: number;
  /** Up to `capacity` matching paths, in list order */
  matches: string[];
}

/**
 * Anything that accepts text, such as process.stdout
 */
export interface PrintSink {
  write(chunk: string): unknown;
}

/**
 * A broken back-link found while walking the sequence
 */
export interface LinkViolation {
  /** Path of the node whose neighbour does not point back */
  path: string;
  /** "prev" when node.prev.next !== node, "next" when node.next.prev !== node */
  link: "prev" | "next";
}

/**
 * Outcome of a print call
 */
export interface PrintReport {
  /** Number of lines written */
  printed: number;
  /** Link violations observed during the walk */
  violations: LinkViolation[];
}

/**
 * A format provider translating between external files and tree nodes
 */
export interface Provider {
  /** Unique provider name, used under /system/config */
  readonly name: string;

  /**
   * Prepare the provider's namespace in the tree
   */
  init(tree: PathTree): Promise<void>;

  /**
   * Parse the backing files into tree nodes
   */
  load(tree: PathTree): Promise<void>;

  /**
   * Serialize the provider's tree nodes back to its files
   */
  save(tree: PathTree): Promise<void>;
}

/**
 * Options for opening a tree
 */
export interface TreeOptions {
  /** Providers run in this order by init() and save() (default: none) */
  providers?: Provider[];
}

/**
 * Top-level API over one tree and its providers
 */
export interface ConfigTree {
  /** Underlying node store */
  readonly tree: PathTree;

  /**
   * Run every provider's init then load, in order. Safe to call again:
   * the anchors are kept and providers reload.
   * @throws {ProviderError} On the first provider failure
   */
  init(): Promise<void>;

  /**
   * Value at an exact path, or null when absent or unset
   */
  get(path: string): string | null;

  /**
   * Create or update a node, materializing missing ancestors
   * @throws {InvalidPathError} If the path is malformed
   */
  set(path: string, value: string | null): void;

  /**
   * Whether a node exists at exactly this path
   */
  exists(path: string): boolean;

  /**
   * Create or move `path` so it sits immediately before `sibling`
   * @throws {InvalidInsertError} If the two do not share a parent, are equal, or the sibling is missing
   */
  insert(path: string, sibling: string): void;

  /**
   * Remove a node and its descendants, anchors excepted
   * @returns Number of nodes removed
   */
  rm(path: string): number;

  /**
   * Immediate children of a path, in list order
   */
  ls(path: string): string[];

  /**
   * Glob-match every stored path
   * @param capacity - Maximum number of paths to return (default: unlimited)
   */
  match(pattern: string, capacity?: number): MatchResult;

  /**
   * Write every node under a string prefix to a sink
   */
  print(sink: PrintSink, path?: string | null): PrintReport;

  /**
   * Run every provider's save, in order
   * @throws {ProviderError} On the first provider failure
   */
  save(): Promise<void>;
}
