/**
 * Ordered path/value node store
 *
 * Invariants:
 * - "/system" (the list head) and "/system/config" always exist and are never removed
 * - Paths are unique; every proper ancestor of a node is itself a node
 * - Nodes form a circular doubly-linked sequence: n.prev.next === n and n.next.prev === n
 * - Sequence order is creation order unless changed by insert(). New ancestors and
 *   new leaves from set() are linked just before the head, i.e. at the tail, so order
 *   says nothing about hierarchy. Parent/child relations come from path text only.
 *
 * Nodes are owned by a path-keyed map; the links only carry order.
 */

import { InvalidInsertError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { compileGlob } from "./glob.js";
import { SEP, ancestorsOf, isPathPrefix, normalizePath, parentDir, pathLength } from "./path.js";
import { validatePath, validateScope } from "./validation.js";
import type {
  LinkViolation,
  MatchResult,
  PrintReport,
  PrintSink,
  TreeEntry,
} from "./types.js";

export const SYSTEM_PATH = "/system";
export const SYSTEM_CONFIG_PATH = "/system/config";

const ANCHORS: ReadonlySet<string> = new Set([SYSTEM_PATH, SYSTEM_CONFIG_PATH]);

/**
 * A single node in the sequence
 */
export class TreeNode {
  prev: TreeNode = this;
  next: TreeNode = this;

  constructor(
    readonly path: string,
    /** Creation stamp, unique within one tree */
    readonly serial: number,
    public value: string | null = null
  ) {}
}

/**
 * In-memory hierarchical path/value store
 *
 * @example
 * ```typescript
 * const tree = new PathTree();
 * tree.set("/files/etc/hosts/1/ipaddr", "127.0.0.1");
 * tree.exists("/files/etc");          // true
 * tree.ls("/files/etc/hosts");        // ["/files/etc/hosts/1"]
 * tree.match("/files/*").total;       // 5
 * ```
 */
export class PathTree {
  protected readonly head: TreeNode;
  protected readonly index = new Map<string, TreeNode>();
  #serial = 0;

  constructor() {
    this.head = new TreeNode(SYSTEM_PATH, ++this.#serial);
    this.index.set(SYSTEM_PATH, this.head);

    const config = new TreeNode(SYSTEM_CONFIG_PATH, ++this.#serial);
    this.index.set(SYSTEM_CONFIG_PATH, config);
    this.linkBefore(config, this.head);
  }

  /**
   * Number of nodes, anchors included
   */
  get size(): number {
    return this.index.size;
  }

  /**
   * Value at an exact path, or null when the node is absent or has no value
   */
  get(path: string): string | null {
    return this.find(path)?.value ?? null;
  }

  /**
   * Create or update a node
   *
   * A new path gets every missing ancestor created first, left to right, each
   * linked at the tail; the node itself follows them. An existing node keeps its
   * position and only has its value replaced.
   *
   * @param value - New value; null clears it
   * @throws {InvalidPathError} If the path is malformed
   */
  set(path: string, value: string | null): void {
    const normalized = validatePath(path);
    const node = this.index.get(normalized) ?? this.make(normalized, this.head);
    node.value = value;
  }

  /**
   * Whether a node exists at exactly this path
   */
  exists(path: string): boolean {
    return this.find(path) !== undefined;
  }

  /**
   * Creation stamp of the node at a path. A node that is removed and created
   * again gets a new stamp, so callers can tell it from the original.
   */
  serialOf(path: string): number | undefined {
    return this.find(path)?.serial;
  }

  /**
   * Place `path` immediately before `sibling`. Both must share a parent directory.
   * An existing node is moved and keeps its value; a missing one is created without
   * a value. A rejected request leaves the tree untouched.
   *
   * @throws {InvalidPathError} If either path is malformed
   * @throws {InvalidInsertError} If the paths are equal, have different parents,
   *   or the sibling does not exist
   */
  insert(path: string, sibling: string): void {
    const target = validatePath(path);
    const anchor = validatePath(sibling);

    if (target === anchor) {
      throw new InvalidInsertError(path, sibling, "a node cannot be its own sibling");
    }

    const targetDir = parentDir(target);
    const anchorDir = parentDir(anchor);
    if (targetDir === null || anchorDir === null || targetDir !== anchorDir) {
      throw new InvalidInsertError(path, sibling, "paths do not share a parent");
    }

    const next = this.index.get(anchor);
    if (!next) {
      throw new InvalidInsertError(path, sibling, "sibling does not exist");
    }

    const node = this.index.get(target);
    if (node) {
      this.unlink(node);
      this.linkBefore(node, next);
      return;
    }

    this.make(target, next);
  }

  /**
   * Remove a node and everything nested under it. The anchors survive even
   * when the scope covers them; rm("/") empties the tree down to the anchors.
   *
   * @returns Number of nodes removed (0 when nothing matched)
   * @throws {InvalidPathError} If the path is malformed
   */
  rm(path: string): number {
    const scope = validateScope(path);
    let count = 0;

    // Successors are captured up front, so unlinking never disturbs the walk
    for (const node of [...this.walk()]) {
      if (ANCHORS.has(node.path) || !isPathPrefix(scope, node.path)) {
        continue;
      }
      this.unlink(node);
      this.index.delete(node.path);
      count += 1;
    }

    return count;
  }

  /**
   * Immediate children of a path, in list order
   */
  ls(path: string): string[] {
    const children: string[] = [];
    for (const node of this.walk()) {
      if (isChildOf(path, node.path)) {
        children.push(node.path);
      }
    }
    return children;
  }

  /**
   * Number of immediate children, without building the list
   */
  countChildren(path: string): number {
    let count = 0;
    for (const node of this.walk()) {
      if (isChildOf(path, node.path)) {
        count += 1;
      }
    }
    return count;
  }

  /**
   * Glob-match every stored path. `total` is always the full count, so a caller
   * can detect truncation with `total > capacity` and retry with more room.
   *
   * @param capacity - Maximum number of paths to return (default and NaN: unlimited)
   */
  match(pattern: string, capacity = Number.POSITIVE_INFINITY): MatchResult {
    const matcher = compileGlob(pattern);
    const limit = Number.isNaN(capacity) ? Number.POSITIVE_INFINITY : Math.max(0, capacity);
    const matches: string[] = [];
    let total = 0;

    for (const node of this.walk()) {
      if (matcher.test(node.path)) {
        if (total < limit) {
          matches.push(node.path);
        }
        total += 1;
      }
    }

    return { total, matches };
  }

  /**
   * Write "path = value" (or just "path") lines for every node whose path begins
   * with `path` as a plain string prefix, in list order. Link symmetry is checked
   * for every node visited; problems are logged and reported, never repaired.
   */
  print(sink: PrintSink, path?: string | null): PrintReport {
    const violations: LinkViolation[] = [];
    let printed = 0;

    for (const node of this.walk()) {
      for (const violation of checkLinks(node)) {
        logger.warn("tree.link_mismatch", {
          path: violation.path,
          message: `${violation.link} neighbour does not link back`,
        });
        violations.push(violation);
      }

      if (matchesPrefix(path, node.path)) {
        sink.write(formatEntry(node) + "\n");
        printed += 1;
      }
    }

    return { printed, violations };
  }

  /**
   * Copies of every node under a string prefix (same filter as print), in list order
   */
  entries(path?: string | null): TreeEntry[] {
    const entries: TreeEntry[] = [];
    for (const node of this.walk()) {
      if (matchesPrefix(path, node.path)) {
        entries.push({ path: node.path, value: node.value });
      }
    }
    return entries;
  }

  /**
   * Link-symmetry violations across the whole sequence
   */
  check(): LinkViolation[] {
    const violations: LinkViolation[] = [];
    for (const node of this.walk()) {
      violations.push(...checkLinks(node));
    }
    return violations;
  }

  /**
   * Exact lookup. A single trailing separator is ignored.
   */
  protected find(path: string): TreeNode | undefined {
    return this.index.get(normalizePath(path));
  }

  /**
   * Visit nodes in list order starting at the head. The walk stops after
   * `size` steps so a corrupted sequence cannot loop forever.
   */
  protected *walk(): Generator<TreeNode> {
    let node = this.head;
    let steps = 0;
    do {
      yield node;
      node = node.next;
      steps += 1;
    } while (node !== this.head && steps < this.index.size);
  }

  /**
   * Create `path` before `next`, creating missing ancestors at the tail first
   */
  private make(path: string, next: TreeNode): TreeNode {
    for (const ancestor of ancestorsOf(path)) {
      if (!this.index.has(ancestor)) {
        this.create(ancestor, this.head);
      }
    }
    return this.create(path, next);
  }

  private create(path: string, next: TreeNode): TreeNode {
    const node = new TreeNode(path, ++this.#serial);
    this.index.set(path, node);
    this.linkBefore(node, next);
    return node;
  }

  private linkBefore(node: TreeNode, next: TreeNode): void {
    node.next = next;
    node.prev = next.prev;
    node.prev.next = node;
    next.prev = node;
  }

  private unlink(node: TreeNode): void {
    node.prev.next = node.next;
    node.next.prev = node.prev;
    node.prev = node;
    node.next = node;
  }
}

function isChildOf(path: string, candidate: string): boolean {
  const base = path.slice(0, pathLength(path)) + SEP;
  if (!candidate.startsWith(base) || candidate.length === base.length) {
    return false;
  }
  return !candidate.includes(SEP, base.length);
}

function matchesPrefix(prefix: string | null | undefined, path: string): boolean {
  if (prefix === null || prefix === undefined) {
    return true;
  }
  return path.startsWith(prefix.slice(0, pathLength(prefix)));
}

function checkLinks(node: TreeNode): LinkViolation[] {
  const violations: LinkViolation[] = [];
  if (node.prev.next !== node) {
    violations.push({ path: node.path, link: "prev" });
  }
  if (node.next.prev !== node) {
    violations.push({ path: node.path, link: "next" });
  }
  return violations;
}

function formatEntry(node: TreeNode): string {
  return node.value === null ? node.path : `${node.path} = ${node.value}`;
}
