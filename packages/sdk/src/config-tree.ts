/**
 * Top-level API: one tree plus the providers that fill and persist it
 */

import { PathTree } from "./tree.js";
import { ProviderRegistry } from "./providers/registry.js";
import type {
  ConfigTree,
  MatchResult,
  PrintReport,
  PrintSink,
  TreeOptions,
} from "./types.js";

/**
 * ConfigTree implementation
 *
 * The anchors exist from construction, so init() only has provider work left;
 * calling it again reloads every provider in order.
 *
 * @example
 * ```typescript
 * const tree = openTree({
 *   providers: [new KeyValueProvider({ name: "etc", root: "/etc/sysconfig", mount: "/files", include: ["*"] })],
 * });
 * await tree.init();
 *
 * tree.set("/files/network/HOSTNAME", "gateway");
 * tree.insert("/files/network/DOMAIN", "/files/network/HOSTNAME");
 * await tree.save();
 * ```
 */
class ConfigTreeImpl implements ConfigTree {
  readonly #tree = new PathTree();
  readonly #registry: ProviderRegistry;

  constructor(options: TreeOptions) {
    this.#registry = new ProviderRegistry(options.providers);
  }

  get tree(): PathTree {
    return this.#tree;
  }

  async init(): Promise<void> {
    await this.#registry.initAll(this.#tree);
  }

  get(path: string): string | null {
    return this.#tree.get(path);
  }

  set(path: string, value: string | null): void {
    this.#tree.set(path, value);
  }

  exists(path: string): boolean {
    return this.#tree.exists(path);
  }

  insert(path: string, sibling: string): void {
    this.#tree.insert(path, sibling);
  }

  rm(path: string): number {
    return this.#tree.rm(path);
  }

  ls(path: string): string[] {
    return this.#tree.ls(path);
  }

  match(pattern: string, capacity?: number): MatchResult {
    return this.#tree.match(pattern, capacity);
  }

  print(sink: PrintSink, path?: string | null): PrintReport {
    return this.#tree.print(sink, path);
  }

  async save(): Promise<void> {
    await this.#registry.saveAll(this.#tree);
  }
}

/**
 * Open a new, independent tree
 * @param options - Providers to run on init() and save()
 */
export function openTree(options: TreeOptions = {}): ConfigTree {
  return new ConfigTreeImpl(options);
}
