/**
 * Shared behaviour for providers backed by a directory of files
 *
 * Every file below `root` whose relative path matches one of the `include`
 * globs becomes the node `mount/<relative path>`. Subclasses only parse file
 * contents into nodes below that file node and render them back.
 *
 * Invariants:
 * - load() replaces the nodes of every file it reads and drops the nodes of
 *   previously loaded files that are gone from disk
 * - save() writes a file only when its rendering differs from the one taken at
 *   load (or at the last save), so untouched files keep comments and layout
 * - save() deletes a backing file once its file node is gone from the tree
 */

import { join } from "node:path";
import { Minimatch } from "minimatch";
import { logger, type EventLogger } from "../observability/logs.js";
import { SYSTEM_CONFIG_PATH, SYSTEM_PATH, type PathTree } from "../tree.js";
import { InvalidPathError } from "../errors.js";
import { SEP, isPathPrefix, joinPath } from "../path.js";
import { checkSegment, validatePath } from "../validation.js";
import {
  atomicWrite,
  listFilesRecursive,
  readTextFile,
  readTextFileIfExists,
  removeFile,
} from "../io.js";
import type { Provider } from "../types.js";

export interface FileProviderOptions {
  /** Unique provider name */
  name: string;
  /** Absolute directory holding the backing files */
  root: string;
  /** Tree path the files are mounted under */
  mount: string;
  /** Globs selecting files, relative to root */
  include: string[];
}

export abstract class FileProvider implements Provider {
  readonly name: string;
  readonly root: string;
  readonly mount: string;
  readonly include: readonly string[];

  protected readonly log: EventLogger;

  #matchers: Minimatch[];
  /** Rendering of every loaded or saved file, by relative path */
  #rendered = new Map<string, string>();

  constructor(options: FileProviderOptions) {
    this.name = options.name;
    this.root = options.root;
    this.mount = validatePath(options.mount);
    if (isPathPrefix(SYSTEM_PATH, this.mount)) {
      throw new InvalidPathError(options.mount, `providers cannot mount under ${SYSTEM_PATH}`);
    }
    this.include = [...options.include];
    this.#matchers = options.include.map((pattern) => new Minimatch(pattern));
    this.log = logger.scoped({ provider: this.name });
  }

  /**
   * Parse one file's content into nodes below `fileNode`
   */
  protected abstract parse(tree: PathTree, fileNode: string, content: string): void;

  /**
   * Render the nodes below `fileNode` as file content
   */
  protected abstract render(tree: PathTree, fileNode: string): string;

  /**
   * Called at the start of every load, before any file is read
   */
  protected reset(): void {}

  async init(tree: PathTree): Promise<void> {
    const configPath = joinPath(SYSTEM_CONFIG_PATH, this.name);
    tree.set(joinPath(configPath, "root"), this.root);
    tree.set(joinPath(configPath, "mount"), this.mount);
    tree.set(joinPath(configPath, "include"), this.include.join(" "));

    if (!tree.exists(this.mount)) {
      tree.set(this.mount, null);
    }

    this.log.debug("provider.init", { path: this.mount });
  }

  async load(tree: PathTree): Promise<void> {
    this.reset();
    const previous = this.#rendered;
    this.#rendered = new Map();

    const files = await listFilesRecursive(this.root);
    for (const rel of files) {
      if (!this.includes(rel)) continue;

      const reason = rel.split(SEP).map(checkSegment).find((r) => r !== null);
      if (reason) {
        this.log.warn("provider.skip_file", { file: rel, message: reason });
        continue;
      }

      const content = await readTextFile(join(this.root, rel));
      const fileNode = joinPath(this.mount, rel);

      // A reload starts the file from scratch
      tree.rm(fileNode);
      tree.set(fileNode, null);
      this.parse(tree, fileNode, content);
      this.#rendered.set(rel, this.render(tree, fileNode));
    }

    let dropped = 0;
    for (const rel of previous.keys()) {
      if (!this.#rendered.has(rel)) {
        dropped += tree.rm(joinPath(this.mount, rel)) > 0 ? 1 : 0;
      }
    }

    this.log.debug("provider.load", {
      path: this.mount,
      details: { files: this.#rendered.size, dropped },
    });
  }

  async save(tree: PathTree): Promise<void> {
    const saved = new Map<string, string>();
    let written = 0;

    for (const fileNode of this.fileNodes(tree)) {
      const rel = this.relativePath(fileNode);
      const target = join(this.root, rel);
      const content = this.render(tree, fileNode);

      // Files this provider never loaded are compared with what is on disk
      const baseline = this.#rendered.get(rel) ?? (await readTextFileIfExists(target));
      if (baseline !== content) {
        await atomicWrite(target, content);
        written += 1;
      }
      saved.set(rel, content);
    }

    for (const rel of this.#rendered.keys()) {
      if (saved.has(rel)) continue;
      await removeFile(join(this.root, rel));
      this.log.debug("provider.file_removed", { file: rel });
    }
    this.#rendered = saved;

    this.log.debug("provider.save", {
      path: this.mount,
      details: { files: saved.size, written },
    });
  }

  /**
   * Whether a root-relative file path is selected by the include globs
   */
  includes(rel: string): boolean {
    return this.#matchers.some((mm) => mm.match(rel));
  }

  /**
   * Tree paths of every file under the mount, skipping matches nested inside
   * another file node (a key that happens to look like a file name)
   */
  protected fileNodes(tree: PathTree): string[] {
    const candidates = tree
      .entries(this.mount)
      .map((entry) => entry.path)
      .filter(
        (path) =>
          path !== this.mount &&
          isPathPrefix(this.mount, path) &&
          this.includes(this.relativePath(path))
      );

    return candidates.filter(
      (path) => !candidates.some((other) => other !== path && isPathPrefix(other, path))
    );
  }

  protected relativePath(fileNode: string): string {
    return fileNode.slice(this.mount.length + 1);
  }

  protected warnSkip(fileNode: string, message: string): void {
    this.log.warn("provider.skip_key", { path: fileNode, message });
  }
}
