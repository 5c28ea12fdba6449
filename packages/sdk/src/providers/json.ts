/**
 * Provider for JSON files
 *
 * Object keys and array indexes become path segments; scalars become string
 * values and JSON null becomes a node without a value. The kind of every
 * loaded value is remembered against the node it created, so save() can
 * restore arrays, numbers and booleans; a node removed and created again
 * starts without a kind. Nodes with children are written as objects unless
 * remembered as arrays, and childless nodes as scalars unless they are still
 * the empty container that was loaded.
 *
 * Output keeps object members in tree order, integer-like keys included.
 */

import type { PathTree } from "../tree.js";
import { baseName, joinPath } from "../path.js";
import { checkSegment } from "../validation.js";
import { FileProvider } from "./file-provider.js";

/**
 * A JSON value with object members kept in tree order
 */
export type JsonValue =
  | { type: "object"; members: Array<[string, JsonValue]> }
  | { type: "array"; items: JsonValue[] }
  | { type: "scalar"; value: string | number | boolean | null };

type JsonKind = "object" | "array" | "string" | "number" | "boolean" | "null";

interface RememberedKind {
  kind: JsonKind;
  serial: number;
}

const INDENT = 2;
const EMPTY_OBJECT: JsonValue = { type: "object", members: [] };

export class JsonProvider extends FileProvider {
  #kinds = new Map<string, RememberedKind>();

  protected reset(): void {
    this.#kinds.clear();
  }

  protected parse(tree: PathTree, fileNode: string, content: string): void {
    // Strip BOM if present
    const cleaned = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
    if (cleaned.trim() === "") {
      this.remember(tree, fileNode, "object");
      return;
    }

    const parsed: unknown = JSON.parse(cleaned);
    this.add(tree, fileNode, parsed);
  }

  protected render(tree: PathTree, fileNode: string): string {
    return stringifyJson(this.build(tree, fileNode, true)) + "\n";
  }

  private remember(tree: PathTree, path: string, kind: JsonKind): void {
    const serial = tree.serialOf(path);
    if (serial !== undefined) {
      this.#kinds.set(path, { kind, serial });
    }
  }

  /**
   * Kind recorded for the node now at `path`, ignoring records left by a node
   * that has since been removed
   */
  private kindOf(tree: PathTree, path: string): JsonKind | undefined {
    const remembered = this.#kinds.get(path);
    return remembered && remembered.serial === tree.serialOf(path) ? remembered.kind : undefined;
  }

  private add(tree: PathTree, path: string, value: unknown): void {
    if (Array.isArray(value)) {
      tree.set(path, null);
      this.remember(tree, path, "array");
      value.forEach((item, index) => this.add(tree, joinPath(path, String(index)), item));
      return;
    }

    if (value !== null && typeof value === "object") {
      tree.set(path, null);
      this.remember(tree, path, "object");
      for (const [key, item] of Object.entries(value)) {
        const reason = checkSegment(key);
        if (reason) {
          this.warnSkip(path, `key ${JSON.stringify(key)}: ${reason}`);
          continue;
        }
        this.add(tree, joinPath(path, key), item);
      }
      return;
    }

    if (value === null) {
      tree.set(path, null);
      this.remember(tree, path, "null");
      return;
    }

    if (typeof value === "number" || typeof value === "boolean") {
      tree.set(path, String(value));
      this.remember(tree, path, typeof value === "number" ? "number" : "boolean");
      return;
    }

    tree.set(path, String(value));
    this.remember(tree, path, "string");
  }

  private build(tree: PathTree, path: string, isFile = false): JsonValue {
    const kind = this.kindOf(tree, path);
    const children = tree.ls(path);

    if (children.length > 0) {
      if (kind === "array") {
        return { type: "array", items: children.map((child) => this.build(tree, child)) };
      }
      return {
        type: "object",
        members: children.map((child): [string, JsonValue] => [
          baseName(child),
          this.build(tree, child),
        ]),
      };
    }

    const text = tree.get(path);
    if (text === null) {
      if (kind === "array") {
        return { type: "array", items: [] };
      }
      if (kind === "object" || (isFile && kind === undefined)) {
        return EMPTY_OBJECT;
      }
    }

    return { type: "scalar", value: toScalar(text, kind) };
  }
}

/**
 * Turn a stored value back into a JSON scalar of its remembered kind,
 * falling back to a string when the text no longer fits that kind
 */
function toScalar(text: string | null, kind: JsonKind | undefined): string | number | boolean | null {
  if (text === null) {
    return null;
  }

  if (kind === "number") {
    const num = Number(text);
    if (text.trim() !== "" && Number.isFinite(num)) {
      return num;
    }
  }

  if (kind === "boolean" && (text === "true" || text === "false")) {
    return text === "true";
  }

  return text;
}

/**
 * Serialize with the same layout as JSON.stringify(value, null, 2), keeping
 * object members in the order given
 */
export function stringifyJson(value: JsonValue, depth = 0): string {
  if (value.type === "scalar") {
    return JSON.stringify(value.value);
  }

  const inner = " ".repeat((depth + 1) * INDENT);
  const outer = " ".repeat(depth * INDENT);

  if (value.type === "array") {
    if (value.items.length === 0) return "[]";
    const items = value.items.map((item) => inner + stringifyJson(item, depth + 1));
    return `[\n${items.join(",\n")}\n${outer}]`;
  }

  if (value.members.length === 0) return "{}";
  const members = value.members.map(
    ([key, member]) => `${inner}${JSON.stringify(key)}: ${stringifyJson(member, depth + 1)}`
  );
  return `{\n${members.join(",\n")}\n${outer}}`;
}
