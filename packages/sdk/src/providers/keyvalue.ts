/**
 * Provider for flat KEY=value files (sysconfig, .env, shell variable files)
 *
 * Each assignment becomes `<file node>/<KEY>`. An empty unquoted value loads as
 * a node without a value; `KEY=""` loads as the empty string.
 */

import type { PathTree } from "../tree.js";
import { baseName, joinPath } from "../path.js";
import { checkSegment } from "../validation.js";
import { FileProvider } from "./file-provider.js";

/**
 * Values containing any of these characters are written double-quoted
 */
const NEEDS_QUOTING = /[\s#;"'\\]/;

export class KeyValueProvider extends FileProvider {
  protected parse(tree: PathTree, fileNode: string, content: string): void {
    const lines = content.split(/\r?\n/);

    lines.forEach((raw, index) => {
      const line = raw.trim();
      if (!line || line.startsWith("#") || line.startsWith(";")) {
        return;
      }

      const eq = line.indexOf("=");
      if (eq === -1) {
        this.warnSkip(fileNode, `line ${index + 1} is not an assignment`);
        return;
      }

      const key = line.slice(0, eq).trim();
      const reason = checkSegment(key);
      if (reason) {
        this.warnSkip(fileNode, `line ${index + 1}: ${reason}`);
        return;
      }

      tree.set(joinPath(fileNode, key), parseValue(line.slice(eq + 1).trim()));
    });
  }

  protected render(tree: PathTree, fileNode: string): string {
    const lines = tree.ls(fileNode).map((child) => {
      if (tree.countChildren(child) > 0) {
        this.warnSkip(child, "nested nodes cannot be written to a key/value file");
      }
      return `${baseName(child)}=${formatValue(tree.get(child))}`;
    });

    return lines.length > 0 ? lines.join("\n") + "\n" : "";
  }
}

/**
 * Strip one layer of matching quotes. Double quotes honour \", \\ and \n escapes.
 */
export function parseValue(text: string): string | null {
  if (text === "") {
    return null;
  }

  const first = text[0];
  if (text.length >= 2 && (first === '"' || first === "'") && text.endsWith(first)) {
    const inner = text.slice(1, -1);
    if (first === "'") {
      return inner;
    }
    return inner.replace(/\\(["\\n])/g, (_, ch: string) => (ch === "n" ? "\n" : ch));
  }

  return text;
}

/**
 * Render a value for the right-hand side of an assignment
 */
export function formatValue(value: string | null): string {
  if (value === null) {
    return "";
  }
  if (value === "" || NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/["\\]/g, "\\$&").replace(/\n/g, "\\n")}"`;
  }
  return value;
}
