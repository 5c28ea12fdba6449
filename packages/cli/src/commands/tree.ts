/**
 * Tree operations shared by single commands and `run` scripts
 */

import type { ConfigTree } from "@cfgtree/sdk";
import { CliError, EXIT_NOT_FOUND } from "../lib/errors.js";
import { printJson, printLines, type TextStream } from "../lib/render.js";

export interface CommandContext {
  tree: ConfigTree;
  stdout: TextStream;
  stderr: TextStream;
}

/**
 * Print the value at a path; a node without a value prints nothing
 * @throws {CliError} exit code 2 when the node does not exist
 */
export function getPath(ctx: CommandContext, path: string): void {
  if (!ctx.tree.exists(path)) {
    throw new CliError(`Path not found: ${path}`, { exitCode: EXIT_NOT_FOUND });
  }

  const value = ctx.tree.get(path);
  if (value !== null) {
    ctx.stdout.write(value + "\n");
  }
}

export function setPath(ctx: CommandContext, path: string, value: string | null): void {
  ctx.tree.set(path, value);
}

export function existsPath(ctx: CommandContext, path: string): void {
  ctx.stdout.write(`${ctx.tree.exists(path)}\n`);
}

export function insertPath(ctx: CommandContext, path: string, sibling: string): void {
  ctx.tree.insert(path, sibling);
}

/**
 * @returns Number of nodes removed
 */
export function removePath(ctx: CommandContext, path: string): number {
  return ctx.tree.rm(path);
}

export function listPath(ctx: CommandContext, path: string, options: { json?: boolean } = {}): void {
  const children = ctx.tree.ls(path);
  if (options.json) {
    printJson(ctx.stdout, children);
  } else {
    printLines(ctx.stdout, children);
  }
}

export interface MatchOptions {
  /** Maximum number of paths to print */
  limit?: number;
  /** Print {total, matches} as JSON */
  json?: boolean;
  /** Print only the number of matches */
  count?: boolean;
}

export function matchPattern(ctx: CommandContext, pattern: string, options: MatchOptions = {}): void {
  if (options.count) {
    ctx.stdout.write(`${ctx.tree.match(pattern, 0).total}\n`);
    return;
  }

  const result = ctx.tree.match(pattern, options.limit);
  if (options.json) {
    printJson(ctx.stdout, result);
    return;
  }

  printLines(ctx.stdout, result.matches);
  if (result.total > result.matches.length) {
    ctx.stderr.write(`showing ${result.matches.length} of ${result.total} matches\n`);
  }
}

/**
 * Dump nodes under a string prefix
 * @returns Number of link violations seen during the walk
 */
export function printTree(ctx: CommandContext, path?: string): number {
  return ctx.tree.print(ctx.stdout, path).violations.length;
}
