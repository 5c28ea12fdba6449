/**
 * Batch scripts for `cfgtree run`
 *
 * One command per line, words split shell-style:
 *
 *   # comments and blank lines are skipped
 *   set /files/network.conf/HOSTNAME gateway
 *   ins /files/network.conf/DOMAIN /files/network.conf/HOSTNAME
 *   set /files/network.conf/DOMAIN "example test"
 *   match /files/*.conf 10
 *
 * The first failing line stops the script.
 */

import { parseNonNegativeInt, splitWords } from "../lib/arg.js";
import { CliError, mapSdkErrorToExitCode } from "../lib/errors.js";
import {
  existsPath,
  getPath,
  insertPath,
  listPath,
  matchPattern,
  printTree,
  removePath,
  setPath,
  type CommandContext,
} from "./tree.js";

interface ScriptCommand {
  usage: string;
  minArgs: number;
  maxArgs: number;
  mutates: boolean;
  run(ctx: CommandContext, args: readonly string[]): void;
}

/**
 * Positional argument that arity checks have already guaranteed
 */
function arg(args: readonly string[], index: number): string {
  return args[index] ?? "";
}

const SCRIPT_COMMANDS: Record<string, ScriptCommand> = {
  get: {
    usage: "get <path>",
    minArgs: 1,
    maxArgs: 1,
    mutates: false,
    run: (ctx, args) => getPath(ctx, arg(args, 0)),
  },
  set: {
    usage: "set <path> [value]",
    minArgs: 1,
    maxArgs: 2,
    mutates: true,
    run: (ctx, args) => setPath(ctx, arg(args, 0), args[1] ?? null),
  },
  exists: {
    usage: "exists <path>",
    minArgs: 1,
    maxArgs: 1,
    mutates: false,
    run: (ctx, args) => existsPath(ctx, arg(args, 0)),
  },
  ins: {
    usage: "ins <path> <sibling>",
    minArgs: 2,
    maxArgs: 2,
    mutates: true,
    run: (ctx, args) => insertPath(ctx, arg(args, 0), arg(args, 1)),
  },
  rm: {
    usage: "rm <path>",
    minArgs: 1,
    maxArgs: 1,
    mutates: true,
    run: (ctx, args) => {
      removePath(ctx, arg(args, 0));
    },
  },
  ls: {
    usage: "ls <path>",
    minArgs: 1,
    maxArgs: 1,
    mutates: false,
    run: (ctx, args) => listPath(ctx, arg(args, 0)),
  },
  match: {
    usage: "match <pattern> [limit]",
    minArgs: 1,
    maxArgs: 2,
    mutates: false,
    run: (ctx, args) => {
      const limit = args[1] === undefined ? undefined : parseNonNegativeInt(args[1], "limit");
      matchPattern(ctx, arg(args, 0), { limit });
    },
  },
  print: {
    usage: "print [path]",
    minArgs: 0,
    maxArgs: 1,
    mutates: false,
    run: (ctx, args) => {
      printTree(ctx, args[0]);
    },
  },
};

export interface ScriptResult {
  /** Commands executed */
  executed: number;
  /** Whether any command changed the tree */
  mutated: boolean;
}

/**
 * Execute every line of a script against one tree
 * @throws {CliError} Naming the first failing line
 */
export function runScript(ctx: CommandContext, text: string): ScriptResult {
  let executed = 0;
  let mutated = false;

  for (const [index, raw] of text.split(/\r?\n/).entries()) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }

    try {
      const [name, ...args] = splitWords(line);
      if (name === undefined) {
        continue;
      }

      const command = Object.hasOwn(SCRIPT_COMMANDS, name) ? SCRIPT_COMMANDS[name] : undefined;
      if (!command) {
        throw new CliError(`unknown command "${name}"`);
      }
      if (args.length < command.minArgs || args.length > command.maxArgs) {
        throw new CliError(`usage: ${command.usage}`);
      }

      command.run(ctx, args);
      executed += 1;
      mutated = mutated || command.mutates;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CliError(`line ${index + 1}: ${message}`, {
        exitCode: mapSdkErrorToExitCode(err),
        cause: err,
      });
    }
  }

  return { executed, mutated };
}
