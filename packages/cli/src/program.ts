/**
 * cfgtree command definitions
 *
 * Every command opens a fresh tree from the resolved configuration, runs one
 * operation and, if the tree changed, saves it back through the providers
 * (skipped under --dry-run).
 */

import { Command, CommanderError } from "commander";
import { readTextFile } from "@cfgtree/sdk";
import { VERSION } from "./version.js";
import { openCliTree } from "./lib/tree.js";
import { isVerbose, resolveConfigPath } from "./lib/env.js";
import { parseNonNegativeInt } from "./lib/arg.js";
import { processIO, type CliIO } from "./lib/io.js";
import { colorize } from "./lib/render.js";
import { CliError, EXIT_OK, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { withTiming, type MetricSink } from "./lib/telemetry.js";
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
} from "./commands/tree.js";
import { runScript } from "./commands/script.js";

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
};

/**
 * Build the command tree. Output goes to `io`, so tests can run it in process.
 */
export function createProgram(io: CliIO = processIO, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  // Configure output before adding commands so subcommands inherit it
  program
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(colorize(str, "red", io.stderr)),
    })
    .exitOverride();

  // Global options
  program
    .name("cfgtree")
    .description("Ordered path/value tree over configuration files")
    .version(VERSION)
    .option("--config <file>", "Provider configuration file (default: $CFGTREE_CONFIG or ./cfgtree.json)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output")
    .option("--dry-run", "Apply changes in memory without saving");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const metrics = (): MetricSink => ({
    enabled: Boolean(globals().verbose) || isVerbose(env),
    stream: io.stderr,
  });

  const notify = (message: string): void => {
    if (!globals().quiet) {
      io.stdout.write(message + "\n");
    }
  };

  /**
   * Open a tree, run `fn` against it and save when it reports a change
   */
  async function withTree(
    label: string,
    fn: (ctx: CommandContext) => boolean | Promise<boolean>
  ): Promise<void> {
    await withTiming(metrics(), label, async () => {
      const opts = globals();
      const configPath = await resolveConfigPath(opts.config, { env });
      const tree = await openCliTree(configPath);

      const changed = await fn({ tree, stdout: io.stdout, stderr: io.stderr });
      if (!changed) {
        return;
      }

      if (opts.dryRun) {
        if (!opts.quiet) {
          io.stderr.write("Dry run: changes not saved\n");
        }
        return;
      }
      await tree.save();
    });
  }

  // Get command
  program
    .command("get <path>")
    .description("Print the value at a path (exit 2 if the path does not exist)")
    .action(async (path: string) => {
      await withTree("cli.get", (ctx) => {
        getPath(ctx, path);
        return false;
      });
    });

  // Set command
  program
    .command("set <path> [value]")
    .description("Create or update a node; omit the value to clear it")
    .action(async (path: string, value: string | undefined) => {
      await withTree("cli.set", (ctx) => {
        setPath(ctx, path, value ?? null);
        return true;
      });
      notify(`Set ${path}`);
    });

  // Exists command
  program
    .command("exists <path>")
    .description("Print whether a node exists at a path")
    .action(async (path: string) => {
      await withTree("cli.exists", (ctx) => {
        existsPath(ctx, path);
        return false;
      });
    });

  // Insert command
  program
    .command("ins <path> <sibling>")
    .description("Create or move a node so it sits immediately before its sibling")
    .action(async (path: string, sibling: string) => {
      await withTree("cli.ins", (ctx) => {
        insertPath(ctx, path, sibling);
        return true;
      });
      notify(`Inserted ${path} before ${sibling}`);
    });

  // Remove command
  program
    .command("rm <path>")
    .description("Remove a node and everything under it")
    .action(async (path: string) => {
      let count = 0;
      await withTree("cli.rm", (ctx) => {
        count = removePath(ctx, path);
        return count > 0;
      });
      notify(`Removed ${count} node(s) under ${path}`);
    });

  // List command
  program
    .command("ls <path>")
    .description("List the immediate children of a path")
    .option("--json", "Output as JSON array")
    .action(async (path: string, options: { json?: boolean }) => {
      await withTree("cli.ls", (ctx) => {
        listPath(ctx, path, options);
        return false;
      });
    });

  // Match command
  program
    .command("match <pattern>")
    .description("List every path matching a glob (* and ? also match /)")
    .option("--limit <n>", "Maximum number of paths to print", (val) =>
      parseNonNegativeInt(val, "--limit")
    )
    .option("--count", "Print only the number of matches")
    .option("--json", "Output {total, matches} as JSON")
    .action(async (pattern: string, options: { limit?: number; count?: boolean; json?: boolean }) => {
      await withTree("cli.match", (ctx) => {
        matchPattern(ctx, pattern, options);
        return false;
      });
    });

  // Print command
  program
    .command("print [path]")
    .description("Print nodes whose path starts with a prefix, as path = value lines")
    .action(async (path: string | undefined) => {
      await withTree("cli.print", (ctx) => {
        printTree(ctx, path);
        return false;
      });
    });

  // Run command
  program
    .command("run")
    .description("Run a script of commands, one per line, against a single tree")
    .option("--file <path>", "Read the script from a file instead of stdin")
    .addHelpText(
      "after",
      `
Script commands:
  get <path>, set <path> [value], exists <path>, ins <path> <sibling>,
  rm <path>, ls <path>, match <pattern> [limit], print [path]

Examples:
  $ cfgtree run --file ./changes.txt
  $ echo "set /files/network.conf/HOSTNAME gateway" | cfgtree run`
    )
    .action(async (options: { file?: string }) => {
      let script: string;
      if (options.file) {
        script = await readTextFile(options.file);
      } else {
        if (io.stdinIsTTY()) {
          throw new CliError("No script provided. Use --file or pipe commands to stdin");
        }
        try {
          script = await io.readStdin();
        } catch (err) {
          throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", {
            cause: err,
          });
        }
      }

      await withTree("cli.run", (ctx) => runScript(ctx, script).mutated);
    });

  return program;
}

/**
 * Parse and run one command line
 * @param args - Arguments after the executable and script name
 * @returns Process exit code
 */
export async function runProgram(
  args: readonly string[],
  io: CliIO = processIO,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const program = createProgram(io, env);

  try {
    await program.parseAsync([...args], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    if (err instanceof CommanderError) {
      // Commander has already written help, the version or its own message
      return err.exitCode;
    }

    const verbose = Boolean(program.opts<GlobalOptions>().verbose) || isVerbose(env);
    io.stderr.write(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.stderr) + "\n");
    return mapSdkErrorToExitCode(err);
  }
}
