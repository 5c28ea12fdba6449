/**
 * CLI testing utilities
 */

import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import { execa } from "execa";

const require = createRequire(import.meta.url);

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
  /** Terminating signal when the process didn't exit normally */
  signal: string | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
  /** Kill the process after this many milliseconds (default: 15000) */
  timeout?: number;
}

/**
 * Run a TypeScript CLI entry point in a child process through the tsx loader
 * @param cliPath - Absolute path to the CLI's .ts entry point
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(
  cliPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { cwd, env, input, timeout = 15000 } = options;

  // Resolved here so the loader is found whatever the child's cwd is
  const loader = pathToFileURL(require.resolve("tsx")).href;

  const result = await execa(process.execPath, ["--import", loader, cliPath, ...args], {
    cwd,
    env: { ...process.env, ...env },
    input: input ?? "",
    reject: false,
    timeout,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
