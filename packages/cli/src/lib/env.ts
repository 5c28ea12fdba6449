/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { stat } from "node:fs/promises";

/**
 * Config file picked up from the working directory when nothing else is given
 */
export const DEFAULT_CONFIG_FILE = "cfgtree.json";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the configuration file
 * Priority: CLI option > CFGTREE_CONFIG env var > ./cfgtree.json when present > none
 *
 * @returns Absolute path, or null to run without providers
 */
export async function resolveConfigPath(
  cliConfig?: string,
  options: { env?: NodeJS.ProcessEnv; cwd?: string } = {}
): Promise<string | null> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  const explicit = cliConfig ?? env.CFGTREE_CONFIG;
  if (explicit) {
    return path.resolve(cwd, expandTilde(explicit));
  }

  const fallback = path.join(cwd, DEFAULT_CONFIG_FILE);
  try {
    const info = await stat(fallback);
    return info.isFile() ? fallback : null;
  } catch {
    return null;
  }
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.CFGTREE_CLI_DEBUG === "1";
}
