/**
 * File system test utilities
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite } from "@cfgtree/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "cfgtree-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "cfgtree-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write fixture files below a directory, creating parent directories
 * @param files - Relative path → content
 */
export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    await atomicWrite(join(dir, rel), content);
  }
}

/**
 * Read a fixture file back as UTF-8
 */
export async function readFixture(dir: string, rel: string): Promise<string> {
  return readFile(join(dir, rel), "utf8");
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
