/**
 * File I/O for providers
 *
 * Invariants:
 * - Writes are atomic: never observe partial file contents
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; missing files throw FileNotFoundError
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join } from "node:path";
import {
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

/**
 * Error code of a Node.js system error, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const base = basename(filePath);
  const tmp = join(dir, `.${base}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o644);
    await fileHandle.writeFile(content, "utf-8");

    // Prefer datasync, fall back to a full sync where it is unsupported
    try {
      await fileHandle.datasync();
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch(() => undefined);
    }
    // Temp file may never have been created
    await fs.unlink(tmp).catch(() => undefined);

    throw new FileWriteError(filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory after a rename
 */
async function syncDirectory(dir: string): Promise<void> {
  let dirHandle: fs.FileHandle | null = null;
  try {
    dirHandle = await fs.open(dir, "r");
    await dirHandle.sync();
  } catch (err) {
    // Some platforms cannot fsync directories
    const code = errorCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      throw err;
    }
  } finally {
    await dirHandle?.close();
  }
}

/**
 * Read a text file
 * @returns File contents as UTF-8 string
 * @throws FileNotFoundError if file doesn't exist
 * @throws FileReadError for other read failures
 */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new FileNotFoundError(filePath, { cause: err });
    }
    throw new FileReadError(filePath, { cause: err });
  }
}

/**
 * Read a text file, or return null when it does not exist
 */
export async function readTextFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await readTextFile(filePath);
  } catch (err) {
    if (err instanceof FileNotFoundError) {
      return null;
    }
    throw err;
  }
}

/**
 * Remove a file (idempotent - no error if file doesn't exist)
 * @throws FileRemoveError if removal fails for reasons other than file not found
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return;
    }
    throw new FileRemoveError(filePath, { cause: err });
  }
}

/**
 * List regular files below a directory, recursively
 * @param dirPath - Directory to walk
 * @returns Sorted relative paths using "/" separators; empty if the directory is missing
 */
export async function listFilesRecursive(dirPath: string): Promise<string[]> {
  const files: string[] = [];

  const visit = async (relDir: string): Promise<void> => {
    const absDir = relDir ? join(dirPath, relDir) : dirPath;
    const entries = await fs.readdir(absDir, { withFileTypes: true });

    for (const entry of entries) {
      const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
      // Symlinks are skipped, both files and directories
      if (entry.isSymbolicLink()) continue;
      if (entry.isDirectory()) {
        await visit(rel);
      } else if (entry.isFile() && !entry.name.endsWith(".tmp")) {
        files.push(rel);
      }
    }
  };

  try {
    await visit("");
  } catch (err) {
    // A missing root simply has no files
    if (errorCode(err) === "ENOENT") {
      return [];
    }
    throw new ListFilesError(dirPath, { cause: err });
  }

  return files.sort();
}
