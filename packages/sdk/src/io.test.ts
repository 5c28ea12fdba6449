import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile, symlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  atomicWrite,
  readTextFile,
  readTextFileIfExists,
  removeFile,
  ensureDirectory,
  listFilesRecursive,
  errorCode,
} from "./io.js";
import { FileNotFoundError, FileReadError, FileRemoveError, DirectoryError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "cfgtree-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "network.conf");

      await atomicWrite(filePath, "HOSTNAME=gateway\n");

      expect(await readTextFile(filePath)).toBe("HOSTNAME=gateway\n");
    });

    it("should not leave temp files after successful write", async () => {
      await atomicWrite(join(testDir, "a.conf"), "A=1\n");

      const files = await readdir(testDir);
      expect(files).toEqual(["a.conf"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "a.conf");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should create parent directories automatically", async () => {
      const filePath = join(testDir, "etc", "sysconfig", "network.conf");

      await atomicWrite(filePath, "NETWORKING=yes\n");

      expect(await readTextFile(filePath)).toBe("NETWORKING=yes\n");
    });

    it("should handle empty content", async () => {
      const filePath = join(testDir, "empty.conf");

      await atomicWrite(filePath, "");

      expect(await readTextFile(filePath)).toBe("");
    });
  });

  describe("readTextFile errors", () => {
    it("should throw FileNotFoundError for non-existent file", async () => {
      const filePath = join(testDir, "missing.conf");

      await expect(readTextFile(filePath)).rejects.toThrow(FileNotFoundError);
      await expect(readTextFile(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });

    it("should throw FileReadError when the path is a directory", async () => {
      const dirPath = join(testDir, "is-a-directory");
      await mkdir(dirPath);

      const err = await readTextFile(dirPath).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(FileReadError);
      expect(err).toHaveProperty("code", "READ_ERROR");
      expect(errorCode(err instanceof Error ? err.cause : undefined)).toBe("EISDIR");
    });
  });

  describe("readTextFileIfExists", () => {
    it("should return null for a missing file", async () => {
      expect(await readTextFileIfExists(join(testDir, "missing.conf"))).toBeNull();
    });

    it("should return the content of an existing file", async () => {
      await writeFile(join(testDir, "a.conf"), "A=1\n");

      expect(await readTextFileIfExists(join(testDir, "a.conf"))).toBe("A=1\n");
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories", async () => {
      const dirPath = join(testDir, "level1", "level2");

      await ensureDirectory(dirPath);

      expect(await readdir(join(testDir, "level1"))).toEqual(["level2"]);
    });

    it("should not error if directory already exists", async () => {
      await ensureDirectory(testDir);
      await expect(ensureDirectory(testDir)).resolves.toBeUndefined();
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(DirectoryError);
    });

    it("should throw DirectoryError when path is a regular file", async () => {
      const filePath = join(testDir, "file.conf");
      await writeFile(filePath, "");

      await expect(ensureDirectory(join(filePath, "child"))).rejects.toThrow(DirectoryError);
    });
  });

  describe("removeFile", () => {
    it("should remove existing file", async () => {
      const filePath = join(testDir, "a.conf");
      await writeFile(filePath, "A=1\n");

      await removeFile(filePath);

      expect(await readdir(testDir)).toEqual([]);
    });

    it("should be idempotent", async () => {
      const filePath = join(testDir, "missing.conf");

      await expect(removeFile(filePath)).resolves.toBeUndefined();
      await expect(removeFile(filePath)).resolves.toBeUndefined();
    });

    it("should throw FileRemoveError when trying to remove a directory", async () => {
      const dirPath = join(testDir, "is-directory");
      await mkdir(dirPath);

      await expect(removeFile(dirPath)).rejects.toThrow(FileRemoveError);
    });
  });

  describe("listFilesRecursive", () => {
    it("should list nested files as sorted relative paths", async () => {
      await mkdir(join(testDir, "sysconfig", "network-scripts"), { recursive: true });
      await writeFile(join(testDir, "sysconfig", "network"), "");
      await writeFile(join(testDir, "sysconfig", "network-scripts", "ifcfg-eth0"), "");
      await writeFile(join(testDir, "hosts"), "");

      expect(await listFilesRecursive(testDir)).toEqual([
        "hosts",
        "sysconfig/network",
        "sysconfig/network-scripts/ifcfg-eth0",
      ]);
    });

    it("should skip symlinks and leftover temp files", async () => {
      await writeFile(join(testDir, "real.conf"), "");
      await writeFile(join(testDir, ".real.conf.1234.tmp"), "");
      await symlink(join(testDir, "real.conf"), join(testDir, "link.conf"));

      expect(await listFilesRecursive(testDir)).toEqual(["real.conf"]);
    });

    it("should return empty array for non-existent directory", async () => {
      expect(await listFilesRecursive(join(testDir, "missing"))).toEqual([]);
    });
  });
});
