/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { writeFile, mkdir } from "node:fs/promises";
import { createTempDir, removeDir } from "@cfgtree/testkit";
import { expandTilde, isVerbose, resolveConfigPath } from "../src/lib/env.js";

describe("environment resolution", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await createTempDir("cfgtree-env-");
  });

  afterEach(async () => {
    await removeDir(cwd);
  });

  describe("resolveConfigPath", () => {
    it("should use CLI option when provided", async () => {
      const result = await resolveConfigPath("/cli/cfgtree.json", {
        env: { CFGTREE_CONFIG: "/env/cfgtree.json" },
        cwd,
      });
      expect(result).toBe(path.resolve("/cli/cfgtree.json"));
    });

    it("should use CFGTREE_CONFIG when CLI option not provided", async () => {
      const result = await resolveConfigPath(undefined, {
        env: { CFGTREE_CONFIG: "/env/cfgtree.json" },
        cwd,
      });
      expect(result).toBe(path.resolve("/env/cfgtree.json"));
    });

    it("should resolve relative paths against the working directory", async () => {
      const result = await resolveConfigPath("conf/tree.json", { env: {}, cwd });
      expect(result).toBe(path.join(cwd, "conf", "tree.json"));
    });

    it("should fall back to ./cfgtree.json when it exists", async () => {
      await writeFile(path.join(cwd, "cfgtree.json"), "{}");

      const result = await resolveConfigPath(undefined, { env: {}, cwd });
      expect(result).toBe(path.join(cwd, "cfgtree.json"));
    });

    it("should return null when nothing is configured", async () => {
      expect(await resolveConfigPath(undefined, { env: {}, cwd })).toBeNull();
    });

    it("should ignore a directory named cfgtree.json", async () => {
      await mkdir(path.join(cwd, "cfgtree.json"));

      expect(await resolveConfigPath(undefined, { env: {}, cwd })).toBeNull();
    });
  });

  describe("expandTilde", () => {
    it("should expand a leading ~", () => {
      expect(expandTilde("~")).toBe(homedir());
      expect(expandTilde("~/cfgtree.json")).toBe(path.join(homedir(), "cfgtree.json"));
    });

    it("should leave other paths untouched", () => {
      expect(expandTilde("/etc/cfgtree.json")).toBe("/etc/cfgtree.json");
      expect(expandTilde("~user/cfgtree.json")).toBe("~user/cfgtree.json");
    });
  });

  describe("isVerbose", () => {
    it("should only accept CFGTREE_CLI_DEBUG=1", () => {
      expect(isVerbose({ CFGTREE_CLI_DEBUG: "1" })).toBe(true);
      expect(isVerbose({ CFGTREE_CLI_DEBUG: "true" })).toBe(false);
      expect(isVerbose({})).toBe(false);
    });
  });
});
