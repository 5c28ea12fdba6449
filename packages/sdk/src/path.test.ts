import { describe, it, expect } from "vitest";
import {
  pathLength,
  isPathPrefix,
  normalizePath,
  parentDir,
  baseName,
  ancestorsOf,
  joinPath,
} from "./path.js";
import { validatePath, validateScope, checkSegment } from "./validation.js";
import { InvalidPathError } from "./errors.js";

describe("path primitives", () => {
  describe("pathLength", () => {
    it("ignores one trailing separator", () => {
      expect(pathLength("/a/b")).toBe(4);
      expect(pathLength("/a/b/")).toBe(4);
      expect(pathLength("/")).toBe(0);
      expect(pathLength("")).toBe(0);
    });
  });

  describe("isPathPrefix", () => {
    it("accepts the path itself and nested paths", () => {
      expect(isPathPrefix("/a", "/a")).toBe(true);
      expect(isPathPrefix("/a", "/a/b/c")).toBe(true);
      expect(isPathPrefix("/a/", "/a/b")).toBe(true);
    });

    it("rejects siblings that share leading characters", () => {
      expect(isPathPrefix("/a", "/ab")).toBe(false);
      expect(isPathPrefix("/a/b", "/a")).toBe(false);
    });

    it("treats the root as a prefix of every absolute path", () => {
      expect(isPathPrefix("/", "/system")).toBe(true);
      expect(isPathPrefix("/", "relative")).toBe(false);
    });
  });

  describe("normalizePath", () => {
    it("strips a single trailing separator but keeps the root", () => {
      expect(normalizePath("/a/b/")).toBe("/a/b");
      expect(normalizePath("/a/b")).toBe("/a/b");
      expect(normalizePath("/")).toBe("/");
    });
  });

  describe("parentDir and baseName", () => {
    it("splits at the last separator", () => {
      expect(parentDir("/a/b/c")).toBe("/a/b");
      expect(parentDir("/a")).toBe("");
      expect(parentDir("plain")).toBeNull();
      expect(baseName("/a/b/c")).toBe("c");
    });
  });

  describe("ancestorsOf", () => {
    it("lists proper ancestors shortest first", () => {
      expect(ancestorsOf("/a/b/c")).toEqual(["/a", "/a/b"]);
      expect(ancestorsOf("/a")).toEqual([]);
    });
  });

  describe("joinPath", () => {
    it("joins segments with single separators", () => {
      expect(joinPath("/files", "etc/hosts")).toBe("/files/etc/hosts");
      expect(joinPath("/files/", "/etc/", "hosts")).toBe("/files/etc/hosts");
      expect(joinPath("/", "a")).toBe("/a");
    });
  });
});

describe("path validation", () => {
  it("normalizes valid paths", () => {
    expect(validatePath("/a/b/")).toBe("/a/b");
  });

  it("rejects relative, root, and empty-segment paths", () => {
    expect(() => validatePath("a/b")).toThrow(InvalidPathError);
    expect(() => validatePath("")).toThrow(InvalidPathError);
    expect(() => validatePath("/")).toThrow("the root path cannot hold a node");
    expect(() => validatePath("/a//b")).toThrow("path cannot contain empty segments");
    expect(() => validatePath("/a\nb")).toThrow(InvalidPathError);
  });

  it("allows the root as a removal scope", () => {
    expect(validateScope("/")).toBe("/");
    expect(() => validateScope("a")).toThrow(InvalidPathError);
  });

  it("reports unusable segments", () => {
    expect(checkSegment("HOSTNAME")).toBeNull();
    expect(checkSegment("")).toBe("segment is empty");
    expect(checkSegment("a/b")).toBe('segment contains "/"');
  });
});
