import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openTree } from "./config-tree.js";
import { ProviderError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { KeyValueProvider } from "./providers/keyvalue.js";
import { JsonProvider } from "./providers/json.js";
import type { ConfigTree } from "./types.js";

describe("openTree", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "cfgtree-open-"));
    vi.spyOn(logger, "debug").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  function withProviders(): ConfigTree {
    return openTree({
      providers: [
        new KeyValueProvider({ name: "etc", root, mount: "/files", include: ["*.conf"] }),
        new JsonProvider({ name: "settings", root, mount: "/settings", include: ["*.json"] }),
      ],
    });
  }

  it("works without providers", async () => {
    const tree = openTree();
    await tree.init();

    tree.set("/a/b", "1");

    expect(tree.get("/a/b")).toBe("1");
    expect(tree.ls("/")).toEqual(["/system", "/a"]);
    await expect(tree.save()).resolves.toBeUndefined();
  });

  it("opens independent trees", () => {
    const first = openTree();
    const second = openTree();

    first.set("/a", "1");

    expect(second.exists("/a")).toBe(false);
    expect(first.tree).not.toBe(second.tree);
  });

  it("loads every provider on init", async () => {
    await writeFile(join(root, "network.conf"), "HOSTNAME=gateway\n");
    await writeFile(join(root, "app.json"), '{"port": 8080}');
    const tree = withProviders();

    await tree.init();

    expect(tree.get("/files/network.conf/HOSTNAME")).toBe("gateway");
    expect(tree.get("/settings/app.json/port")).toBe("8080");
    expect(tree.ls("/system/config")).toEqual([
      "/system/config/etc",
      "/system/config/settings",
    ]);
  });

  it("persists edits through save and a fresh tree", async () => {
    await writeFile(join(root, "network.conf"), "HOSTNAME=gateway\n");
    const first = withProviders();
    await first.init();

    first.insert("/files/network.conf/DOMAIN", "/files/network.conf/HOSTNAME");
    first.set("/files/network.conf/DOMAIN", "example.test");
    await first.save();

    expect(await readFile(join(root, "network.conf"), "utf8")).toBe(
      "DOMAIN=example.test\nHOSTNAME=gateway\n"
    );

    const second = withProviders();
    await second.init();
    expect(second.ls("/files/network.conf")).toEqual([
      "/files/network.conf/DOMAIN",
      "/files/network.conf/HOSTNAME",
    ]);
  });

  it("can be initialized again to reload from disk", async () => {
    await writeFile(join(root, "a.conf"), "A=1\n");
    const tree = withProviders();
    await tree.init();

    await writeFile(join(root, "a.conf"), "A=2\n");
    await tree.init();

    expect(tree.get("/files/a.conf/A")).toBe("2");
    expect(tree.match("/system/config/*").total).toBe(8);
  });

  it("wraps provider failures", async () => {
    await writeFile(join(root, "broken.json"), "{");
    const tree = withProviders();

    const err = await tree.init().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ provider: "settings", phase: "load" });
  });

  it("matches and prints through the facade", async () => {
    const tree = openTree();
    tree.set("/k/1", "a");
    tree.set("/k/2", "b");
    let text = "";

    const report = tree.print({ write: (chunk: string) => (text += chunk) }, "/k");

    expect(text).toBe("/k\n/k/1 = a\n/k/2 = b\n");
    expect(report).toEqual({ printed: 3, violations: [] });
    expect(tree.match("/k/*", 1)).toEqual({ total: 2, matches: ["/k/1"] });
    expect(tree.rm("/k")).toBe(3);
  });
});
