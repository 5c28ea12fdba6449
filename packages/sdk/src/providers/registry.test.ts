import { describe, it, expect } from "vitest";
import { PathTree } from "../tree.js";
import { ProviderError } from "../errors.js";
import { ProviderRegistry } from "./registry.js";
import type { Provider } from "../types.js";

/**
 * Provider that records each phase it runs, optionally failing one
 */
function recording(name: string, calls: string[], failOn?: "init" | "load" | "save"): Provider {
  const phase = async (step: "init" | "load" | "save"): Promise<void> => {
    calls.push(`${name}.${step}`);
    if (step === failOn) {
      throw new Error("boom");
    }
  };
  return {
    name,
    init: () => phase("init"),
    load: () => phase("load"),
    save: () => phase("save"),
  };
}

describe("ProviderRegistry", () => {
  it("runs init then load per provider, in registration order", async () => {
    const calls: string[] = [];
    const registry = new ProviderRegistry([recording("a", calls), recording("b", calls)]);

    await registry.initAll(new PathTree());

    expect(calls).toEqual(["a.init", "a.load", "b.init", "b.load"]);
  });

  it("saves in registration order", async () => {
    const calls: string[] = [];
    const registry = new ProviderRegistry([recording("a", calls), recording("b", calls)]);

    await registry.saveAll(new PathTree());

    expect(calls).toEqual(["a.save", "b.save"]);
  });

  it("stops at the first failure and names the provider and phase", async () => {
    const calls: string[] = [];
    const registry = new ProviderRegistry([
      recording("a", calls),
      recording("b", calls, "load"),
      recording("c", calls),
    ]);

    const err = await registry.initAll(new PathTree()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ provider: "b", phase: "load", code: "E_PROVIDER" });
    expect(err).toHaveProperty("message", 'Provider "b" failed during load: boom');
    expect(calls).toEqual(["a.init", "a.load", "b.init", "b.load"]);
  });

  it("keeps the underlying error as the cause", async () => {
    const registry = new ProviderRegistry([recording("a", [], "save")]);

    const err = await registry.saveAll(new PathTree()).catch((e: unknown) => e);

    expect(err instanceof Error ? err.cause : undefined).toEqual(new Error("boom"));
  });

  it("does nothing without providers", async () => {
    const tree = new PathTree();
    const registry = new ProviderRegistry();

    await registry.initAll(tree);
    await registry.saveAll(tree);

    expect(registry.providers).toEqual([]);
    expect(tree.size).toBe(2);
  });

  it("rejects duplicate names", () => {
    expect(() => new ProviderRegistry([recording("a", []), recording("a", [])])).toThrow(
      "Duplicate provider name: a"
    );
  });
});
