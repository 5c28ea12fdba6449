/**
 * Fixed, ordered list of providers
 *
 * Invariants:
 * - Providers always run in registration order
 * - The first failure stops the sequence; nothing is rolled back
 * - Failures surface as ProviderError naming the provider and phase
 */

import { ProviderError, type ProviderPhase } from "../errors.js";
import type { PathTree } from "../tree.js";
import type { Provider } from "../types.js";

export class ProviderRegistry {
  readonly #providers: readonly Provider[];

  constructor(providers: readonly Provider[] = []) {
    const names = new Set<string>();
    for (const provider of providers) {
      if (names.has(provider.name)) {
        throw new TypeError(`Duplicate provider name: ${provider.name}`);
      }
      names.add(provider.name);
    }
    this.#providers = [...providers];
  }

  get providers(): readonly Provider[] {
    return this.#providers;
  }

  /**
   * init then load each provider, in order
   * @throws {ProviderError} On the first failure
   */
  async initAll(tree: PathTree): Promise<void> {
    for (const provider of this.#providers) {
      await runPhase(provider, "init", () => provider.init(tree));
      await runPhase(provider, "load", () => provider.load(tree));
    }
  }

  /**
   * save each provider, in order
   * @throws {ProviderError} On the first failure
   */
  async saveAll(tree: PathTree): Promise<void> {
    for (const provider of this.#providers) {
      await runPhase(provider, "save", () => provider.save(tree));
    }
  }
}

async function runPhase(
  provider: Provider,
  phase: ProviderPhase,
  fn: () => Promise<void>
): Promise<void> {
  try {
    await fn();
  } catch (err) {
    throw new ProviderError(provider.name, phase, { cause: err });
  }
}
