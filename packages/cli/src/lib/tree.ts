/**
 * Tree adapter for CLI
 * Opens a tree with the providers named in the resolved configuration file
 */

import { createProviders, loadTreeConfig, openTree, type ConfigTree } from "@cfgtree/sdk";

/**
 * Open and initialize a tree
 * @param configPath - Configuration file, or null for a tree without providers
 */
export async function openCliTree(configPath: string | null): Promise<ConfigTree> {
  const configs = configPath ? await loadTreeConfig(configPath) : [];
  const tree = openTree({ providers: createProviders(configs) });
  await tree.init();
  return tree;
}
