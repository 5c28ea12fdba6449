/**
 * Basic Usage Example
 *
 * Loads a directory of KEY=value files into a tree, edits it, and saves it back.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { KeyValueProvider, openTree } from "@cfgtree/sdk";

async function main(): Promise<void> {
  // Setup: a small sysconfig-style directory
  const root = "./examples-data/basic";
  await rm(root, { recursive: true, force: true });
  await mkdir(root, { recursive: true });
  await writeFile(join(root, "network.conf"), "NETWORKING=yes\nHOSTNAME=gateway\n");

  const tree = openTree({
    providers: [
      new KeyValueProvider({ name: "etc", root, mount: "/files", include: ["*.conf"] }),
    ],
  });
  await tree.init();

  console.log("Loaded:");
  tree.print(process.stdout, "/files");

  // Read and update
  console.log(`\nHOSTNAME is ${tree.get("/files/network.conf/HOSTNAME")}`);
  tree.set("/files/network.conf/HOSTNAME", "router");

  // New keys land at the end unless placed before a sibling
  tree.insert("/files/network.conf/DOMAIN", "/files/network.conf/HOSTNAME");
  tree.set("/files/network.conf/DOMAIN", "example.test");
  console.log("Keys:", tree.ls("/files/network.conf"));

  // Glob matching spans separators
  const { total, matches } = tree.match("/files/*/HOST*");
  console.log(`Matched ${total}:`, matches);

  // Where the provider recorded its settings
  console.log("Provider config:", tree.ls("/system/config/etc"));

  await tree.save();
  console.log("\nSaved network.conf:");
  console.log(await readFile(join(root, "network.conf"), "utf8"));

  await rm("./examples-data", { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
