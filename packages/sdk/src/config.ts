/**
 * Provider configuration files
 *
 * @example cfgtree.json
 * ```json
 * {
 *   "providers": [
 *     { "type": "keyvalue", "name": "sysconfig", "root": "./etc/sysconfig" },
 *     { "type": "json", "root": "./settings", "mount": "/settings" }
 *   ]
 * }
 * ```
 */

import { dirname, resolve } from "node:path";
import { z } from "zod";
import { CfgTreeError, ConfigError } from "./errors.js";
import { readTextFile } from "./io.js";
import { isPathPrefix } from "./path.js";
import { SYSTEM_PATH } from "./tree.js";
import { validatePath } from "./validation.js";
import { JsonProvider } from "./providers/json.js";
import { KeyValueProvider } from "./providers/keyvalue.js";
import type { Provider } from "./types.js";

const namePattern = /^[A-Za-z0-9]+(?:[._-][A-Za-z0-9]+)*$/;

const MountSchema = z.string().superRefine((val, ctx) => {
  try {
    const mount = validatePath(val);
    if (isPathPrefix(SYSTEM_PATH, mount)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `mount cannot be under ${SYSTEM_PATH}`,
      });
    }
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
  }
});

export const ProviderConfigSchema = z
  .object({
    type: z.enum(["keyvalue", "json"]),
    name: z
      .string()
      .regex(namePattern, "name may contain only letters, numbers, dots, underscores, and hyphens")
      .optional(),
    root: z.string().min(1, "root must be non-empty"),
    mount: MountSchema.optional(),
    include: z.array(z.string().min(1)).min(1, "include must list at least one glob").optional(),
  })
  .strict();

export const TreeConfigSchema = z
  .object({
    providers: z.array(ProviderConfigSchema).default([]),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.providers.forEach((provider, index) => {
      const name = provider.name ?? provider.type;
      if (seen.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["providers", index, "name"],
          message: `duplicate provider name "${name}"`,
        });
      }
      seen.add(name);
    });
  });

export type ProviderType = z.infer<typeof ProviderConfigSchema>["type"];

/**
 * A provider entry with defaults applied and root made absolute
 */
export interface ResolvedProviderConfig {
  type: ProviderType;
  name: string;
  root: string;
  mount: string;
  include: string[];
}

const DEFAULTS: Record<ProviderType, { mount: string; include: string[] }> = {
  keyvalue: { mount: "/files", include: ["**/*.conf"] },
  json: { mount: "/json", include: ["**/*.json"] },
};

/**
 * Validate raw configuration and apply defaults
 * @param raw - Parsed JSON
 * @param baseDir - Directory relative roots resolve against
 * @param source - Label for error messages
 * @throws {ConfigError} If the configuration does not validate
 */
export function resolveTreeConfig(
  raw: unknown,
  baseDir: string,
  source = "<inline>"
): ResolvedProviderConfig[] {
  const result = TreeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join(", ");
    throw new ConfigError(source, issues);
  }

  return result.data.providers.map((provider) => {
    const defaults = DEFAULTS[provider.type];
    return {
      type: provider.type,
      name: provider.name ?? provider.type,
      root: resolve(baseDir, provider.root),
      mount: validatePath(provider.mount ?? defaults.mount),
      include: provider.include ?? [...defaults.include],
    };
  });
}

/**
 * Read and validate a JSON configuration file
 * @throws {ConfigError} If the file cannot be read, parsed or validated
 */
export async function loadTreeConfig(configPath: string): Promise<ResolvedProviderConfig[]> {
  const absolute = resolve(configPath);

  let content: string;
  try {
    content = await readTextFile(absolute);
  } catch (err) {
    const reason = err instanceof CfgTreeError ? err.message : "unreadable";
    throw new ConfigError(absolute, reason, { cause: err });
  }

  let raw: unknown;
  try {
    // Strip BOM if present
    raw = JSON.parse(content.charCodeAt(0) === 0xfeff ? content.slice(1) : content);
  } catch (err) {
    const reason = err instanceof SyntaxError ? err.message : String(err);
    throw new ConfigError(absolute, `invalid JSON: ${reason}`, { cause: err });
  }

  return resolveTreeConfig(raw, dirname(absolute), absolute);
}

/**
 * Build a provider from a resolved configuration entry
 */
export function createProvider(config: ResolvedProviderConfig): Provider {
  const options = {
    name: config.name,
    root: config.root,
    mount: config.mount,
    include: config.include,
  };

  switch (config.type) {
    case "keyvalue":
      return new KeyValueProvider(options);
    case "json":
      return new JsonProvider(options);
  }
}

/**
 * Build every provider of a configuration, preserving order
 */
export function createProviders(configs: ResolvedProviderConfig[]): Provider[] {
  return configs.map(createProvider);
}
