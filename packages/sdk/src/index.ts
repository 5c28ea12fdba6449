/**
 * cfgtree SDK
 *
 * An in-memory hierarchical path/value store with file format providers
 */

// Re-export types
export type {
  TreeEntry,
  MatchResult,
  PrintSink,
  LinkViolation,
  PrintReport,
  Provider,
  TreeOptions,
  ConfigTree,
} from "./types.js";

// Core store
export { PathTree, TreeNode, SYSTEM_PATH, SYSTEM_CONFIG_PATH } from "./tree.js";
export { openTree } from "./config-tree.js";

// Path and glob utilities
export {
  SEP,
  pathLength,
  isPathPrefix,
  normalizePath,
  parentDir,
  baseName,
  ancestorsOf,
  joinPath,
} from "./path.js";
export { compileGlob, globMatch, type GlobMatcher } from "./glob.js";
export { validatePath, validateScope, checkSegment } from "./validation.js";

// Providers
export { ProviderRegistry } from "./providers/registry.js";
export { FileProvider, type FileProviderOptions } from "./providers/file-provider.js";
export { KeyValueProvider, parseValue, formatValue } from "./providers/keyvalue.js";
export { JsonProvider, stringifyJson, type JsonValue } from "./providers/json.js";

// Configuration
export {
  ProviderConfigSchema,
  TreeConfigSchema,
  resolveTreeConfig,
  loadTreeConfig,
  createProvider,
  createProviders,
  type ProviderType,
  type ResolvedProviderConfig,
} from "./config.js";

// Re-export I/O operations
export {
  atomicWrite,
  readTextFile,
  readTextFileIfExists,
  removeFile,
  ensureDirectory,
  listFilesRecursive,
} from "./io.js";

// Logging
export {
  logger,
  formatLogEntry,
  type EventLogger,
  type LogEntry,
  type LogFields,
  type LogLevel,
} from "./observability/logs.js";

// Re-export errors
export {
  CfgTreeError,
  InvalidPathError,
  InvalidInsertError,
  ProviderError,
  ConfigError,
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
  type ProviderPhase,
} from "./errors.js";
