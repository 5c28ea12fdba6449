/**
 * Error types for cfgtree operations
 *
 * Invariants:
 * - Path and file errors include the offending path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all cfgtree errors
 */
export abstract class CfgTreeError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a tree path is malformed
 */
export class InvalidPathError extends CfgTreeError {
  readonly code = "E_PATH";

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid path "${path}": ${reason}`, options);
  }
}

/**
 * Thrown when a sibling-relative insert is rejected. The tree is left untouched.
 */
export class InvalidInsertError extends CfgTreeError {
  readonly code = "E_INSERT";

  constructor(
    public readonly path: string,
    public readonly sibling: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Cannot insert "${path}" before "${sibling}": ${reason}`, options);
  }
}

export type ProviderPhase = "init" | "load" | "save";

/**
 * Thrown when a provider fails during init, load or save
 */
export class ProviderError extends CfgTreeError {
  readonly code = "E_PROVIDER";

  constructor(
    public readonly provider: string,
    public readonly phase: ProviderPhase,
    options?: ErrorOptions
  ) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Provider "${provider}" failed during ${phase}${detail}`, options);
  }
}

/**
 * Thrown when a configuration file cannot be read or does not validate
 */
export class ConfigError extends CfgTreeError {
  readonly code = "E_CONFIG";

  constructor(configPath: string, reason: string, options?: ErrorOptions) {
    super(`Invalid configuration ${configPath}: ${reason}`, options);
  }
}

/**
 * Thrown when a backing file cannot be found
 */
export class FileNotFoundError extends CfgTreeError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`File not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a file read operation fails
 */
export class FileReadError extends CfgTreeError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file write operation fails
 */
export class FileWriteError extends CfgTreeError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write file: ${filePath}`, options);
  }
}

/**
 * Thrown when a file removal operation fails
 */
export class FileRemoveError extends CfgTreeError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends CfgTreeError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends CfgTreeError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}
