/**
 * Shared test helpers for cfgtree packages
 */

export { createTempDir, removeDir, writeFiles, readFixture, withTempDir } from "./fs.js";
export { runCli, parseJsonOutput, type CliResult, type CliExecOptions } from "./cli.js";
