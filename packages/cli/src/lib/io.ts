/**
 * I/O helpers for CLI
 */

import type { TextStream } from "./render.js";

/**
 * Streams a command runs against. Tests substitute in-memory ones.
 */
export interface CliIO {
  stdout: TextStream;
  stderr: TextStream;
  /** Read all of stdin */
  readStdin(): Promise<string>;
  /** Whether stdin is an interactive terminal */
  stdinIsTTY(): boolean;
}

/**
 * Read from stdin with size limit (default 10MB)
 * @param maxBytes - Maximum bytes to read (default 10MB)
 * @throws Error if input exceeds size limit
 */
export async function readStdin(maxBytes = 10 * 1024 * 1024): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let bytesRead = 0;
    process.stdin.setEncoding("utf8");

    process.stdin.on("data", (chunk: string) => {
      bytesRead += Buffer.byteLength(chunk, "utf8");

      // Enforce size limit during streaming to prevent memory exhaustion
      if (bytesRead > maxBytes) {
        process.stdin.pause();
        process.stdin.removeAllListeners();
        reject(new Error(`stdin too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`));
        return;
      }

      data += chunk;
    });

    process.stdin.on("end", () => resolve(data));
    process.stdin.on("error", reject);
  });
}

/**
 * The real process streams
 */
export const processIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  readStdin: () => readStdin(),
  stdinIsTTY: () => process.stdin.isTTY ?? false,
};
