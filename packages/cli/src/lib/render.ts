/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

/**
 * A writable text stream; process.stdout and process.stderr qualify
 */
export interface TextStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

/**
 * Print JSON
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(stream: TextStream, data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  stream.write(json + "\n");
}

/**
 * Print lines (one per line)
 */
export function printLines(stream: TextStream, lines: readonly string[]): void {
  for (const line of lines) {
    stream.write(line + "\n");
  }
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(text: string, color: Color, stream: TextStream): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
