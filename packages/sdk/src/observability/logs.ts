/**
 * Structured logging for tree and provider operations
 *
 * Lines look like:
 *
 *   [2024-01-01T00:00:00.000Z] [WARN] [provider.skip_key] etc /files/a.conf: line 3 is not an assignment
 *
 * Providers log through a scoped logger that stamps their name on every
 * event. debug output needs CFGTREE_DEBUG; only info reaches stdout.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Fields an event may carry besides its name
 */
export interface LogFields {
  /** Provider that raised the event */
  provider?: string;
  /** Tree path the event concerns */
  path?: string;
  /** Backing file, relative to the provider root */
  file?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export interface LogEntry extends LogFields {
  timestamp: string;
  level: LogLevel;
  event: string;
}

export interface EventLogger {
  debug(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  error(event: string, fields?: LogFields): void;
}

/**
 * Render one entry as a single line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  const subject = [entry.provider, entry.path ?? entry.file].filter(Boolean).join(" ");
  if (subject) {
    parts.push(entry.message ? `${subject}:` : subject);
  }
  if (entry.path && entry.file) {
    parts.push(`(${entry.file})`);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

class Logger implements EventLogger {
  #enabled = true;

  log(level: LogLevel, event: string, fields?: LogFields): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.CFGTREE_DEBUG) return;

    const line = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      event,
      ...fields,
    });

    // The CLI prints tree dumps on stdout, so everything but info goes to stderr
    if (level === "info") {
      console.log(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  /**
   * A logger that adds `base` to every event. Calls go through this logger's
   * methods, so spies and setEnabled apply to scoped output too.
   */
  scoped(base: LogFields): EventLogger {
    return {
      debug: (event, fields) => this.debug(event, { ...base, ...fields }),
      info: (event, fields) => this.info(event, { ...base, ...fields }),
      warn: (event, fields) => this.warn(event, { ...base, ...fields }),
      error: (event, fields) => this.error(event, { ...base, ...fields }),
    };
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
