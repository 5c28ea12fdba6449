import { describe, it, expect, afterEach, vi } from "vitest";
import { formatLogEntry, logger } from "./logs.js";

const TS = "2024-01-01T00:00:00.000Z";

describe("formatLogEntry", () => {
  it("prints provider, path and message", () => {
    expect(
      formatLogEntry({
        timestamp: TS,
        level: "warn",
        event: "provider.skip_key",
        provider: "etc",
        path: "/files/a.conf",
        message: "line 3 is not an assignment",
      })
    ).toBe(`[${TS}] [WARN] [provider.skip_key] etc /files/a.conf: line 3 is not an assignment`);
  });

  it("falls back to the file when there is no path", () => {
    expect(
      formatLogEntry({
        timestamp: TS,
        level: "debug",
        event: "provider.file_removed",
        provider: "etc",
        file: "old.conf",
      })
    ).toBe(`[${TS}] [DEBUG] [provider.file_removed] etc old.conf`);
  });

  it("shows the file beside a path and appends details", () => {
    expect(
      formatLogEntry({
        timestamp: TS,
        level: "info",
        event: "provider.save",
        path: "/files/a.conf",
        file: "a.conf",
        details: { written: 1 },
      })
    ).toBe(`[${TS}] [INFO] [provider.save] /files/a.conf (a.conf) {"written":1}`);
  });
});

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    logger.setEnabled(true);
  });

  it("sends warnings to stderr and info to stdout", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.warn("tree.link_mismatch", { path: "/a" });
    logger.info("provider.load", { provider: "etc" });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/\[WARN\] \[tree\.link_mismatch\] \/a$/);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0]?.[0]).toMatch(/\[INFO\] \[provider\.load\] etc$/);
  });

  it("writes debug output only when CFGTREE_DEBUG is set", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    vi.stubEnv("CFGTREE_DEBUG", "");
    logger.debug("provider.init");
    expect(error).not.toHaveBeenCalled();

    vi.stubEnv("CFGTREE_DEBUG", "1");
    logger.debug("provider.init");
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("stays silent when disabled", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger.setEnabled(false);
    logger.warn("provider.skip_file", { file: "x" });

    expect(warn).not.toHaveBeenCalled();
  });

  it("merges scoped fields into every event", () => {
    const spy = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const scoped = logger.scoped({ provider: "etc" });

    scoped.warn("provider.skip_key", { path: "/files/a.conf", message: "bad" });

    expect(spy).toHaveBeenCalledWith("provider.skip_key", {
      provider: "etc",
      path: "/files/a.conf",
      message: "bad",
    });
  });
});
