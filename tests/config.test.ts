import { afterEach, describe, expect, it, vi } from "vitest";

describe("PATHS", () => {
  const saved = process.env.SSL_MONITOR_LOG_FILE;

  afterEach(() => {
    if (saved === undefined) {
      delete process.env.SSL_MONITOR_LOG_FILE;
    } else {
      process.env.SSL_MONITOR_LOG_FILE = saved;
    }
    vi.resetModules();
  });

  it("writes the log file under logs/ by default", async () => {
    delete process.env.SSL_MONITOR_LOG_FILE;
    vi.resetModules();
    const { PATHS } = await import("../src/config.js");
    expect(PATHS.LOG_FILE).toBe("logs/ssl_monitor.log");
  });

  it("takes the log file from the environment", async () => {
    process.env.SSL_MONITOR_LOG_FILE = "var/monitor.log";
    vi.resetModules();
    const { PATHS } = await import("../src/config.js");
    expect(PATHS.LOG_FILE).toBe("var/monitor.log");
  });
});
