import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { createLogger, generateCorrelationId, isLogLevel } from "../index";

describe("createLogger", () => {
  let mockConsole: {
    debug: MockInstance;
    info: MockInstance;
    warn: MockInstance;
    error: MockInstance;
  };

  beforeEach(() => {
    mockConsole = {
      debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
      info: vi.spyOn(console, "info").mockImplementation(() => {}),
      warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
      error: vi.spyOn(console, "error").mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs debug messages when the minimum level allows it", () => {
    const logger = createLogger({ correlationId: "debug-test", minLevel: "debug" });
    logger.debug("Test message");

    expect(mockConsole.debug).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(mockConsole.debug.mock.calls[0][0]));

    expect(parsed.level).toBe("debug");
    expect(parsed.correlationId).toBe("debug-test");
    expect(parsed.message).toBe("Test message");
    expect(parsed.timestamp).toBeDefined();
    expect(parsed.minLevel).toBeUndefined();
  });

  it("drops debug messages at the default level", () => {
    const logger = createLogger({ correlationId: "quiet" });
    logger.debug("hidden");
    logger.info("shown");

    expect(mockConsole.debug).not.toHaveBeenCalled();
    expect(mockConsole.info).toHaveBeenCalledTimes(1);
  });

  it("only writes errors at the error level", () => {
    const logger = createLogger({ correlationId: "errors-only", minLevel: "error" });
    logger.info("hidden");
    logger.warn("hidden");
    logger.error("shown");

    expect(mockConsole.info).not.toHaveBeenCalled();
    expect(mockConsole.warn).not.toHaveBeenCalled();
    expect(mockConsole.error).toHaveBeenCalledTimes(1);
  });

  it("merges meta into the entry", () => {
    const logger = createLogger({ correlationId: "info-test" });
    logger.info("applied ruleset", { elapsedMs: 12 });

    const parsed = JSON.parse(String(mockConsole.info.mock.calls[0][0]));

    expect(parsed.level).toBe("info");
    expect(parsed.message).toBe("applied ruleset");
    expect(parsed.elapsedMs).toBe(12);
  });

  it("writes warnings to console.warn", () => {
    const logger = createLogger({ correlationId: "warn-test" });
    logger.warn("cannot set nf_conntrack_max");

    expect(mockConsole.warn).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(mockConsole.warn.mock.calls[0][0]));
    expect(parsed.level).toBe("warn");
  });

  describe("child logger", () => {
    it("creates child logger with merged context", () => {
      const parent = createLogger({ correlationId: "cycle-1", service: "fwsync" });
      const child = parent.child({ component: "orchestrator" });

      child.info("Child log");

      const parsed = JSON.parse(String(mockConsole.info.mock.calls[0][0]));
      expect(parsed.correlationId).toBe("cycle-1");
      expect(parsed.service).toBe("fwsync");
      expect(parsed.component).toBe("orchestrator");
    });

    it("allows overriding the correlation id", () => {
      const parent = createLogger({ correlationId: "daemon" });
      const child = parent.child({ correlationId: "cycle-2" });

      child.info("Override test");

      const parsed = JSON.parse(String(mockConsole.info.mock.calls[0][0]));
      expect(parsed.correlationId).toBe("cycle-2");
    });

    it("inherits the minimum level", () => {
      const parent = createLogger({ correlationId: "daemon", minLevel: "warn" });
      parent.child({ component: "loader" }).info("hidden");

      expect(mockConsole.info).not.toHaveBeenCalled();
    });
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});

describe("generateCorrelationId", () => {
  it("generates unique IDs", () => {
    const ids = new Set<string>();
    for (let i = 0; i < 100; i++) {
      ids.add(generateCorrelationId());
    }
    expect(ids.size).toBe(100);
  });

  it("uses the cycle prefix by default", () => {
    const parts = generateCorrelationId().split("_");
    expect(parts.length).toBe(3);
    expect(parts[0]).toBe("cycle");
    expect(parts[2]).toMatch(/^[0-9a-z]{6}$/);
  });

  it("accepts a custom prefix", () => {
    expect(generateCorrelationId("daemon").startsWith("daemon_")).toBe(true);
  });
});
