import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Logger, createLogger } from "./Logger.ts";

const spyOnConsoleLog = () => vi.spyOn(console, "log").mockImplementation(() => {});

describe("Logger", () => {
  let consoleSpy: {
    log: ReturnType<typeof spyOnConsoleLog>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: spyOnConsoleLog(),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lastLine = (): string => String(consoleSpy.log.mock.calls.at(-1)?.[0]);

  describe("constructor", () => {
    it("should create logger with level", () => {
      const logger = new Logger({ level: "info" });
      expect(logger.level).toBe("info");
    });
  });

  describe("child", () => {
    it("should inherit parent level", () => {
      const logger = new Logger({ level: "debug" });
      const child = logger.child({ module: "test" });

      expect(child.level).toBe("debug");
    });

    it("should prefix messages with the child module", () => {
      const logger = new Logger({ level: "info", timestamps: false, json: true });
      const child = logger.child({ module: "NodeRpcProxy" });
      child.info("message");

      expect(JSON.parse(lastLine())).toEqual({
        level: "info",
        message: "message",
        module: "NodeRpcProxy",
      });
    });
  });

  describe("level filtering", () => {
    it("should not log below current level", () => {
      const logger = new Logger({ level: "warn" });
      logger.info("info message");
      logger.debug("debug message");
      logger.trace("trace message");

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });

    it("should log at and above current level", () => {
      const logger = new Logger({ level: "warn" });
      logger.warn("warn message");
      logger.error("error message");

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
    });

    it("should log every level at trace", () => {
      const logger = new Logger({ level: "trace" });
      logger.trace("a");
      logger.debug("b");
      logger.info("c");

      expect(consoleSpy.log).toHaveBeenCalledTimes(3);
    });
  });

  describe("isLevelEnabled", () => {
    it("should return true for enabled levels", () => {
      const logger = new Logger({ level: "info" });

      expect(logger.isLevelEnabled("error")).toBe(true);
      expect(logger.isLevelEnabled("warn")).toBe(true);
      expect(logger.isLevelEnabled("info")).toBe(true);
    });

    it("should return false for disabled levels", () => {
      const logger = new Logger({ level: "warn" });

      expect(logger.isLevelEnabled("info")).toBe(false);
      expect(logger.isLevelEnabled("debug")).toBe(false);
      expect(logger.isLevelEnabled("trace")).toBe(false);
    });
  });

  describe("pretty mode", () => {
    it("should render module, node and context fields", () => {
      const logger = new Logger({ level: "info", timestamps: false });
      logger.info("Refreshed", { module: "NodeRpcProxy", node: "http://node.test", height: 42 });

      const plain = lastLine().replace(/\x1b\[[0-9;]*m/g, "");
      expect(plain).toBe("INF [NodeRpcProxy] [http://node.test] Refreshed height=42");
    });

    it("should skip undefined context fields", () => {
      const logger = new Logger({ level: "warn", timestamps: false });
      logger.warn("Node busy", { method: "get_info", error: undefined, extra: undefined });

      const plain = lastLine().replace(/\x1b\[[0-9;]*m/g, "");
      expect(plain).toBe("WRN Node busy method=get_info");
    });

    it("should print the stack of errors logged at error level", () => {
      const logger = new Logger({ level: "error", timestamps: false });
      const error = new Error("boom");
      logger.error("failed", { error });

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
      expect(lastLine()).toContain("Error: boom");
    });
  });

  describe("JSON mode", () => {
    it("should output JSON when configured", () => {
      const logger = new Logger({ level: "info", json: true, timestamps: false });
      logger.info("test message", { method: "get_info", height: 100 });

      expect(JSON.parse(lastLine())).toEqual({
        level: "info",
        message: "test message",
        method: "get_info",
        height: 100,
      });
    });

    it("should serialize errors", () => {
      const logger = new Logger({ level: "info", json: true, timestamps: false });
      logger.warn("unreachable", { error: new Error("ECONNREFUSED") });

      const entry = JSON.parse(lastLine());
      expect(entry.error.name).toBe("Error");
      expect(entry.error.message).toBe("ECONNREFUSED");
    });

    it("should include a timestamp by default", () => {
      const logger = new Logger({ level: "info", json: true });
      logger.info("test message");

      expect(typeof JSON.parse(lastLine()).timestamp).toBe("string");
    });
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should use the configured level", () => {
    expect(createLogger({ level: "debug" }).level).toBe("debug");
  });

  it("should use info as default level", () => {
    const logger = createLogger({});
    expect(logger.level).toBe("info");
  });

  it("should pass the output format through", () => {
    const log = spyOnConsoleLog();
    createLogger({ level: "info", timestamps: false, json: true }).info("ready");

    expect(JSON.parse(String(log.mock.calls.at(-1)?.[0]))).toEqual({ level: "info", message: "ready" });
  });
});
