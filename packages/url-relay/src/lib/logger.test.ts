import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import {
  createLogger,
  createNoopLogger,
  levelFromVerbose,
  redactMeta,
} from "./logger.js";

describe("logger", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("createLogger", () => {
    describe("log level filtering", () => {
      it("logs debug when level is debug", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.debug("test message");
        expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      });

      it("does not log debug when level is info", () => {
        const logger = createLogger({ level: "info", json: false });
        logger.debug("test message");
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });

      it("does not log warn when level is error", () => {
        const logger = createLogger({ level: "error", json: false });
        logger.warn("test message");
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });
    });

    describe("output routing", () => {
      it("logs info to stdout", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.info("info message");
        expect(consoleLogSpy).toHaveBeenCalledTimes(1);
        expect(consoleErrorSpy).not.toHaveBeenCalled();
      });

      it("logs warn and error to stderr", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.warn("warn message");
        logger.error("error message");
        expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
        expect(consoleLogSpy).not.toHaveBeenCalled();
      });
    });

    describe("JSON format", () => {
      it("outputs one JSON object per line with metadata", () => {
        const logger = createLogger({ level: "debug", json: true });
        logger.info("Relay listening", { port: 51888, bind: "0.0.0.0" });

        const parsed = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));

        expect(parsed.message).toBe("Relay listening");
        expect(parsed.level).toBe("info");
        expect(parsed.port).toBe(51888);
        expect(parsed.bind).toBe("0.0.0.0");
        expect(typeof parsed.timestamp).toBe("string");
      });
    });

    describe("human-readable format", () => {
      it("prefixes timestamp and padded level", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.info("test message");

        const output = String(consoleLogSpy.mock.calls[0][0]);
        expect(output).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO  test message$/);
      });

      it("appends metadata as JSON when provided", () => {
        const logger = createLogger({ level: "debug", json: false });
        logger.info("test message", { key: "value" });

        const output = String(consoleLogSpy.mock.calls[0][0]);
        expect(output.endsWith(' test message {"key":"value"}')).toBe(true);
      });
    });

    describe("redaction", () => {
      it("never prints token values passed as metadata", () => {
        const logger = createLogger({ level: "debug", json: true });
        logger.warn("Rejected request", { token: "test-secret", source: "10.0.0.5" });

        const parsed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
        expect(parsed.token).toBe("***REDACTED***");
        expect(parsed.source).toBe("10.0.0.5");
      });
    });

    describe("child logger", () => {
      it("includes default meta on all logs", () => {
        const logger = createLogger({ level: "debug", json: true });
        const child = logger.child({ requestId: "req-1" });

        child.info("message 1");
        child.warn("message 2");

        const output1 = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
        const output2 = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));

        expect(output1.requestId).toBe("req-1");
        expect(output2.requestId).toBe("req-1");
      });

      it("per-call metadata overrides default meta", () => {
        const logger = createLogger({ level: "debug", json: true });
        const child = logger.child({ component: "default" });

        child.info("message", { component: "override" });

        const output = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
        expect(output.component).toBe("override");
      });
    });
  });

  describe("levelFromVerbose", () => {
    it("maps verbose to debug and quiet to info", () => {
      expect(levelFromVerbose(true)).toBe("debug");
      expect(levelFromVerbose(false)).toBe("info");
    });
  });

  describe("redactMeta", () => {
    it("matches secret keys case-insensitively", () => {
      expect(redactMeta({ "X-Auth-Token": "abc", Authorization: "Bearer x", url: "https://example.com" })).toEqual({
        "X-Auth-Token": "***REDACTED***",
        Authorization: "***REDACTED***",
        url: "https://example.com",
      });
    });
  });

  describe("createNoopLogger", () => {
    it("returns a logger that does nothing, including children", () => {
      const logger = createNoopLogger();

      logger.debug("debug");
      logger.info("info");
      logger.warn("warn");
      logger.error("error");
      logger.child({ requestId: "x" }).info("child");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });
  });
});
