import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { generateToken, parseTokenBytes, registerTokenCommand } from "./token.js";
import { initContext, resetContext } from "../lib/cli-context.js";

describe("token", () => {
  describe("generateToken", () => {
    it("encodes 32 random bytes as base64url by default", () => {
      const token = generateToken();

      expect(token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    });

    it("returns a different token each call", () => {
      expect(generateToken()).not.toBe(generateToken());
    });

    it("honours the byte count", () => {
      expect(generateToken(16)).toHaveLength(22);
    });
  });

  describe("parseTokenBytes", () => {
    it("accepts integers in range", () => {
      expect(parseTokenBytes("16")).toBe(16);
      expect(parseTokenBytes("128")).toBe(128);
    });

    it("rejects short, long, and fractional sizes", () => {
      expect(() => parseTokenBytes("8")).toThrow("Must be an integer between 16 and 128.");
      expect(() => parseTokenBytes("256")).toThrow("Must be an integer between 16 and 128.");
      expect(() => parseTokenBytes("20.5")).toThrow("Must be an integer between 16 and 128.");
    });
  });

  describe("token command", () => {
    let program: Command;
    let consoleLogSpy: MockInstance;

    beforeEach(() => {
      program = new Command();
      program.exitOverride();
      registerTokenCommand(program);
      consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    });

    afterEach(() => {
      resetContext();
      vi.restoreAllMocks();
    });

    it("prints a bare token", async () => {
      await program.parseAsync(["node", "test", "token", "--bytes", "16"]);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleLogSpy.mock.calls[0][0])).toMatch(/^[A-Za-z0-9_-]{22}$/);
    });

    it("prints a JSON envelope in JSON mode", async () => {
      initContext(["node", "test", "token", "--json"]);

      await program.parseAsync(["node", "test", "token"]);

      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
      expect(output).toEqual({
        success: true,
        data: { token: expect.stringMatching(/^[A-Za-z0-9_-]{43}$/), bytes: 32 },
      });
    });
  });
});
