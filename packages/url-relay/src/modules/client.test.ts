import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { runPing, runSend } from "./client.js";
import type { FetchLike } from "../lib/relay-client.js";
import { initContext, resetContext } from "../lib/cli-context.js";

const env = { URL_RELAY_HOST: "10.211.55.2", URL_RELAY_TOKEN: "test-secret" };

function reply(body: unknown) {
  return { ok: true, status: 200, text: async () => JSON.stringify(body) };
}

describe("client commands", () => {
  let logSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    resetContext();
    vi.restoreAllMocks();
  });

  it("prints the relay's service, version and latency", async () => {
    initContext(["node", "url-relay", "ping", "--quiet"]);
    const fetchImpl = vi.fn<FetchLike>(async () =>
      reply({ ok: true, service: "url-relay", version: "1.2.3" })
    );
    const times = [100, 142];
    const clock = { now: () => times.shift() ?? 0 };

    await runPing({}, { fetchImpl, env, clock });

    const line = String(logSpy.mock.calls[0][0]);
    expect(line).toContain("url-relay 1.2.3 at http://10.211.55.2:51888");
    expect(line).toContain("(42 ms)");
  });

  it("emits a JSON envelope for send in JSON mode", async () => {
    initContext(["node", "url-relay", "send", "--json"]);
    const fetchImpl = vi.fn<FetchLike>(async () =>
      reply({ ok: true, url: "https://example.com", dryRun: true, elapsedMs: 3 })
    );

    await runSend("https://example.com", {}, { fetchImpl, env });

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      success: true,
      data: {
        endpoint: "http://10.211.55.2:51888",
        url: "https://example.com",
        dryRun: true,
        elapsedMs: 3,
      },
    });
  });

  it("passes relay refusals to the caller", async () => {
    initContext(["node", "url-relay", "send", "--quiet"]);
    const fetchImpl = vi.fn<FetchLike>(async () => ({
      ok: false,
      status: 401,
      text: async () => JSON.stringify({ ok: false, error: { code: "AUTH_DENIED", message: "Unauthorized" } }),
    }));

    await expect(runSend("https://example.com", {}, { fetchImpl, env })).rejects.toThrow(
      "Relay answered HTTP 401"
    );
    expect(logSpy).not.toHaveBeenCalled();
  });
});
