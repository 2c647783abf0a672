import { describe, it, expect, afterEach } from "vitest";
import fetch from "node-fetch";
import { request as httpRequest } from "http";
import { connect } from "net";
import { createRelayServer, type RelayServer } from "./server.js";
import type { RelayConfig } from "../lib/config.js";
import type { UrlOpener } from "../lib/ports/url-opener.js";
import { createNoopLogger } from "../lib/logger.js";
import { createRecordingUrlOpener } from "../lib/adapters/recording-opener.js";
import { createDryRunUrlOpener } from "../lib/adapters/dry-run-opener.js";
import { isRelayError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const baseConfig: RelayConfig = {
  bindAddress: "127.0.0.1",
  port: 0,
  token: "t1",
  allowedRanges: ["127.0.0.0/8"],
  allowedSchemes: ["http", "https"],
  verbose: false,
  dryRun: false,
  logJson: false,
  openTimeoutMs: 2000,
  readTimeoutMs: 1000,
  maxBodyBytes: 1024,
  shutdownGraceMs: 500,
};

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

interface RawResponse {
  status: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * Plain HTTP request that can declare a length and send only part of it.
 */
function rawRequest(
  port: number,
  options: { method: string; path: string; headers?: Record<string, string | number>; body?: string; end?: boolean }
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = httpRequest(
      { host: "127.0.0.1", port, method: options.method, path: options.path, headers: options.headers, agent: false },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString("utf8"),
          });
          req.destroy();
        });
      }
    );
    req.on("error", reject);
    if (options.body !== undefined) {
      req.write(options.body);
    }
    if (options.end !== false) {
      req.end();
    }
  });
}

/**
 * Send raw bytes and collect everything until the server closes the socket.
 */
function rawExchange(port: number, payload: string): Promise<{ data: string; elapsedMs: number }> {
  return new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const chunks: Buffer[] = [];
    const socket = connect(port, "127.0.0.1", () => {
      socket.write(payload);
    });
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("error", reject);
    socket.on("close", () => {
      resolve({ data: Buffer.concat(chunks).toString("utf8"), elapsedMs: Date.now() - startedAt });
    });
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("createRelayServer", () => {
  const servers: RelayServer[] = [];

  async function startServer(
    opener: UrlOpener,
    overrides: Partial<RelayConfig> = {}
  ): Promise<{ server: RelayServer; base: string; port: number }> {
    const server = createRelayServer(
      { ...baseConfig, ...overrides },
      { opener, logger: createNoopLogger(), version: "1.2.3" }
    );
    servers.push(server);
    const address = await server.start();
    return { server, base: `http://127.0.0.1:${address.port}`, port: address.port };
  }

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.stop()));
  });

  it("opens a URL over loopback", async () => {
    const opener = createRecordingUrlOpener();
    const { base } = await startServer(opener);

    const response = await fetch(`${base}/open`, {
      method: "POST",
      headers: { "X-Auth-Token": "t1", "Content-Type": "application/json" },
      body: JSON.stringify({ url: "https://example.com" }),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    await expect(response.json()).resolves.toMatchObject({
      ok: true,
      url: "https://example.com",
      dryRun: false,
    });
    expect(opener.dispatched).toEqual(["https://example.com"]);
  });

  it("reports dry-run without dispatching", async () => {
    const { base } = await startServer(createDryRunUrlOpener(), { dryRun: true });

    const response = await fetch(`${base}/open`, {
      method: "POST",
      headers: { "X-Auth-Token": "t1" },
      body: JSON.stringify({ url: "https://example.com" }),
    });

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({ ok: true, dryRun: true });
  });

  it("answers ping and preflight", async () => {
    const { base } = await startServer(createRecordingUrlOpener());

    const ping = await fetch(`${base}/ping`, { headers: { "X-Auth-Token": "t1" } });
    expect(ping.status).toBe(200);
    await expect(ping.json()).resolves.toEqual({ ok: true, service: "url-relay", version: "1.2.3" });

    const preflight = await fetch(`${base}/open`, { method: "OPTIONS" });
    expect(preflight.status).toBe(204);
    expect(preflight.headers.get("access-control-allow-methods")).toBe("GET, POST, OPTIONS");
    expect(preflight.headers.get("access-control-allow-headers")).toBe("Content-Type, X-Auth-Token");
  });

  it("refuses a wrong token", async () => {
    const opener = createRecordingUrlOpener();
    const { base } = await startServer(opener);

    const response = await fetch(`${base}/open`, {
      method: "POST",
      headers: { "X-Auth-Token": "wrong" },
      body: JSON.stringify({ url: "https://example.com" }),
    });

    expect(response.status).toBe(401);
    await expect(response.json()).resolves.toEqual({
      ok: false,
      error: { code: "AUTH_DENIED", message: "Unauthorized" },
    });
    expect(opener.dispatched).toEqual([]);
  });

  it("refuses loopback when it is outside the allowed ranges", async () => {
    const opener = createRecordingUrlOpener();
    const { port } = await startServer(opener, { allowedRanges: ["10.0.0.0/24"] });

    const response = await rawRequest(port, {
      method: "POST",
      path: "/open",
      headers: { "X-Auth-Token": "t1", "Content-Type": "application/json" },
      body: JSON.stringify({ url: "https://example.com" }),
    });

    expect(response.status).toBe(403);
    expect(JSON.parse(response.body)).toEqual({
      ok: false,
      error: { code: "ORIGIN_DENIED", message: "Forbidden: client address not allowed" },
    });
    expect(opener.dispatched).toEqual([]);
  });

  it("answers 413 for a declared length over the limit", async () => {
    const opener = createRecordingUrlOpener();
    const { port } = await startServer(opener);
    const body = JSON.stringify({ url: `https://example.com/${"a".repeat(2000)}` });

    const response = await rawRequest(port, {
      method: "POST",
      path: "/open",
      headers: {
        "X-Auth-Token": "t1",
        "Content-Type": "application/json",
        "Content-Length": Buffer.byteLength(body),
      },
      body,
    });

    expect(response.status).toBe(413);
    expect(response.headers.connection).toBe("close");
    expect(opener.dispatched).toEqual([]);
  });

  it("answers 408 for a body that stalls", async () => {
    const opener = createRecordingUrlOpener();
    const { port } = await startServer(opener);

    const response = await rawRequest(port, {
      method: "POST",
      path: "/open",
      headers: { "X-Auth-Token": "t1", "Content-Type": "application/json", "Content-Length": 50 },
      body: '{"url":',
      end: false,
    });

    expect(response.status).toBe(408);
    expect(JSON.parse(response.body)).toEqual({
      ok: false,
      error: { code: "REQUEST_TIMEOUT", message: "Request body not received within 1000 ms" },
    });
    expect(opener.dispatched).toEqual([]);
  });

  it("closes a connection whose headers never complete", async () => {
    const { port } = await startServer(createRecordingUrlOpener());

    const { data, elapsedMs } = await rawExchange(port, "GET /ping HTTP/1.1\r\nHost: relay\r\n");

    expect(data.startsWith("HTTP/1.1 408 Request Timeout")).toBe(true);
    expect(elapsedMs).toBeGreaterThanOrEqual(900);
    expect(elapsedMs).toBeLessThan(3000);
  }, 10000);

  it("serves concurrent opens independently", async () => {
    const opener = createRecordingUrlOpener();
    const { base } = await startServer(opener);
    const urls = ["https://a.example", "https://b.example", "https://c.example"];

    const statuses = await Promise.all(
      urls.map(async (url) => {
        const response = await fetch(`${base}/open`, {
          method: "POST",
          headers: { "X-Auth-Token": "t1" },
          body: JSON.stringify({ url }),
        });
        return response.status;
      })
    );

    expect(statuses).toEqual([200, 200, 200]);
    expect([...opener.dispatched].sort()).toEqual(urls);
  });

  it("rejects with BIND_FAILED when the port is taken", async () => {
    const { port } = await startServer(createRecordingUrlOpener());
    const second = createRelayServer(
      { ...baseConfig, port },
      { opener: createRecordingUrlOpener(), logger: createNoopLogger(), version: "1.2.3" }
    );

    let caught: unknown;
    try {
      await second.start();
    } catch (error) {
      caught = error;
    }

    expect(isRelayError(caught) && caught.code).toBe("BIND_FAILED");
    expect(isRelayError(caught) && caught.message).toBe(`Can't listen on 127.0.0.1:${port}`);
  });

  it("lets an in-flight request finish during shutdown", async () => {
    const started = deferred();
    const gate = deferred();
    const opener: UrlOpener = {
      async open() {
        started.resolve();
        await gate.promise;
      },
    };
    const { server, base } = await startServer(opener);

    const pending = fetch(`${base}/open`, {
      method: "POST",
      headers: { "X-Auth-Token": "t1" },
      body: JSON.stringify({ url: "https://example.com" }),
    });
    await started.promise;

    let stopped = false;
    const stopping = server.stop().then(() => {
      stopped = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(stopped).toBe(false);
    expect(server.inFlight()).toBe(1);

    gate.resolve();
    const response = await pending;
    expect(response.status).toBe(200);

    await stopping;
    expect(stopped).toBe(true);
    expect(server.address()).toBeNull();
  });

  it("drops requests still running when the grace period ends", async () => {
    const opener = createRecordingUrlOpener({ hang: true });
    const { server, base } = await startServer(opener, {
      shutdownGraceMs: 100,
      openTimeoutMs: 300,
    });

    const outcome = fetch(`${base}/open`, {
      method: "POST",
      headers: { "X-Auth-Token": "t1" },
      body: JSON.stringify({ url: "https://example.com" }),
    }).then(
      (response) => response.status,
      () => "connection closed"
    );

    while (opener.dispatched.length === 0) {
      await new Promise((resolve) => setTimeout(resolve, 10));
    }

    await server.stop();

    await expect(outcome).resolves.toBe("connection closed");
    expect(server.address()).toBeNull();
  });
});
