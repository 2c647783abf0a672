import type { RequestInit, Response } from "node-fetch";
import fetch, { Headers } from "node-fetch";
import { z } from "zod";
import { configInvalid, missingToken, relayRejected, relayUnreachable } from "./errors/catalog.js";
import { RelayError } from "./errors/types.js";
import { CONFIG_DEFAULTS } from "./config.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of `fetch` the client uses */
export type FetchLike = (
  input: URL,
  init: RequestInit
) => Promise<Pick<Response, "ok" | "status" | "text">>;

export interface RelayClientOptions {
  host?: string;
  port?: number;
  token?: string;
  https?: boolean;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

const PingAckSchema = z.object({
  ok: z.literal(true),
  service: z.string(),
  version: z.string(),
});

const OpenAckSchema = z.object({
  ok: z.literal(true),
  url: z.string(),
  dryRun: z.boolean(),
  elapsedMs: z.number(),
});

export type PingReply = z.infer<typeof PingAckSchema>;
export type OpenReply = z.infer<typeof OpenAckSchema>;

export interface RelayClient {
  readonly endpoint: string;
  ping(): Promise<PingReply>;
  send(url: string): Promise<OpenReply>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_CLIENT_HOST = "127.0.0.1";
export const DEFAULT_CLIENT_TIMEOUT_MS = 10000;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Client for a running relay, used by the `ping` and `send` commands.
 */
export function createRelayClient({
  host = DEFAULT_CLIENT_HOST,
  port = CONFIG_DEFAULTS.port,
  token = "",
  https = false,
  timeoutMs = DEFAULT_CLIENT_TIMEOUT_MS,
  fetchImpl = fetch,
}: RelayClientOptions = {}): RelayClient {
  const hostPart = host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
  const endpoint = `${https ? "https" : "http"}://${hostPart}:${port}`;

  async function request<T>(
    path: string,
    init: RequestInit,
    schema: z.ZodType<T>
  ): Promise<T> {
    const headers = new Headers(init.headers);
    headers.set("X-Auth-Token", token);

    let response: Pick<Response, "ok" | "status" | "text">;
    try {
      response = await fetchImpl(new URL(path, endpoint), {
        ...init,
        headers,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw relayUnreachable(endpoint, error instanceof Error ? error : undefined);
    }

    const payload = parseJson(await response.text());
    if (!response.ok) {
      throw relayRejected(response.status, payload);
    }

    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new RelayError("UNKNOWN_ERROR", `Unexpected reply from ${endpoint}${path}`, {
        details: typeof payload === "string" ? payload : JSON.stringify(payload),
      });
    }
    return result.data;
  }

  return {
    endpoint,
    ping: () => request("/ping", { method: "GET" }, PingAckSchema),
    send: (url) =>
      request(
        "/open",
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ url }),
        },
        OpenAckSchema
      ),
  };
}

// ---------------------------------------------------------------------------
// Option Resolution
// ---------------------------------------------------------------------------

export const CLIENT_ENV = {
  host: "URL_RELAY_HOST",
  port: "URL_RELAY_PORT",
  token: "URL_RELAY_TOKEN",
} as const;

export interface ClientFlags {
  host?: string;
  port?: number;
  token?: string;
  https?: boolean;
  timeout?: number;
}

/**
 * Combine client flags with URL_RELAY_HOST / _PORT / _TOKEN.
 * Flags win; a malformed port in the environment is an error.
 */
export function resolveClientOptions(
  flags: ClientFlags,
  env: NodeJS.ProcessEnv = process.env
): RelayClientOptions {
  let port = flags.port;
  const envPort = env[CLIENT_ENV.port];
  if (port === undefined && envPort !== undefined && envPort.trim() !== "") {
    port = Number(envPort.trim());
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw configInvalid([`${CLIENT_ENV.port}: expected a port number, got "${envPort}"`], "environment");
    }
  }

  const token = flags.token ?? env[CLIENT_ENV.token];
  if (!token) {
    throw missingToken();
  }

  return {
    host: flags.host ?? (env[CLIENT_ENV.host]?.trim() || undefined),
    port,
    token,
    https: flags.https ?? false,
    timeoutMs: flags.timeout,
  };
}
