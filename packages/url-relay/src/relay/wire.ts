import type { Readable } from "stream";
import { z } from "zod";
import type { TimerService } from "../lib/ports/time.js";
import { realTimerService } from "../lib/adapters/system-time.js";
import {
  malformedRequest,
  methodNotAllowed,
  notFound,
  payloadTooLarge,
  requestTimeout,
  unsupportedMediaType,
} from "../lib/errors/catalog.js";
import type { OperationKind } from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Sent on every response so page scripts in the guest can call the relay */
export const CORS_HEADERS: Readonly<Record<string, string>> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, X-Auth-Token",
  "Access-Control-Max-Age": "600",
};

const ROUTES = new Map<string, { method: string; kind: OperationKind }>([
  ["/open", { method: "POST", kind: "open" }],
  ["/ping", { method: "GET", kind: "ping" }],
]);

const OpenBodySchema = z.object({
  url: z.string({ invalid_type_error: "'url' must be a string" }).optional(),
});

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

/**
 * Map method and path to an operation. Query strings are ignored.
 * Throws NOT_FOUND for unknown paths, METHOD_NOT_ALLOWED for known paths
 * hit with the wrong method.
 */
export function resolveOperation(method: string, rawPath: string): OperationKind {
  const path = rawPath.split("?")[0].replace(/\/+$/, "") || "/";
  const route = ROUTES.get(path);
  if (!route) {
    throw notFound(method, path);
  }
  if (route.method !== method.toUpperCase()) {
    throw methodNotAllowed(method, path);
  }
  return route.kind;
}

// ---------------------------------------------------------------------------
// Body Reading
// ---------------------------------------------------------------------------

export interface BodyLimits {
  maxBytes: number;
  timeoutMs: number;
  timerService?: TimerService;
}

/**
 * Collect a request body under a size cap and a deadline.
 *
 * A declared Content-Length over the cap fails before anything is read.
 */
export function readBody(
  stream: Readable,
  declaredLength: string | undefined,
  limits: BodyLimits
): Promise<Buffer> {
  const { maxBytes, timeoutMs, timerService = realTimerService } = limits;

  if (declaredLength !== undefined) {
    const length = Number(declaredLength);
    if (!Number.isInteger(length) || length < 0) {
      return Promise.reject(malformedRequest("Invalid Content-Length"));
    }
    if (length > maxBytes) {
      return Promise.reject(payloadTooLarge(maxBytes));
    }
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    const cleanup = () => {
      settled = true;
      timerService.clearTimeout(timer);
      stream.off("data", onData);
      stream.off("end", onEnd);
      stream.off("error", onError);
    };

    const fail = (error: Error) => {
      if (settled) return;
      cleanup();
      stream.pause();
      reject(error);
    };

    const onData = (chunk: Buffer | string) => {
      const buffer = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      size += buffer.length;
      if (size > maxBytes) {
        fail(payloadTooLarge(maxBytes));
        return;
      }
      chunks.push(buffer);
    };

    const onEnd = () => {
      if (settled) return;
      cleanup();
      resolve(Buffer.concat(chunks));
    };

    const onError = (error: Error) => {
      fail(malformedRequest(`Request body could not be read: ${error.message}`));
    };

    const timer = timerService.setTimeout(() => fail(requestTimeout(timeoutMs)), timeoutMs);

    stream.on("data", onData);
    stream.on("end", onEnd);
    stream.on("error", onError);
  });
}

// ---------------------------------------------------------------------------
// Body Parsing
// ---------------------------------------------------------------------------

function mediaType(contentType: string | undefined): string {
  return (contentType ?? "").split(";")[0].trim().toLowerCase();
}

/**
 * Pull the `url` field out of an open request body.
 *
 * JSON is the primary encoding; a form-encoded body is accepted too. A
 * missing Content-Type is read as JSON. Returns `undefined` for a missing
 * field and leaves URL checks to the router.
 */
export function parseOpenBody(body: Buffer, contentType: string | undefined): string | undefined {
  const type = mediaType(contentType);
  const text = body.toString("utf8");

  if (type === "application/x-www-form-urlencoded") {
    return new URLSearchParams(text).get("url") ?? undefined;
  }

  if (type !== "" && type !== "application/json" && type !== "text/plain") {
    throw unsupportedMediaType(type);
  }

  if (!text.trim()) {
    return undefined;
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw malformedRequest("Body is not valid JSON");
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw malformedRequest("Body must be a JSON object");
  }

  const result = OpenBodySchema.safeParse(data);
  if (!result.success) {
    throw malformedRequest(result.error.issues[0]?.message ?? "Invalid body");
  }
  return result.data.url;
}
