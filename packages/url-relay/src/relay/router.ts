import type { UrlOpener } from "../lib/ports/url-opener.js";
import type { Clock, TimerService } from "../lib/ports/time.js";
import type { Logger } from "../lib/logger.js";
import type { NavigableScheme } from "../lib/config.js";
import { malformedRequest, openFailed, openTimedOut } from "../lib/errors/catalog.js";
import { openWithDeadline } from "./opener.js";
import type { InboundRequest, OpenAck, PingAck } from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SERVICE_NAME = "url-relay";

export const MAX_URL_LENGTH = 8192;

/** Schemes whose URLs must name a host */
const HOST_SCHEMES = new Set(["http", "https", "ftp"]);

// Whitespace, C0/C1 controls and DEL
const UNSAFE_CHARS = /[\s\u0000-\u001f\u007f-\u009f]/;

// ---------------------------------------------------------------------------
// Validation (Pure Functions)
// ---------------------------------------------------------------------------

/**
 * Check a caller-supplied URL before it may reach the opener.
 * Returns the trimmed URL; throws MALFORMED_REQUEST otherwise.
 */
export function validateTargetUrl(
  raw: unknown,
  allowedSchemes: readonly NavigableScheme[]
): string {
  if (raw === undefined || raw === null) {
    throw malformedRequest("Missing 'url'");
  }
  if (typeof raw !== "string") {
    throw malformedRequest("'url' must be a string");
  }

  const url = raw.trim();
  if (!url) {
    throw malformedRequest("Missing 'url'");
  }
  if (url.length > MAX_URL_LENGTH) {
    throw malformedRequest(`'url' is longer than ${MAX_URL_LENGTH} characters`);
  }
  if (UNSAFE_CHARS.test(url)) {
    throw malformedRequest("'url' contains whitespace or control characters");
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw malformedRequest("'url' is not a valid absolute URL");
  }

  const scheme = parsed.protocol.replace(/:$/, "");
  if (!allowedSchemes.some((allowed) => allowed === scheme)) {
    throw malformedRequest(
      `Only ${allowedSchemes.join("/")} URLs are permitted`
    );
  }
  if (HOST_SCHEMES.has(scheme) && !parsed.hostname) {
    throw malformedRequest("'url' has no host");
  }

  return url;
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export interface RouterDeps {
  opener: UrlOpener;
  allowedSchemes: readonly NavigableScheme[];
  openTimeoutMs: number;
  dryRun: boolean;
  version: string;
  logger: Logger;
  clock?: Clock;
  timerService?: TimerService;
}

export interface Router {
  route(request: InboundRequest): Promise<PingAck | OpenAck>;
}

/**
 * Dispatch authenticated requests. Stateless: every call stands alone.
 */
export function createRouter(deps: RouterDeps): Router {
  const { opener, allowedSchemes, openTimeoutMs, dryRun, version, logger } = deps;

  async function handleOpen(rawUrl: unknown, source: string): Promise<OpenAck> {
    const url = validateTargetUrl(rawUrl, allowedSchemes);

    const outcome = await openWithDeadline(opener, url, {
      timeoutMs: openTimeoutMs,
      clock: deps.clock,
      timerService: deps.timerService,
    });

    if (!outcome.ok) {
      logger.error("Open failed", {
        source,
        url,
        reason: outcome.reason,
        error: outcome.error,
        elapsedMs: outcome.elapsedMs,
      });
      throw outcome.reason === "timeout"
        ? openTimedOut(openTimeoutMs)
        : openFailed(outcome.error);
    }

    logger.info("Opened URL", { source, url, dryRun, elapsedMs: outcome.elapsedMs });
    return { ok: true, url, dryRun, elapsedMs: outcome.elapsedMs };
  }

  return {
    async route(request) {
      switch (request.kind) {
        case "ping":
          logger.debug("Ping", { source: request.source });
          return { ok: true, service: SERVICE_NAME, version };
        case "open":
          return handleOpen(request.url, request.source);
      }
    },
  };
}
