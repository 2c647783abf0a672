import { createServer, type IncomingMessage, type Server, type ServerResponse } from "http";
import type { AddressInfo } from "net";
import type { RelayConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import type { UrlOpener } from "../lib/ports/url-opener.js";
import type { Clock, TimerService } from "../lib/ports/time.js";
import { realTimerService } from "../lib/adapters/system-time.js";
import { bindFailed } from "../lib/errors/catalog.js";
import { createOriginFilter } from "./origin-filter.js";
import { createAuthGuard } from "./auth-guard.js";
import { createRouter } from "./router.js";
import { handleRelayRequest, type HandlerDeps } from "./handler.js";
import { CORS_HEADERS, readBody } from "./wire.js";
import type { WireResponse } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RelayServerDeps {
  opener: UrlOpener;
  logger: Logger;
  version: string;
  clock?: Clock;
  timerService?: TimerService;
}

export interface RelayServer {
  /** Bind and start accepting. Rejects with BIND_FAILED */
  start(): Promise<AddressInfo>;
  /** Stop accepting, let in-flight requests finish within the grace period */
  stop(): Promise<void>;
  /** Bound address, once started */
  address(): AddressInfo | null;
  /** Requests currently being handled */
  inFlight(): number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const HEADER_CHECK_INTERVAL_MS = 1000;

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function writeResponse(res: ServerResponse, response: WireResponse, closing: boolean): void {
  res.statusCode = response.status;
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    res.setHeader(name, value);
  }
  if (response.close || closing) {
    res.setHeader("Connection", "close");
  }
  if (response.body === undefined) {
    res.end();
    return;
  }
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Cache-Control", "no-store");
  res.end(JSON.stringify(response.body));
}

/**
 * Create the relay's HTTP listener.
 *
 * Each request runs through the origin filter, auth guard and router as an
 * independent async handler; only the frozen config and the injected
 * collaborators are shared.
 */
export function createRelayServer(config: RelayConfig, deps: RelayServerDeps): RelayServer {
  const { logger, timerService = realTimerService } = deps;

  const handlerDeps: HandlerDeps = {
    originFilter: createOriginFilter(config.allowedRanges),
    authGuard: createAuthGuard(config.token),
    router: createRouter({
      opener: deps.opener,
      allowedSchemes: config.allowedSchemes,
      openTimeoutMs: config.openTimeoutMs,
      dryRun: config.dryRun,
      version: deps.version,
      logger,
      clock: deps.clock,
      timerService,
    }),
    logger,
  };

  const pending = new Set<Promise<void>>();
  let server: Server | null = null;
  let closing = false;
  let sequence = 0;

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    sequence += 1;
    const requestId = `req-${sequence}`;
    const requestLogger = logger.child({ requestId });
    const method = req.method ?? "GET";
    const path = req.url ?? "/";

    requestLogger.debug("Request", { method, path, source: req.socket.remoteAddress });

    const response = await handleRelayRequest(
      {
        method,
        path,
        headers: req.headers,
        source: req.socket.remoteAddress,
        readBody: () =>
          readBody(req, req.headers["content-length"], {
            maxBytes: config.maxBodyBytes,
            timeoutMs: config.readTimeoutMs,
            timerService,
          }),
      },
      { ...handlerDeps, logger: requestLogger }
    );

    if (res.writableEnded || res.destroyed) {
      return;
    }
    writeResponse(res, response, closing);
    requestLogger.debug("Response", { status: response.status });
  }

  function onRequest(req: IncomingMessage, res: ServerResponse): void {
    const task = handle(req, res).catch((error: unknown) => {
      logger.error("Failed to write response", {
        error: error instanceof Error ? error.message : String(error),
      });
      res.destroy();
    });
    pending.add(task);
    void task.finally(() => pending.delete(task));
  }

  async function start(): Promise<AddressInfo> {
    if (server) {
      throw new Error("Relay server already started");
    }

    const instance = createServer(
      {
        // Bodies have their own deadline in readBody; this is only a backstop
        requestTimeout: config.readTimeoutMs * 2,
        headersTimeout: config.readTimeoutMs,
        // Node only enforces the two timeouts above on this interval
        connectionsCheckingInterval: Math.min(HEADER_CHECK_INTERVAL_MS, config.readTimeoutMs),
      },
      onRequest
    );

    instance.on("clientError", (error: Error, socket) => {
      const timedOut = "code" in error && error.code === "ERR_HTTP_REQUEST_TIMEOUT";
      logger.debug(timedOut ? "Request headers timed out" : "Malformed HTTP from client", {
        error: error.message,
      });
      if (socket.writable) {
        socket.end(
          timedOut
            ? "HTTP/1.1 408 Request Timeout\r\nConnection: close\r\n\r\n"
            : "HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n"
        );
      } else {
        socket.destroy();
      }
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        reject(bindFailed(config.bindAddress, config.port, error));
      };
      instance.once("error", onError);
      instance.listen(config.port, config.bindAddress, () => {
        instance.off("error", onError);
        resolve();
      });
    });

    instance.on("error", (error: Error) => {
      logger.error("Listener error", { error: error.message });
    });

    server = instance;
    closing = false;
    const bound = instance.address();
    if (bound === null || typeof bound === "string") {
      throw new Error("Relay server is not bound to a TCP port");
    }
    return bound;
  }

  async function stop(): Promise<void> {
    const instance = server;
    if (!instance) {
      return;
    }
    closing = true;

    const closed = new Promise<void>((resolve) => {
      instance.close(() => resolve());
    });
    instance.closeIdleConnections();

    if (pending.size > 0) {
      logger.info("Waiting for in-flight requests", {
        count: pending.size,
        graceMs: config.shutdownGraceMs,
      });
      let timer: NodeJS.Timeout | undefined;
      const grace = new Promise<void>((resolve) => {
        timer = timerService.setTimeout(() => resolve(), config.shutdownGraceMs);
      });
      await Promise.race([Promise.allSettled([...pending]), grace]);
      if (timer !== undefined) {
        timerService.clearTimeout(timer);
      }
      if (pending.size > 0) {
        logger.warn("Grace period over, closing remaining connections", {
          count: pending.size,
        });
      }
    }

    instance.closeAllConnections();
    await closed;
    server = null;
  }

  return {
    start,
    stop,
    address() {
      const bound = server?.address();
      return bound && typeof bound !== "string" ? bound : null;
    },
    inFlight: () => pending.size,
  };
}
