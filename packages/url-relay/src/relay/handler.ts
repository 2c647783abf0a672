import type { Logger } from "../lib/logger.js";
import { RelayError, isRelayError } from "../lib/errors/types.js";
import { authDenied, originDenied, unknownError } from "../lib/errors/catalog.js";
import type { OriginFilter } from "./origin-filter.js";
import type { AuthGuard } from "./auth-guard.js";
import { extractToken } from "./auth-guard.js";
import type { Router } from "./router.js";
import { parseOpenBody, resolveOperation } from "./wire.js";
import type { ErrorBody, WireRequest, WireResponse } from "./types.js";

export interface HandlerDeps {
  originFilter: OriginFilter;
  authGuard: AuthGuard;
  router: Router;
  logger: Logger;
}

/** Errors raised while the body may still be unread on the socket */
const CLOSE_AFTER: ReadonlySet<string> = new Set(["PAYLOAD_TOO_LARGE", "REQUEST_TIMEOUT"]);

export function errorBody(error: RelayError): ErrorBody {
  return {
    ok: false,
    error: {
      code: error.code,
      message: error.message,
      ...(error.details !== undefined && { details: error.details }),
    },
  };
}

function errorResponse(error: RelayError): WireResponse {
  return {
    status: error.status,
    body: errorBody(error),
    ...(CLOSE_AFTER.has(error.code) && { close: true }),
  };
}

/**
 * Run one request through the relay pipeline:
 * origin check, auth check, route resolution, body parse, dispatch.
 *
 * Never throws; every failure becomes a response.
 */
export async function handleRelayRequest(
  request: WireRequest,
  deps: HandlerDeps
): Promise<WireResponse> {
  const { originFilter, authGuard, router, logger } = deps;
  const source = request.source ?? "unknown";

  if (request.source === undefined || !originFilter.allows(request.source)) {
    logger.debug("Rejected request from disallowed address", {
      source,
      method: request.method,
      path: request.path,
    });
    return { ...errorResponse(originDenied()), close: true };
  }

  // Preflight carries no token
  if (request.method.toUpperCase() === "OPTIONS") {
    return { status: 204 };
  }

  if (!authGuard.verify(extractToken(request.headers))) {
    logger.warn("Rejected request with bad token", {
      source,
      method: request.method,
      path: request.path,
    });
    return errorResponse(authDenied());
  }

  try {
    const kind = resolveOperation(request.method, request.path);

    if (kind === "ping") {
      const ack = await router.route({ kind, source });
      return { status: 200, body: ack };
    }

    const raw = await request.readBody();
    const contentType = request.headers["content-type"];
    const url = parseOpenBody(raw, typeof contentType === "string" ? contentType : undefined);
    const ack = await router.route({ kind, url, source });
    return { status: 200, body: ack };
  } catch (error) {
    if (isRelayError(error)) {
      if (error.status < 500) {
        logger.debug("Rejected request", {
          source,
          path: request.path,
          code: error.code,
          reason: error.message,
        });
      }
      return errorResponse(error);
    }

    const wrapped = unknownError(error);
    logger.error("Unexpected error handling request", { source, error: wrapped.message });
    return {
      status: 500,
      body: { ok: false, error: { code: "UNKNOWN_ERROR", message: "Internal error" } },
    };
  }
}
