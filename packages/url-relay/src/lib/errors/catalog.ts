import { RelayError } from "./types.js";

/**
 * Error catalog - factory functions for creating RelayErrors.
 * Messages returned to relay callers stay generic; details are only added
 * where the caller needs them (open failures, validation reasons).
 */

// ============================================================================
// Startup Errors
// ============================================================================

export function configInvalid(issues: string[], source?: string): RelayError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  const where = source ? ` in ${source}` : "";
  return new RelayError("CONFIG_INVALID", `Configuration has errors${where}`, {
    suggestion: "Fix the issues below and start the relay again",
    example: "url-relay config show",
    details,
  });
}

export function missingToken(): RelayError {
  return new RelayError("CONFIG_INVALID", "No shared token configured", {
    suggestion: "Set URL_RELAY_TOKEN, pass --token, or add `token:` to the config file",
    example: "url-relay token",
  });
}

export function bindFailed(address: string, port: number, cause: Error): RelayError {
  const code = "code" in cause ? cause.code : undefined;
  const suggestion =
    code === "EADDRINUSE"
      ? `Port ${port} is already in use. Stop the other process or pick another port`
      : code === "EACCES"
        ? `Not allowed to listen on port ${port}. Use a port above 1023`
        : "Check the bind address exists on this host";
  return new RelayError("BIND_FAILED", `Can't listen on ${address}:${port}`, {
    suggestion,
    details: cause.message,
    cause,
  });
}

// ============================================================================
// Access Errors
// ============================================================================

export function originDenied(): RelayError {
  return new RelayError("ORIGIN_DENIED", "Forbidden: client address not allowed");
}

export function authDenied(): RelayError {
  return new RelayError("AUTH_DENIED", "Unauthorized");
}

// ============================================================================
// Request Errors
// ============================================================================

export function malformedRequest(reason: string): RelayError {
  return new RelayError("MALFORMED_REQUEST", reason);
}

export function payloadTooLarge(limitBytes: number): RelayError {
  return new RelayError(
    "PAYLOAD_TOO_LARGE",
    `Request body exceeds ${limitBytes} bytes`
  );
}

export function requestTimeout(timeoutMs: number): RelayError {
  return new RelayError(
    "REQUEST_TIMEOUT",
    `Request body not received within ${timeoutMs} ms`
  );
}

export function unsupportedMediaType(contentType: string): RelayError {
  return new RelayError(
    "UNSUPPORTED_MEDIA_TYPE",
    `Unsupported content type: ${contentType}`
  );
}

export function notFound(method: string, path: string): RelayError {
  return new RelayError("NOT_FOUND", `Not found: ${method} ${path}`);
}

export function methodNotAllowed(method: string, path: string): RelayError {
  return new RelayError("METHOD_NOT_ALLOWED", `${method} is not allowed on ${path}`);
}

// ============================================================================
// Open Errors
// ============================================================================

export function openFailed(details: string): RelayError {
  return new RelayError("OPEN_FAILED", "Couldn't open the URL on the host", {
    details,
  });
}

export function openTimedOut(timeoutMs: number): RelayError {
  return new RelayError("OPEN_TIMEOUT", "Opening the URL took too long", {
    details: `No result from the host browser within ${timeoutMs} ms`,
  });
}

// ============================================================================
// Client Errors
// ============================================================================

export function relayUnreachable(endpoint: string, cause?: Error): RelayError {
  return new RelayError("RELAY_UNREACHABLE", `Can't reach the relay at ${endpoint}`, {
    suggestion: "Check the host address, the port, and that `url-relay serve` is running",
    details: cause?.message,
    cause,
  });
}

export function relayRejected(status: number, payload: unknown): RelayError {
  return new RelayError("RELAY_REJECTED", `Relay answered HTTP ${status}`, {
    suggestion: suggestionForStatus(status),
    details: extractErrorMessage(payload),
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): RelayError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new RelayError("UNKNOWN_ERROR", message, { cause });
}

// ============================================================================
// Helpers
// ============================================================================

function suggestionForStatus(status: number): string | undefined {
  switch (status) {
    case 401:
      return "The token doesn't match the relay's token";
    case 403:
      return "This machine's address is outside the relay's allowed ranges";
    case 400:
      return "Only http and https URLs are accepted";
    case 502:
      return "The relay couldn't launch the browser. Check its logs";
    default:
      return undefined;
  }
}

/**
 * Extract the error message from a relay error body.
 */
function extractErrorMessage(payload: unknown): string | undefined {
  if (!payload) return undefined;
  if (typeof payload === "string") return payload;
  if (typeof payload === "object" && "error" in payload) {
    const error = payload.error;
    if (error && typeof error === "object") {
      const message = "message" in error && typeof error.message === "string"
        ? error.message
        : undefined;
      const details = "details" in error && typeof error.details === "string"
        ? error.details
        : undefined;
      if (message && details) return `${message}: ${details}`;
      return message ?? details;
    }
    if (typeof error === "string") return error;
  }
  return JSON.stringify(payload);
}
