/**
 * Error codes for all relay error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Startup errors
  | "CONFIG_INVALID"
  | "BIND_FAILED"
  // Access errors
  | "ORIGIN_DENIED"
  | "AUTH_DENIED"
  // Request errors
  | "MALFORMED_REQUEST"
  | "PAYLOAD_TOO_LARGE"
  | "REQUEST_TIMEOUT"
  | "UNSUPPORTED_MEDIA_TYPE"
  | "NOT_FOUND"
  | "METHOD_NOT_ALLOWED"
  // Open errors
  | "OPEN_FAILED"
  | "OPEN_TIMEOUT"
  // Client errors
  | "RELAY_UNREACHABLE"
  | "RELAY_REJECTED"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * HTTP status returned to relay callers for each code.
 */
export const HTTP_STATUS: Record<ErrorCode, number> = {
  CONFIG_INVALID: 500,
  BIND_FAILED: 500,
  ORIGIN_DENIED: 403,
  AUTH_DENIED: 401,
  MALFORMED_REQUEST: 400,
  PAYLOAD_TOO_LARGE: 413,
  REQUEST_TIMEOUT: 408,
  UNSUPPORTED_MEDIA_TYPE: 415,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  OPEN_FAILED: 502,
  OPEN_TIMEOUT: 502,
  RELAY_UNREACHABLE: 502,
  RELAY_REJECTED: 502,
  UNKNOWN_ERROR: 500,
};

/**
 * Error carrying a code, an optional next step, and optional details.
 */
export class RelayError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "RelayError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }

  get status(): number {
    return HTTP_STATUS[this.code];
  }
}

/**
 * Type guard to check if an error is a RelayError.
 */
export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
