import { createHash, timingSafeEqual } from "crypto";

/** Header carrying the shared token on every relay request */
export const TOKEN_HEADER = "x-auth-token";

export interface AuthGuard {
  /** True only when `presented` equals the configured secret */
  verify(presented: string | undefined): boolean;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Constant-time token check.
 *
 * Both sides are reduced to SHA-256 digests, so the comparison always runs
 * over 32 bytes whatever the matching prefix or the token lengths. No
 * lockout or backoff: the origin filter is the trust boundary.
 */
export function createAuthGuard(secret: string): AuthGuard {
  if (!secret) {
    throw new Error("Auth guard needs a non-empty secret");
  }
  const expected = digest(secret);

  return {
    verify(presented) {
      const actual = digest(presented ?? "");
      const equal = timingSafeEqual(expected, actual);
      return equal && presented !== undefined && presented.length > 0;
    },
  };
}

/**
 * Read the token header; repeated headers count as absent.
 */
export function extractToken(
  headers: Record<string, string | string[] | undefined>
): string | undefined {
  const value = headers[TOKEN_HEADER];
  return typeof value === "string" ? value : undefined;
}
