/**
 * JSON output utilities for machine-readable CLI output.
 * Errors go through the error renderer; this covers success payloads.
 */

import { isJsonMode } from "./cli-context.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    durationMs?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface PingResultJson {
  endpoint: string;
  service: string;
  version: string;
  latencyMs: number;
}

export interface SendResultJson {
  endpoint: string;
  url: string;
  dryRun: boolean;
  elapsedMs: number;
}

export interface TokenResultJson {
  token: string;
  bytes: number;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

export interface ConfigPathJson {
  user: { path: string; exists: boolean };
  system: { path: string; exists: boolean };
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
